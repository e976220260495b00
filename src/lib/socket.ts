/**
 * Socket.IO server lifecycle
 * Connection handling is done in server.ts
 */

import { Server as HTTPServer } from 'http';
import { Server, Socket } from 'socket.io';
import { env } from '../config/env';
import type { ClientToServerEvents, ServerToClientEvents } from '../modules/scraper/scraper.types';

export type ScrapeSocketServer = Server<ClientToServerEvents, ServerToClientEvents>;
export type ScrapeSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

let io: ScrapeSocketServer | null = null;

export const initializeSocket = (httpServer: HTTPServer, clientUrl: string = env.CLIENT_URL): ScrapeSocketServer => {
  io = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: clientUrl,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  });

  return io;
};

export const getIO = (): ScrapeSocketServer => {
  if (!io) {
    throw new Error('Socket.io not initialized! Call initializeSocket first.');
  }
  return io;
};

/**
 * Disconnect every client and close the attached HTTP server
 */
export const closeSocket = (): Promise<void> => {
  const server = io;
  io = null;
  if (!server) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
};
