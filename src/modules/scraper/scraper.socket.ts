/**
 * Scraper Socket Handlers
 * Real-time job status and socket submissions
 */

import { logger } from '../../lib/logger';
import { getIO, ScrapeSocket } from '../../lib/socket';
import { ScrapeError } from '../../lib/scraping';
import { JOB_STATUS_EVENT, JobManager } from './job.manager';
import { IJobStatusEvent, ISubmitAck } from './scraper.types';

export const jobRoom = (jobId: string): string => `job:${jobId}`;

interface StatusEmitter {
  emit(event: 'scrape:status', payload: IJobStatusEvent): unknown;
}

/**
 * The part of the socket.io server the relay uses
 */
export interface StatusRelayTarget {
  except(room: string): StatusEmitter;
  to(room: string): StatusEmitter;
}

/**
 * Relay every job state change to all clients, once each: room members
 * get it through the room, everyone else through the broadcast.
 * Returns a function that detaches the relay.
 */
export const bindJobStatusBroadcast = (manager: JobManager, io: StatusRelayTarget = getIO()): (() => void) => {
  const relay = (event: IJobStatusEvent): void => {
    const room = jobRoom(event.jobId);
    io.except(room).emit('scrape:status', event);
    io.to(room).emit('scrape:status', event);
  };

  manager.on(JOB_STATUS_EVENT, relay);
  return () => {
    manager.off(JOB_STATUS_EVENT, relay);
  };
};

/**
 * Register scraper socket event handlers
 */
export const registerScraperSocketHandlers = (socket: ScrapeSocket, manager: JobManager): void => {
  /**
   * Join a job room for real-time updates
   */
  socket.on('scrape:subscribe', (jobId: unknown) => {
    if (typeof jobId !== 'string' || !jobId) return;
    socket.join(jobRoom(jobId));
    logger.debug(`Socket ${socket.id} joined job room: ${jobId}`);
  });

  /**
   * Leave a job room
   */
  socket.on('scrape:unsubscribe', (jobId: unknown) => {
    if (typeof jobId !== 'string' || !jobId) return;
    socket.leave(jobRoom(jobId));
    logger.debug(`Socket ${socket.id} left job room: ${jobId}`);
  });

  /**
   * Submit a job over the socket; the submitter joins the job room
   */
  socket.on('scrape:submit', (payload: unknown, ack?: (response: ISubmitAck) => void) => {
    let response: ISubmitAck;
    try {
      const jobId = manager.submit(payload);
      socket.join(jobRoom(jobId));
      response = { success: true, jobId };
    } catch (error) {
      if (!(error instanceof ScrapeError)) {
        logger.error(`Socket ${socket.id}: submission failed`, error);
      }
      response =
        error instanceof ScrapeError
          ? { success: false, error: error.message, code: error.code }
          : { success: false, error: 'Internal error', code: 'Internal' };
    }

    if (typeof ack === 'function') {
      ack(response);
    }
  });
};
