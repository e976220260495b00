/**
 * Server Entry Point
 * Starts the scrape engine, Express and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { logger } from './lib/logger';
import { connectDB, disconnectDB } from './lib/mongo';
import { closeSocket, initializeSocket } from './lib/socket';
import { createScrapeEngine, engineConfigFromEnv } from './modules/scraper/scraper.engine';
import { bindJobStatusBroadcast, registerScraperSocketHandlers } from './modules/scraper/scraper.socket';

const startServer = async (): Promise<void> => {
  try {
    const config = engineConfigFromEnv();

    if (config.store.kind === 'mongo') {
      await connectDB();
    } else {
      logger.info(`💾 Results will be written to ${config.store.outputDir}`);
    }

    const engine = createScrapeEngine(config);
    engine.start();

    const app = createApp(engine);
    const httpServer = createServer(app);
    const io = initializeSocket(httpServer);
    bindJobStatusBroadcast(engine.manager, io);

    io.on('connection', (socket) => {
      logger.info(`✅ Socket connected: ${socket.id}`);

      registerScraperSocketHandlers(socket, engine.manager);

      socket.on('disconnect', () => {
        logger.info(`❌ Socket disconnected: ${socket.id}`);
      });
    });

    httpServer.listen(env.PORT, () => {
      logger.info('');
      logger.info('🚀 ═══════════════════════════════════════════════════════');
      logger.info('🚀 Scrape Engine is running');
      logger.info(`🚀 Environment: ${env.NODE_ENV}`);
      logger.info(`🚀 Port: ${env.PORT}`);
      logger.info(`🚀 Workers: ${config.workerCount}, browsers: ${config.browser.size}`);
      logger.info(`🚀 Result store: ${config.store.kind}`);
      logger.info(`🚀 API: http://localhost:${env.PORT}/health`);
      logger.info(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
      logger.info('🚀 ═══════════════════════════════════════════════════════');
      logger.info('');
    });

    let shuttingDown = false;
    const shutdown = (signal: string): void => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`${signal} signal received: closing HTTP server`);

      closeSocket()
        .then(() => {
          logger.info('HTTP server closed');
          return engine.shutdown();
        })
        .then(() => (config.store.kind === 'mongo' ? disconnectDB() : undefined))
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();
