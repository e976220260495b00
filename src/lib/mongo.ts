/**
 * MongoDB connection for the mongo result store
 */

import mongoose from 'mongoose';
import { env } from '../config/env';
import { logger } from './logger';

export const connectDB = async (uri: string = env.MONGODB_URI): Promise<void> => {
  if (mongoose.connection.readyState === 1) {
    return;
  }

  logger.info('📦 Connecting to MongoDB...');
  await mongoose.connect(uri);
  logger.info('✅ MongoDB connected');
};

export const disconnectDB = async (): Promise<void> => {
  if (mongoose.connection.readyState === 0) {
    return;
  }
  await mongoose.connection.close();
  logger.info('MongoDB disconnected');
};
