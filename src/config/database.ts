import mongoose from 'mongoose';
import { env } from './env.js';
import { logger } from '../utils/logger.js';

export const connectDB = async (): Promise<void> => {
  const conn = await mongoose.connect(env.MONGODB_URI);
  logger.info(`MongoDB connected: ${conn.connection.host}`);

  // Indexes back the unique identifier and session-key lookups
  await Promise.all(Object.values(mongoose.models).map((model) => model.syncIndexes()));

  mongoose.connection.on('error', (err) => {
    logger.error('MongoDB runtime error:', err);
  });

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close(false);
  logger.info('MongoDB connection closed');
};
