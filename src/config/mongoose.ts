import mongoose from 'mongoose';
import { envString } from './env';
import { logger } from './logger';
import { errorMessage } from '../services/pipeline/pipeline-error';

/** Hide user:password in connection strings before they reach the logs. */
export function redactUrl(url: string): string {
  return url.replace(/\/\/[^@/]+@/, '//***@');
}

/**
 * Connect the shared Mongoose instance used by the run, profile and history
 * models. Exits the process when the database is unreachable at startup.
 */
export const connectDB = async (): Promise<void> => {
  const databaseUrl = envString('DATABASE_URL', 'mongodb://localhost:27017/reelsmith');

  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  try {
    await mongoose.connect(databaseUrl);
    logger.info(`MongoDB connected: ${redactUrl(databaseUrl)}`);
  } catch (error: unknown) {
    logger.error('MongoDB connection failed: %s', errorMessage(error));
    logger.error('Check that MongoDB is running and DATABASE_URL=%s is reachable', redactUrl(databaseUrl));
    process.exit(1);
  }
};
