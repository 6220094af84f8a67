import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';
import type { PipelineKind } from '../models/GenerationRun';

// Redis connection configuration
const redisConnection = new Redis(process.env.REDIS_URL || 'redis://localhost:6379', {
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
});

redisConnection.on('connect', () => {
  logger.info('Redis connected successfully');
});

redisConnection.on('error', (error) => {
  logger.error('Redis connection error:', error);
});

// Queue names
export const QUEUE_NAMES = {
  VIDEO_GENERATION: 'video-generation',
} as const;

export interface GenerationJobData {
  /** GenerationRun document id */
  runId: string;
  kind: PipelineKind;
  input: Record<string, unknown>;
}

// Pipelines are not retried wholesale; provider calls retry on their own
export const videoGenerationQueue = new Queue<GenerationJobData>(QUEUE_NAMES.VIDEO_GENERATION, {
  connection: redisConnection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: {
      count: 100, // Keep last 100 completed jobs
      age: 24 * 3600, // Keep for 24 hours
    },
    removeOnFail: {
      count: 200, // Keep last 200 failed jobs
    },
  },
});

// Queue events for monitoring
const setupQueueEvents = (queueName: string) => {
  const queueEvents = new QueueEvents(queueName, { connection: redisConnection });

  queueEvents.on('completed', ({ jobId }) => {
    logger.info(`Job ${jobId} in queue ${queueName} completed`);
  });

  queueEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error(`Job ${jobId} in queue ${queueName} failed:`, failedReason);
  });

  queueEvents.on('progress', ({ jobId, data }) => {
    logger.debug(`Job ${jobId} in queue ${queueName} progress:`, data);
  });
};

// Setup events for all queues
Object.values(QUEUE_NAMES).forEach(setupQueueEvents);

export default redisConnection;
