import { loadEnv, envNumber } from '../config/env';
loadEnv();

import { Worker, Job } from 'bullmq';
import redisConnection, { QUEUE_NAMES, type GenerationJobData } from '../config/redis';
import { logger } from '../config/logger';
import { GenerationRun, RunStatus } from '../models/GenerationRun';
import { createProgressReporter, runGeneration } from '../services/generation/generation-runner';
import { PipelineError, errorMessage } from '../services/pipeline/pipeline-error';

/**
 * Process one queued pipeline run
 */
const processVideoGeneration = async (job: Job<GenerationJobData>) => {
  const { runId, kind, input } = job.data;

  logger.info(`Processing ${kind} generation job ${job.id}`, { runId });

  await GenerationRun.findByIdAndUpdate(runId, { status: RunStatus.RUNNING, progress: 0 });

  const reporter = createProgressReporter(async (message, fraction) => {
    await job.updateProgress(Math.round(fraction * 100));
    await GenerationRun.findByIdAndUpdate(runId, { progress: fraction, progressMessage: message });
  });

  try {
    const outputPaths = await runGeneration(kind, input, { runId, onProgress: reporter.onProgress });
    await reporter.flush();

    await GenerationRun.findByIdAndUpdate(runId, {
      status: RunStatus.COMPLETED,
      progress: 1,
      outputPaths,
      completedAt: new Date(),
    });

    logger.info(`Generation completed for job ${job.id}`, { runId, outputPaths });

    return { success: true, runId, outputPaths };
  } catch (error: unknown) {
    await reporter.flush();
    const failedStep = error instanceof PipelineError ? error.failedStep : undefined;

    logger.error(`Generation failed for job ${job.id}:`, {
      runId,
      failedStep,
      error: errorMessage(error),
    });

    await GenerationRun.findByIdAndUpdate(runId, {
      status: RunStatus.FAILED,
      failedStep,
      errorMessage: errorMessage(error),
      completedAt: new Date(),
    });

    throw error;
  }
};

/**
 * Create and start the video generation worker
 */
export const createVideoGenerationWorker = () => {
  const worker = new Worker<GenerationJobData>(QUEUE_NAMES.VIDEO_GENERATION, processVideoGeneration, {
    connection: redisConnection,
    concurrency: envNumber('GENERATION_CONCURRENCY', 2),
  });

  worker.on('completed', (job) => {
    logger.info(`Generation job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`Generation job ${job?.id} failed:`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Generation worker error:', err);
  });

  logger.info('Video generation worker started');

  return worker;
};

export default createVideoGenerationWorker;
