import { Request, Response } from 'express';
import mongoose from 'mongoose';
import { GenerationRun, PipelineKind } from '../models/GenerationRun';
import { videoGenerationQueue } from '../config/redis';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { logger } from '../config/logger';

/**
 * Record a run and queue it. Responds before any work starts; clients poll
 * GET /generations/:id for progress.
 */
export const enqueueGeneration = (kind: PipelineKind) =>
  asyncHandler(async (req: Request, res: Response) => {
    const input: Record<string, unknown> = req.body;

    const run = await GenerationRun.create({ kind, input });
    const runId = String(run._id);

    await videoGenerationQueue.add(kind, { runId, kind, input }, { jobId: runId });

    logger.info(`Generation queued: ${kind} run ${runId}`);

    res.status(202).json({
      success: true,
      data: {
        runId,
        kind,
        status: run.status,
      },
    });
  });

/**
 * Get a generation run by ID
 */
export const getGeneration = asyncHandler(async (req: Request, res: Response) => {
  const { id } = req.params;

  if (!mongoose.isValidObjectId(id)) {
    throw new AppError('Generation run not found', 404);
  }

  const run = await GenerationRun.findById(id).lean();

  if (!run) {
    throw new AppError('Generation run not found', 404);
  }

  res.json({
    success: true,
    data: run,
  });
});
