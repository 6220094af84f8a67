import { Request, Response } from 'express';
import mongoose from 'mongoose';
import { VideoHistory, VIDEO_TYPES, type VideoType } from '../models/VideoHistory';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { logger } from '../config/logger';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function isVideoType(value: unknown): value is VideoType {
  return VIDEO_TYPES.some((type) => type === value);
}

function parseLimit(value: unknown): number {
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_LIMIT;
  return Math.min(parsed, MAX_LIMIT);
}

async function findEntry(id: string) {
  if (!mongoose.isValidObjectId(id)) {
    throw new AppError('History entry not found', 404);
  }
  const entry = await VideoHistory.findById(id);
  if (!entry) {
    throw new AppError('History entry not found', 404);
  }
  return entry;
}

/**
 * List recorded videos, newest first
 */
export const getHistory = asyncHandler(async (req: Request, res: Response) => {
  const { videoType, limit } = req.query;

  if (videoType !== undefined && !isVideoType(videoType)) {
    throw new AppError(`Unknown video type: ${String(videoType)}`, 400);
  }

  const filter = videoType ? { videoType } : {};
  const entries = await VideoHistory.find(filter).sort({ createdAt: -1 }).limit(parseLimit(limit)).lean();

  res.json({
    success: true,
    data: entries,
  });
});

export const getHistoryEntry = asyncHandler(async (req: Request, res: Response) => {
  const entry = await findEntry(req.params.id);

  res.json({
    success: true,
    data: entry,
  });
});

/**
 * Delete a history record. The rendered video file is left in place.
 */
export const deleteHistoryEntry = asyncHandler(async (req: Request, res: Response) => {
  const entry = await findEntry(req.params.id);
  await entry.deleteOne();

  logger.info(`History entry deleted: ${req.params.id}`);

  res.json({
    success: true,
    message: 'History entry deleted successfully',
  });
});
