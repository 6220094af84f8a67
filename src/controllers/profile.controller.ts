import { Request, Response } from 'express';
import { Profile } from '../models/Profile';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { logger } from '../config/logger';

/**
 * List saved profiles, optionally for one pipeline
 */
export const getProfiles = asyncHandler(async (req: Request, res: Response) => {
  const { pipeline } = req.query;
  const filter = typeof pipeline === 'string' ? { pipeline } : {};

  const profiles = await Profile.find(filter).sort({ name: 1 }).lean();

  res.json({
    success: true,
    data: profiles,
  });
});

export const getProfile = asyncHandler(async (req: Request, res: Response) => {
  const profile = await Profile.findOne({ name: req.params.name }).lean();

  if (!profile) {
    throw new AppError('Profile not found', 404);
  }

  res.json({
    success: true,
    data: profile,
  });
});

/**
 * Save a new profile. Names are unique.
 */
export const createProfile = asyncHandler(async (req: Request, res: Response) => {
  const { name, pipeline, settings } = req.body;

  const existing = await Profile.exists({ name });
  if (existing) {
    throw new AppError(`Profile "${name}" already exists`, 409);
  }

  const profile = await Profile.create({ name, pipeline, settings });

  logger.info(`Profile created: ${name}`);

  res.status(201).json({
    success: true,
    data: profile,
  });
});

export const updateProfile = asyncHandler(async (req: Request, res: Response) => {
  const profile = await Profile.findOneAndUpdate({ name: req.params.name }, req.body, {
    new: true,
    runValidators: true,
  });

  if (!profile) {
    throw new AppError('Profile not found', 404);
  }

  logger.info(`Profile updated: ${req.params.name}`);

  res.json({
    success: true,
    data: profile,
  });
});

export const deleteProfile = asyncHandler(async (req: Request, res: Response) => {
  const profile = await Profile.findOneAndDelete({ name: req.params.name });

  if (!profile) {
    throw new AppError('Profile not found', 404);
  }

  logger.info(`Profile deleted: ${req.params.name}`);

  res.json({
    success: true,
    message: 'Profile deleted successfully',
  });
});
