import {
  DEFAULT_MOTION_PATTERN,
  IDEAL_IMAGE_DURATION,
  MIN_IMAGE_DURATION,
  type MotionPattern,
} from '../../config/settings';
import type { SegmentTiming } from '../../types/alignment.types';
import type { VisualPlan } from '../../types/pipeline.types';
import type { SegmentStoryboard } from '../../types/v2.types';

// ===========================================================================
// Visual planning
//
// Turns segment durations into image counts. Every image except the last
// in a segment runs for the ideal duration; the last one absorbs the rest.
// ===========================================================================

export interface PlanVisualsOptions {
  idealImageDuration?: number;
  minImageDuration?: number;
  singleImagePerSegment?: boolean;
}

/** Images needed for a segment and how long the last one runs. */
export function computeImagesPerSegment(
  duration: number,
  ideal: number = IDEAL_IMAGE_DURATION,
  min: number = MIN_IMAGE_DURATION
): { numImages: number; lastImageDuration: number } {
  if (duration <= ideal) {
    return { numImages: 1, lastImageDuration: duration };
  }
  const full = Math.floor(duration / ideal);
  const excess = duration - full * ideal;
  if (excess > min) {
    return { numImages: full + 1, lastImageDuration: excess };
  }
  return { numImages: full, lastImageDuration: ideal + excess };
}

export function emptyVisualPlan(segmentIndex: number, numImages: number, lastImageDuration: number): VisualPlan {
  return { segmentIndex, numImages, lastImageDuration, imageDescriptions: [], imagePaths: [], videoPath: null };
}

export function planVisuals(timings: readonly SegmentTiming[], options: PlanVisualsOptions = {}): VisualPlan[] {
  return timings.map((timing, index) => {
    if (options.singleImagePerSegment) {
      return emptyVisualPlan(index, 1, timing.duration);
    }
    const { numImages, lastImageDuration } = computeImagesPerSegment(
      timing.duration,
      options.idealImageDuration,
      options.minImageDuration
    );
    return emptyVisualPlan(index, numImages, lastImageDuration);
  });
}

/**
 * One plan per storyboard entry and one image per shot. Shot prompts become
 * the image descriptions; the last shot's duration becomes the last image's.
 */
export function buildVisualPlansFromStoryboard(storyboards: readonly SegmentStoryboard[]): VisualPlan[] {
  return storyboards.map((board, index) => {
    const lastShot = board.shots[board.shots.length - 1];
    const plan = emptyVisualPlan(index, board.shots.length, lastShot ? lastShot.durationMs / 1000 : 3);
    plan.imageDescriptions = board.shots.map((shot) => ({ description: shot.imagePrompt, usesLogo: false }));
    return plan;
  });
}

/**
 * Motion for every image of every plan. Image k of the whole run uses
 * patterns[(start + k) % patterns.length]; counts come from `imageCounts`.
 */
export function assignMotions(
  imageCounts: readonly number[],
  patterns: readonly MotionPattern[] = DEFAULT_MOTION_PATTERN,
  start = 0
): MotionPattern[][] {
  let cursor = start;
  return imageCounts.map((count) =>
    Array.from({ length: count }, () => patterns[cursor++ % patterns.length])
  );
}

/** Per-image durations for a plan: ideal for all but the last. */
export function imageDurations(plan: Pick<VisualPlan, 'lastImageDuration'>, imageCount: number, ideal: number): number[] {
  return Array.from({ length: imageCount }, (_, i) => (i === imageCount - 1 ? plan.lastImageDuration : ideal));
}
