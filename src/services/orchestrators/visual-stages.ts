import { logger } from '../../config/logger';
import {
  DEFAULT_MOTION_PATTERN,
  type ImageProviderName,
  type MotionPattern,
  type Orientation,
  type VideoProviderName,
} from '../../config/settings';
import type { SegmentTiming } from '../../types/alignment.types';
import type { VisualPlan } from '../../types/pipeline.types';
import type { ImageGenerator } from '../image/image.service';
import type { ClipRenderer } from '../media/video-assembler.service';
import { assignMotions, imageDurations } from '../planning/visual-planner';
import { fanOut } from '../pipeline/stage-runner';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import type { VideoGenerator } from '../video/video.service';

// ===========================================================================
// Image and clip stages shared by the video pipelines
//
// Every helper writes into the plan it was handed, so a failing branch
// leaves its siblings' results on the state.
// ===========================================================================

/** One fan-out per plan, and one per image inside it. */
export async function generatePlanImages(
  plans: VisualPlan[],
  images: ImageGenerator,
  options: { orientation: Orientation; provider: ImageProviderName },
  pool: RateLimitedProviderPool
): Promise<void> {
  await fanOut(plans, async (plan) => {
    const prompts = plan.imageDescriptions.map((d) => d.description);
    plan.imagePaths = await images.generateImages(prompts, options.orientation, options.provider, pool);
  });
}

/**
 * Zoompan clip per plan. Motions cycle across the whole run, so image k of
 * the run uses patterns[(start + k) % patterns.length].
 */
export async function animatePlans(
  plans: VisualPlan[],
  renderer: ClipRenderer,
  options: { orientation: Orientation; idealImageDuration: number },
  patterns: readonly MotionPattern[] = DEFAULT_MOTION_PATTERN,
  start = 0
): Promise<string[]> {
  const motions = assignMotions(
    plans.map((p) => p.imagePaths.length),
    patterns,
    start
  );

  await fanOut(plans, async (plan, index) => {
    if (plan.imagePaths.length === 0) {
      logger.warn(`Segment ${plan.segmentIndex} has no images; skipping its clip`);
      return;
    }
    plan.videoPath = await renderer.renderClip({
      imagePaths: plan.imagePaths,
      durations: imageDurations(plan, plan.imagePaths.length, options.idealImageDuration),
      motions: motions[index],
      orientation: options.orientation,
    });
  });

  return collectClipPaths(plans);
}

export function fallbackClipPrompt(orientation: Orientation): string {
  return `B-roll footage, ${orientation} format`;
}

/**
 * One AI video clip per plan. The prompt is the plan's first image
 * description, the duration its segment's, and the first image (when there
 * is one) the clip's starting frame.
 */
export async function generatePlanClips(
  plans: VisualPlan[],
  timings: readonly SegmentTiming[],
  videos: VideoGenerator,
  options: { orientation: Orientation; provider: VideoProviderName },
  pool: RateLimitedProviderPool
): Promise<string[]> {
  await fanOut(plans, async (plan) => {
    const timing = timings[plan.segmentIndex];
    plan.videoPath = await videos.generateClip(
      {
        prompt: plan.imageDescriptions[0]?.description ?? fallbackClipPrompt(options.orientation),
        durationSeconds: timing ? timing.duration : plan.lastImageDuration,
        orientation: options.orientation,
        provider: options.provider,
        imagePath: plan.imagePaths[0] ?? null,
      },
      pool
    );
  });

  return collectClipPaths(plans);
}

export function collectClipPaths(plans: readonly VisualPlan[]): string[] {
  return plans.flatMap((p) => (p.videoPath ? [p.videoPath] : []));
}
