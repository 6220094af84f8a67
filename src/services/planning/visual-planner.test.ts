import { describe, it, expect } from 'vitest';
import {
  assignMotions,
  buildVisualPlansFromStoryboard,
  computeImagesPerSegment,
  imageDurations,
  planVisuals,
} from './visual-planner';

describe('computeImagesPerSegment', () => {
  it('uses one image for a segment no longer than the ideal duration', () => {
    expect(computeImagesPerSegment(2.4)).toEqual({ numImages: 1, lastImageDuration: 2.4 });
    expect(computeImagesPerSegment(3)).toEqual({ numImages: 1, lastImageDuration: 3 });
  });

  it('adds an image when the remainder is longer than the minimum', () => {
    expect(computeImagesPerSegment(8.5)).toEqual({ numImages: 3, lastImageDuration: 2.5 });
  });

  it('folds a short remainder into the last image', () => {
    const { numImages, lastImageDuration } = computeImagesPerSegment(7);
    expect(numImages).toBe(2);
    expect(lastImageDuration).toBeCloseTo(4);
  });

  it('treats a remainder equal to the minimum as short', () => {
    expect(computeImagesPerSegment(8)).toEqual({ numImages: 2, lastImageDuration: 5 });
  });
});

describe('planVisuals', () => {
  const timings = [
    { startTime: 0, endTime: 8.5, duration: 8.5 },
    { startTime: 8.5, endTime: 10, duration: 1.5 },
  ];

  it('creates one plan per timing', () => {
    expect(planVisuals(timings)).toEqual([
      { segmentIndex: 0, numImages: 3, lastImageDuration: 2.5, imageDescriptions: [], imagePaths: [], videoPath: null },
      { segmentIndex: 1, numImages: 1, lastImageDuration: 1.5, imageDescriptions: [], imagePaths: [], videoPath: null },
    ]);
  });

  it('keeps one image per segment when asked', () => {
    const plans = planVisuals(timings, { singleImagePerSegment: true });
    expect(plans.map((p) => [p.numImages, p.lastImageDuration])).toEqual([
      [1, 8.5],
      [1, 1.5],
    ]);
  });
});

describe('buildVisualPlansFromStoryboard', () => {
  it('maps shots to images and takes the last shot duration', () => {
    const plans = buildVisualPlansFromStoryboard([
      {
        segmentEnergy: 6,
        shots: [
          { imagePrompt: 'wide harbour', durationMs: 3000, motionType: 'zoom_in', motionSpeed: 'medium', transitionIn: 'cut' },
          { imagePrompt: 'rope close-up', durationMs: 2200, motionType: 'pan_left', motionSpeed: 'slow', transitionIn: 'cut' },
        ],
      },
      { segmentEnergy: 5, shots: [] },
    ]);

    expect(plans[0].numImages).toBe(2);
    expect(plans[0].lastImageDuration).toBe(2.2);
    expect(plans[0].imageDescriptions).toEqual([
      { description: 'wide harbour', usesLogo: false },
      { description: 'rope close-up', usesLogo: false },
    ]);
    expect(plans[1]).toMatchObject({ segmentIndex: 1, numImages: 0, lastImageDuration: 3 });
  });
});

describe('assignMotions', () => {
  it('continues the cycle across segments', () => {
    expect(assignMotions([3, 2], ['zoom_in', 'zoom_out'])).toEqual([
      ['zoom_in', 'zoom_out', 'zoom_in'],
      ['zoom_out', 'zoom_in'],
    ]);
  });

  it('starts part way through the cycle', () => {
    expect(assignMotions([1, 1], ['zoom_in', 'zoom_out', 'pan_right', 'ken_burns'], 3)).toEqual([
      ['ken_burns'],
      ['zoom_in'],
    ]);
  });
});

describe('imageDurations', () => {
  it('gives the last image the plan remainder', () => {
    expect(imageDurations({ lastImageDuration: 2.5 }, 3, 3)).toEqual([3, 3, 2.5]);
  });
});
