import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { OUTPUT_DIRS } from '../../config/settings';
import type { SegmentTiming, TimedWord } from '../../types/alignment.types';
import wordAligner from '../alignment/word-aligner';
import historyStore, { type HistoryStore } from '../history/history-store';
import imageService, { type ImageGenerator } from '../image/image.service';
import videoAssembler, { type MediaRenderer } from '../media/video-assembler.service';
import { StageRunner, type ProgressCallback } from '../pipeline/stage-runner';
import { StepCheckpointer, type CheckpointWriter } from '../pipeline/step-checkpointer';
import { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import elevenLabsService from '../tts/elevenlabs.service';
import type { TextToSpeechClient } from '../tts/tts-provider.interface';
import videoService, { type VideoGenerator } from '../video/video.service';

// ===========================================================================
// Shared wiring for the orchestrators
//
// Each run gets its own state, StageRunner, StepCheckpointer and provider
// pool. Collaborators are injected so tests can swap in fakes.
// ===========================================================================

export interface SegmentAligner {
  align(words: readonly TimedWord[], segments: readonly string[]): SegmentTiming[];
}

/** What every video orchestrator needs besides its LLM-backed writers. */
export interface MediaDependencies {
  tts: TextToSpeechClient;
  images: ImageGenerator;
  videos: VideoGenerator;
  renderer: MediaRenderer;
  aligner: SegmentAligner;
  history: HistoryStore;
}

export function defaultMediaDependencies(): MediaDependencies {
  return {
    tts: elevenLabsService,
    images: imageService,
    videos: videoService,
    renderer: videoAssembler,
    aligner: wordAligner,
    history: historyStore,
  };
}

export interface OrchestratorOptions {
  /** Defaults to the pipeline's directory under output/checkpoints; each run writes to `<dir>/<runId>/` */
  checkpointDir?: string;
  checkpointWrite?: CheckpointWriter;
  createPool?: () => RateLimitedProviderPool;
}

/** Per-run inputs supplied by the caller (worker or test). */
export interface RunContext {
  runId?: string;
  onProgress?: ProgressCallback;
}

export interface Run<S extends object> {
  runner: StageRunner<S>;
  pool: RateLimitedProviderPool;
}

export function startRun<S extends object>(
  state: S,
  defaultCheckpointDir: string,
  options: OrchestratorOptions,
  context: RunContext
): Run<S> {
  const runId = context.runId ?? uuidv4();
  const checkpointer = new StepCheckpointer(path.join(options.checkpointDir ?? defaultCheckpointDir, runId), {
    write: options.checkpointWrite,
  });
  const runner = new StageRunner(state, {
    runId,
    checkpointer,
    onProgress: context.onProgress,
  });
  return { runner, pool: options.createPool ? options.createPool() : new RateLimitedProviderPool() };
}

export const CHECKPOINT_DIRS = {
  video: OUTPUT_DIRS.checkpoints,
  ebook: path.join(OUTPUT_DIRS.checkpoints, 'ebook'),
  ugc: path.join(OUTPUT_DIRS.checkpoints, 'ugc'),
} as const;
