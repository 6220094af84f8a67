import path from 'path';
import voiceActorsData from '../../data/voice-actors.json';
import { envNumber, envString } from './env';

// ===========================================================================
// Pipeline settings
//
// Typed constants shared by every pipeline. Paths and limits can be
// overridden from the environment; everything else is fixed per release.
// ===========================================================================

// ----- Provider names -----

export const LLM_PROVIDERS = ['google', 'openai', 'anthropic', 'xai', 'deepseek'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export const IMAGE_PROVIDERS = ['google', 'openai', 'flux'] as const;
export type ImageProviderName = (typeof IMAGE_PROVIDERS)[number];

export const VIDEO_PROVIDERS = ['runway', 'luma', 'kling'] as const;
export type VideoProviderName = (typeof VIDEO_PROVIDERS)[number];

/** Every external provider guarded by the rate-limited pool. */
export type PooledProviderName = ImageProviderName | VideoProviderName | 'elevenlabs' | 'tavily';

export const ORIENTATIONS = ['portrait', 'landscape'] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

export const VISUAL_MODES = ['zoompan', 'video_gen'] as const;
export type VisualMode = (typeof VISUAL_MODES)[number];

export const MOTION_PATTERNS = ['zoom_in', 'zoom_out', 'pan_right', 'pan_left', 'pan_up', 'pan_down', 'ken_burns'] as const;
export type MotionPattern = (typeof MOTION_PATTERNS)[number];

export const DEFAULT_MOTION_PATTERN: MotionPattern[] = ['zoom_in', 'zoom_out'];
export const UGC_MOTION_PATTERN: MotionPattern[] = ['zoom_in', 'zoom_out', 'pan_right', 'ken_burns'];

// ----- Output layout -----

const OUTPUT_ROOT = path.resolve(process.cwd(), envString('OUTPUT_DIR', 'output'));

export const OUTPUT_DIRS = {
  root: OUTPUT_ROOT,
  audio: path.join(OUTPUT_ROOT, 'audio'),
  images: path.join(OUTPUT_ROOT, 'images'),
  clips: path.join(OUTPUT_ROOT, 'clips'),
  sections: path.join(OUTPUT_ROOT, 'sections'),
  final: path.join(OUTPUT_ROOT, 'final'),
  checkpoints: path.join(OUTPUT_ROOT, 'checkpoints'),
  ebooks: path.join(OUTPUT_ROOT, 'ebooks'),
  uploads: path.join(OUTPUT_ROOT, 'uploads'),
} as const;

// ----- Video -----

export const FPS = 48;

export const FRAME_SIZES: Record<Orientation, { width: number; height: number }> = {
  portrait: { width: 1080, height: 1920 },
  landscape: { width: 1920, height: 1080 },
};

/** Images are upscaled before zoompan so camera motion never exposes edges. */
export const OVERSCALE_FACTOR = 2;

export const END_BUFFER_SECONDS = 1;
export const SUBTITLE_WORDS_PER_CUE = 4;

// ----- Visual planning -----

export const IDEAL_IMAGE_DURATION = 3;
export const MIN_IMAGE_DURATION = 2;

export const VIDEO_CLIP_MIN_SECONDS = 3;
export const VIDEO_CLIP_MAX_SECONDS = 10;

// ----- LLM -----

export const LLM_MODELS: Record<LLMProviderName, string> = {
  google: envString('GEMINI_MODEL', 'gemini-2.5-pro'),
  openai: envString('OPENAI_MODEL', 'gpt-4o'),
  anthropic: envString('ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),
  xai: envString('XAI_MODEL', 'grok-3-latest'),
  deepseek: envString('DEEPSEEK_MODEL', 'deepseek-chat'),
};

export const MAX_SCRIPT_REVISIONS = 2;
export const MAX_OUTLINE_REVISIONS = 2;

// ----- Retry and rate limits -----

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const PROVIDER_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 2000, maxDelayMs: 30000 };
export const LLM_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 2000, maxDelayMs: 30000 };
export const TTS_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 3000, maxDelayMs: 30000 };

export interface ProviderLimit {
  /** Requests allowed per period */
  maxRate: number;
  periodMs: number;
  /** Simultaneous in-flight requests */
  concurrency: number;
}

const IMAGE_RATE_PERIOD_MS = envNumber('IMAGE_RATE_LIMIT_PERIOD_MS', 9000);

export const PROVIDER_LIMITS: Record<PooledProviderName, ProviderLimit> = {
  google: { maxRate: 1, periodMs: IMAGE_RATE_PERIOD_MS, concurrency: 8 },
  openai: { maxRate: 1, periodMs: IMAGE_RATE_PERIOD_MS, concurrency: 8 },
  flux: { maxRate: 1, periodMs: IMAGE_RATE_PERIOD_MS, concurrency: 5 },
  runway: { maxRate: 1, periodMs: 5000, concurrency: 2 },
  luma: { maxRate: 1, periodMs: 5000, concurrency: 2 },
  kling: { maxRate: 1, periodMs: 5000, concurrency: 2 },
  elevenlabs: { maxRate: 4, periodMs: 1000, concurrency: 4 },
  tavily: { maxRate: 5, periodMs: 1000, concurrency: 5 },
};

export const VIDEO_POLL_INTERVAL_MS = 5000;
export const VIDEO_POLL_TIMEOUT_MS = 300000;

// ----- Voices -----

export const VOICE_ACTORS: Readonly<Record<string, string>> = voiceActorsData;
export const DEFAULT_VOICE_MODEL = 'eleven_v3';
