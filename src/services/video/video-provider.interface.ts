import type { Orientation, VideoProviderName } from '../../config/settings';

export interface VideoJobRequest {
  prompt: string;
  /** Whole seconds, already clamped to what the providers accept */
  durationSeconds: number;
  orientation: Orientation;
  /** JPEG bytes to animate from (image-to-video) */
  baseImage?: Buffer;
}

export type VideoJobStatus =
  | { state: 'pending' }
  | { state: 'succeeded'; videoUrl: string }
  | { state: 'failed'; reason: string };

/** Asynchronous text/image-to-video API: submit a job, then poll it. */
export interface VideoProvider {
  readonly name: VideoProviderName;
  isConfigured(): boolean;
  submit(request: VideoJobRequest): Promise<string>;
  poll(jobId: string): Promise<VideoJobStatus>;
}

export function aspectRatio(orientation: Orientation): '9:16' | '16:9' {
  return orientation === 'portrait' ? '9:16' : '16:9';
}

export function jpegDataUri(image: Buffer): string {
  return `data:image/jpeg;base64,${image.toString('base64')}`;
}
