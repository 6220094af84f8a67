import path from 'path';
import type { ImageProviderName, Orientation } from '../config/settings';
import type { SegmentTiming, TimedWord } from '../types/alignment.types';
import type { VideoHistoryFields } from '../models/VideoHistory';
import type { HistoryStore } from '../services/history/history-store';
import type { ImageGenerator } from '../services/image/image.service';
import type { AssembleRequest, ClipRenderRequest, MediaRenderer } from '../services/media/video-assembler.service';
import type { MediaDependencies, OrchestratorOptions, SegmentAligner } from '../services/orchestrators/run-context';
import type { CheckpointWriter } from '../services/pipeline/step-checkpointer';
import { RateLimitedProviderPool } from '../services/providers/rate-limited-pool';
import type { SynthesisRequest, TextToSpeechClient } from '../services/tts/tts-provider.interface';
import type { ClipRequest, VideoGenerator } from '../services/video/video.service';

// In-process stand-ins for the media collaborators of the orchestrators.

export class FakeTts implements TextToSpeechClient {
  readonly requests: SynthesisRequest[] = [];
  failWith: Error | null = null;

  isConfigured(): boolean {
    return true;
  }

  async synthesize(request: SynthesisRequest): Promise<{ audioPath: string; words: TimedWord[] }> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    const words = request.text
      .split(/\s+/)
      .filter(Boolean)
      .map((text, i) => ({ text, startTime: i * 0.5, endTime: i * 0.5 + 0.4 }));
    return { audioPath: `/audio/narration_${this.requests.length}.mp3`, words };
  }
}

/** Segment i lasts durations[i] seconds (the last entry repeats), back to back. */
export class FakeAligner implements SegmentAligner {
  readonly calls: string[][] = [];

  constructor(private readonly durations: number[] = [4]) {}

  align(_words: readonly TimedWord[], segments: readonly string[]): SegmentTiming[] {
    this.calls.push([...segments]);
    let start = 0;
    return segments.map((_, i) => {
      const duration = this.durations[Math.min(i, this.durations.length - 1)];
      const timing = { startTime: start, endTime: start + duration, duration };
      start += duration;
      return timing;
    });
  }
}

export class FakeImages implements ImageGenerator {
  readonly prompts: { prompt: string; orientation: Orientation; provider: ImageProviderName }[] = [];
  /** Prompt that makes generation throw */
  failOn: string | null = null;

  async generateImage(prompt: string, orientation: Orientation, provider: ImageProviderName): Promise<string> {
    this.prompts.push({ prompt, orientation, provider });
    if (prompt === this.failOn) throw new Error(`image rejected: ${prompt}`);
    return `/images/image_${this.prompts.length}.png`;
  }

  async generateImages(
    prompts: readonly string[],
    orientation: Orientation,
    provider: ImageProviderName
  ): Promise<string[]> {
    const paths: string[] = [];
    for (const prompt of prompts) paths.push(await this.generateImage(prompt, orientation, provider));
    return paths;
  }
}

export class FakeVideos implements VideoGenerator {
  readonly requests: ClipRequest[] = [];
  failOn: string | null = null;

  async generateClip(request: ClipRequest): Promise<string> {
    this.requests.push(request);
    if (request.prompt === this.failOn) throw new Error(`clip job failed: ${request.prompt}`);
    return `/clips/ai_${this.requests.length}.mp4`;
  }
}

export class FakeRenderer implements MediaRenderer {
  readonly clips: ClipRenderRequest[] = [];
  readonly assembled: AssembleRequest[] = [];
  readonly concatenated: { sectionPaths: string[]; outputPath: string }[] = [];

  /** Image path whose render throws */
  failOn: string | null = null;

  async renderClip(request: ClipRenderRequest): Promise<string> {
    this.clips.push(request);
    if (this.failOn !== null && request.imagePaths.includes(this.failOn)) throw new Error('ffmpeg exited with code 1');
    return `/clips/zoompan_${this.clips.length}.mp4`;
  }

  async concatAndMux(request: AssembleRequest): Promise<string> {
    this.assembled.push(request);
    return request.outputPath;
  }

  async concatSections(sectionPaths: string[], outputPath: string): Promise<string> {
    this.concatenated.push({ sectionPaths, outputPath });
    return outputPath;
  }
}

export class FakeHistory implements HistoryStore {
  readonly entries: VideoHistoryFields[] = [];

  async record(entry: VideoHistoryFields): Promise<void> {
    this.entries.push(entry);
  }
}

/** Checkpoint writer that keeps labels in memory, in write order. */
export class MemoryCheckpoints {
  readonly labels: string[] = [];
  readonly paths: string[] = [];

  readonly write: CheckpointWriter = async (filePath) => {
    this.paths.push(filePath);
    // `<YYYYMMDD_HHMMSS>_<label>.json`
    this.labels.push(path.basename(filePath, '.json').slice(16));
  };

  options(): OrchestratorOptions {
    return {
      checkpointDir: '/checkpoints',
      checkpointWrite: this.write,
      createPool: () => new RateLimitedProviderPool(undefined, async () => undefined),
    };
  }
}

export function fakeMedia(durations?: number[]) {
  const media = {
    tts: new FakeTts(),
    images: new FakeImages(),
    videos: new FakeVideos(),
    renderer: new FakeRenderer(),
    aligner: new FakeAligner(durations),
    history: new FakeHistory(),
  };
  return media satisfies MediaDependencies;
}
