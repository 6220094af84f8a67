import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import {
  END_BUFFER_SECONDS,
  FPS,
  FRAME_SIZES,
  OUTPUT_DIRS,
  OVERSCALE_FACTOR,
  type MotionPattern,
  type Orientation,
} from '../../config/settings';
import type { TimedWord } from '../../types/alignment.types';
import { fileTimestamp } from '../../utils/file-naming';
import { errorMessage } from '../pipeline/pipeline-error';
import { buildClipFilterGraph } from './motion-effects';
import defaultRenderPool, { type RenderPool } from './render-pool';
import { buildSrt } from './subtitles';

// ===========================================================================
// FFmpeg video assembly
//
//   renderClip       still images -> one zoompan clip (no audio)
//   concatAndMux     clips (+ black end buffer) + narration (+ burned SRT)
//   concatSections   finished section videos -> one video
//
// Every render holds a RenderPool slot for the lifetime of its process.
// ===========================================================================

export interface ClipRenderRequest {
  imagePaths: string[];
  /** Seconds per image, same length as imagePaths */
  durations: number[];
  motions: MotionPattern[];
  orientation: Orientation;
}

export interface AssembleRequest {
  clipPaths: string[];
  audioPath: string;
  orientation: Orientation;
  addEndBuffer: boolean;
  /** Burn word-timed subtitles when present */
  subtitleWords?: TimedWord[] | null;
  outputPath: string;
}

export interface ClipRenderer {
  renderClip(request: ClipRenderRequest): Promise<string>;
}

export interface Assembler {
  concatAndMux(request: AssembleRequest): Promise<string>;
  concatSections(sectionPaths: string[], outputPath: string): Promise<string>;
}

export type MediaRenderer = ClipRenderer & Assembler;

const SUBTITLE_STYLE =
  'FontName=Arial,FontSize=22,PrimaryColour=&H00FFFFFF,OutlineColour=&H00000000,Outline=2,MarginV=60,Alignment=2';

/** `<final dir>/<label>_<timestamp>_<runId>.mp4` */
export function finalVideoPath(label: string, runId: string): string {
  return path.join(OUTPUT_DIRS.final, `${label}_${fileTimestamp()}_${runId}.mp4`);
}

/** Sections of one run share `<sections dir>/<runId>/`. */
export function sectionVideoPath(runId: string, sectionIndex: number): string {
  return path.join(OUTPUT_DIRS.sections, runId, `section_${sectionIndex}_${fileTimestamp()}.mp4`);
}

/** Path as a filtergraph argument: forward slashes, colons escaped. */
export function escapeFilterPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/:/g, '\\:').replace(/'/g, "\\'");
}

/**
 * Concatenate `clipCount` video inputs (each fitted to the frame), an
 * optional end-buffer input right after them, and burn subtitles last.
 */
export function buildAssemblyFilterGraph(options: {
  clipCount: number;
  withEndBuffer: boolean;
  frame: { width: number; height: number };
  fps: number;
  subtitlePath?: string;
}): string {
  const { width, height } = options.frame;
  const videoCount = options.clipCount + (options.withEndBuffer ? 1 : 0);
  const fitted = Array.from(
    { length: videoCount },
    (_, i) =>
      `[${i}:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
      `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${options.fps}[c${i}]`
  );
  const labels = Array.from({ length: videoCount }, (_, i) => `[c${i}]`).join('');
  const concatTarget = options.subtitlePath ? '[vcat]' : '[out]';
  const graph = [...fitted, `${labels}concat=n=${videoCount}:v=1:a=0${concatTarget}`];
  if (options.subtitlePath) {
    graph.push(`[vcat]subtitles=filename=${escapeFilterPath(options.subtitlePath)}:force_style='${SUBTITLE_STYLE}'[out]`);
  }
  return graph.join(';');
}

function runCommand(command: ffmpeg.FfmpegCommand, label: string): Promise<void> {
  return new Promise((resolve, reject) => {
    command
      .on('start', (commandLine: string) => {
        logger.debug(`FFmpeg ${label} started`, { commandLine });
      })
      .on('end', () => {
        resolve();
      })
      .on('error', (err: Error) => {
        logger.error(`FFmpeg ${label} error: ${err.message}`);
        reject(new Error(`FFmpeg ${label} failed: ${err.message}`));
      });
    command.run();
  });
}

export class VideoAssemblerService implements MediaRenderer {
  constructor(
    private readonly renderPool: RenderPool = defaultRenderPool,
    private readonly clipsDir: string = OUTPUT_DIRS.clips
  ) {}

  async renderClip(request: ClipRenderRequest): Promise<string> {
    if (request.imagePaths.length === 0) {
      throw new Error('renderClip requires at least one image');
    }
    if (request.durations.length !== request.imagePaths.length || request.motions.length !== request.imagePaths.length) {
      throw new Error(
        `renderClip got ${request.imagePaths.length} images, ${request.durations.length} durations and ${request.motions.length} motions`
      );
    }

    await fs.mkdir(this.clipsDir, { recursive: true });
    const clipPath = path.join(this.clipsDir, `${uuidv4().replace(/-/g, '')}.mp4`);
    const frame = FRAME_SIZES[request.orientation];
    const graph = buildClipFilterGraph(
      request.imagePaths.map((_, i) => ({ duration: request.durations[i], motion: request.motions[i] })),
      frame,
      OVERSCALE_FACTOR,
      FPS
    );

    await this.renderPool.run(() => {
      const command = ffmpeg();
      request.imagePaths.forEach((imagePath, i) => {
        command.input(imagePath).inputOptions(['-loop', '1', '-t', String(request.durations[i]), '-framerate', String(FPS)]);
      });
      command
        .outputOptions([
          '-filter_complex', graph,
          '-map', '[out]',
          '-c:v', 'libx264',
          '-pix_fmt', 'yuv420p',
          '-r', String(FPS),
          '-preset', 'slow',
        ])
        .output(clipPath);
      return runCommand(command, 'zoompan clip');
    });

    const expected = request.durations.reduce((sum, d) => sum + d, 0);
    logger.info(`Clip rendered: ${path.basename(clipPath)} (expected ${expected.toFixed(1)}s, ${request.imagePaths.length} images)`);
    return clipPath;
  }

  async concatAndMux(request: AssembleRequest): Promise<string> {
    if (request.clipPaths.length === 0) {
      throw new Error('No animated clips available for assembly');
    }

    const frame = FRAME_SIZES[request.orientation];
    await fs.mkdir(path.dirname(request.outputPath), { recursive: true });

    const subtitlePath = request.subtitleWords?.length
      ? request.outputPath.replace(/\.mp4$/, '') + '.srt'
      : undefined;
    if (subtitlePath && request.subtitleWords) {
      await fs.writeFile(subtitlePath, buildSrt(request.subtitleWords), 'utf-8');
    }

    const graph = buildAssemblyFilterGraph({
      clipCount: request.clipPaths.length,
      withEndBuffer: request.addEndBuffer,
      frame,
      fps: FPS,
      subtitlePath,
    });
    const audioIndex = request.clipPaths.length + (request.addEndBuffer ? 1 : 0);

    try {
      await this.renderPool.run(() => {
        const command = ffmpeg();
        for (const clipPath of request.clipPaths) command.input(clipPath);
        if (request.addEndBuffer) {
          command
            .input(`color=c=black:s=${frame.width}x${frame.height}:d=${END_BUFFER_SECONDS}:r=${FPS}`)
            .inputFormat('lavfi');
        }
        command
          .input(request.audioPath)
          .outputOptions([
            '-filter_complex', graph,
            '-map', '[out]',
            '-map', `${audioIndex}:a`,
            '-c:v', 'libx264',
            '-pix_fmt', 'yuv420p',
            '-c:a', 'aac',
            '-b:a', '192k',
            '-movflags', '+faststart',
          ])
          .output(request.outputPath);
        return runCommand(command, 'assembly');
      });
    } finally {
      if (subtitlePath) {
        await fs.rm(subtitlePath, { force: true }).catch((error: unknown) => {
          logger.warn(`Could not remove subtitle file ${subtitlePath}: ${errorMessage(error)}`);
        });
      }
    }

    logger.info(`Video assembled: ${request.outputPath}`, {
      clips: request.clipPaths.length,
      endBuffer: request.addEndBuffer,
      subtitles: Boolean(subtitlePath),
    });
    return request.outputPath;
  }

  async concatSections(sectionPaths: string[], outputPath: string): Promise<string> {
    if (sectionPaths.length === 0) {
      throw new Error('No section videos to concatenate');
    }
    await fs.mkdir(path.dirname(outputPath), { recursive: true });

    const streams = sectionPaths.map((_, i) => `[${i}:v][${i}:a]`).join('');
    const graph = `${streams}concat=n=${sectionPaths.length}:v=1:a=1[outv][outa]`;

    await this.renderPool.run(() => {
      const command = ffmpeg();
      for (const sectionPath of sectionPaths) command.input(sectionPath);
      command
        .outputOptions([
          '-filter_complex', graph,
          '-map', '[outv]',
          '-map', '[outa]',
          '-c:v', 'libx264',
          '-c:a', 'aac',
          '-b:a', '192k',
          '-movflags', '+faststart',
        ])
        .output(outputPath);
      return runCommand(command, 'section concat');
    });

    logger.info(`Sections concatenated: ${outputPath} (${sectionPaths.length} sections)`);
    return outputPath;
  }
}

export default new VideoAssemblerService();
