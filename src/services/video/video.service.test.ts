import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { VideoService, clampClipDuration } from './video.service';
import type { VideoJobRequest, VideoJobStatus, VideoProvider } from './video-provider.interface';
import { RunwayProvider } from './runway.provider';
import { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { VideoJobTimeoutError } from '../pipeline/pipeline-error';
import { okResponse } from '../../test/http';

vi.mock('axios');

const noWait = async () => undefined;

let outputDir: string;

beforeEach(async () => {
  vi.mocked(axios.get).mockReset();
  vi.mocked(axios.post).mockReset();
  outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'video-test-'));
});

afterEach(async () => {
  await fs.rm(outputDir, { recursive: true, force: true });
});

function fakeProvider(statuses: VideoJobStatus[]) {
  const submitted: VideoJobRequest[] = [];
  let polls = 0;
  const provider: VideoProvider = {
    name: 'runway',
    isConfigured: () => true,
    submit: async (request) => {
      submitted.push(request);
      return `job-${submitted.length}`;
    },
    poll: async () => statuses[Math.min(polls++, statuses.length - 1)],
  };
  return { provider, submitted, pollCount: () => polls };
}

function pool() {
  return new RateLimitedProviderPool(undefined, noWait);
}

describe('clampClipDuration', () => {
  it('keeps whole seconds between 3 and 10', () => {
    expect(clampClipDuration(1.2)).toBe(3);
    expect(clampClipDuration(6.8)).toBe(6);
    expect(clampClipDuration(14)).toBe(10);
  });
});

describe('VideoService.generateClip', () => {
  it('polls until the job succeeds and saves the download', async () => {
    const fake = fakeProvider([
      { state: 'pending' },
      { state: 'pending' },
      { state: 'succeeded', videoUrl: 'https://videos.test/clip.mp4' },
    ]);
    vi.mocked(axios.get).mockResolvedValueOnce(okResponse(Buffer.from('mp4-bytes')));
    const service = new VideoService({ providers: [fake.provider], outputDir, sleep: noWait });

    const clipPath = await service.generateClip(
      { prompt: 'waves on rocks', durationSeconds: 12.5, orientation: 'portrait', provider: 'runway' },
      pool()
    );

    expect(fake.pollCount()).toBe(3);
    expect(fake.submitted[0]).toEqual({
      prompt: 'waves on rocks',
      durationSeconds: 10,
      orientation: 'portrait',
      baseImage: undefined,
    });
    expect(await fs.readFile(clipPath, 'utf-8')).toBe('mp4-bytes');
    expect(path.extname(clipPath)).toBe('.mp4');
  });

  it('sends the base image bytes when an image path is given', async () => {
    const imagePath = path.join(outputDir, 'base.jpg');
    await fs.writeFile(imagePath, 'jpeg');
    const fake = fakeProvider([{ state: 'succeeded', videoUrl: 'https://videos.test/a.mp4' }]);
    vi.mocked(axios.get).mockResolvedValueOnce(okResponse(Buffer.from('mp4')));
    const service = new VideoService({ providers: [fake.provider], outputDir, sleep: noWait });

    await service.generateClip(
      { prompt: 'x', durationSeconds: 4, orientation: 'landscape', provider: 'runway', imagePath },
      pool()
    );

    expect(fake.submitted[0].baseImage?.toString('utf-8')).toBe('jpeg');
  });

  it('resubmits after a failed job', async () => {
    const fake = fakeProvider([
      { state: 'failed', reason: 'moderation' },
      { state: 'succeeded', videoUrl: 'https://videos.test/b.mp4' },
    ]);
    vi.mocked(axios.get).mockResolvedValueOnce(okResponse(Buffer.from('mp4')));
    const service = new VideoService({
      providers: [fake.provider],
      outputDir,
      retry: { attempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
      sleep: noWait,
    });

    await service.generateClip(
      { prompt: 'x', durationSeconds: 5, orientation: 'portrait', provider: 'runway' },
      pool()
    );

    expect(fake.submitted).toHaveLength(2);
  });

  it('times out a job that never finishes', async () => {
    const fake = fakeProvider([{ state: 'pending' }]);
    const service = new VideoService({
      providers: [fake.provider],
      outputDir,
      retry: { attempts: 1, baseDelayMs: 1, maxDelayMs: 1 },
      pollIntervalMs: 5000,
      pollTimeoutMs: 20000,
      sleep: noWait,
    });

    await expect(
      service.generateClip({ prompt: 'x', durationSeconds: 5, orientation: 'portrait', provider: 'runway' }, pool())
    ).rejects.toBeInstanceOf(VideoJobTimeoutError);
    expect(fake.pollCount()).toBe(4);
  });

  it('rejects a provider that is not registered', async () => {
    const service = new VideoService({ providers: [fakeProvider([]).provider], outputDir });

    await expect(
      service.generateClip({ prompt: 'x', durationSeconds: 5, orientation: 'portrait', provider: 'kling' }, pool())
    ).rejects.toThrow('Video provider "kling" is not registered. Available: runway');
  });
});

describe('RunwayProvider', () => {
  it('maps task states onto job statuses', async () => {
    vi.mocked(axios.get)
      .mockResolvedValueOnce(okResponse({ status: 'RUNNING' }))
      .mockResolvedValueOnce(okResponse({ status: 'SUCCEEDED', output: ['https://videos.test/r.mp4'] }))
      .mockResolvedValueOnce(okResponse({ status: 'FAILED', failure: 'bad prompt' }));
    const runway = new RunwayProvider('test-secret');

    expect(await runway.poll('t1')).toEqual({ state: 'pending' });
    expect(await runway.poll('t1')).toEqual({ state: 'succeeded', videoUrl: 'https://videos.test/r.mp4' });
    expect(await runway.poll('t1')).toEqual({ state: 'failed', reason: 'bad prompt' });
  });

  it('submits a 9:16 image-to-video task', async () => {
    vi.mocked(axios.post).mockResolvedValueOnce(okResponse({ id: 'task-9' }));

    const jobId = await new RunwayProvider('test-secret').submit({
      prompt: 'city at night',
      durationSeconds: 5,
      orientation: 'portrait',
    });

    expect(jobId).toBe('task-9');
    expect(vi.mocked(axios.post).mock.calls[0][1]).toEqual({
      promptText: 'city at night',
      model: 'gen3a_turbo',
      duration: 5,
      ratio: '9:16',
    });
  });
});
