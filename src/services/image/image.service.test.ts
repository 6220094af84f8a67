import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ImageService } from './image.service';
import { GoogleImagenProvider } from './google-imagen.provider';
import { FluxProvider } from './flux.provider';
import type { ImageProvider } from './image-provider.interface';
import { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { okResponse } from '../../test/http';

vi.mock('axios');

const noWait = async () => undefined;
const retry = { attempts: 2, baseDelayMs: 10, maxDelayMs: 10 };

let outputDir: string;

beforeEach(async () => {
  vi.mocked(axios.post).mockReset();
  vi.mocked(axios.get).mockReset();
  outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-test-'));
});

afterEach(async () => {
  await fs.rm(outputDir, { recursive: true, force: true });
});

function pool() {
  return new RateLimitedProviderPool(undefined, noWait);
}

function fakeProvider(generate: ImageProvider['generate']): ImageProvider {
  return { name: 'openai', isConfigured: () => true, generate };
}

describe('ImageService.generateImage', () => {
  it('writes the provider bytes to a jpg file', async () => {
    const service = new ImageService({
      providers: [fakeProvider(async (prompt) => Buffer.from(`img:${prompt}`))],
      outputDir,
      retry,
      sleep: noWait,
    });

    const imagePath = await service.generateImage('a red kite', 'portrait', 'openai', pool());

    expect(path.dirname(imagePath)).toBe(outputDir);
    expect(path.extname(imagePath)).toBe('.jpg');
    expect(await fs.readFile(imagePath, 'utf-8')).toBe('img:a red kite');
  });

  it('retries a failed generation', async () => {
    const generate = vi
      .fn<Parameters<ImageProvider['generate']>, ReturnType<ImageProvider['generate']>>()
      .mockRejectedValueOnce(new ProviderError('openai', 'Rate limit exceeded', 429))
      .mockResolvedValueOnce(Buffer.from('ok'));
    const service = new ImageService({ providers: [fakeProvider(generate)], outputDir, retry, sleep: noWait });

    const imagePath = await service.generateImage('harbour at dawn', 'landscape', 'openai', pool());

    expect(generate).toHaveBeenCalledTimes(2);
    expect(generate).toHaveBeenLastCalledWith('harbour at dawn', 'landscape');
    expect(await fs.readFile(imagePath, 'utf-8')).toBe('ok');
  });

  it('rejects an unregistered provider', async () => {
    const service = new ImageService({ providers: [fakeProvider(async () => Buffer.from(''))], outputDir });

    await expect(service.generateImage('x', 'portrait', 'flux', pool())).rejects.toThrow(
      'Image provider "flux" is not registered. Available: openai'
    );
  });

  it('rejects a provider without credentials', async () => {
    const service = new ImageService({ providers: [new GoogleImagenProvider('')], outputDir });

    await expect(service.generateImage('x', 'portrait', 'google', pool())).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

describe('ImageService.generateImages', () => {
  it('returns one path per prompt in prompt order', async () => {
    const service = new ImageService({
      providers: [fakeProvider(async (prompt) => Buffer.from(prompt))],
      outputDir,
      retry,
      sleep: noWait,
    });

    const paths = await service.generateImages(['first', 'second', 'third'], 'portrait', 'openai', pool());

    const contents = await Promise.all(paths.map((p) => fs.readFile(p, 'utf-8')));
    expect(contents).toEqual(['first', 'second', 'third']);
  });
});

describe('GoogleImagenProvider', () => {
  it('requests a 9:16 image for portrait and decodes the prediction', async () => {
    vi.mocked(axios.post).mockResolvedValueOnce(
      okResponse({ predictions: [{ bytesBase64Encoded: Buffer.from('png-bytes').toString('base64') }] })
    );

    const image = await new GoogleImagenProvider('test-secret').generate('a lighthouse', 'portrait');

    expect(image.toString('utf-8')).toBe('png-bytes');
    expect(vi.mocked(axios.post).mock.calls[0][1]).toEqual({
      instances: [{ prompt: 'a lighthouse' }],
      parameters: { sampleCount: 1, aspectRatio: '9:16' },
    });
  });

  it('treats an empty prediction list as a provider error', async () => {
    vi.mocked(axios.post).mockResolvedValueOnce(okResponse({ predictions: [] }));

    await expect(new GoogleImagenProvider('test-secret').generate('x', 'landscape')).rejects.toBeInstanceOf(
      ProviderError
    );
  });
});

describe('FluxProvider', () => {
  it('polls until the job is ready and downloads the sample', async () => {
    vi.mocked(axios.post).mockResolvedValueOnce(okResponse({ polling_url: 'https://flux.test/poll/1' }));
    vi.mocked(axios.get)
      .mockResolvedValueOnce(okResponse({ status: 'Pending' }))
      .mockResolvedValueOnce(okResponse({ status: 'Ready', result: { sample: 'https://flux.test/sample.jpg' } }))
      .mockResolvedValueOnce(okResponse(Buffer.from('jpeg-bytes')));

    const image = await new FluxProvider('test-secret', noWait).generate('a forest trail', 'landscape');

    expect(image.toString('utf-8')).toBe('jpeg-bytes');
    expect(vi.mocked(axios.post).mock.calls[0][1]).toEqual({ prompt: 'a forest trail', width: 1920, height: 1088 });
    expect(vi.mocked(axios.get).mock.calls[2][0]).toBe('https://flux.test/sample.jpg');
  });

  it('surfaces a failed job', async () => {
    vi.mocked(axios.post).mockResolvedValueOnce(okResponse({ polling_url: 'https://flux.test/poll/2' }));
    vi.mocked(axios.get).mockResolvedValueOnce(okResponse({ status: 'Failed', error: 'content moderated' }));

    await expect(new FluxProvider('test-secret', noWait).generate('x', 'portrait')).rejects.toThrow(
      '[flux] Generation failed: content moderated'
    );
  });
});
