import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { MediaAnalyzerService } from './media-analyzer.service';
import { FakeStructuredGenerator } from '../../test/fake-llm';

const analysis = {
  hookStyle: 'question hook',
  pacing: 'fast cuts',
  tone: 'excited',
  ctaStyle: 'link in bio',
  shotTypes: ['close-up'],
  structureSummary: 'Hook, demo, verdict.',
};

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'media-test-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function writeFile(name: string, contents: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, contents);
  return filePath;
}

describe('MediaAnalyzerService.analyzeReferenceVideos', () => {
  it('skips videos that cannot be analyzed and caps the count at three', async () => {
    const videos = [
      await writeFile('a.mp4', 'video-a'),
      await writeFile('b.avi', 'video-b'),
      await writeFile('c.mov', 'video-c'),
      await writeFile('d.mp4', 'video-d'),
    ];
    const llm = new FakeStructuredGenerator({ ReferenceVideoAnalysis: [{ analysis }] });

    const results = await new MediaAnalyzerService(llm).analyzeReferenceVideos(videos);

    expect(results).toHaveLength(2);
    expect(results[0]).toMatchObject({ hookStyle: 'question hook', keyPhrases: [], estimatedDurationSeconds: 30 });
    const calls = llm.callsFor('ReferenceVideoAnalysis');
    expect(calls.map((c) => c.media?.[0].mimeType).sort()).toEqual(['video/mp4', 'video/quicktime']);
    expect(calls.every((c) => c.provider === 'google')).toBe(true);
  });
});

describe('MediaAnalyzerService.describeProduct', () => {
  it('sends every readable photo in one call', async () => {
    const photos = [await writeFile('front.jpg', 'front'), path.join(dir, 'gone.png'), await writeFile('side.png', 'side')];
    const llm = new FakeStructuredGenerator({
      ProductVisualDescription: [{ productVisualDescription: 'A matte green bottle with a bamboo cap.' }],
    });

    const description = await new MediaAnalyzerService(llm).describeProduct(photos);

    expect(description).toBe('A matte green bottle with a bamboo cap.');
    expect(llm.calls[0].media).toEqual([
      { mimeType: 'image/jpeg', data: Buffer.from('front').toString('base64') },
      { mimeType: 'image/png', data: Buffer.from('side').toString('base64') },
    ]);
  });

  it('answers without a model call when there are no photos', async () => {
    const llm = new FakeStructuredGenerator({});

    expect(await new MediaAnalyzerService(llm).describeProduct([])).toBe('No product images provided.');
    expect(llm.calls).toHaveLength(0);
  });
});
