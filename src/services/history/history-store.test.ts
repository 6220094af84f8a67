import { describe, it, expect, vi } from 'vitest';
import { VideoHistoryStore } from './history-store';
import type { VideoHistoryFields } from '../../models/VideoHistory';

const entry: VideoHistoryFields = {
  topic: 'Night markets',
  videoType: 'short_form',
  durationSeconds: 45,
  orientation: 'portrait',
  modelProvider: 'google',
  imageProvider: 'flux',
  voiceActor: 'american_male_narrator',
  videoPath: 'output/final/night_markets.mp4',
  script: 'Lanterns glow.',
  goal: 'Inspire a visit',
};

describe('VideoHistoryStore', () => {
  it('persists the entry', async () => {
    const persist = vi.fn().mockResolvedValue(undefined);

    await new VideoHistoryStore(persist).record(entry);

    expect(persist).toHaveBeenCalledWith(entry);
  });

  it('swallows a failed write', async () => {
    const persist = vi.fn().mockRejectedValue(new Error('connection refused'));

    await expect(new VideoHistoryStore(persist).record(entry)).resolves.toBeUndefined();
  });
});
