import { describe, it, expect, vi } from 'vitest';
import path from 'path';
import { StepCheckpointer } from './step-checkpointer';

const fixedNow = () => new Date(2025, 10, 9, 14, 7, 3);

describe('StepCheckpointer', () => {
  it('names files by timestamp and sanitized label', async () => {
    const write = vi.fn(async () => undefined);
    const checkpointer = new StepCheckpointer('/data/ckpt', { write, now: fixedNow });

    const filePath = await checkpointer.save({ step: 1 }, 'lf sec2/script');

    expect(filePath).toBe(path.join('/data/ckpt', '20251109_140703_lf_sec2-script.json'));
  });

  it('omits word alignments at any depth', async () => {
    const write = vi.fn(async (_filePath: string, _contents: string) => undefined);
    const checkpointer = new StepCheckpointer('/data/ckpt', { write, now: fixedNow });

    await checkpointer.save(
      {
        audioPath: 'narration.mp3',
        wordAlignments: [{ text: 'hi', startTime: 0, endTime: 0.2 }],
        sections: [{ title: 'Intro', words: [{ text: 'hey', startTime: 0, endTime: 0.1 }] }],
      },
      'after_audio'
    );

    const contents = write.mock.calls[0][1];
    expect(JSON.parse(contents)).toEqual({ audioPath: 'narration.mp3', sections: [{ title: 'Intro' }] });
  });

  it('honours a custom exclude list', async () => {
    const write = vi.fn(async (_filePath: string, _contents: string) => undefined);
    const checkpointer = new StepCheckpointer('/data/ckpt', { write, now: fixedNow, exclude: ['secret'] });

    await checkpointer.save({ secret: 'test-secret', words: ['kept'] }, 'after_goal');

    expect(JSON.parse(write.mock.calls[0][1])).toEqual({ words: ['kept'] });
  });

  it('returns null instead of throwing when the write fails', async () => {
    const checkpointer = new StepCheckpointer('/data/ckpt', {
      now: fixedNow,
      write: async () => {
        throw new Error('EACCES');
      },
    });

    await expect(checkpointer.save({}, 'after_goal')).resolves.toBeNull();
  });

  it('returns null when the state cannot be serialized', async () => {
    const write = vi.fn(async () => undefined);
    const checkpointer = new StepCheckpointer('/data/ckpt', { write, now: fixedNow });
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;

    await expect(checkpointer.save(cyclic, 'after_goal')).resolves.toBeNull();
    expect(write).not.toHaveBeenCalled();
  });
});
