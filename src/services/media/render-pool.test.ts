import { describe, it, expect } from 'vitest';
import { RenderPool } from './render-pool';

describe('RenderPool', () => {
  it('never runs more renders than its size', async () => {
    const pool = new RenderPool(2);
    let running = 0;
    let peak = 0;
    const render = async (id: number) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return id;
    };

    const results = await Promise.all([1, 2, 3, 4, 5].map((id) => pool.run(() => render(id))));

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
    expect(pool.active).toBe(0);
  });

  it('frees the slot when a render fails', async () => {
    const pool = new RenderPool(1);

    await expect(pool.run(async () => Promise.reject(new Error('ffmpeg exited with code 1')))).rejects.toThrow(
      'ffmpeg exited with code 1'
    );
    expect(await pool.run(async () => 'next')).toBe('next');
  });
});
