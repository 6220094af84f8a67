import os from 'os';
import { Semaphore } from '../providers/rate-limited-pool';

/**
 * Caps concurrent ffmpeg renders. Each render is its own OS process, so the
 * event loop only waits; the cap keeps the machine from oversubscribing.
 */
export class RenderPool {
  private readonly slots: Semaphore;

  constructor(readonly size: number = Math.max(1, os.cpus().length)) {
    this.slots = new Semaphore(size);
  }

  async run<T>(render: () => Promise<T>): Promise<T> {
    await this.slots.acquire();
    try {
      return await render();
    } finally {
      this.slots.release();
    }
  }

  get active(): number {
    return this.slots.inFlight;
  }
}

export default new RenderPool();
