import { logger } from '../../config/logger';
import { PipelineError, errorMessage } from './pipeline-error';
import type { StepCheckpointer } from './step-checkpointer';

// ===========================================================================
// Stage Runner
//
// Runs named steps against one mutable state object:
//   success  -> checkpoint <label>, continue
//   failure  -> checkpoint FAILED_<step>, throw PipelineError(step, state, cause)
//
// Steps are never retried here; retry lives around individual provider calls.
// Fan-out branches write into their own slot of the state, so a failing
// branch leaves its siblings' finished work in place for the PipelineError.
// ===========================================================================

export type ProgressCallback = (message: string, fraction: number) => void;

export interface StageRunnerOptions {
  runId: string;
  checkpointer: StepCheckpointer;
  onProgress?: ProgressCallback;
}

/**
 * Run one task per item concurrently. Every started task is allowed to
 * finish; results come back in input order and the first failure (by time)
 * is rethrown once all tasks have settled.
 */
export async function fanOut<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const failures: unknown[] = [];

  await Promise.all(
    items.map(async (item, index) => {
      try {
        results[index] = await task(item, index);
      } catch (error) {
        failures.push(error);
      }
    })
  );

  if (failures.length > 0) throw failures[0];
  return results;
}

/**
 * Run tasks strictly one after another, handing each the previous result
 * (the baton). Stops at the first failure.
 */
export async function sequence<T, R>(
  items: readonly T[],
  task: (item: T, index: number, previous: R | undefined) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  let previous: R | undefined;
  for (let index = 0; index < items.length; index++) {
    previous = await task(items[index], index, previous);
    results.push(previous);
  }
  return results;
}

export class StageRunner<S extends object> {
  readonly runId: string;
  private readonly checkpointer: StepCheckpointer;
  private readonly onProgress?: ProgressCallback;

  constructor(
    readonly state: S,
    options: StageRunnerOptions
  ) {
    this.runId = options.runId;
    this.checkpointer = options.checkpointer;
    this.onProgress = options.onProgress;
  }

  /**
   * Execute one step. `label` names the success checkpoint; pass null for
   * steps that should not checkpoint on success.
   */
  async step<R>(name: string, label: string | null, fn: (state: S) => Promise<R> | R): Promise<R> {
    const startedAt = Date.now();
    this.log(`Step ${name}: started`);

    let result: R;
    try {
      result = await fn(this.state);
    } catch (error) {
      logger.error(`[Pipeline ${this.runId}] Step ${name} failed: ${errorMessage(error)}`);
      await this.checkpointer.save(this.state, `FAILED_${name}`);
      if (error instanceof PipelineError) throw error;
      throw new PipelineError(name, this.state, error);
    }

    if (label) await this.checkpointer.save(this.state, label);
    this.log(`Step ${name}: completed in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);
    return result;
  }

  /** Best-effort checkpoint outside a step boundary (revision loops, per-section saves). */
  checkpoint(label: string): Promise<string | null> {
    return this.checkpointer.save(this.state, label);
  }

  fanOut<T, R>(items: readonly T[], task: (item: T, index: number) => Promise<R>): Promise<R[]> {
    return fanOut(items, task);
  }

  sequence<T, R>(
    items: readonly T[],
    task: (item: T, index: number, previous: R | undefined) => Promise<R>
  ): Promise<R[]> {
    return sequence(items, task);
  }

  progress(message: string, fraction: number): void {
    const clamped = Math.max(0, Math.min(1, fraction));
    this.log(`${message} (${Math.round(clamped * 100)}%)`);
    this.onProgress?.(message, clamped);
  }

  log(message: string): void {
    logger.info(`[Pipeline ${this.runId}] ${message}`);
  }
}
