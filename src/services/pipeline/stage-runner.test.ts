import { describe, it, expect, vi } from 'vitest';
import path from 'path';
import { StageRunner, fanOut, sequence } from './stage-runner';
import { StepCheckpointer, type CheckpointWriter } from './step-checkpointer';
import { PipelineError } from './pipeline-error';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
const fixedNow = () => new Date(2024, 0, 2, 3, 4, 5);

function createRunner<S extends object>(state: S, write: CheckpointWriter = vi.fn(async () => undefined)) {
  const checkpointer = new StepCheckpointer('/tmp/checkpoints', { write, now: fixedNow });
  const onProgress = vi.fn();
  const runner = new StageRunner(state, { runId: 'run-1', checkpointer, onProgress });
  return { runner, write, onProgress };
}

describe('StageRunner.step', () => {
  it('checkpoints the success label after the step', async () => {
    const { runner, write } = createRunner({ goal: '' });

    const result = await runner.step('generate_goal', 'after_goal', (state) => {
      state.goal = 'Teach tide pools';
      return 'done';
    });

    expect(result).toBe('done');
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith(
      path.join('/tmp/checkpoints', '20240102_030405_after_goal.json'),
      JSON.stringify({ goal: 'Teach tide pools' }, null, 2)
    );
  });

  it('skips the success checkpoint when the label is null', async () => {
    const { runner, write } = createRunner({});

    await runner.step('plan_visuals', null, () => undefined);

    expect(write).not.toHaveBeenCalled();
  });

  it('wraps a failure in PipelineError carrying the partial state', async () => {
    const initial: { script: string; audioPath: string | null } = { script: 'draft', audioPath: null };
    const { runner, write } = createRunner(initial);

    const error = await runner
      .step('generate_audio', 'after_audio', () => {
        throw new Error('voice not found');
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    if (!(error instanceof PipelineError)) return;
    expect(error.failedStep).toBe('generate_audio');
    expect(error.message).toBe("Pipeline failed at step 'generate_audio': voice not found");
    expect(error.partialState).toEqual({ script: 'draft', audioPath: null });
    expect(error.cause).toBeInstanceOf(Error);
    expect(write).toHaveBeenCalledWith(
      path.join('/tmp/checkpoints', '20240102_030405_FAILED_generate_audio.json'),
      expect.any(String)
    );
  });

  it('lets a PipelineError from a nested runner pass through', async () => {
    const { runner } = createRunner({});
    const inner = new PipelineError('section_3_audio', { section: 3 }, new Error('quota'));

    const error = await runner
      .step('script_writing', 'after_scripts', () => {
        throw inner;
      })
      .catch((e: unknown) => e);

    expect(error).toBe(inner);
  });

  it('keeps the step outcome when checkpoint writes fail', async () => {
    const failingWrite = vi.fn(async () => {
      throw new Error('disk full');
    });
    const { runner } = createRunner({ value: 0 }, failingWrite);

    await expect(runner.step('ok_step', 'after_ok', () => 42)).resolves.toBe(42);

    const error = await runner
      .step('bad_step', 'after_bad', () => {
        throw new Error('step broke');
      })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PipelineError);
    if (error instanceof PipelineError) expect(error.message).toContain('step broke');
    expect(failingWrite).toHaveBeenCalledTimes(2);
  });

  it('forwards clamped progress to the callback', () => {
    const { runner, onProgress } = createRunner({});

    runner.progress('Generating images', 1.4);

    expect(onProgress).toHaveBeenCalledWith('Generating images', 1);
  });
});

describe('fanOut', () => {
  it('places results by index regardless of completion order', async () => {
    const results = await fanOut([0, 1, 2, 3, 4], async (item) => {
      await delay((5 - item) * 3);
      return `result-${item}`;
    });

    expect(results).toEqual(['result-0', 'result-1', 'result-2', 'result-3', 'result-4']);
  });

  it('keeps sibling results in the state when one branch fails', async () => {
    const state: { images: (string | null)[] } = { images: [null, null, null, null, null] };
    const { runner } = createRunner(state);

    const error = await runner
      .step('generate_images', 'after_images', (s) =>
        runner.fanOut([0, 1, 2, 3, 4], async (index) => {
          await delay((5 - index) * 3);
          if (index === 2) throw new Error('image provider rejected prompt');
          s.images[index] = `image-${index}.png`;
          return index;
        })
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    if (!(error instanceof PipelineError)) return;
    expect(error.failedStep).toBe('generate_images');
    expect(error.partialState).toEqual({
      images: ['image-0.png', 'image-1.png', null, 'image-3.png', 'image-4.png'],
    });
  });

  it('rethrows the failure that happened first', async () => {
    const error = await fanOut([0, 1, 2], async (index) => {
      await delay(index === 0 ? 20 : 5);
      if (index === 0) throw new Error('slow failure');
      if (index === 2) throw new Error('fast failure');
      return index;
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) expect(error.message).toBe('fast failure');
  });
});

describe('sequence', () => {
  it('hands each task the previous result', async () => {
    const seen: (string | undefined)[] = [];

    const results = await sequence<string, string>(['intro', 'body', 'end'], async (chapter, index, previous) => {
      seen.push(previous);
      return `${index}:${chapter}`;
    });

    expect(seen).toEqual([undefined, '0:intro', '1:body']);
    expect(results).toEqual(['0:intro', '1:body', '2:end']);
  });

  it('stops at the first failure', async () => {
    const task = vi.fn(async (item: number) => {
      if (item === 1) throw new Error('chapter failed');
      return item;
    });

    await expect(sequence([0, 1, 2], task)).rejects.toThrow('chapter failed');
    expect(task).toHaveBeenCalledTimes(2);
  });
});
