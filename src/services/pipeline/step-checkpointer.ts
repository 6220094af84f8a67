import fs from 'fs';
import path from 'path';
import { logger } from '../../config/logger';
import { fileTimestamp, sanitizeLabel } from '../../utils/file-naming';
import { errorMessage } from './pipeline-error';

/** Word-level timings are large and reproducible, so they stay out of checkpoints. */
export const DEFAULT_EXCLUDED_KEYS = ['wordAlignments', 'words'];

export type CheckpointWriter = (filePath: string, contents: string) => Promise<void>;

export interface StepCheckpointerOptions {
  /** Keys dropped at any depth when serializing */
  exclude?: string[];
  write?: CheckpointWriter;
  now?: () => Date;
}

/**
 * Write-only JSON snapshots of pipeline state, one file per step:
 * `<YYYYMMDD_HHMMSS>_<label>.json`. Checkpoints are never read back; a
 * failed write is logged and ignored so it cannot change a step's outcome.
 */
export class StepCheckpointer {
  private readonly exclude: Set<string>;
  private readonly write: CheckpointWriter;
  private readonly now: () => Date;

  constructor(
    readonly directory: string,
    options: StepCheckpointerOptions = {}
  ) {
    this.exclude = new Set(options.exclude ?? DEFAULT_EXCLUDED_KEYS);
    this.now = options.now ?? (() => new Date());
    this.write =
      options.write ??
      (async (filePath, contents) => {
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        await fs.promises.writeFile(filePath, contents, 'utf-8');
      });
  }

  /** Returns the checkpoint path, or null when the write failed. */
  async save(state: unknown, label: string): Promise<string | null> {
    const filePath = path.join(this.directory, `${fileTimestamp(this.now())}_${sanitizeLabel(label)}.json`);
    try {
      const contents = JSON.stringify(state, (key, value: unknown) => (this.exclude.has(key) ? undefined : value), 2);
      await this.write(filePath, contents);
      logger.debug(`Checkpoint saved: ${filePath}`);
      return filePath;
    } catch (error) {
      logger.warn(`Failed to save checkpoint '${label}': ${errorMessage(error)}`);
      return null;
    }
  }
}
