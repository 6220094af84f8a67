import { logger } from '../../config/logger';
import { parseWith, schemas } from '../../middleware/validate';
import { PipelineKind } from '../../models/GenerationRun';
import type { EbookConfigInput, EbookState } from '../../types/ebook.types';
import type { LongFormState, ShortFormState, VideoConfigInput } from '../../types/pipeline.types';
import type { UGCConfigInput, UGCState } from '../../types/ugc.types';
import type { LongFormV2State, ShortFormV2State, VideoV2ConfigInput } from '../../types/v2.types';
import ebookOrchestrator from '../orchestrators/ebook.orchestrator';
import longFormV2Orchestrator from '../orchestrators/long-form-v2.orchestrator';
import longFormOrchestrator from '../orchestrators/long-form.orchestrator';
import type { RunContext } from '../orchestrators/run-context';
import shortFormV2Orchestrator from '../orchestrators/short-form-v2.orchestrator';
import shortFormOrchestrator from '../orchestrators/short-form.orchestrator';
import ugcOrchestrator from '../orchestrators/ugc.orchestrator';
import { errorMessage } from '../pipeline/pipeline-error';
import type { ProgressCallback } from '../pipeline/stage-runner';

interface Runnable<I, S> {
  run(input: I, context?: RunContext): Promise<S>;
}

export interface PipelineOrchestrators {
  shortForm: Runnable<VideoConfigInput, ShortFormState>;
  longForm: Runnable<VideoConfigInput, LongFormState>;
  shortFormV2: Runnable<VideoV2ConfigInput, ShortFormV2State>;
  longFormV2: Runnable<VideoV2ConfigInput, LongFormV2State>;
  ebook: Runnable<EbookConfigInput, EbookState>;
  ugc: Runnable<UGCConfigInput, UGCState>;
}

const defaultOrchestrators: PipelineOrchestrators = {
  shortForm: shortFormOrchestrator,
  longForm: longFormOrchestrator,
  shortFormV2: shortFormV2Orchestrator,
  longFormV2: longFormV2Orchestrator,
  ebook: ebookOrchestrator,
  ugc: ugcOrchestrator,
};

function present(...paths: (string | null)[]): string[] {
  return paths.filter((p): p is string => p !== null);
}

/**
 * Run one pipeline for a stored request and return the files it produced.
 * The input is validated again here: queued payloads outlive the request
 * that created them.
 */
export async function runGeneration(
  kind: PipelineKind,
  input: unknown,
  context: RunContext,
  orchestrators: PipelineOrchestrators = defaultOrchestrators
): Promise<string[]> {
  switch (kind) {
    case PipelineKind.SHORT_FORM: {
      const state = await orchestrators.shortForm.run(parseWith(schemas.shortForm, input), context);
      return present(state.finalVideoPath);
    }
    case PipelineKind.LONG_FORM: {
      const state = await orchestrators.longForm.run(parseWith(schemas.longForm, input), context);
      return present(state.finalVideoPath);
    }
    case PipelineKind.SHORT_FORM_V2: {
      const state = await orchestrators.shortFormV2.run(parseWith(schemas.shortFormV2, input), context);
      return present(state.finalVideoPath);
    }
    case PipelineKind.LONG_FORM_V2: {
      const state = await orchestrators.longFormV2.run(parseWith(schemas.longFormV2, input), context);
      return present(state.finalVideoPath);
    }
    case PipelineKind.EBOOK: {
      const state = await orchestrators.ebook.run(parseWith(schemas.ebook, input), context);
      return present(state.pdfPath, state.docxPath);
    }
    case PipelineKind.UGC: {
      const state = await orchestrators.ugc.run(parseWith(schemas.ugc, input), context);
      return present(state.finalVideoPath);
    }
  }
}

export interface ProgressReporter {
  onProgress: ProgressCallback;
  /** Resolves once every reported update has been written. */
  flush(): Promise<void>;
}

/**
 * Turn the synchronous progress callback into ordered async writes. A
 * failed write is logged and does not affect the run.
 */
export function createProgressReporter(
  write: (message: string, fraction: number) => Promise<unknown>
): ProgressReporter {
  let chain: Promise<void> = Promise.resolve();
  return {
    onProgress: (message, fraction) => {
      chain = chain.then(
        () => write(message, fraction).then(
          () => undefined,
          (error: unknown) => {
            logger.warn(`Progress update failed: ${errorMessage(error)}`);
          }
        )
      );
    },
    flush: () => chain,
  };
}
