// ===========================================================================
// Pipeline error taxonomy
//
//   PipelineError          a step failed; carries the partial run state
//   ConfigurationError     unknown provider, missing key or voice; never retried
//   ProviderError          unusable provider response; retryable
//   VideoJobTimeoutError   an async video job outlived its polling ceiling
// ===========================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised by the StageRunner when a step throws. `partialState` is the run's
 * state object as it stood at the failure, including every slot filled by
 * sibling fan-out branches.
 */
export class PipelineError<S = unknown> extends Error {
  readonly failedStep: string;
  readonly partialState: S;
  override readonly cause: unknown;

  constructor(failedStep: string, partialState: S, cause: unknown) {
    super(`Pipeline failed at step '${failedStep}': ${errorMessage(cause)}`);
    this.name = 'PipelineError';
    this.failedStep = failedStep;
    this.partialState = partialState;
    this.cause = cause;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly statusCode?: number;

  constructor(provider: string, message: string, statusCode?: number) {
    super(`[${provider}] ${message}`);
    this.name = 'ProviderError';
    this.provider = provider;
    this.statusCode = statusCode;
  }
}

export class VideoJobTimeoutError extends Error {
  readonly provider: string;
  readonly jobId: string;

  constructor(provider: string, jobId: string, timeoutMs: number) {
    super(`[${provider}] video job ${jobId} did not finish within ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'VideoJobTimeoutError';
    this.provider = provider;
    this.jobId = jobId;
  }
}
