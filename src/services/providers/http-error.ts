import axios from 'axios';
import { logger } from '../../config/logger';
import { ConfigurationError, ProviderError, errorMessage } from '../pipeline/pipeline-error';

/**
 * Convert an axios failure into the pipeline taxonomy. Rejected credentials
 * become a ConfigurationError (never retried); everything else is a
 * retryable ProviderError.
 */
export function toProviderError(provider: string, error: unknown): Error {
  if (error instanceof ProviderError || error instanceof ConfigurationError) return error;
  if (!axios.isAxiosError(error)) return new ProviderError(provider, errorMessage(error));

  const status = error.response?.status;
  logger.error(`${provider} API error`, {
    status,
    data: describeBody(error.response?.data),
    message: error.message,
  });

  if (status === 401 || status === 403) {
    return new ConfigurationError(`Invalid ${provider} API key (HTTP ${status})`);
  }
  if (status === 429) {
    return new ProviderError(provider, 'Rate limit exceeded', status);
  }
  if (status === 400) {
    return new ProviderError(provider, `Invalid request parameters: ${describeBody(error.response?.data)}`, status);
  }
  if (status !== undefined && status >= 500) {
    return new ProviderError(provider, `Service error (HTTP ${status})`, status);
  }
  return new ProviderError(provider, error.message, status);
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data.slice(0, 500);
  if (Buffer.isBuffer(data)) return data.toString('utf-8').slice(0, 500);
  try {
    return JSON.stringify(data).slice(0, 500);
  } catch {
    return '[unserializable body]';
  }
}
