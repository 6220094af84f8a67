import axios from 'axios';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import type { Orientation } from '../../config/settings';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import { sleep, type Sleep } from '../providers/retry';
import type { ImageProvider } from './image-provider.interface';

interface SubmitResponse {
  polling_url?: string;
}

interface PollResponse {
  status?: string;
  result?: { sample?: string };
  error?: string;
}

const POLL_INTERVAL_MS = 500;
const POLL_TIMEOUT_MS = 120000;

/**
 * Black Forest Labs FLUX: submit, poll the returned URL until Ready or
 * Failed, then download the sample.
 */
export class FluxProvider implements ImageProvider {
  readonly name = 'flux' as const;
  private readonly apiKey: string;
  private readonly apiUrl = envString('BFL_API_URL', 'https://api.bfl.ai/v1/flux-2-pro');

  constructor(
    apiKey?: string,
    private readonly wait: Sleep = sleep
  ) {
    this.apiKey = apiKey ?? envString('BFL_API_KEY');
    if (!this.apiKey) {
      logger.warn('BFL (Flux) API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async generate(prompt: string, orientation: Orientation): Promise<Buffer> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('flux provider is not configured. Check BFL_API_KEY.');
    }

    try {
      const submit = await axios.post<SubmitResponse>(
        this.apiUrl,
        {
          prompt,
          width: orientation === 'portrait' ? 1088 : 1920,
          height: orientation === 'portrait' ? 1920 : 1088,
        },
        { headers: this.headers(), timeout: 60000 }
      );
      const pollingUrl = submit.data.polling_url;
      if (!pollingUrl) {
        throw new ProviderError(this.name, 'Submit response had no polling_url');
      }

      const sampleUrl = await this.waitForSample(pollingUrl);
      const image = await axios.get<ArrayBuffer>(sampleUrl, { responseType: 'arraybuffer', timeout: 30000 });
      return Buffer.from(image.data);
    } catch (error) {
      throw toProviderError(this.name, error);
    }
  }

  private async waitForSample(pollingUrl: string): Promise<string> {
    for (let elapsed = 0; elapsed <= POLL_TIMEOUT_MS; elapsed += POLL_INTERVAL_MS) {
      const poll = await axios.get<PollResponse>(pollingUrl, { headers: this.headers(), timeout: 30000 });
      if (poll.data.status === 'Ready') {
        const sample = poll.data.result?.sample;
        if (!sample) throw new ProviderError(this.name, 'Ready response had no sample URL');
        return sample;
      }
      if (poll.data.status === 'Failed' || poll.data.status === 'Error') {
        throw new ProviderError(this.name, `Generation failed: ${poll.data.error ?? 'unknown error'}`);
      }
      await this.wait(POLL_INTERVAL_MS);
    }
    throw new ProviderError(this.name, `No result within ${POLL_TIMEOUT_MS / 1000}s`);
  }

  private headers(): Record<string, string> {
    return { accept: 'application/json', 'x-key': this.apiKey, 'Content-Type': 'application/json' };
  }
}

export default new FluxProvider();
