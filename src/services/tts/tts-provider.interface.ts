// ===========================================================================
// Text-to-speech capability
//
// Pipelines only need "text in, audio file and word timings out". The voice
// is a friendly actor name; the implementation resolves it to a provider id.
// ===========================================================================

import type { SynthesizedAudio } from '../../types/alignment.types';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';

export interface SynthesisRequest {
  text: string;
  /** Friendly name from data/voice-actors.json */
  voiceActor: string;
  /** Provider model id, e.g. "eleven_v3" */
  model: string;
}

export interface TextToSpeechClient {
  isConfigured(): boolean;

  /**
   * Synthesize `text`, save the audio and return its path with word-level
   * timings. Throws after the client's retries are exhausted.
   */
  synthesize(request: SynthesisRequest, pool: RateLimitedProviderPool): Promise<SynthesizedAudio>;
}
