import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import { envString } from '../../config/env';
import { OUTPUT_DIRS, TTS_RETRY, VOICE_ACTORS, type RetryPolicy } from '../../config/settings';
import type { CharacterAlignment, SynthesizedAudio } from '../../types/alignment.types';
import { extractWordTimings } from '../../utils/alignment-to-words';
import { ConfigurationError, ProviderError } from '../pipeline/pipeline-error';
import { toProviderError } from '../providers/http-error';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import { withRetry, type Sleep } from '../providers/retry';
import type { SynthesisRequest, TextToSpeechClient } from './tts-provider.interface';

interface VoiceSettings {
  stability: number; // 0-1
  similarity_boost: number; // 0-1
  style: number; // 0-1
  use_speaker_boost: boolean;
}

type OutputFormat = 'mp3_44100_128' | 'mp3_44100_192';

interface WithTimestampsResponse {
  audio_base64?: string;
  alignment?: CharacterAlignment | null;
  normalized_alignment?: CharacterAlignment | null;
}

export interface ElevenLabsServiceOptions {
  apiKey?: string;
  apiUrl?: string;
  outputDir?: string;
  voices?: Readonly<Record<string, string>>;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  stability: 0.5,
  similarity_boost: 0.75,
  style: 0.0,
  use_speaker_boost: true,
};

/**
 * ElevenLabs `with-timestamps` synthesis. Audio is written under the audio
 * output directory; character alignment is folded into word timings.
 */
export class ElevenLabsService implements TextToSpeechClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly outputDir: string;
  private readonly voices: Readonly<Record<string, string>>;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  constructor(options: ElevenLabsServiceOptions = {}) {
    this.apiKey = options.apiKey ?? envString('ELEVEN_LABS_API_KEY');
    this.apiUrl = options.apiUrl ?? envString('ELEVEN_LABS_API_URL', 'https://api.elevenlabs.io/v1');
    this.outputDir = options.outputDir ?? OUTPUT_DIRS.audio;
    this.voices = options.voices ?? VOICE_ACTORS;
    this.retry = options.retry ?? TTS_RETRY;
    this.sleep = options.sleep;

    if (!this.apiKey) {
      logger.warn('ElevenLabs API key not configured');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /** Provider voice id for a friendly actor name. */
  resolveVoice(voiceActor: string): string {
    const voiceId = this.voices[voiceActor];
    if (!voiceId) {
      throw new ConfigurationError(
        `Unknown voice actor "${voiceActor}". Available: ${Object.keys(this.voices).join(', ')}`
      );
    }
    return voiceId;
  }

  async synthesize(request: SynthesisRequest, pool: RateLimitedProviderPool): Promise<SynthesizedAudio> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('elevenlabs provider is not configured. Check ELEVEN_LABS_API_KEY.');
    }
    const voiceId = this.resolveVoice(request.voiceActor);

    logger.info('Generating speech with timestamps (ElevenLabs)', {
      voiceActor: request.voiceActor,
      model: request.model,
      textLength: request.text.length,
    });

    const { audio, alignment } = await withRetry(
      () => pool.run('elevenlabs', () => this.requestWithTimestamps(request.text, voiceId, request.model)),
      this.retry,
      { label: `TTS (${request.voiceActor})`, sleep: this.sleep }
    );

    await fs.mkdir(this.outputDir, { recursive: true });
    const audioPath = path.join(this.outputDir, `${uuidv4().replace(/-/g, '')}.mp3`);
    await fs.writeFile(audioPath, audio);

    const words = extractWordTimings(alignment);
    logger.info(`Audio saved: ${audioPath} (${words.length} words)`);
    return { audioPath, words };
  }

  private async requestWithTimestamps(
    text: string,
    voiceId: string,
    modelId: string,
    outputFormat: OutputFormat = 'mp3_44100_128'
  ): Promise<{ audio: Buffer; alignment: CharacterAlignment }> {
    let data: WithTimestampsResponse;
    try {
      const response = await axios.post<WithTimestampsResponse>(
        `${this.apiUrl}/text-to-speech/${voiceId}/with-timestamps`,
        { text, model_id: modelId, voice_settings: DEFAULT_VOICE_SETTINGS },
        {
          headers: {
            'xi-api-key': this.apiKey,
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
          params: { output_format: outputFormat },
          timeout: 120000,
        }
      );
      data = response.data;
    } catch (error) {
      throw toProviderError('elevenlabs', error);
    }

    if (!data.audio_base64) {
      throw new ProviderError('elevenlabs', 'with-timestamps returned no audio_base64');
    }
    const alignment = data.alignment ?? data.normalized_alignment;
    if (!alignment?.characters?.length) {
      throw new ProviderError('elevenlabs', 'with-timestamps returned no character alignment');
    }
    return { audio: Buffer.from(data.audio_base64, 'base64'), alignment };
  }
}

export default new ElevenLabsService();
