/**
 * Speech Provider
 *
 * Synthesizes AI lines to MP3 through a bearer-authenticated TTS endpoint.
 * Speech is optional: without a credential, or after a failed retry, the
 * caller gets undefined and the turn goes on without audio.
 */

import axios, { type AxiosInstance } from 'axios';
import pino from 'pino';
import Bottleneck from 'bottleneck';
import { speechConfig, type SpeechConfig } from '../../config/providers.js';
import { getResponseStatus, errorMessage } from '../../utils/http-errors.js';
import { clean } from '../content/text-cleaner.js';
import type { AudioSink, ISpeechService, SpeechRequestBody } from './types.js';

const logger = pino({
  name: 'speech-provider',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * First call plus one retry
 */
const MAX_ATTEMPTS = 2;

export interface SpeechProviderOptions {
  store: AudioSink;
  config?: SpeechConfig;
}

export class SpeechProvider implements ISpeechService {
  readonly provider = 'yarngpt';

  private readonly config: SpeechConfig;
  private readonly store: AudioSink;
  private readonly client: AxiosInstance;
  private readonly limiter: Bottleneck;

  constructor(options: SpeechProviderOptions) {
    this.config = options.config ?? speechConfig;
    this.store = options.store;

    this.client = axios.create({
      timeout: this.config.timeoutMs,
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
      },
    });

    // Rate limiter
    this.limiter = new Bottleneck({
      maxConcurrent: this.config.maxConcurrent,
    });

    if (!this.isAvailable()) {
      logger.warn('YARNGPT_API_KEY not set - debate lines will have no audio');
    }
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  async synthesize(text: string, voice: string = this.config.voice): Promise<string | undefined> {
    if (!this.isAvailable()) {
      return undefined;
    }

    const input = clean(text).slice(0, this.config.maxChars);
    if (!input) {
      return undefined;
    }

    let audio: Buffer | undefined;
    try {
      audio = await this.limiter.schedule(() => this.fetchAudio(input, voice));
    } catch (error) {
      logger.warn(
        { voice, status: getResponseStatus(error), error: errorMessage(error) },
        'Speech synthesis failed after retry'
      );
      return undefined;
    }

    if (audio.length === 0) {
      logger.warn({ voice }, 'Speech provider returned no audio');
      return undefined;
    }

    try {
      return await this.store.save(audio, 'mp3');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to store synthesized audio');
      return undefined;
    }
  }

  /**
   * POST the text; timeouts, network errors and non-2xx statuses are retried once
   */
  private async fetchAudio(text: string, voice: string, attempt: number = 1): Promise<Buffer> {
    const body: SpeechRequestBody = { text, voice, response_format: 'mp3' };

    try {
      const startTime = Date.now();
      const response = await this.client.post<ArrayBuffer>(this.config.apiUrl, body, {
        responseType: 'arraybuffer',
      });

      const audio = Buffer.from(response.data);
      logger.info(
        { voice, textLength: text.length, bufferSize: audio.length, processingTime: Date.now() - startTime },
        'Speech generated successfully'
      );

      return audio;
    } catch (error) {
      if (attempt < MAX_ATTEMPTS) {
        logger.warn(
          { attempt, status: getResponseStatus(error), error: errorMessage(error) },
          'Speech request failed, retrying'
        );
        return this.fetchAudio(text, voice, attempt + 1);
      }

      throw error;
    }
  }
}
