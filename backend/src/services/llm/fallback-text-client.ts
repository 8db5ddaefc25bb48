/**
 * Secondary text provider
 *
 * Keyless text generation over a single GET: the url-encoded prompt is the
 * last path segment and the response body is the generated text.
 */

import axios, { type AxiosInstance } from 'axios';
import pino from 'pino';
import { fallbackTextConfig, type FallbackTextConfig } from '../../config/providers.js';
import type { ProviderResult, TextSource } from '../../types/provider.js';
import { providerFailure, providerSuccess } from '../../types/provider.js';
import { getResponseStatus, isTimeoutError, errorMessage } from '../../utils/http-errors.js';

const logger = pino({
  name: 'fallback-text-client',
  level: process.env.LOG_LEVEL || 'info',
});

export class FallbackTextClient implements TextSource {
  readonly name = 'fallback-text';

  private readonly client: AxiosInstance;

  constructor(config: FallbackTextConfig = fallbackTextConfig) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      responseType: 'text',
    });
  }

  isAvailable(): boolean {
    return true;
  }

  /**
   * The endpoint takes no sampling options, so they are ignored
   */
  async generate(prompt: string): Promise<ProviderResult<string>> {
    try {
      const response = await this.client.get<string>(`/${encodeURIComponent(prompt)}`);
      const text = typeof response.data === 'string' ? response.data : '';

      if (!text.trim()) {
        return providerFailure(this.name, 'empty_response', 'Fallback text provider returned an empty body');
      }

      return providerSuccess(this.name, text);
    } catch (error) {
      const status = getResponseStatus(error);
      logger.warn({ status, error: errorMessage(error) }, 'Fallback text request failed');

      if (isTimeoutError(error)) {
        return providerFailure(this.name, 'timeout', errorMessage(error));
      }
      return providerFailure(this.name, 'http_error', errorMessage(error), status);
    }
  }
}
