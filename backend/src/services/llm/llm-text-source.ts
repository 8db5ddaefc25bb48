/**
 * Primary text source: adapts LLMClient to the TextSource contract used by
 * the content provider's fallback chain.
 */

import { toLLMError, type LLMClient } from './client.js';
import type { LLMErrorCode } from '../../types/llm.js';
import type { ProviderFailureKind, ProviderResult, TextSource } from '../../types/provider.js';
import { providerFailure, providerSuccess } from '../../types/provider.js';

const FAILURE_KINDS: Record<LLMErrorCode, ProviderFailureKind> = {
  authentication: 'unavailable',
  timeout: 'timeout',
  rate_limit: 'http_error',
  invalid_request: 'http_error',
  server_error: 'http_error',
  not_found: 'http_error',
  unknown: 'http_error',
};

export class LLMTextSource implements TextSource {
  constructor(private readonly client: LLMClient) {}

  get name(): string {
    return this.client.defaultProvider;
  }

  isAvailable(): boolean {
    return this.client.isAvailable();
  }

  async generate(
    prompt: string,
    options: { temperature: number; maxTokens: number }
  ): Promise<ProviderResult<string>> {
    if (!this.isAvailable()) {
      return providerFailure(this.name, 'unavailable', 'No API key configured');
    }

    try {
      const content = await this.client.chat(
        [{ role: 'user', content: prompt }],
        { temperature: options.temperature, maxTokens: options.maxTokens }
      );

      if (!content.trim()) {
        return providerFailure(this.name, 'empty_response', 'Provider returned no text');
      }

      return providerSuccess(this.name, content);
    } catch (error) {
      const llmError = toLLMError(error);
      return providerFailure(
        this.name,
        FAILURE_KINDS[llmError.code],
        llmError.message,
        llmError.statusCode
      );
    }
  }
}
