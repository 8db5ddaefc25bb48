/**
 * Content Provider
 *
 * Text generation behind a fallback chain: primary LLM, then the secondary
 * text provider, then a static in-character line. Every link reports a typed
 * ProviderResult; the chain moves on for any failure kind.
 */

import pino from 'pino';
import type { GenerationPurpose } from '../../types/llm.js';
import type { ProviderFailure, ProviderResult, TextSource } from '../../types/provider.js';
import { providerFailure, providerSuccess } from '../../types/provider.js';
import { GENERATION_SETTINGS } from '../../config/llm.js';
import { gameConfig } from '../../config/game.js';
import { loggers, startTimer } from '../logging/log-helpers.js';
import { errorMessage } from '../../utils/http-errors.js';
import { clean } from './text-cleaner.js';
import type { LLMClient } from '../llm/client.js';
import { LLMTextSource } from '../llm/llm-text-source.js';
import { FallbackTextClient } from '../llm/fallback-text-client.js';

const logger = pino({
  name: 'content-provider',
  level: process.env.LOG_LEVEL || 'info',
});

export interface ContentProviderOptions {
  /** Sources tried in order */
  sources: TextSource[];
  /** Returned by generate() when every source fails */
  staticFallbackLine?: string;
}

export class ContentProvider {
  private readonly sources: TextSource[];
  private readonly staticFallbackLine: string;

  constructor(options: ContentProviderOptions) {
    this.sources = options.sources;
    this.staticFallbackLine = options.staticFallbackLine ?? gameConfig.staticFallbackLine;
  }

  /**
   * Cleaned text for the prompt. Never rejects: falls back to the static line.
   */
  async generate(prompt: string, purpose: GenerationPurpose): Promise<string> {
    const result = await this.attempt(prompt, purpose);

    if (result.ok) {
      return result.value;
    }

    logger.warn(
      { purpose, lastFailure: result.failure.kind },
      'All text providers failed, using static fallback line'
    );
    return this.staticFallbackLine;
  }

  /**
   * Run the provider chain without the static default.
   * Resolves to the first cleaned, non-empty output or the last failure.
   */
  async attempt(prompt: string, purpose: GenerationPurpose): Promise<ProviderResult<string>> {
    const settings = GENERATION_SETTINGS[purpose];
    let lastFailure: ProviderFailure = {
      kind: 'unavailable',
      provider: 'none',
      message: 'No text providers configured',
    };

    for (const [index, source] of this.sources.entries()) {
      const result = await this.trySource(source, prompt, purpose, settings);

      if (result.ok) {
        return result;
      }

      lastFailure = result.failure;
      const next = this.sources[index + 1]?.name ?? 'static fallback';
      loggers.providerFallback(result.failure, next);
    }

    return { ok: false, failure: lastFailure };
  }

  private async trySource(
    source: TextSource,
    prompt: string,
    purpose: GenerationPurpose,
    settings: { temperature: number; maxTokens: number }
  ): Promise<ProviderResult<string>> {
    if (!source.isAvailable()) {
      return providerFailure(source.name, 'unavailable', 'No credential configured');
    }

    const elapsed = startTimer();
    let result: ProviderResult<string>;

    try {
      result = await source.generate(prompt, settings);
    } catch (error) {
      // TextSource implementations resolve failures; a throw is still a failure
      result = providerFailure(source.name, 'http_error', errorMessage(error));
    }

    if (result.ok) {
      const text = clean(result.value);
      result = text
        ? providerSuccess(source.name, text)
        : providerFailure(source.name, 'empty_response', 'Output was empty after cleaning');
    }

    loggers.providerCall({
      provider: source.name,
      purpose,
      latency_ms: elapsed(),
      success: result.ok,
      error: result.ok ? undefined : result.failure.message,
    });

    return result;
  }
}

/**
 * Content provider wired to the configured LLM and the secondary text provider
 */
export function createContentProvider(client: LLMClient): ContentProvider {
  return new ContentProvider({
    sources: [new LLMTextSource(client), new FallbackTextClient()],
  });
}
