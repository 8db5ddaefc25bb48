/**
 * LLM Configuration
 *
 * Configuration for the primary text-generation provider loaded from environment
 * variables. Supports Gemini, OpenAI and Anthropic. A missing key is not fatal:
 * the content provider falls through to the secondary text provider.
 */

import type { LLMProviderName, RetryConfig, GenerationPurpose } from '../types/llm.js';
import { getEnvVar, getEnvInt } from './env.js';

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  /** Google AI Studio (Gemini) credentials */
  gemini: {
    apiKey: string;
    baseURL: string;
  };
  /** OpenAI API key */
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  /** Anthropic API key */
  anthropic: {
    apiKey: string;
    baseURL?: string;
  };
  /** Provider used for debate dialogue, judging and scoring */
  defaultProvider: LLMProviderName;
  /** Default model for each provider */
  defaultModels: Record<LLMProviderName, string>;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Retry configuration */
  retry: RetryConfig;
}

/**
 * Sampling settings per call purpose. Dialogue is creative; judging and
 * scoring need short, structured answers.
 */
export const GENERATION_SETTINGS: Record<GenerationPurpose, { temperature: number; maxTokens: number }> = {
  dialogue: { temperature: 0.8, maxTokens: 150 },
  judging: { temperature: 0.2, maxTokens: 20 },
  scoring: { temperature: 0.1, maxTokens: 10 },
};

/**
 * Validate provider name
 */
function validateProvider(provider: string): LLMProviderName {
  if (provider !== 'gemini' && provider !== 'openai' && provider !== 'anthropic') {
    throw new Error(`Invalid LLM provider: ${provider}. Must be 'gemini', 'openai' or 'anthropic'`);
  }
  return provider;
}

/**
 * LLM configuration loaded from environment variables
 *
 * Environment variables:
 * - LLM_PROVIDER: 'gemini' | 'openai' | 'anthropic' (default: 'gemini')
 * - GOOGLE_API_KEY / GEMINI_BASE_URL
 * - OPENAI_API_KEY / OPENAI_BASE_URL
 * - ANTHROPIC_API_KEY / ANTHROPIC_BASE_URL
 * - LLM_DEFAULT_MODEL_GEMINI (default: 'gemini-2.0-flash')
 * - LLM_DEFAULT_MODEL_OPENAI (default: 'gpt-4o-mini')
 * - LLM_DEFAULT_MODEL_ANTHROPIC (default: 'claude-3-5-haiku-20241022')
 * - LLM_TIMEOUT_MS: Request timeout in milliseconds (default: 20000)
 * - LLM_MAX_RETRIES: Retries before falling back (default: 0)
 * - LLM_RETRY_BASE_DELAY / LLM_RETRY_MAX_DELAY
 */
export const llmConfig: LLMConfig = {
  gemini: {
    apiKey: getEnvVar('GOOGLE_API_KEY'),
    baseURL: getEnvVar('GEMINI_BASE_URL', false, 'https://generativelanguage.googleapis.com/v1beta'),
  },
  openai: {
    apiKey: getEnvVar('OPENAI_API_KEY'),
    baseURL: getEnvVar('OPENAI_BASE_URL') || undefined,
  },
  anthropic: {
    apiKey: getEnvVar('ANTHROPIC_API_KEY'),
    baseURL: getEnvVar('ANTHROPIC_BASE_URL') || undefined,
  },
  defaultProvider: validateProvider(getEnvVar('LLM_PROVIDER', false, 'gemini')),
  defaultModels: {
    gemini: getEnvVar('LLM_DEFAULT_MODEL_GEMINI', false, 'gemini-2.0-flash'),
    openai: getEnvVar('LLM_DEFAULT_MODEL_OPENAI', false, 'gpt-4o-mini'),
    anthropic: getEnvVar('LLM_DEFAULT_MODEL_ANTHROPIC', false, 'claude-3-5-haiku-20241022'),
  },
  timeoutMs: getEnvInt('LLM_TIMEOUT_MS', 20000),
  retry: {
    maxRetries: getEnvInt('LLM_MAX_RETRIES', 0),
    baseDelay: getEnvInt('LLM_RETRY_BASE_DELAY', 500),
    maxDelay: getEnvInt('LLM_RETRY_MAX_DELAY', 4000),
  },
};

/**
 * Validate configuration at startup.
 * Returns warnings for optional settings; throws only for invalid values.
 */
export function validateLLMConfig(cfg: LLMConfig = llmConfig): string[] {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!cfg[cfg.defaultProvider].apiKey) {
    warnings.push(
      `No API key configured for LLM provider "${cfg.defaultProvider}" - dialogue will use the secondary text provider`
    );
  }

  if (cfg.retry.maxRetries < 0) {
    errors.push('LLM_MAX_RETRIES must be >= 0');
  }

  if (cfg.retry.baseDelay < 0) {
    errors.push('LLM_RETRY_BASE_DELAY must be >= 0');
  }

  if (cfg.retry.maxDelay < cfg.retry.baseDelay) {
    errors.push('LLM_RETRY_MAX_DELAY must be >= LLM_RETRY_BASE_DELAY');
  }

  if (cfg.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (errors.length > 0) {
    throw new Error(`LLM configuration validation failed:\n${errors.join('\n')}`);
  }

  return warnings;
}
