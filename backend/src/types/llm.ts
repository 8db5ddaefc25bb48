/**
 * LLM client types
 */

export type LLMProviderName = 'gemini' | 'openai' | 'anthropic';

/**
 * What a generation call is for. Selects temperature and output length.
 */
export type GenerationPurpose = 'dialogue' | 'judging' | 'scoring';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  provider: LLMProviderName;
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Overrides the configured timeout, in milliseconds */
  timeout?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Provider stop reasons, normalized
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | 'error';

export interface LLMResponse {
  content: string;
  model: string;
  usage: TokenUsage;
  finishReason: FinishReason;
  provider: LLMProviderName;
}

export type LLMErrorCode =
  | 'rate_limit'
  | 'timeout'
  | 'invalid_request'
  | 'server_error'
  | 'authentication'
  | 'not_found'
  | 'unknown';

/**
 * Failure of a primary text call. `retryable` drives the client's backoff loop.
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly code: LLMErrorCode,
    public readonly retryable: boolean,
    public readonly statusCode?: number,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'LLMError';
  }
}

export interface RetryConfig {
  maxRetries: number;
  /** First backoff delay in milliseconds, doubled per attempt */
  baseDelay: number;
  maxDelay: number;
}
