/**
 * LLM Client Implementation
 *
 * Unified client for the primary text-generation providers (Gemini, OpenAI,
 * Anthropic) with timeout handling, optional retry and token usage tracking.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import axios, { type AxiosInstance } from 'axios';
import pino from 'pino';
import type {
  ChatMessage,
  LLMProviderName,
  LLMRequest,
  LLMResponse,
  RetryConfig,
  TokenUsage,
  FinishReason,
} from '../../types/llm.js';
import { LLMError } from '../../types/llm.js';
import { llmConfig, type LLMConfig } from '../../config/llm.js';
import { getResponseStatus, isTimeoutError, errorMessage } from '../../utils/http-errors.js';

/**
 * Logger instance for LLM operations
 */
const logger = pino({
  name: 'llm-client',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Subset of the Gemini generateContent response we read
 */
interface GeminiGenerateResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
  modelVersion?: string;
}

/**
 * LLM Client for unified provider access
 */
export class LLMClient {
  private openaiClient: OpenAI | null = null;
  private anthropicClient: Anthropic | null = null;
  private geminiClient: AxiosInstance;
  private retryConfig: RetryConfig;
  private config: LLMConfig;

  constructor(retryConfig?: Partial<RetryConfig>, config: LLMConfig = llmConfig) {
    this.config = config;
    this.retryConfig = {
      maxRetries: retryConfig?.maxRetries ?? config.retry.maxRetries,
      baseDelay: retryConfig?.baseDelay ?? config.retry.baseDelay,
      maxDelay: retryConfig?.maxDelay ?? config.retry.maxDelay,
    };

    this.geminiClient = axios.create({
      baseURL: config.gemini.baseURL,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    // Initialize OpenAI client if API key is available
    if (config.openai.apiKey) {
      this.openaiClient = new OpenAI({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
      });
      logger.info('OpenAI client initialized');
    }

    // Initialize Anthropic client if API key is available
    if (config.anthropic.apiKey) {
      this.anthropicClient = new Anthropic({
        apiKey: config.anthropic.apiKey,
        baseURL: config.anthropic.baseURL,
      });
      logger.info('Anthropic client initialized');
    }

    if (!this.isAvailable()) {
      logger.warn(
        { provider: config.defaultProvider },
        'Default LLM provider has no API key - requests will fail over to the secondary provider'
      );
    }
  }

  /**
   * Whether the given provider (default provider if omitted) has credentials
   */
  isAvailable(provider: LLMProviderName = this.config.defaultProvider): boolean {
    return Boolean(this.config[provider].apiKey);
  }

  /**
   * Name of the provider used by chat()
   */
  get defaultProvider(): LLMProviderName {
    return this.config.defaultProvider;
  }

  /**
   * Simple chat method for non-streaming requests against the default provider
   * Convenience wrapper around complete()
   */
  async chat(
    messages: ChatMessage[],
    options?: {
      temperature?: number;
      maxTokens?: number;
    }
  ): Promise<string> {
    const provider = this.config.defaultProvider;
    const request: LLMRequest = {
      provider,
      model: this.config.defaultModels[provider],
      messages,
      temperature: options?.temperature,
      maxTokens: options?.maxTokens,
    };

    const response = await this.complete(request);
    return response.content;
  }

  /**
   * Complete a chat request with automatic retry logic
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const startTime = Date.now();

    logger.debug({
      provider: request.provider,
      model: request.model,
      messageCount: request.messages.length,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    }, 'Starting LLM completion request');

    try {
      const response = await this.executeWithRetry(request);

      const duration = Date.now() - startTime;
      logger.info({
        provider: response.provider,
        model: response.model,
        usage: response.usage,
        duration,
        finishReason: response.finishReason,
      }, 'LLM completion successful');

      return response;
    } catch (error) {
      const duration = Date.now() - startTime;
      const llmError = toLLMError(error);

      logger.error({
        provider: request.provider,
        model: request.model,
        duration,
        error: {
          code: llmError.code,
          message: llmError.message,
          retryable: llmError.retryable,
          statusCode: llmError.statusCode,
        },
      }, 'LLM completion failed');

      throw llmError;
    }
  }

  /**
   * Execute request with exponential backoff retry logic
   */
  private async executeWithRetry(request: LLMRequest, attempt: number = 0): Promise<LLMResponse> {
    try {
      return await this.executeRequest(request);
    } catch (error) {
      const llmError = toLLMError(error);

      if (this.shouldRetry(llmError, attempt)) {
        const delay = this.calculateBackoff(attempt);

        logger.warn({
          provider: request.provider,
          attempt: attempt + 1,
          maxRetries: this.retryConfig.maxRetries,
          delay,
          errorCode: llmError.code,
        }, 'Retrying LLM request after error');

        await this.sleep(delay);
        return this.executeWithRetry(request, attempt + 1);
      }

      throw llmError;
    }
  }

  /**
   * Determine if error should be retried
   */
  private shouldRetry(error: LLMError, attempt: number): boolean {
    return error.retryable && attempt < this.retryConfig.maxRetries;
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateBackoff(attempt: number): number {
    const exponentialDelay = this.retryConfig.baseDelay * Math.pow(2, attempt);
    const jitter = Math.random() * 0.3 * exponentialDelay; // 0-30% jitter
    const delay = exponentialDelay + jitter;
    return Math.min(delay, this.retryConfig.maxDelay);
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Execute request with appropriate provider
   */
  private async executeRequest(request: LLMRequest): Promise<LLMResponse> {
    const timeout = request.timeout ?? this.config.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    // Create timeout promise
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new LLMError(
          `Request timeout after ${timeout}ms`,
          'timeout',
          true,
          undefined
        ));
      }, timeout);
    });

    // Race between actual request and timeout
    try {
      return await Promise.race([this.dispatch(request), timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }

  private dispatch(request: LLMRequest): Promise<LLMResponse> {
    switch (request.provider) {
      case 'gemini':
        return this.executeGeminiRequest(request);
      case 'openai':
        return this.executeOpenAIRequest(request);
      case 'anthropic':
        return this.executeAnthropicRequest(request);
    }
  }

  /**
   * Execute Gemini generateContent request over REST
   */
  private async executeGeminiRequest(request: LLMRequest): Promise<LLMResponse> {
    if (!this.config.gemini.apiKey) {
      throw new LLMError(
        'Gemini client not initialized - missing API key',
        'authentication',
        false
      );
    }

    // Gemini takes system text separately and calls the assistant "model"
    const systemMessage = request.messages.find(m => m.role === 'system');
    const contents = request.messages
      .filter(m => m.role !== 'system')
      .map(msg => ({
        role: msg.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: msg.content }],
      }));

    try {
      const response = await this.geminiClient.post<GeminiGenerateResponse>(
        `/models/${request.model}:generateContent`,
        {
          contents,
          ...(systemMessage ? { systemInstruction: { parts: [{ text: systemMessage.content }] } } : {}),
          generationConfig: {
            temperature: request.temperature ?? 0.7,
            maxOutputTokens: request.maxTokens ?? 1024,
          },
        },
        {
          params: {
            key: this.config.gemini.apiKey,
          },
        }
      );

      const candidate = response.data.candidates?.[0];
      if (!candidate) {
        throw new LLMError(
          'No candidates returned from Gemini',
          'server_error',
          true
        );
      }

      const content = (candidate.content?.parts ?? [])
        .map(part => part.text ?? '')
        .join('');
      const metadata = response.data.usageMetadata;
      const usage: TokenUsage = {
        promptTokens: metadata?.promptTokenCount ?? 0,
        completionTokens: metadata?.candidatesTokenCount ?? 0,
        totalTokens: metadata?.totalTokenCount ?? 0,
      };

      return {
        content,
        model: response.data.modelVersion ?? request.model,
        usage,
        finishReason: this.mapGeminiFinishReason(candidate.finishReason),
        provider: 'gemini',
      };
    } catch (error: unknown) {
      throw toLLMError(error);
    }
  }

  /**
   * Execute OpenAI API request
   */
  private async executeOpenAIRequest(request: LLMRequest): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new LLMError(
        'OpenAI client not initialized - missing API key',
        'authentication',
        false
      );
    }

    try {
      const completion = await this.openaiClient.chat.completions.create({
        model: request.model,
        messages: request.messages.map(msg => ({
          role: msg.role,
          content: msg.content,
        })),
        temperature: request.temperature ?? 0.7,
        max_tokens: request.maxTokens ?? 1024,
        stream: false,
      });

      const choice = completion.choices[0];
      if (!choice) {
        throw new LLMError(
          'No completion choices returned from OpenAI',
          'server_error',
          true
        );
      }

      const content = choice.message.content ?? '';
      const usage: TokenUsage = {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      };

      return {
        content,
        model: completion.model,
        usage,
        finishReason: this.mapOpenAIFinishReason(choice.finish_reason),
        provider: 'openai',
      };
    } catch (error: unknown) {
      throw toLLMError(error);
    }
  }

  /**
   * Execute Anthropic API request
   */
  private async executeAnthropicRequest(request: LLMRequest): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new LLMError(
        'Anthropic client not initialized - missing API key',
        'authentication',
        false
      );
    }

    try {
      // Anthropic requires system messages to be separate
      const systemMessage = request.messages.find(m => m.role === 'system');
      const conversationMessages = request.messages
        .filter((m): m is ChatMessage & { role: 'user' | 'assistant' } => m.role !== 'system')
        .map(msg => ({
          role: msg.role,
          content: msg.content,
        }));

      const response = await this.anthropicClient.messages.create({
        model: request.model,
        system: systemMessage?.content,
        messages: conversationMessages,
        temperature: request.temperature ?? 0.7,
        max_tokens: request.maxTokens ?? 1024,
      });

      // Extract text content from response
      const textContent = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('\n');

      const usage: TokenUsage = {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      };

      return {
        content: textContent,
        model: response.model,
        usage,
        finishReason: this.mapAnthropicStopReason(response.stop_reason),
        provider: 'anthropic',
      };
    } catch (error: unknown) {
      throw toLLMError(error);
    }
  }

  /**
   * Map Gemini finish reason to our standard format
   */
  private mapGeminiFinishReason(reason: string | undefined): FinishReason {
    switch (reason) {
      case 'MAX_TOKENS':
        return 'length';
      case 'SAFETY':
      case 'RECITATION':
      case 'BLOCKLIST':
      case 'PROHIBITED_CONTENT':
        return 'content_filter';
      default:
        return 'stop';
    }
  }

  /**
   * Map OpenAI finish reason to our standard format
   */
  private mapOpenAIFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }

  /**
   * Map Anthropic stop reason to our standard format
   */
  private mapAnthropicStopReason(reason: string | null): FinishReason {
    return reason === 'max_tokens' ? 'length' : 'stop';
  }
}

/**
 * The OpenAI and Anthropic SDKs expose the status on the error itself
 */
function getSdkStatus(error: unknown): number | undefined {
  if (error instanceof OpenAI.APIError || error instanceof Anthropic.APIError) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Classify anything a provider call threw. Classification goes by HTTP
 * status and timeout codes only, never by message text.
 */
export function toLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const message = errorMessage(error);

  if (isTimeoutError(error)) {
    return new LLMError(message, 'timeout', true, undefined, cause);
  }

  const status = getResponseStatus(error) ?? getSdkStatus(error);

  if (status === 429) {
    return new LLMError(message, 'rate_limit', true, status, cause);
  }

  if (status === 401 || status === 403) {
    return new LLMError(message, 'authentication', false, status, cause);
  }

  // Unknown model or endpoint
  if (status === 404) {
    return new LLMError(message, 'not_found', false, status, cause);
  }

  if (status === 400) {
    return new LLMError(message, 'invalid_request', false, status, cause);
  }

  if (status !== undefined && status >= 500) {
    return new LLMError(message, 'server_error', true, status, cause);
  }

  return new LLMError(message, 'unknown', false, status, cause);
}

/**
 * Default LLM client instance
 */
export const defaultLLMClient = new LLMClient();
