/**
 * LLM Client Tests
 *
 * LLMError classification, the Gemini REST path, and the TextSource adapters
 * that turn client errors into provider failures.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockPost, mockGet } = vi.hoisted(() => ({
  mockPost: vi.fn(),
  mockGet: vi.fn(),
}));

vi.mock('axios', async importOriginal => {
  const actual = await importOriginal<typeof import('axios')>();
  return {
    ...actual,
    default: {
      isAxiosError: actual.isAxiosError,
      create: vi.fn().mockImplementation(() => ({
        post: mockPost,
        get: mockGet,
      })),
    },
  };
});

import OpenAI from 'openai';
import { AxiosError, AxiosHeaders } from 'axios';
import { LLMError, type LLMRequest } from '../src/types/llm.js';
import type { LLMConfig } from '../src/config/llm.js';
import { LLMClient, toLLMError } from '../src/services/llm/client.js';
import { LLMTextSource } from '../src/services/llm/llm-text-source.js';
import { FallbackTextClient } from '../src/services/llm/fallback-text-client.js';

function statusError(status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, {
    data: {},
    status,
    statusText: '',
    headers: {},
    config: { headers: new AxiosHeaders() },
  });
}

function timeoutError(message: string): AxiosError {
  return new AxiosError(message, 'ECONNABORTED');
}

function makeConfig(overrides: Partial<LLMConfig> = {}): LLMConfig {
  return {
    gemini: { apiKey: 'test-key', baseURL: 'https://gemini.test/v1beta' },
    openai: { apiKey: '' },
    anthropic: { apiKey: '' },
    defaultProvider: 'gemini',
    defaultModels: {
      gemini: 'gemini-2.0-flash',
      openai: 'gpt-4o-mini',
      anthropic: 'claude-3-5-haiku-20241022',
    },
    timeoutMs: 5000,
    retry: { maxRetries: 0, baseDelay: 0, maxDelay: 0 },
    ...overrides,
  };
}

const geminiReply = (text: string) => ({
  data: {
    candidates: [{ content: { parts: [{ text }] }, finishReason: 'STOP' }],
    usageMetadata: { promptTokenCount: 5, candidatesTokenCount: 2, totalTokenCount: 7 },
  },
});

describe('LLMError', () => {
  it('should create error with all properties', () => {
    const error = new LLMError('Test error', 'rate_limit', true, 429);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('rate_limit');
    expect(error.retryable).toBe(true);
    expect(error.statusCode).toBe(429);
    expect(error.name).toBe('LLMError');
  });

  it('should keep the original error as cause', () => {
    const original = new Error('boom');
    const error = new LLMError('Wrapped', 'unknown', false, undefined, original);

    expect(error.cause).toBe(original);
  });
});

describe('toLLMError', () => {
  it('should classify axios failures by status', () => {
    expect(toLLMError(statusError(429))).toMatchObject({ code: 'rate_limit', retryable: true, statusCode: 429 });
    expect(toLLMError(statusError(403))).toMatchObject({ code: 'authentication', retryable: false });
    expect(toLLMError(statusError(404))).toMatchObject({ code: 'not_found', retryable: false });
    expect(toLLMError(statusError(502))).toMatchObject({ code: 'server_error', retryable: true });
  });

  it('should classify axios timeouts', () => {
    expect(toLLMError(timeoutError('timeout of 5000ms exceeded'))).toMatchObject({ code: 'timeout', retryable: true });
  });

  it('should classify SDK errors by status', () => {
    const error = toLLMError(new OpenAI.APIError(401, undefined, 'Unauthorized', undefined));

    expect(error).toMatchObject({ code: 'authentication', statusCode: 401 });
  });

  it('should not guess a code from message text', () => {
    const error = toLLMError(new Error('Invalid reply: 400 words, 500 chars'));

    expect(error).toMatchObject({ code: 'unknown', retryable: false, statusCode: undefined });
  });

  it('should pass LLMErrors through and wrap non-Error values', () => {
    const original = new LLMError('Slow down', 'rate_limit', true, 429);

    expect(toLLMError(original)).toBe(original);
    expect(toLLMError('String error message')).toMatchObject({ code: 'unknown', message: 'String error message' });
  });
});

describe('LLMClient', () => {
  const request: LLMRequest = {
    provider: 'gemini',
    model: 'gemini-2.0-flash',
    messages: [
      { role: 'system', content: 'Be brief' },
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
      { role: 'user', content: 'Who be GOAT?' },
    ],
    temperature: 0.8,
    maxTokens: 150,
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should call Gemini generateContent with mapped roles and settings', async () => {
    mockPost.mockResolvedValue(geminiReply('Na Messi'));
    const client = new LLMClient(undefined, makeConfig());

    await client.complete(request);

    expect(mockPost).toHaveBeenCalledWith(
      '/models/gemini-2.0-flash:generateContent',
      {
        contents: [
          { role: 'user', parts: [{ text: 'Hi' }] },
          { role: 'model', parts: [{ text: 'Hello' }] },
          { role: 'user', parts: [{ text: 'Who be GOAT?' }] },
        ],
        systemInstruction: { parts: [{ text: 'Be brief' }] },
        generationConfig: { temperature: 0.8, maxOutputTokens: 150 },
      },
      { params: { key: 'test-key' } }
    );
  });

  it('should join candidate parts and report usage', async () => {
    mockPost.mockResolvedValue({
      data: {
        candidates: [
          { content: { parts: [{ text: 'Abeg ' }, { text: 'hold am' }] }, finishReason: 'MAX_TOKENS' },
        ],
        usageMetadata: { promptTokenCount: 5, candidatesTokenCount: 2, totalTokenCount: 7 },
      },
    });
    const client = new LLMClient(undefined, makeConfig());

    const response = await client.complete(request);

    expect(response).toEqual({
      content: 'Abeg hold am',
      model: 'gemini-2.0-flash',
      usage: { promptTokens: 5, completionTokens: 2, totalTokens: 7 },
      finishReason: 'length',
      provider: 'gemini',
    });
  });

  it('should fail with an authentication error when no key is configured', async () => {
    const client = new LLMClient(undefined, makeConfig({ gemini: { apiKey: '', baseURL: 'https://gemini.test' } }));

    expect(client.isAvailable()).toBe(false);
    await expect(client.complete(request)).rejects.toMatchObject({
      code: 'authentication',
      retryable: false,
    });
    expect(mockPost).not.toHaveBeenCalled();
  });

  it('should map HTTP 429 to a retryable rate_limit error', async () => {
    mockPost.mockRejectedValue(statusError(429));
    const client = new LLMClient(undefined, makeConfig());

    await expect(client.complete(request)).rejects.toMatchObject({
      code: 'rate_limit',
      retryable: true,
      statusCode: 429,
    });
    expect(mockPost).toHaveBeenCalledTimes(1);
  });

  it('should retry retryable errors when retries are configured', async () => {
    mockPost
      .mockRejectedValueOnce(statusError(503))
      .mockResolvedValueOnce(geminiReply('Second time lucky'));
    const client = new LLMClient({ maxRetries: 1, baseDelay: 0, maxDelay: 0 }, makeConfig());

    const response = await client.complete(request);

    expect(response.content).toBe('Second time lucky');
    expect(mockPost).toHaveBeenCalledTimes(2);
  });

  it('should not retry non-retryable errors', async () => {
    mockPost.mockRejectedValue(statusError(400));
    const client = new LLMClient({ maxRetries: 3, baseDelay: 0, maxDelay: 0 }, makeConfig());

    await expect(client.complete(request)).rejects.toMatchObject({ code: 'invalid_request' });
    expect(mockPost).toHaveBeenCalledTimes(1);
  });

  it('should map axios timeouts to timeout errors', async () => {
    mockPost.mockRejectedValue(timeoutError('socket hang up'));
    const client = new LLMClient(undefined, makeConfig());

    await expect(client.complete(request)).rejects.toMatchObject({ code: 'timeout', retryable: true });
  });

  it('should treat a reply without candidates as a server error', async () => {
    mockPost.mockResolvedValue({ data: {} });
    const client = new LLMClient(undefined, makeConfig());

    await expect(client.complete(request)).rejects.toMatchObject({ code: 'server_error' });
  });

  it('should send chat() to the default provider and model', async () => {
    mockPost.mockResolvedValue(geminiReply('Oya'));
    const client = new LLMClient(undefined, makeConfig());

    const content = await client.chat([{ role: 'user', content: 'Start' }], { temperature: 0.2, maxTokens: 20 });

    expect(content).toBe('Oya');
    expect(mockPost).toHaveBeenCalledWith(
      '/models/gemini-2.0-flash:generateContent',
      {
        contents: [{ role: 'user', parts: [{ text: 'Start' }] }],
        generationConfig: { temperature: 0.2, maxOutputTokens: 20 },
      },
      { params: { key: 'test-key' } }
    );
  });
});

describe('LLMTextSource', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return the generated text as a success', async () => {
    mockPost.mockResolvedValue(geminiReply('Na me be the GOAT'));
    const source = new LLMTextSource(new LLMClient(undefined, makeConfig()));

    const result = await source.generate('prompt', { temperature: 0.8, maxTokens: 150 });

    expect(result).toEqual({ ok: true, value: 'Na me be the GOAT', provider: 'gemini' });
  });

  it('should report a missing key as unavailable without calling the API', async () => {
    const source = new LLMTextSource(
      new LLMClient(undefined, makeConfig({ gemini: { apiKey: '', baseURL: 'https://gemini.test' } }))
    );

    const result = await source.generate('prompt', { temperature: 0.8, maxTokens: 150 });

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'unavailable', provider: 'gemini', message: 'No API key configured', statusCode: undefined },
    });
    expect(mockPost).not.toHaveBeenCalled();
  });

  it('should report whitespace-only output as empty_response', async () => {
    mockPost.mockResolvedValue(geminiReply('   '));
    const source = new LLMTextSource(new LLMClient(undefined, makeConfig()));

    const result = await source.generate('prompt', { temperature: 0.8, maxTokens: 150 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('empty_response');
    }
  });

  it('should map client errors to failure kinds', async () => {
    mockPost.mockRejectedValue(statusError(500));
    const source = new LLMTextSource(new LLMClient(undefined, makeConfig()));

    const result = await source.generate('prompt', { temperature: 0.8, maxTokens: 150 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure).toMatchObject({ kind: 'http_error', provider: 'gemini', statusCode: 500 });
    }
  });
});

describe('FallbackTextClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should GET the url-encoded prompt and return the body', async () => {
    mockGet.mockResolvedValue({ data: 'Messi no reach Ronaldo at all' });
    const client = new FallbackTextClient({ baseUrl: 'https://text.test', timeoutMs: 1000 });

    const result = await client.generate('Who be GOAT?');

    expect(mockGet).toHaveBeenCalledWith('/Who%20be%20GOAT%3F');
    expect(result).toEqual({ ok: true, value: 'Messi no reach Ronaldo at all', provider: 'fallback-text' });
  });

  it('should report an empty body as empty_response', async () => {
    mockGet.mockResolvedValue({ data: '' });
    const client = new FallbackTextClient({ baseUrl: 'https://text.test', timeoutMs: 1000 });

    const result = await client.generate('prompt');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('empty_response');
    }
  });

  it('should classify timeouts and HTTP errors', async () => {
    const client = new FallbackTextClient({ baseUrl: 'https://text.test', timeoutMs: 1000 });

    mockGet.mockRejectedValueOnce(timeoutError('timeout of 1000ms exceeded'));
    const timedOut = await client.generate('prompt');

    mockGet.mockRejectedValueOnce(statusError(502));
    const badGateway = await client.generate('prompt');

    expect(timedOut).toEqual({
      ok: false,
      failure: { kind: 'timeout', provider: 'fallback-text', message: 'timeout of 1000ms exceeded', statusCode: undefined },
    });
    expect(badGateway).toEqual({
      ok: false,
      failure: {
        kind: 'http_error',
        provider: 'fallback-text',
        message: 'Request failed with status code 502',
        statusCode: 502,
      },
    });
  });
});
