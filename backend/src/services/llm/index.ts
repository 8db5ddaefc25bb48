/**
 * LLM Service Barrel Export
 */

export { LLMClient, defaultLLMClient, toLLMError } from './client.js';
export { LLMTextSource } from './llm-text-source.js';
export { FallbackTextClient } from './fallback-text-client.js';
export { LLMError } from '../../types/llm.js';
export type { LLMRequest, LLMResponse, LLMProviderName, GenerationPurpose } from '../../types/llm.js';
