/**
 * Secondary provider configuration: fallback text generation, speech synthesis,
 * portrait images and the static asset directory.
 */

import { getEnvVar, getEnvInt } from './env.js';

export interface FallbackTextConfig {
  /** Base URL; the url-encoded prompt is appended as the last path segment */
  baseUrl: string;
  timeoutMs: number;
}

export interface SpeechConfig {
  /** Bearer credential. Empty disables audio. */
  apiKey: string;
  apiUrl: string;
  voice: string;
  timeoutMs: number;
  maxChars: number;
  maxConcurrent: number;
}

export interface AssetConfig {
  /** Directory audio files are written to */
  staticDir: string;
  /** URL prefix the directory is served under */
  publicPath: string;
}

export interface ImageConfig {
  baseUrl: string;
  width: number;
  height: number;
}

export const fallbackTextConfig: FallbackTextConfig = {
  baseUrl: getEnvVar('FALLBACK_TEXT_BASE_URL', false, 'https://text.pollinations.ai'),
  timeoutMs: getEnvInt('FALLBACK_TEXT_TIMEOUT_MS', 15000),
};

export const speechConfig: SpeechConfig = {
  apiKey: getEnvVar('YARNGPT_API_KEY'),
  apiUrl: getEnvVar('SPEECH_API_URL', false, 'https://yarngpt.ai/api/v1/tts'),
  voice: getEnvVar('SPEECH_VOICE', false, 'Osagie'),
  timeoutMs: getEnvInt('SPEECH_TIMEOUT_MS', 15000),
  maxChars: getEnvInt('SPEECH_MAX_CHARS', 600),
  maxConcurrent: getEnvInt('SPEECH_MAX_CONCURRENT', 3),
};

export const assetConfig: AssetConfig = {
  staticDir: getEnvVar('STATIC_DIR', false, './static'),
  publicPath: '/static',
};

export const imageConfig: ImageConfig = {
  baseUrl: getEnvVar('IMAGE_BASE_URL', false, 'https://image.pollinations.ai/prompt'),
  width: getEnvInt('IMAGE_WIDTH', 800),
  height: getEnvInt('IMAGE_HEIGHT', 800),
};
