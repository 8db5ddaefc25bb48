/**
 * Helpers for inspecting errors thrown by the axios-based provider clients
 */

import axios from 'axios';

/**
 * HTTP status of a failed axios request, if the server answered
 */
export function getResponseStatus(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * True for client-side timeouts: axios ECONNABORTED/ETIMEDOUT, or a timeout message elsewhere
 */
export function isTimeoutError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  }

  return error instanceof Error && /timeout|timed out/i.test(error.message);
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
