/**
 * Provider Outcome Types
 *
 * Every external generation call (primary LLM, secondary text provider,
 * speech synthesis) reports a typed outcome instead of throwing, so fallback
 * chains can be composed as data.
 */

/**
 * Why a provider call produced no usable output
 */
export type ProviderFailureKind =
  | 'unavailable'       // No credential configured, or provider rejected the credential
  | 'timeout'           // Call exceeded its time budget
  | 'http_error'        // Non-success status or transport failure
  | 'empty_response'    // Call succeeded but returned nothing usable
  | 'malformed_output'; // Output did not match the expected wire format

export interface ProviderFailure {
  kind: ProviderFailureKind;
  /** Provider that failed (e.g. 'gemini', 'fallback-text', 'speech') */
  provider: string;
  message: string;
  statusCode?: number;
}

export type ProviderResult<T> =
  | { ok: true; value: T; provider: string }
  | { ok: false; failure: ProviderFailure };

export function providerSuccess<T>(provider: string, value: T): ProviderResult<T> {
  return { ok: true, value, provider };
}

export function providerFailure<T>(
  provider: string,
  kind: ProviderFailureKind,
  message: string,
  statusCode?: number
): ProviderResult<T> {
  return { ok: false, failure: { kind, provider, message, statusCode } };
}

/**
 * A single link in a fallback chain
 */
export interface TextSource {
  readonly name: string;
  /** True when the source has the credentials it needs */
  isAvailable(): boolean;
  generate(prompt: string, options: { temperature: number; maxTokens: number }): Promise<ProviderResult<string>>;
}
