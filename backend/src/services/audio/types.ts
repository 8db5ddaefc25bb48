/**
 * Audio Service Type Definitions
 *
 * Contracts between the speech provider and where its audio ends up.
 */

/**
 * Audio output format
 */
export type AudioFormat = 'mp3';

/**
 * Request body the speech API takes
 */
export interface SpeechRequestBody {
  text: string;
  voice: string;
  response_format: AudioFormat;
}

/**
 * Persists synthesized audio and returns the relative URL it is served under
 */
export interface AudioSink {
  save(audio: Buffer, format: AudioFormat): Promise<string>;
}

/**
 * Text-to-speech service used by the debate orchestrator
 */
export interface ISpeechService {
  readonly provider: string;
  /** True when a credential is configured */
  isAvailable(): boolean;
  /**
   * Relative URL of the stored audio, or undefined when speech is disabled or failed.
   * Never rejects.
   */
  synthesize(text: string, voice?: string): Promise<string | undefined>;
}
