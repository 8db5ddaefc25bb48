/**
 * Debate game policy
 *
 * Time limit, context window, scoring caps and the voice of the AI persona.
 * Every value can be overridden from the environment.
 */

import { getEnvVar, getEnvInt } from './env.js';

export interface GameConfig {
  /** Elapsed seconds after which the next turn is judged instead of answered */
  timeLimitSeconds: number;
  /** Number of most recent history entries included in a reply prompt */
  historyWindow: number;
  /** Maximum points either side can earn in a single turn */
  scoreCapPerTurn: number;
  /** Words per point in the deterministic scoring fallback */
  fallbackWordsPerPoint: number;
  /** Sentence ceiling for every AI line */
  maxReplySentences: number;
  /** Speech register the AI persona uses */
  speechRegister: string;
  /** In-character line used when every text provider is down */
  staticFallbackLine: string;
  /** Winner label when the judge names nobody and the scores are level */
  drawLabel: string;
}

export const gameConfig: GameConfig = {
  timeLimitSeconds: getEnvInt('DEBATE_TIME_LIMIT_SECONDS', 300),
  historyWindow: getEnvInt('HISTORY_WINDOW', 5),
  scoreCapPerTurn: getEnvInt('SCORE_CAP_PER_TURN', 20),
  fallbackWordsPerPoint: getEnvInt('FALLBACK_WORDS_PER_POINT', 2),
  maxReplySentences: getEnvInt('MAX_REPLY_SENTENCES', 2),
  speechRegister: getEnvVar('DEBATE_SPEECH_REGISTER', false, 'Nigerian Pidgin English'),
  staticFallbackLine: getEnvVar(
    'STATIC_FALLBACK_LINE',
    false,
    'Abeg, network no good. I no fit talk now.'
  ),
  drawLabel: 'Draw',
};

/**
 * Validate game policy at startup. Throws when a value would break a turn.
 */
export function validateGameConfig(cfg: GameConfig = gameConfig): void {
  const errors: string[] = [];

  if (cfg.timeLimitSeconds <= 0) {
    errors.push('DEBATE_TIME_LIMIT_SECONDS must be > 0');
  }

  if (cfg.historyWindow < 0) {
    errors.push('HISTORY_WINDOW must be >= 0');
  }

  if (cfg.scoreCapPerTurn < 1) {
    errors.push('SCORE_CAP_PER_TURN must be >= 1');
  }

  if (cfg.fallbackWordsPerPoint < 1) {
    errors.push('FALLBACK_WORDS_PER_POINT must be >= 1');
  }

  if (cfg.maxReplySentences < 1) {
    errors.push('MAX_REPLY_SENTENCES must be >= 1');
  }

  if (errors.length > 0) {
    throw new Error(`Game configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Message returned on the turn that ends the debate
 */
export function formatFinishingMessage(winner: string): string {
  return `Time don reach! The winner na ${winner}!`;
}
