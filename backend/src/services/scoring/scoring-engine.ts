/**
 * Scoring Engine
 *
 * Awards points for one exchange. The judge model is asked for two integers;
 * its reply is untrusted, so anything that does not parse cleanly, or falls
 * outside [0, cap], is replaced by a word-count score.
 */

import pino from 'pino';
import type { TurnScore } from '../../types/debate.js';
import type { GenerationPurpose } from '../../types/llm.js';
import type { ProviderResult } from '../../types/provider.js';
import { gameConfig } from '../../config/game.js';
import { buildScoringPrompt } from '../content/prompts.js';
import { clean } from '../content/text-cleaner.js';

const logger = pino({
  name: 'scoring-engine',
  level: process.env.LOG_LEVEL || 'info',
});

const SCORE_REPLY = /^(\d+)\s*,\s*(\d+)\.?$/;

/**
 * The part of ContentProvider the engine needs
 */
export interface JudgeSource {
  attempt(prompt: string, purpose: GenerationPurpose): Promise<ProviderResult<string>>;
}

export interface ScoringEngineOptions {
  judge: JudgeSource;
  /** Per-turn ceiling for either side */
  cap?: number;
  wordsPerPoint?: number;
}

/**
 * Parse a "USER,AI" reply. Undefined for anything else.
 */
export function parseScoreReply(raw: string, cap: number): [number, number] | undefined {
  const match = SCORE_REPLY.exec(clean(raw));
  if (!match) {
    return undefined;
  }

  const userPoints = Number(match[1]);
  const aiPoints = Number(match[2]);

  if (userPoints > cap || aiPoints > cap) {
    return undefined;
  }

  return [userPoints, aiPoints];
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export class ScoringEngine {
  private readonly judge: JudgeSource;
  private readonly cap: number;
  private readonly wordsPerPoint: number;

  constructor(options: ScoringEngineOptions) {
    this.judge = options.judge;
    this.cap = options.cap ?? gameConfig.scoreCapPerTurn;
    this.wordsPerPoint = options.wordsPerPoint ?? gameConfig.fallbackWordsPerPoint;
  }

  /**
   * Deterministic score for a line: one point per wordsPerPoint words, capped
   */
  fallbackPoints(text: string): number {
    return Math.min(this.cap, Math.floor(countWords(text) / this.wordsPerPoint));
  }

  async score(
    userText: string,
    aiText: string,
    sides: { userSide: string; aiSide: string } = { userSide: 'User', aiSide: 'AI' }
  ): Promise<TurnScore> {
    const prompt = buildScoringPrompt({ ...sides, userText, aiText, cap: this.cap });
    const result = await this.judge.attempt(prompt, 'scoring');

    if (result.ok) {
      const parsed = parseScoreReply(result.value, this.cap);
      if (parsed) {
        return { userPoints: parsed[0], aiPoints: parsed[1], method: 'judge' };
      }

      logger.warn({ reply: result.value.slice(0, 100) }, 'Unparseable score reply, using word-count fallback');
    } else {
      logger.warn({ kind: result.failure.kind }, 'Judge unavailable, using word-count fallback');
    }

    return {
      userPoints: this.fallbackPoints(userText),
      aiPoints: this.fallbackPoints(aiText),
      method: 'fallback',
    };
  }
}
