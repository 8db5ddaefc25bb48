/**
 * Debate Orchestrator
 *
 * Runs the debate game: opens a debate with an AI line, answers each user
 * turn, scores the exchange, and judges the winner once the time limit has
 * passed.
 *
 * Responsibilities:
 * - Assign sides and generate the opening line
 * - Serialize turns per session through the SessionStore
 * - Evaluate the time-limit guard before answering a turn
 * - Run scoring and speech concurrently for each reply
 */

import pino from 'pino';
import {
  DebateStatus,
  SpeakerRole,
  type StartDebateInput,
  type StartDebateResult,
  type TurnResult,
  type SessionSnapshot,
  type TurnScore,
} from '../../types/debate.js';
import type { GenerationPurpose } from '../../types/llm.js';
import type { ProviderResult } from '../../types/provider.js';
import { gameConfig, formatFinishingMessage } from '../../config/game.js';
import {
  buildOpeningPrompt,
  buildReplyPrompt,
  buildJudgePrompt,
  DEFAULT_PROMPT_STYLE,
  type PromptStyle,
} from '../content/prompts.js';
import type { ISpeechService } from '../audio/types.js';
import { loggers, startTimer } from '../logging/log-helpers.js';
import { createSessionLogger } from '../../utils/logger.js';
import type { DebateSession } from './debate-session.js';
import type { SessionStore } from './session-store.js';
import { resolveSides, resolveWinner } from './persona-resolver.js';

/**
 * Logger instance
 */
const logger = pino({
  name: 'debate-orchestrator',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Text generation as the orchestrator uses it (ContentProvider)
 */
export interface DebateContentSource {
  generate(prompt: string, purpose: GenerationPurpose): Promise<string>;
  attempt(prompt: string, purpose: GenerationPurpose): Promise<ProviderResult<string>>;
}

export interface TurnScorer {
  score(userText: string, aiText: string, sides: { userSide: string; aiSide: string }): Promise<TurnScore>;
}

export interface OrchestratorSettings {
  timeLimitSeconds: number;
  historyWindow: number;
  drawLabel: string;
  voice?: string;
  promptStyle: PromptStyle;
}

export interface DebateOrchestratorDeps {
  store: SessionStore;
  content: DebateContentSource;
  scoring: TurnScorer;
  speech: ISpeechService;
  settings?: Partial<OrchestratorSettings>;
}

const DEFAULT_SETTINGS: OrchestratorSettings = {
  timeLimitSeconds: gameConfig.timeLimitSeconds,
  historyWindow: gameConfig.historyWindow,
  drawLabel: gameConfig.drawLabel,
  promptStyle: DEFAULT_PROMPT_STYLE,
};

const NO_SCORE: TurnScore = { userPoints: 0, aiPoints: 0, method: 'fallback' };

/**
 * Integer award within [0, cap]
 */
function clampPoints(points: number, cap: number): number {
  if (!Number.isFinite(points)) {
    return 0;
  }
  return Math.max(0, Math.min(cap, Math.floor(points)));
}

export class DebateOrchestrator {
  private readonly store: SessionStore;
  private readonly content: DebateContentSource;
  private readonly scoring: TurnScorer;
  private readonly speech: ISpeechService;
  private readonly settings: OrchestratorSettings;

  constructor(deps: DebateOrchestratorDeps) {
    this.store = deps.store;
    this.content = deps.content;
    this.scoring = deps.scoring;
    this.speech = deps.speech;
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
  }

  /**
   * Create a session and generate the AI's opening line
   */
  async startDebate(input: StartDebateInput): Promise<StartDebateResult> {
    const sides = resolveSides(input);
    const domain = input.domain?.trim() || undefined;

    const prompt = buildOpeningPrompt({ ...sides, domain }, this.settings.promptStyle);
    const aiText = await this.content.generate(prompt, 'dialogue');
    const aiAudioUrl = await this.speech.synthesize(aiText, this.settings.voice);

    const session = this.store.create({
      ...sides,
      domain,
      openingText: aiText,
      openingAudioUrl: aiAudioUrl,
    });

    loggers.debateLifecycle(session.id, 'started', {
      userSide: sides.userSide,
      aiSide: sides.aiSide,
      domain,
      hasAudio: aiAudioUrl !== undefined,
    });

    return {
      sessionId: session.id,
      aiText,
      aiAudioUrl,
      userScore: 0,
      aiScore: 0,
      userSide: sides.userSide,
      aiSide: sides.aiSide,
    };
  }

  /**
   * Apply one user turn. Turns on the same session run strictly in order.
   *
   * @throws SessionNotFoundError for unknown ids
   */
  async processTurn(sessionId: string, userText: string): Promise<TurnResult> {
    const session = this.store.require(sessionId);
    return this.store.runExclusive(sessionId, () => this.runTurn(session, userText));
  }

  /**
   * Read-only view of a session
   *
   * @throws SessionNotFoundError for unknown ids
   */
  getSnapshot(sessionId: string): SessionSnapshot {
    const session = this.store.require(sessionId);
    const state = session.getState();
    const endTime = state.finishedAt ?? this.store.now();

    return {
      sessionId: state.id,
      openingText: state.openingText,
      openingAudioUrl: state.openingAudioUrl,
      userSide: state.userSide,
      aiSide: state.aiSide,
      domain: state.domain,
      status: session.getStatus(),
      turnCount: state.turnCount,
      userScore: state.userScore,
      aiScore: state.aiScore,
      winner: state.winner,
      history: [...state.history],
      elapsedSeconds: Math.max(0, Math.floor((endTime - state.startTime) / 1000)),
    };
  }

  private async runTurn(session: DebateSession, userText: string): Promise<TurnResult> {
    const sessionLogger = createSessionLogger(session.id);

    if (session.finished) {
      sessionLogger.debug('Turn received after the debate finished, replaying final result');
      return this.finalResult(session);
    }

    const elapsed = startTimer();
    const elapsedMs = this.store.now() - session.startTime;
    if (elapsedMs >= this.settings.timeLimitSeconds * 1000) {
      return this.judge(session, userText, elapsedMs);
    }

    // Nothing is written to the session until every provider call has settled
    const matchup = { userSide: session.userSide, aiSide: session.aiSide, domain: session.domain };
    const prompt = buildReplyPrompt(
      { ...matchup, recentHistory: session.recentHistory(this.settings.historyWindow), userText },
      this.settings.promptStyle
    );
    const aiText = await this.content.generate(prompt, 'dialogue');

    const [scored, spoken] = await Promise.allSettled([
      this.scoring.score(userText, aiText, matchup),
      this.speech.synthesize(aiText, this.settings.voice),
    ]);

    const score: TurnScore = scored.status === 'fulfilled' ? scored.value : NO_SCORE;
    if (scored.status === 'rejected') {
      sessionLogger.warn({ error: scored.reason }, 'Scoring failed, awarding no points');
    }
    const aiAudioUrl = spoken.status === 'fulfilled' ? spoken.value : undefined;
    if (spoken.status === 'rejected') {
      sessionLogger.warn({ error: spoken.reason }, 'Speech failed, answering without audio');
    }

    const cap = this.store.scoreCap;
    session.appendUserUtterance(userText);
    session.appendAiUtterance(aiText);
    session.addPoints(clampPoints(score.userPoints, cap), clampPoints(score.aiPoints, cap));

    const { userScore, aiScore } = session.getScores();
    loggers.turnProcessed({
      sessionId: session.id,
      turnCount: session.getTurnCount(),
      userScore,
      aiScore,
      finished: false,
      hasAudio: aiAudioUrl !== undefined,
      duration_ms: elapsed(),
    });
    sessionLogger.debug({ method: score.method }, 'Turn scored');

    return {
      sessionId: session.id,
      aiText,
      aiAudioUrl,
      userScore,
      aiScore,
      finished: false,
      turnCount: session.getTurnCount(),
    };
  }

  /**
   * Time is up: ask the judge for a winner and close the session
   */
  private async judge(session: DebateSession, userText: string, elapsedMs: number): Promise<TurnResult> {
    const prompt = buildJudgePrompt({
      userSide: session.userSide,
      aiSide: session.aiSide,
      domain: session.domain,
      history: [...session.getHistory(), { speaker: SpeakerRole.USER, text: userText }],
    });
    const verdict = await this.content.attempt(prompt, 'judging');

    if (!verdict.ok) {
      logger.warn(
        { sessionId: session.id, kind: verdict.failure.kind },
        'Judge call failed, deciding winner on scores'
      );
    }

    const winner = resolveWinner(
      verdict.ok ? verdict.value : undefined,
      { userSide: session.userSide, aiSide: session.aiSide, ...session.getScores() },
      this.settings.drawLabel
    );

    session.appendUserUtterance(userText);
    session.finish(winner, this.store.now());
    loggers.sessionTransition(session.id, DebateStatus.ACTIVE, DebateStatus.FINISHED, elapsedMs);
    loggers.debateLifecycle(session.id, 'finished', {
      winner,
      turnCount: session.getTurnCount(),
      judged: verdict.ok,
    });

    return this.finalResult(session);
  }

  private finalResult(session: DebateSession): TurnResult {
    const winner = session.getWinner() ?? this.settings.drawLabel;
    const { userScore, aiScore } = session.getScores();

    return {
      sessionId: session.id,
      aiText: formatFinishingMessage(winner),
      aiAudioUrl: undefined,
      userScore,
      aiScore,
      finished: true,
      winner,
      turnCount: session.getTurnCount(),
    };
  }

  /**
   * Number of sessions still in play
   */
  activeSessionCount(): number {
    return this.store.countActive();
  }
}
