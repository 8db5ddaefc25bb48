/**
 * Debate Session
 *
 * Fixed-shape record for one debate. All mutation goes through methods that
 * enforce the session invariants: history is append-only, scores only grow,
 * and a finished session accepts nothing further.
 */

import {
  DebateStatus,
  DebateStateError,
  SpeakerRole,
  type DebateSessionState,
  type Utterance,
} from '../../types/debate.js';

/**
 * Transition map defining valid status transitions
 * Key: from status, Value: allowed destination statuses
 */
const TRANSITIONS: Map<DebateStatus, DebateStatus[]> = new Map([
  [DebateStatus.ACTIVE, [DebateStatus.FINISHED]],
  // Terminal
  [DebateStatus.FINISHED, []],
]);

export interface DebateSessionInit {
  id: string;
  userSide: string;
  aiSide: string;
  domain?: string;
  startTime: number;
  openingText: string;
  openingAudioUrl?: string;
  /** Per-turn ceiling for awarded points */
  scoreCap: number;
}

export class DebateSession {
  readonly id: string;
  readonly userSide: string;
  readonly aiSide: string;
  readonly domain?: string;
  readonly startTime: number;
  readonly openingText: string;
  readonly openingAudioUrl?: string;

  private readonly scoreCap: number;
  private readonly history: Utterance[];
  private status: DebateStatus = DebateStatus.ACTIVE;
  private turnCount = 0;
  private userScore = 0;
  private aiScore = 0;
  private winner?: string;
  private finishedAt?: number;

  constructor(init: DebateSessionInit) {
    this.id = init.id;
    this.userSide = init.userSide;
    this.aiSide = init.aiSide;
    this.domain = init.domain;
    this.startTime = init.startTime;
    this.openingText = init.openingText;
    this.openingAudioUrl = init.openingAudioUrl;
    this.scoreCap = init.scoreCap;

    // History always starts with the AI's opening line
    this.history = [{ speaker: SpeakerRole.AI, text: init.openingText }];
  }

  get finished(): boolean {
    return this.status === DebateStatus.FINISHED;
  }

  getStatus(): DebateStatus {
    return this.status;
  }

  getWinner(): string | undefined {
    return this.winner;
  }

  getTurnCount(): number {
    return this.turnCount;
  }

  getScores(): { userScore: number; aiScore: number } {
    return { userScore: this.userScore, aiScore: this.aiScore };
  }

  getHistory(): readonly Utterance[] {
    return this.history;
  }

  /**
   * Last `count` history entries, oldest first
   */
  recentHistory(count: number): Utterance[] {
    return count > 0 ? this.history.slice(-count) : [];
  }

  /**
   * Copy of the full state
   */
  getState(): DebateSessionState {
    return {
      id: this.id,
      userSide: this.userSide,
      aiSide: this.aiSide,
      domain: this.domain,
      startTime: this.startTime,
      history: this.history.map(entry => ({ ...entry })),
      turnCount: this.turnCount,
      userScore: this.userScore,
      aiScore: this.aiScore,
      finished: this.finished,
      winner: this.winner,
      openingText: this.openingText,
      openingAudioUrl: this.openingAudioUrl,
      finishedAt: this.finishedAt,
    };
  }

  /**
   * Record the user's line. Counts as a turn even when empty.
   */
  appendUserUtterance(text: string): void {
    this.assertActive('append a user utterance');
    this.history.push({ speaker: SpeakerRole.USER, text });
    this.turnCount++;
  }

  appendAiUtterance(text: string): void {
    this.assertActive('append an AI utterance');
    this.history.push({ speaker: SpeakerRole.AI, text });
  }

  /**
   * Add one turn's awards to the running totals
   */
  addPoints(userPoints: number, aiPoints: number): void {
    this.assertActive('change scores');

    for (const points of [userPoints, aiPoints]) {
      if (!Number.isInteger(points) || points < 0 || points > this.scoreCap) {
        throw new DebateStateError(
          this.id,
          `Per-turn award must be an integer in [0, ${this.scoreCap}], got ${points}`
        );
      }
    }

    this.userScore += userPoints;
    this.aiScore += aiPoints;
  }

  /**
   * Move to FINISHED with a winner. One-way.
   */
  finish(winner: string, at: number): void {
    this.transition(DebateStatus.FINISHED);
    this.winner = winner;
    this.finishedAt = at;
  }

  private transition(to: DebateStatus): void {
    const allowed = TRANSITIONS.get(this.status) ?? [];
    if (!allowed.includes(to)) {
      throw new DebateStateError(this.id, `Invalid status transition: ${this.status} -> ${to}`);
    }
    this.status = to;
  }

  private assertActive(action: string): void {
    if (this.finished) {
      throw new DebateStateError(this.id, `Cannot ${action}: debate ${this.id} is finished`);
    }
  }
}
