/**
 * Session Store
 *
 * Owns every live debate session. Work on one session is serialized through
 * a per-id Bottleneck limiter with a single slot, so turns on the same debate
 * run one after another in arrival order while different debates run in
 * parallel. Sessions live for the lifetime of the process.
 */

import Bottleneck from 'bottleneck';
import { v4 as uuidv4 } from 'uuid';
import { SessionNotFoundError } from '../../types/debate.js';
import { gameConfig } from '../../config/game.js';
import { DebateSession, type DebateSessionInit } from './debate-session.js';

/**
 * Milliseconds since epoch
 */
export type Clock = () => number;

export interface SessionStoreOptions {
  clock?: Clock;
  generateId?: () => string;
  scoreCap?: number;
}

export type NewSession = Omit<DebateSessionInit, 'id' | 'startTime' | 'scoreCap'>;

export class SessionStore {
  private readonly sessions = new Map<string, DebateSession>();
  private readonly locks = new Bottleneck.Group({ maxConcurrent: 1 });
  private readonly clock: Clock;
  private readonly generateId: () => string;
  /** Per-turn award ceiling every session enforces */
  readonly scoreCap: number;

  constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? (() => uuidv4());
    this.scoreCap = options.scoreCap ?? gameConfig.scoreCapPerTurn;
  }

  now(): number {
    return this.clock();
  }

  create(init: NewSession): DebateSession {
    const session = new DebateSession({
      ...init,
      id: this.generateId(),
      startTime: this.clock(),
      scoreCap: this.scoreCap,
    });

    if (this.sessions.has(session.id)) {
      throw new Error(`Duplicate session id generated: ${session.id}`);
    }

    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * @throws SessionNotFoundError for unknown ids, including ''
   */
  require(sessionId: string): DebateSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Run `task` once every earlier task for the same session has settled
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.locks.key(sessionId).schedule(task);
  }

  get size(): number {
    return this.sessions.size;
  }

  countActive(): number {
    let active = 0;
    for (const session of this.sessions.values()) {
      if (!session.finished) {
        active++;
      }
    }
    return active;
  }
}
