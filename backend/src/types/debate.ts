/**
 * Debate Game Types
 *
 * Session state, utterances and the request/response contract of the
 * debate orchestrator.
 */

/**
 * Session lifecycle. FINISHED is terminal.
 */
export enum DebateStatus {
  ACTIVE = 'active',
  FINISHED = 'finished',
}

/**
 * Who spoke an utterance
 */
export enum SpeakerRole {
  USER = 'user',
  AI = 'ai',
}

/**
 * A single line of dialogue in a session's history
 */
export interface Utterance {
  speaker: SpeakerRole;
  text: string;
}

/**
 * Read-only view of a debate session
 */
export interface DebateSessionState {
  id: string;
  userSide: string;
  aiSide: string;
  domain?: string;
  /** Creation time, ms since epoch */
  startTime: number;
  history: readonly Utterance[];
  turnCount: number;
  userScore: number;
  aiScore: number;
  finished: boolean;
  winner?: string;
  openingText: string;
  openingAudioUrl?: string;
  finishedAt?: number;
}

/**
 * Input for starting a debate
 */
export interface StartDebateInput {
  /** First persona; the user's side unless userSide says otherwise */
  userPersona: string;
  /** Second persona */
  aiPersona: string;
  /** Optional topic category, e.g. "Football" */
  domain?: string;
  /** Persona the user claims; defaults to userPersona */
  userSide?: string;
}

export interface StartDebateResult {
  sessionId: string;
  aiText: string;
  aiAudioUrl?: string;
  userScore: number;
  aiScore: number;
  userSide: string;
  aiSide: string;
}

export interface TurnResult {
  sessionId: string;
  aiText: string;
  aiAudioUrl?: string;
  userScore: number;
  aiScore: number;
  finished: boolean;
  winner?: string;
  turnCount: number;
}

export interface SessionSnapshot {
  sessionId: string;
  openingText: string;
  openingAudioUrl?: string;
  userSide: string;
  aiSide: string;
  domain?: string;
  status: DebateStatus;
  turnCount: number;
  userScore: number;
  aiScore: number;
  winner?: string;
  history: Utterance[];
  elapsedSeconds: number;
}

/**
 * Points awarded for one turn
 */
export interface TurnScore {
  userPoints: number;
  aiPoints: number;
  method: 'judge' | 'fallback';
}

/**
 * Raised when a session id is unknown. Surfaces to clients as 404.
 */
export class SessionNotFoundError extends Error {
  public readonly code = 'session_not_found';
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Debate session not found: ${sessionId === '' ? '(empty id)' : sessionId}`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/**
 * Raised when code tries to break a session invariant (appending after the
 * debate finished, negative points, finishing twice). A programming error.
 */
export class DebateStateError extends Error {
  public readonly sessionId: string;

  constructor(sessionId: string, message: string) {
    super(message);
    this.name = 'DebateStateError';
    this.sessionId = sessionId;
  }
}
