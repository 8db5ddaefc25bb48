/**
 * Debate Services Barrel Export
 *
 * Central export point for all debate-related services
 */

export { DebateSession } from './debate-session.js';
export type { DebateSessionInit } from './debate-session.js';

export { SessionStore } from './session-store.js';
export type { Clock, SessionStoreOptions, NewSession } from './session-store.js';

export { resolveSides, resolveWinner, findNamedPersona, samePersona } from './persona-resolver.js';
export type { SideAssignment } from './persona-resolver.js';

export { DebateOrchestrator } from './debate-orchestrator.js';
export type {
  DebateContentSource,
  TurnScorer,
  OrchestratorSettings,
  DebateOrchestratorDeps,
} from './debate-orchestrator.js';
