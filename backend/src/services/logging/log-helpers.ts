/**
 * Structured logging helpers for common event types
 * Provides consistent logging patterns across the application
 */

import { logger } from '../../utils/logger.js';
import type { ProviderFailure } from '../../types/provider.js';
import type { DebateStatus } from '../../types/debate.js';

/**
 * Category-based logging helpers
 * Each helper logs a specific type of event with consistent structure
 */
export const loggers = {
  /**
   * Log session state transitions
   * @param sessionId - Debate session identifier
   * @param from - Previous status
   * @param to - New status
   */
  sessionTransition(sessionId: string, from: DebateStatus, to: DebateStatus, elapsedMs?: number) {
    logger.info({
      category: 'state_machine',
      sessionId,
      from,
      to,
      elapsed_ms: elapsedMs,
      event: 'transition',
    }, `Session transition: ${from} -> ${to}`);
  },

  /**
   * Log an external provider call with its latency
   */
  providerCall(params: {
    provider: string;
    purpose: string;
    latency_ms: number;
    success: boolean;
    error?: string;
  }) {
    const level = params.success ? 'debug' : 'warn';
    logger[level]({
      category: 'provider_call',
      event: 'provider_request',
      ...params,
    }, `Provider ${params.provider} ${params.success ? 'answered' : 'failed'} in ${params.latency_ms}ms`);
  },

  /**
   * Log a recovered provider failure and where the chain goes next
   * @param failure - Typed failure from the provider
   * @param next - Name of the next link in the chain
   */
  providerFallback(failure: ProviderFailure, next: string) {
    logger.warn({
      category: 'fallback',
      event: 'provider_fallback',
      provider: failure.provider,
      kind: failure.kind,
      statusCode: failure.statusCode,
      reason: failure.message,
      next,
    }, `Falling back from ${failure.provider} to ${next} (${failure.kind})`);
  },

  /**
   * Log a completed turn
   */
  turnProcessed(params: {
    sessionId: string;
    turnCount: number;
    userScore: number;
    aiScore: number;
    finished: boolean;
    hasAudio: boolean;
    duration_ms: number;
  }) {
    logger.info({
      category: 'turn',
      event: 'turn_processed',
      ...params,
    }, `Turn ${params.turnCount} processed in ${params.duration_ms}ms`);
  },

  /**
   * Log debate lifecycle events
   */
  debateLifecycle(
    sessionId: string,
    event: 'started' | 'finished',
    metadata?: Record<string, unknown>
  ) {
    logger.info({
      category: 'debate_lifecycle',
      event: `debate_${event}`,
      sessionId,
      ...metadata,
    }, `Debate ${event}`);
  },
};

/**
 * Performance timing helper
 * Returns a function that yields the elapsed milliseconds when called
 *
 * @example
 * const elapsed = startTimer();
 * await someOperation();
 * loggers.providerCall({ ..., latency_ms: elapsed() });
 */
export function startTimer(): () => number {
  const start = Date.now();
  return () => Date.now() - start;
}
