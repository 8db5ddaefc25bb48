/**
 * GOAT Debate Backend Server
 * Main entry point: wires the services and runs the HTTP server
 */

// Loads .env before any module reads process.env
import './config/env.js';

import { pathToFileURL } from 'url';
import { createApp } from './app.js';
import { logger } from './utils/logger.js';
import { validateLLMConfig } from './config/llm.js';
import { assetConfig } from './config/providers.js';
import { gameConfig, validateGameConfig } from './config/game.js';
import { defaultLLMClient } from './services/llm/index.js';
import { createContentProvider } from './services/content/content-provider.js';
import { AudioStore } from './services/audio/audio-store.js';
import { SpeechProvider } from './services/audio/speech-provider.js';
import { ScoringEngine } from './services/scoring/scoring-engine.js';
import { PortraitService } from './services/image/portrait-service.js';
import { DebateOrchestrator, SessionStore } from './services/debate/index.js';

const PORT = process.env.PORT || 8000;

const content = createContentProvider(defaultLLMClient);
// One cap for the judge prompt, the clamp and the session invariant
const scoreCap = gameConfig.scoreCapPerTurn;
const orchestrator = new DebateOrchestrator({
  store: new SessionStore({ scoreCap }),
  content,
  scoring: new ScoringEngine({ judge: content, cap: scoreCap }),
  speech: new SpeechProvider({ store: new AudioStore() }),
});

const app = createApp({
  orchestrator,
  portraits: new PortraitService(),
  staticDir: assetConfig.staticDir,
});

/**
 * Server lifecycle
 */

let server: ReturnType<typeof app.listen> | null = null;

/**
 * Start the server
 */
function start() {
  validateGameConfig();
  for (const warning of validateLLMConfig()) {
    logger.warn(warning);
  }

  server = app.listen(PORT, () => {
    logger.info({ port: PORT, env: process.env.NODE_ENV }, 'Server started');
  });

  // Handle server errors
  server.on('error', (error: Error) => {
    logger.error({ error }, 'Server error');
    process.exit(1);
  });
}

/**
 * Graceful shutdown
 * Stops accepting requests, then exits. Sessions are in memory and are lost.
 */
function shutdown(signal: string) {
  logger.info({ signal, activeSessions: orchestrator.activeSessionCount() }, 'Shutdown signal received');

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });
}

/**
 * Register shutdown handlers
 */
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  shutdown('unhandledRejection');
});

/**
 * Start the server if this file is run directly
 */
if (import.meta.url === pathToFileURL(process.argv[1]).href) {
  start();
}

// Export app for testing
export { app, start, shutdown };
