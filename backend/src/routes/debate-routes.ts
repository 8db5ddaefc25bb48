/**
 * Debate Routes
 * Express routes for starting debates, playing turns and reading session state
 */

import express, { type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { SessionNotFoundError } from '../types/debate.js';
import type { DebateOrchestrator } from '../services/debate/index.js';

const logger = createLogger({ module: 'DebateRoutes' });

const personaName = z.string().trim().min(1, 'Persona name is required').max(100);

const startDebateSchema = z.object({
  userPersona: personaName,
  aiPersona: personaName,
  domain: z.string().trim().max(100).optional(),
  userSide: personaName.optional(),
});

// Empty text is a valid (if weak) turn
const turnSchema = z.object({
  userText: z.string().max(2000),
});

/**
 * Shared error response for orchestrator failures
 */
function sendError(res: Response, error: unknown, action: string, sessionId?: string): void {
  if (error instanceof SessionNotFoundError) {
    res.status(404).json({
      error: 'Debate not found',
      code: 'SESSION_NOT_FOUND',
      sessionId: error.sessionId,
    });
    return;
  }

  logger.error({ error, sessionId }, `Failed to ${action}`);
  res.status(500).json({
    error: `Failed to ${action}`,
    message: process.env.NODE_ENV === 'development' && error instanceof Error ? error.message : undefined,
  });
}

/**
 * Build the debate router around an orchestrator
 */
export function createDebateRouter(orchestrator: DebateOrchestrator): Router {
  const router = express.Router();

  /**
   * POST /debates
   * Start a new debate; the AI speaks first
   */
  router.post('/debates', async (req: Request, res: Response) => {
    const parseResult = startDebateSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: parseResult.error.errors,
      });
      return;
    }

    try {
      const result = await orchestrator.startDebate(parseResult.data);

      logger.info(
        { sessionId: result.sessionId, userSide: result.userSide, aiSide: result.aiSide },
        'Debate started'
      );

      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, 'start debate');
    }
  });

  /**
   * POST /debates/:sessionId/turns
   * Submit the user's line and get the AI's answer (or the verdict)
   */
  router.post('/debates/:sessionId/turns', async (req: Request, res: Response) => {
    const { sessionId } = req.params;

    const parseResult = turnSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: parseResult.error.errors,
      });
      return;
    }

    try {
      const result = await orchestrator.processTurn(sessionId, parseResult.data.userText);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'process turn', sessionId);
    }
  });

  /**
   * GET /debates/:sessionId
   * Opening line plus the current state of a debate
   */
  router.get('/debates/:sessionId', (req: Request, res: Response) => {
    const { sessionId } = req.params;

    try {
      res.json(orchestrator.getSnapshot(sessionId));
    } catch (error) {
      sendError(res, error, 'get debate', sessionId);
    }
  });

  return router;
}
