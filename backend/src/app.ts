/**
 * Express application factory
 * Middleware, routes and error handling around a set of services
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import path from 'path';
import { createDebateRouter } from './routes/debate-routes.js';
import { createPortraitRouter } from './routes/portrait-routes.js';
import { requestLogger, errorLogger, slowRequestLogger } from './middleware/request-logger.js';
import type { DebateOrchestrator } from './services/debate/index.js';
import type { PortraitService } from './services/image/portrait-service.js';

export interface AppServices {
  orchestrator: DebateOrchestrator;
  portraits: PortraitService;
  /** Directory served under /static */
  staticDir: string;
}

/**
 * body-parser marks malformed JSON with this type
 */
function isJsonParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(services: AppServices): Express {
  const app = express();

  /**
   * Middleware
   */

  // Enable CORS for all routes
  app.use((req, res, next) => {
    const allowedOrigin = process.env.FRONTEND_URL || '*';
    res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Allow-Credentials', 'true');

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  // Parse JSON request bodies
  app.use(express.json());

  app.use(requestLogger);
  app.use(slowRequestLogger(5000));

  // Synthesized audio
  app.use('/static', express.static(path.resolve(services.staticDir)));

  /**
   * Routes
   */

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      activeSessions: services.orchestrator.activeSessionCount(),
    });
  });

  // API routes
  app.use('/api', createDebateRouter(services.orchestrator));
  app.use('/api', createPortraitRouter(services.portraits));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  app.use(errorLogger);

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isJsonParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}
