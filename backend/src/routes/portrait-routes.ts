/**
 * Portrait Routes
 * Image URLs for persona portraits
 */

import express, { type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import type { PortraitService } from '../services/image/portrait-service.js';

const logger = createLogger({ module: 'PortraitRoutes' });

const portraitSchema = z.object({
  characterName: z.string().trim().min(1, 'Character name is required').max(100),
  domain: z.string().trim().max(100).optional(),
});

export function createPortraitRouter(portraits: PortraitService): Router {
  const router = express.Router();

  /**
   * POST /portraits
   * Returns the image URL for a persona portrait
   */
  router.post('/portraits', (req: Request, res: Response) => {
    const parseResult = portraitSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: parseResult.error.errors,
      });
      return;
    }

    const { characterName, domain } = parseResult.data;
    const imageUrl = portraits.buildPortraitUrl(characterName, domain);

    logger.debug({ characterName }, 'Portrait URL built');
    res.json({ imageUrl });
  });

  return router;
}
