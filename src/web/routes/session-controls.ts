/**
 * Session Controls Routes
 *
 * Start/Stop/Status for the CV process group.
 */

import { Router, Request, Response } from 'express';
import { SessionService } from '../../session/session-service';

/**
 * Creates router for session control endpoints
 */
export function createSessionControlsRoutes(service: SessionService): Router {
  const router = Router();

  // ===================
  // POST /api/session/start
  // ===================
  router.post('/start', async (_req: Request, res: Response) => {
    const result = await service.start();
    if (!result.success) {
      res.status(500).json({
        success: false,
        code: result.error.code,
        error: result.error.message,
      });
      return;
    }
    res.json({ success: true, ...result.value });
  });

  // ===================
  // POST /api/session/stop
  // ===================
  router.post('/stop', async (_req: Request, res: Response) => {
    const result = await service.stop();
    if (!result.success) {
      res.status(500).json({
        success: false,
        code: result.error.code,
        error: result.error.message,
      });
      return;
    }
    res.json({ success: true, ...result.value });
  });

  // ===================
  // GET /api/session/status
  // ===================
  router.get('/status', (_req: Request, res: Response) => {
    res.json(service.status());
  });

  return router;
}
