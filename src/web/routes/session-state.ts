/**
 * Session State Routes
 *
 * File-backed state shared with the CV process: workout id (write),
 * rep count and live metrics (read).
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SessionService } from '../../session/session-service';

const WorkoutIdBodySchema = z.object({
  workout_id: z.string(),
  session: z.string().default('off'),
});

export function createSessionStateRoutes(service: SessionService): Router {
  const router = Router();

  // ===================
  // POST /api/workout-id
  // ===================
  router.post('/workout-id', (req: Request, res: Response) => {
    const body = WorkoutIdBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        error: 'INVALID_INPUT',
        message: 'workout_id must be a string and session a string',
      });
      return;
    }

    const result = service.writeWorkoutId(body.data.workout_id, body.data.session);
    if (!result.success) {
      res.status(500).json({
        error: result.error.code,
        message: result.error.message,
      });
      return;
    }
    res.json(result.value);
  });

  // ===================
  // GET /api/reps
  // ===================
  router.get('/reps', (_req: Request, res: Response) => {
    res.json(service.getRepCount());
  });

  // ===================
  // GET /api/live-metrics
  // ===================
  router.get('/live-metrics', (_req: Request, res: Response) => {
    res.json({ metrics: service.getLiveMetrics() });
  });

  return router;
}
