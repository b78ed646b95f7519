import { Router, Request, Response, NextFunction } from 'express';
import { getMetrics, getContentType } from '../utils/metrics';
import { apiRateLimit } from '../middleware/rateLimit';
import { ContainerRuntime } from '../runtime/types';
import { describeError } from '../utils/sanitizer';
import { logger } from '../utils/logger';

export const createHealthRouter = (runtime: Pick<ContainerRuntime, 'ping'>): Router => {
  const router = Router();

  // Lightweight liveness probe - no rate limit needed
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  // Ready only when the container daemon answers
  router.get('/health/ready', apiRateLimit, async (_req: Request, res: Response) => {
    try {
      await runtime.ping();
      res.status(200).json({ status: 'ready' });
    } catch (error) {
      logger.warn({ error: describeError(error) }, 'Container runtime not available');
      res.status(503).json({ status: 'not ready' });
    }
  });

  router.get('/metrics', apiRateLimit, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await getMetrics();
      res.set('Content-Type', getContentType());
      res.send(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
