import { Router } from 'express';
import type { SessionRouter } from '../router/sessionRouter.js';

export function createHealthRouter(sessions: SessionRouter): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      ...sessions.stats(),
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
