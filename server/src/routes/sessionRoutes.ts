import { Router } from 'express';
import type { SessionRouter } from '../router/sessionRouter.js';

export function createSessionRoutes(sessions: SessionRouter): Router {
  const router = Router();

  router.get('/:id', (req, res) => {
    const summary = sessions.summary(req.params.id);
    if (!summary) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json(summary);
  });

  router.delete('/:id', (req, res) => {
    if (!sessions.closeSession(req.params.id)) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json({ status: 'closed' });
  });

  return router;
}
