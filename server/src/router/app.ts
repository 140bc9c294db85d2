import express, { type Express } from 'express';
import cors from 'cors';
import { createHealthRouter } from '../routes/health.js';
import { createSessionRoutes } from '../routes/sessionRoutes.js';
import type { SessionRouter } from './sessionRouter.js';

export const SERVICE_NAME = 'Terminal Relay Router';
export const SERVICE_VERSION = '0.1.0';

export function createApp(sessions: SessionRouter, corsOrigins: string[]): Express {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
    });
  });

  app.use('/health', createHealthRouter(sessions));
  app.use('/api/sessions', createSessionRoutes(sessions));

  return app;
}
