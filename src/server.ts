import express, { Express } from 'express';
import { createApiRouter } from './router';
import { errorHandler } from './other/errorHandler';
import type { GuidelineAgent } from './lib/ai/guideline-agent';

// **** Setup **** //

export function createServer(agent: GuidelineAgent): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/api', createApiRouter(agent));

  app.use(errorHandler);

  return app;
}
