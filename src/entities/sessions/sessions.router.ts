import { Router } from 'express';
import type { GuidelineAgent } from '../../lib/ai/guideline-agent';
import { createSessionsController } from './sessions.controller';
import { createSessionsService } from './sessions.service';

export function sessionsRoutes(agent: GuidelineAgent): Router {
  const router = Router();
  const controller = createSessionsController(createSessionsService(agent));

  router.post('/', controller.createSession);
  router.get('/:sessionId', controller.getSession);
  router.get('/:sessionId/events', controller.listEvents);
  router.post('/:sessionId/messages', controller.sendMessage);

  return router;
}
