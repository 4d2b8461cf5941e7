import { Router } from 'express';
import type { GuidelineAgent } from '../../lib/ai/guideline-agent';
import { createAgentController } from './agent.controller';
import { createAgentService } from './agent.service';

export function agentRoutes(agent: GuidelineAgent): Router {
  const router = Router();
  const controller = createAgentController(createAgentService(agent));

  router.get('/', controller.describe);
  router.put('/glossary/:name', controller.upsertGlossaryTerm);
  router.post('/guidelines/:guidelineId/activate', controller.activateGuideline);
  router.post('/guidelines/:guidelineId/deactivate', controller.deactivateGuideline);

  return router;
}
