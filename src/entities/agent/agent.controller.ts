import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseRequest } from '../../other/errorHandler';
import { DescribeAgentQuerySchema, UpsertGlossaryTermSchema } from './agent.dto';
import type { AgentService } from './agent.service';

export function createAgentController(service: AgentService) {
  function describe(req: Request, res: Response) {
    const query = parseRequest(DescribeAgentQuerySchema, req.query);
    res.status(HttpStatusCodes.OK).json({ success: true, agent: service.describe(query) });
  }

  function upsertGlossaryTerm(req: Request<{ name: string }>, res: Response) {
    const body = parseRequest(UpsertGlossaryTermSchema, req.body);
    const term = service.upsertGlossaryTerm(req.params.name, body);
    res.status(HttpStatusCodes.OK).json({ success: true, term });
  }

  function activateGuideline(req: Request<{ guidelineId: string }>, res: Response) {
    const guideline = service.setGuidelineEnabled(req.params.guidelineId, true);
    res.status(HttpStatusCodes.OK).json({ success: true, guideline });
  }

  function deactivateGuideline(req: Request<{ guidelineId: string }>, res: Response) {
    const guideline = service.setGuidelineEnabled(req.params.guidelineId, false);
    res.status(HttpStatusCodes.OK).json({ success: true, guideline });
  }

  return { describe, upsertGlossaryTerm, activateGuideline, deactivateGuideline };
}
