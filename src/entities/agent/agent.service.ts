import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { RouteError } from '../../other/errorHandler';
import type { AgentSummary, GuidelineAgent } from '../../lib/ai/guideline-agent';
import type { GlossaryTerm } from '../../lib/ai/types/glossary';
import type { RegisteredGuideline } from '../../lib/ai/types/guideline';
import type { DescribeAgentQuery, UpsertGlossaryTermRequest } from './agent.dto';

export interface AgentService {
  describe(query: DescribeAgentQuery): AgentSummary;
  upsertGlossaryTerm(name: string, body: UpsertGlossaryTermRequest): GlossaryTerm;
  setGuidelineEnabled(id: string, enabled: boolean): RegisteredGuideline;
}

// Edits apply to turns that start afterwards
export function createAgentService(agent: GuidelineAgent): AgentService {
  return {
    describe: query => agent.describe(query),
    upsertGlossaryTerm: (name, body) => agent.upsertGlossaryTerm({ name, ...body }),
    setGuidelineEnabled: (id, enabled) => {
      if (!agent.guidelines.getGuideline(id)) {
        throw new RouteError(HttpStatusCodes.NOT_FOUND, `Guideline ${id} not found`);
      }
      return agent.setGuidelineEnabled(id, enabled);
    }
  };
}
