import { generateObject, type LanguageModel } from 'ai';
import { z } from 'zod';
import { AI_CONFIG } from '../config';
import { getModel } from '../openrouter';
import { summarizeConversation } from '../utils/prompt-helpers';
import { report, type ComplianceChecker, type ComplianceReport } from '../core/compliance';
import type { ConversationState } from '../types/context';
import type { RegisteredGuideline } from '../types/guideline';

const ComplianceSchema = z.object({
  violations: z.array(z.object({
    guidelineId: z.string().describe('Id of the violated guideline'),
    detail: z.string().describe('What in the reply violates it')
  }))
});

export function buildCompliancePrompt(
  draft: string,
  guidelines: readonly RegisteredGuideline[],
  state: ConversationState
): string {
  let xml = `<compliance_review>\n\n`;

  xml += `  <role>\n`;
  xml += `    <description>You are a strict compliance reviewer for customer support replies</description>\n`;
  xml += `  </role>\n\n`;

  xml += `  <mandatory_guidelines>\n`;
  guidelines.forEach(g => {
    xml += `    <guideline id="${g.id}">\n`;
    xml += `      <when>${g.condition}</when>\n`;
    if (g.action) xml += `      <then>${g.action}</then>\n`;
    xml += `    </guideline>\n`;
  });
  xml += `  </mandatory_guidelines>\n\n`;

  xml += `  <conversation>\n${summarizeConversation(state)}\n  </conversation>\n\n`;
  xml += `  <reply_to_review>${draft}</reply_to_review>\n\n`;

  xml += `  <instructions>\n`;
  xml += `    <instruction>List every guideline the reply violates, with the offending part</instruction>\n`;
  xml += `    <instruction>Return an empty list when the reply complies with all of them</instruction>\n`;
  xml += `  </instructions>\n\n`;

  xml += `</compliance_review>`;
  return xml;
}

/**
 * Model-based review of HIGH guidelines. Unknown guideline ids in the reply
 * are dropped; a failed call throws and the composer treats it as a violation.
 */
export class LLMComplianceChecker implements ComplianceChecker {
  constructor(private readonly model: LanguageModel = getModel(AI_CONFIG.CRITIQUE_MODEL)) {}

  async check(
    draft: string,
    guidelines: readonly RegisteredGuideline[],
    state: ConversationState,
    signal?: AbortSignal
  ): Promise<ComplianceReport> {
    if (guidelines.length === 0) return report([]);

    const { object } = await generateObject({
      model: this.model,
      schema: ComplianceSchema,
      prompt: buildCompliancePrompt(draft, guidelines, state),
      temperature: AI_CONFIG.CRITIQUE_TEMPERATURE,
      abortSignal: signal
    });

    const ids = new Set(guidelines.map(g => g.id));
    return report(object.violations.filter(v => ids.has(v.guidelineId)));
  }
}
