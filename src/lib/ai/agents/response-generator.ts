import { generateText, type LanguageModel } from 'ai';
import logger from 'jet-logger';
import { AI_CONFIG } from '../config';
import { getModel } from '../openrouter';
import { GlossaryStore } from '../core/glossary-store';
import type { DraftRequest, ResponseGenerator } from '../core/response-generator';
import type { ToolInvocation } from '../types/tool';

function describeTool(invocation: ToolInvocation): string {
  const { outcome } = invocation;
  switch (outcome.status) {
    case 'success':
      return JSON.stringify(outcome.data ?? null, null, 2);
    case 'deferred':
      return `Not called yet. Ask the customer for: ${outcome.missing.join(', ')}`;
    case 'missing_parameter':
      return `Could not be called, missing: ${outcome.missing.join(', ')}. Ask the customer for it`;
    case 'error':
    case 'timeout':
      return `Failed. Do not invent a result; tell the customer it could not be completed right now`;
    case 'security_violation':
      return 'Refused for security reasons';
    case 'skipped':
      return `Skipped (${outcome.reason})`;
  }
}

/**
 * XML system prompt: role, instructions, guidelines by criticality, journey
 * step, tool results, variables, glossary, style anchor and critique feedback.
 */
export function buildSystemPrompt(request: DraftRequest): string {
  const { state } = request;
  let xml = ``;

  xml += `  <system>\n`;
  xml += `    <role>You are a customer support agent replying in a chat</role>\n`;
  xml += `    <style>Brief, natural, professional</style>\n`;
  xml += `  </system>\n\n`;

  xml += `  <instructions>\n`;
  xml += `    <instruction>Follow every guideline below; HIGH criticality guidelines are mandatory</instruction>\n`;
  xml += `    <instruction>Only state facts present in the tool results, variables or conversation</instruction>\n`;
  xml += `    <instruction>When a tool needs information from the customer, ask for it in one short question</instruction>\n`;
  xml += `    <instruction>Reply with the message text only</instruction>\n`;
  xml += `  </instructions>\n\n`;

  if (request.guidelines.length > 0) {
    xml += `  <guidelines>\n`;
    request.guidelines.forEach(g => {
      xml += `    <guideline id="${g.id}" criticality="${g.criticality}">\n`;
      xml += `      <when>${g.condition}</when>\n`;
      if (g.action) xml += `      <then>${g.action}</then>\n`;
      xml += `    </guideline>\n`;
    });
    xml += `  </guidelines>\n\n`;
  }

  if (request.journeyInstruction && state.journey) {
    xml += `  <journey title="${state.journey.title}" state="${state.journey.stateId}">\n`;
    xml += `    <current_step>${request.journeyInstruction}</current_step>\n`;
    xml += `  </journey>\n\n`;
  }

  if (request.tools.length > 0) {
    xml += `  <tool_results>\n`;
    request.tools.forEach(t => {
      xml += `    <tool name="${t.toolName}" status="${t.outcome.status}">\n${describeTool(t)}\n    </tool>\n`;
    });
    xml += `  </tool_results>\n\n`;
  }

  const variables = Object.entries(state.variables);
  const facts = Object.entries(state.facts);
  if (variables.length > 0 || facts.length > 0) {
    xml += `  <variables>\n`;
    variables.forEach(([name, value]) => {
      xml += `    <variable name="${name}">${typeof value === 'string' ? value : JSON.stringify(value)}</variable>\n`;
    });
    facts.forEach(([name, value]) => {
      xml += `    <variable name="${name}">${value}</variable>\n`;
    });
    xml += `  </variables>\n\n`;
  }

  const glossary = GlossaryStore.buildEnrichedContext(state.glossary);
  if (glossary) {
    xml += `  <glossary>${glossary}\n  </glossary>\n\n`;
  }

  if (request.styleAnchor) {
    xml += `  <style_anchor>\n`;
    xml += `    <instruction>Match the structure and tone of this approved reply; adapt only the details</instruction>\n`;
    xml += `    <template>${request.styleAnchor}</template>\n`;
    xml += `  </style_anchor>\n\n`;
  }

  if (request.feedback) {
    xml += `  <feedback>\n`;
    xml += `    <previous_draft>${request.feedback.previousDraft}</previous_draft>\n`;
    request.feedback.violations.forEach(v => {
      xml += `    <violation>${v}</violation>\n`;
    });
    xml += `    <instruction>Rewrite the reply so that none of these violations remain</instruction>\n`;
    xml += `  </feedback>\n\n`;
  }

  return xml;
}

export class LLMResponseGenerator implements ResponseGenerator {
  constructor(private readonly model: LanguageModel = getModel(AI_CONFIG.COMPOSER_MODEL)) {}

  async generate(request: DraftRequest, signal?: AbortSignal): Promise<string> {
    const system = buildSystemPrompt(request);
    logger.info(`[ResponseGenerator] System prompt length: ${system.length}`);

    const { text } = await generateText({
      model: this.model,
      system,
      messages: request.state.messages.slice(-AI_CONFIG.HISTORY_WINDOW),
      temperature: AI_CONFIG.COMPOSER_TEMPERATURE,
      abortSignal: signal
    });

    const reply = text.trim();
    if (!reply) {
      throw new Error('Model returned an empty reply');
    }
    return reply;
  }
}
