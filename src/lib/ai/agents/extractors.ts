import { generateObject, type LanguageModel } from 'ai';
import logger from 'jet-logger';
import { z } from 'zod';
import { AI_CONFIG } from '../config';
import { getModel } from '../openrouter';
import { summarizeConversation } from '../utils/prompt-helpers';
import type { FactExtractor } from '../core/journey-engine';
import type { ParameterExtractor, ParameterSpec } from '../core/tool-caller';
import type { ConversationState } from '../types/context';
import type { JourneyField } from '../types/journey';
import type { ToolDefinition } from '../types/tool';

interface Extractable {
  name: string;
  description: string;
}

// Build extraction prompt in XML format
export function buildExtractionPrompt(purpose: string, items: Extractable[], state: ConversationState): string {
  let xml = `<extraction_prompt>\n\n`;

  xml += `  <role>\n`;
  xml += `    <description>You extract values the customer stated explicitly</description>\n`;
  xml += `    <goal>${purpose}</goal>\n`;
  xml += `  </role>\n\n`;

  xml += `  <fields>\n`;
  items.forEach(item => {
    xml += `    <field name="${item.name}">${item.description}</field>\n`;
  });
  xml += `  </fields>\n\n`;

  xml += `  <conversation>\n${summarizeConversation(state)}\n  </conversation>\n\n`;

  xml += `  <instructions>\n`;
  xml += `    <instruction>Only use values the customer actually gave; never guess</instruction>\n`;
  xml += `    <instruction>Leave a field out when the customer has not provided it</instruction>\n`;
  xml += `  </instructions>\n\n`;

  xml += `</extraction_prompt>`;
  return xml;
}

function schemaFor(items: Extractable[]) {
  return z.object(
    Object.fromEntries(items.map(item => [item.name, z.string().optional().describe(item.description)]))
  );
}

async function extract(
  model: LanguageModel,
  purpose: string,
  items: Extractable[],
  state: ConversationState,
  signal?: AbortSignal
): Promise<Record<string, string>> {
  if (items.length === 0) return {};
  const { object } = await generateObject({
    model,
    schema: schemaFor(items),
    prompt: buildExtractionPrompt(purpose, items, state),
    temperature: 0,
    abortSignal: signal
  });

  const values: Record<string, string> = {};
  items.forEach(item => {
    const value = object[item.name]?.trim();
    if (value) values[item.name] = value;
  });
  return values;
}

export class LLMFactExtractor implements FactExtractor {
  constructor(private readonly model: LanguageModel = getModel(AI_CONFIG.EXTRACTION_MODEL)) {}

  async extract(fields: JourneyField[], state: ConversationState, signal?: AbortSignal): Promise<Record<string, string>> {
    const values = await extract(this.model, 'Collect the journey details the customer already gave', fields, state, signal);
    logger.info(`[FactExtractor] Extracted ${Object.keys(values).length} of ${fields.length} field(s)`);
    return values;
  }
}

export class LLMParameterExtractor implements ParameterExtractor {
  constructor(private readonly model: LanguageModel = getModel(AI_CONFIG.EXTRACTION_MODEL)) {}

  async extract(
    tool: ToolDefinition,
    parameters: ParameterSpec[],
    state: ConversationState,
    signal?: AbortSignal
  ): Promise<Record<string, unknown>> {
    return extract(
      this.model,
      `Find the arguments for the tool "${tool.name}": ${tool.description}`,
      parameters.map(p => ({ name: p.name, description: p.description })),
      state,
      signal
    );
  }
}
