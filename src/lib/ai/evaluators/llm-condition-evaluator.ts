import { generateObject, generateText, type LanguageModel } from 'ai';
import logger from 'jet-logger';
import { z } from 'zod';
import { AI_CONFIG } from '../config';
import { getModel } from '../openrouter';
import { buildContextXml, parseJsonReply } from '../utils/prompt-helpers';
import { errorMessage } from '../core/errors';
import type { ConditionEvaluator, ConditionVerdict } from '../core/condition-evaluator';
import type { ConversationState } from '../types/context';

const VerdictSchema = z.object({
  applies: z.boolean().describe('Does the condition hold?'),
  confidence: z.number().min(0).max(1).describe('Confidence in the evaluation (0-1)'),
  reasoning: z.string().describe('Short explanation of why it holds or not')
});

const BatchSchema = z.object({
  evaluations: z.array(VerdictSchema.extend({
    conditionIndex: z.number().int().describe('Index of the condition (1-based)')
  }))
});

// Lenient shape for free-text replies
const LooseVerdictSchema = z.object({
  applies: z.union([z.boolean(), z.string()]).transform(value => value === true || value === 'true'),
  confidence: z.number().catch(0.5),
  reasoning: z.string().catch('No reasoning provided')
});

// Build batch evaluation prompt in XML format
export function buildBatchPrompt(conditions: string[], state: ConversationState): string {
  let xml = `<evaluation_prompt>\n\n`;

  xml += `  <role>\n`;
  xml += `    <description>You are a semantic evaluator that decides which conditions hold in a customer conversation</description>\n`;
  xml += `    <goal>Analyse the conversational context and evaluate each condition independently</goal>\n`;
  xml += `  </role>\n\n`;

  xml += `  <conditions_to_evaluate>\n`;
  conditions.forEach((condition, idx) => {
    xml += `    <condition index="${idx + 1}">${condition}</condition>\n`;
  });
  xml += `  </conditions_to_evaluate>\n\n`;

  xml += buildContextXml(state);

  xml += `  <evaluation_instructions>\n`;
  xml += `    <instruction>For EACH condition, decide whether it holds in the current context</instruction>\n`;
  xml += `    <instruction>Consider the recent history, the last customer message, known facts and tool results</instruction>\n`;
  xml += `    <instruction>Assign a confidence (0.0 to 1.0) for how well the condition matches the context</instruction>\n`;
  xml += `    <instruction>Evaluate ALL conditions in the given order (1 to ${conditions.length})</instruction>\n`;
  xml += `  </evaluation_instructions>\n\n`;

  xml += `</evaluation_prompt>`;
  return xml;
}

// Build single condition evaluation prompt in XML format
export function buildSinglePrompt(condition: string, state: ConversationState): string {
  let xml = `<condition_evaluation>\n\n`;

  xml += `  <role>\n`;
  xml += `    <description>Semantic evaluator for a single condition</description>\n`;
  xml += `  </role>\n\n`;

  xml += `  <condition>${condition}</condition>\n\n`;

  xml += buildContextXml(state);

  xml += `  <instructions>\n`;
  xml += `    <instruction>Decide carefully whether the CONDITION holds in this specific context</instruction>\n`;
  xml += `    <instruction>High confidence (0.8-1.0) on a clear match, medium (0.5-0.8) on a partial one, low (0-0.5) otherwise</instruction>\n`;
  xml += `  </instructions>\n\n`;

  xml += `</condition_evaluation>`;
  return xml;
}

// Parse a free-text verdict; confidence is clamped to [0, 1]
export function parseVerdictText(text: string): ConditionVerdict {
  const parsed = LooseVerdictSchema.parse(parseJsonReply(text));
  return {
    applies: parsed.applies,
    confidence: Math.max(0, Math.min(1, parsed.confidence)),
    reason: parsed.reasoning
  };
}

export class LLMConditionEvaluator implements ConditionEvaluator {
  constructor(private readonly model: LanguageModel = getModel(AI_CONFIG.MATCHING_MODEL)) {}

  async evaluateBatch(conditions: string[], state: ConversationState, signal?: AbortSignal): Promise<ConditionVerdict[]> {
    try {
      const { object } = await generateObject({
        model: this.model,
        schema: BatchSchema,
        prompt: buildBatchPrompt(conditions, state),
        temperature: AI_CONFIG.MATCHING_TEMPERATURE,
        abortSignal: signal
      });

      const byIndex = new Map(object.evaluations.map(e => [e.conditionIndex, e]));
      if (conditions.some((_, idx) => !byIndex.has(idx + 1))) {
        throw new Error(`Batch reply covered ${byIndex.size} of ${conditions.length} conditions`);
      }

      return conditions.map((_, idx) => {
        const evaluation = byIndex.get(idx + 1);
        return evaluation
          ? { applies: evaluation.applies, confidence: evaluation.confidence, reason: evaluation.reasoning }
          : { applies: false, confidence: 0, reason: 'Not evaluated' };
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      logger.warn(`[LLMConditionEvaluator] Batch evaluation failed, falling back to individual evaluation: ${errorMessage(error)}`);
      return Promise.all(conditions.map(condition => this.evaluate(condition, state, signal)));
    }
  }

  async evaluate(condition: string, state: ConversationState, signal?: AbortSignal): Promise<ConditionVerdict> {
    const prompt = buildSinglePrompt(condition, state);
    try {
      const { object } = await generateObject({
        model: this.model,
        schema: VerdictSchema,
        prompt,
        temperature: AI_CONFIG.MATCHING_TEMPERATURE,
        abortSignal: signal
      });
      return { applies: object.applies, confidence: object.confidence, reason: object.reasoning };
    } catch (error) {
      if (signal?.aborted) throw error;
      logger.warn(`[LLMConditionEvaluator] generateObject failed, trying text fallback: ${errorMessage(error)}`);
    }

    // Fallback for models that struggle with structured output; a failure here propagates
    const { text } = await generateText({
      model: this.model,
      prompt: `${prompt}

<output_format>
  <instruction>Reply ONLY with a valid JSON object in exactly this format</instruction>
  <structure>
{
  "applies": true or false,
  "confidence": number between 0 and 1,
  "reasoning": "your explanation"
}
</structure>
</output_format>`,
      temperature: AI_CONFIG.MATCHING_TEMPERATURE,
      abortSignal: signal
    });

    return parseVerdictText(text);
  }
}
