import type { ConversationState } from '../types/context';

export interface ConditionVerdict {
  applies: boolean;
  confidence: number;
  reason: string;
}

/**
 * Semantic matching oracle. Decides whether a natural-language condition holds
 * for the conversation. Implementations may be remote and may fail; callers
 * decide whether a failure is fatal.
 */
export interface ConditionEvaluator {
  evaluate(condition: string, state: ConversationState, signal?: AbortSignal): Promise<ConditionVerdict>;
  // Optional: one round-trip for many conditions, results in input order
  evaluateBatch?(conditions: string[], state: ConversationState, signal?: AbortSignal): Promise<ConditionVerdict[]>;
}

export async function evaluateAll(
  evaluator: ConditionEvaluator,
  conditions: string[],
  state: ConversationState,
  signal?: AbortSignal
): Promise<ConditionVerdict[]> {
  if (conditions.length === 0) return [];
  if (evaluator.evaluateBatch) {
    const verdicts = await evaluator.evaluateBatch(conditions, state, signal);
    if (verdicts.length !== conditions.length) {
      throw new Error(`Evaluator returned ${verdicts.length} verdicts for ${conditions.length} conditions`);
    }
    return verdicts;
  }
  return Promise.all(conditions.map(condition => evaluator.evaluate(condition, state, signal)));
}
