import logger from 'jet-logger';
import { AI_CONFIG } from '../config';
import { evaluateAll, type ConditionEvaluator } from './condition-evaluator';
import { MatchingUnavailableError, TurnCancelledError, errorMessage } from './errors';
import { isInScope, type ScopePosition } from './guideline-store';
import { withTimeout } from '../../utils/timeout';
import { criticalityRank, type GuidelineMatch, type RegisteredGuideline } from '../types/guideline';
import type { ConversationState } from '../types/context';

export interface GuidelineMatcherOptions {
  threshold?: number;
  batchSize?: number;
  timeoutMs?: number;
}

export interface MatchRequest {
  state: ConversationState;
  guidelines: readonly RegisteredGuideline[];
  position: ScopePosition;
  signal?: AbortSignal;
  turnId?: string;
}

// Criticality first, then confidence, then declaration order
export function compareMatches(a: GuidelineMatch, b: GuidelineMatch): number {
  const byCriticality = criticalityRank(b.guideline.criticality) - criticalityRank(a.guideline.criticality);
  if (byCriticality !== 0) return byCriticality;
  if (a.score !== b.score) return b.score - a.score;
  return a.guideline.order - b.guideline.order;
}

export class GuidelineMatcher {
  private readonly threshold: number;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly evaluator: ConditionEvaluator,
    options: GuidelineMatcherOptions = {}
  ) {
    this.threshold = options.threshold ?? AI_CONFIG.GUIDELINE_THRESHOLD;
    this.batchSize = Math.max(1, options.batchSize ?? AI_CONFIG.MATCHING_BATCH_SIZE);
    this.timeoutMs = options.timeoutMs ?? AI_CONFIG.MATCHING_TIMEOUT_MS;
  }

  eligible(guidelines: readonly RegisteredGuideline[], position: ScopePosition): RegisteredGuideline[] {
    return guidelines.filter(g => g.enabled && isInScope(g.scope, position));
  }

  /**
   * Evaluates every eligible guideline. Overlapping conditions are not
   * deduplicated. Any oracle failure fails the whole match.
   */
  async match(request: MatchRequest): Promise<GuidelineMatch[]> {
    const candidates = this.eligible(request.guidelines, request.position);
    if (candidates.length === 0) return [];

    const batches = this.createBatches(candidates);
    logger.info(`[GuidelineMatcher] Evaluating ${candidates.length} guidelines in ${batches.length} batch(es)`);

    let results: GuidelineMatch[];
    try {
      const batchResults = await Promise.all(
        batches.map((batch, index) => this.evaluateBatch(batch, request, index))
      );
      results = batchResults.flat();
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      logger.err(`[GuidelineMatcher] Oracle unavailable: ${errorMessage(error)}`);
      throw new MatchingUnavailableError('Guideline matching is unavailable', { cause: error });
    }

    const matches = results
      .filter(match => match.score >= this.threshold)
      .sort(compareMatches);

    logger.info(`[GuidelineMatcher] Matched ${matches.length} guidelines above threshold ${this.threshold}`);
    matches.forEach(m => {
      logger.info(`  - ${m.guideline.id} (${m.guideline.criticality}, score: ${m.score.toFixed(2)}): ${m.reason}`);
    });

    return matches;
  }

  // Create batches of guidelines
  private createBatches(guidelines: RegisteredGuideline[]): RegisteredGuideline[][] {
    const batches: RegisteredGuideline[][] = [];
    for (let i = 0; i < guidelines.length; i += this.batchSize) {
      batches.push(guidelines.slice(i, i + this.batchSize));
    }
    return batches;
  }

  private async evaluateBatch(
    batch: RegisteredGuideline[],
    request: MatchRequest,
    batchIndex: number
  ): Promise<GuidelineMatch[]> {
    const verdicts = await withTimeout(
      signal => evaluateAll(this.evaluator, batch.map(g => g.condition), request.state, signal),
      {
        ms: this.timeoutMs,
        label: `guideline batch ${batchIndex + 1}`,
        signal: request.signal,
        turnId: request.turnId
      }
    );

    return batch.map((guideline, index) => ({
      guideline,
      score: verdicts[index].applies ? verdicts[index].confidence : 0,
      reason: verdicts[index].reason
    }));
  }
}
