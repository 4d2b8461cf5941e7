import logger from 'jet-logger';
import { AI_CONFIG } from '../config';
import { LexicalSignalMatcher, rankCandidates, type CannedCandidate, type SignalMatcher } from './canned-responses';
import { TurnCancelledError, errorMessage } from './errors';
import { withTimeout } from '../../utils/timeout';
import { criticalityRank, type CompositionMode, type GuidelineMatch, type RegisteredGuideline } from '../types/guideline';
import { getLastUserMessage, type ConversationState } from '../types/context';
import type { ComplianceChecker, ComplianceViolation } from './compliance';
import type { DraftRequest, ResponseGenerator } from './response-generator';
import type { ToolInvocation } from '../types/tool';
import type {
  CannedResponse,
  CompositionResult,
  CompositionStatus,
  CompositionTrace,
  Diagnostic
} from '../types/composition';

export interface ComposerOptions {
  defaultMode?: CompositionMode;
  signalMatcher?: SignalMatcher;
  signalThreshold?: number;
  maxRegenerations?: number;
  timeoutMs?: number;
  critiqueTimeoutMs?: number;
}

// Position in the active journey as seen by the composer
export interface JourneyStep {
  journeyId: string;
  stateId: string;
  instruction?: string;
  stateMode?: CompositionMode;
  journeyMode?: CompositionMode;
}

export interface ComposeRequest {
  state: ConversationState;
  matches: GuidelineMatch[];
  tools: ToolInvocation[];
  journey?: JourneyStep;
  cannedResponses: readonly CannedResponse[];
  diagnostics?: Diagnostic[];
  signal?: AbortSignal;
  turnId?: string;
}

export interface ConflictResolution {
  applied: GuidelineMatch[];
  overriddenBy: Map<string, string>;
  diagnostics: Diagnostic[];
}

/**
 * For every authored contradiction between two matched guidelines, higher
 * criticality wins. Equal criticality: the later-defined guideline wins and
 * the ambiguity is reported.
 */
export function resolveConflicts(matches: GuidelineMatch[]): ConflictResolution {
  const overriddenBy = new Map<string, string>();
  const diagnostics: Diagnostic[] = [];
  const byId = new Map(matches.map(m => [m.guideline.id, m.guideline]));
  const seen = new Set<string>();

  matches.forEach(({ guideline }) => {
    (guideline.conflictsWith ?? []).forEach(otherId => {
      const other = byId.get(otherId);
      if (!other) return;
      const pairKey = [guideline.id, other.id].sort().join('|');
      if (seen.has(pairKey)) return;
      seen.add(pairKey);

      const diff = criticalityRank(guideline.criticality) - criticalityRank(other.criticality);
      let winner: RegisteredGuideline;
      let loser: RegisteredGuideline;
      if (diff !== 0) {
        [winner, loser] = diff > 0 ? [guideline, other] : [other, guideline];
      } else {
        [winner, loser] = guideline.order > other.order ? [guideline, other] : [other, guideline];
        logger.warn(`[MessageComposer] Ambiguous conflict between ${guideline.id} and ${other.id}; ${winner.id} wins`);
        diagnostics.push({
          kind: 'ambiguous_guideline_conflict',
          guidelineIds: [guideline.id, other.id],
          winner: winner.id
        });
      }
      if (!overriddenBy.has(loser.id)) overriddenBy.set(loser.id, winner.id);
    });
  });

  return {
    applied: matches.filter(m => !overriddenBy.has(m.guideline.id)),
    overriddenBy,
    diagnostics
  };
}

// Journey state, then journey, then the highest-criticality guideline declaring one
export function resolveMode(
  applied: GuidelineMatch[],
  journey: JourneyStep | undefined,
  defaultMode: CompositionMode
): CompositionMode {
  if (journey?.stateMode) return journey.stateMode;
  if (journey?.journeyMode) return journey.journeyMode;
  const declaring = applied
    .filter(m => m.guideline.compositionMode !== undefined)
    .sort((a, b) => criticalityRank(b.guideline.criticality) - criticalityRank(a.guideline.criticality));
  return declaring[0]?.guideline.compositionMode ?? defaultMode;
}

// Values available to `{{field}}` placeholders; tool fields take precedence
export function collectCannedValues(state: ConversationState, tools: ToolInvocation[]): Record<string, string> {
  const values: Record<string, string> = {};
  Object.entries(state.variables).forEach(([name, value]) => {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      values[name] = String(value);
    }
  });
  Object.assign(values, state.facts);
  tools.forEach(invocation => {
    if (invocation.outcome.status === 'success') Object.assign(values, invocation.outcome.cannedFields);
  });
  return values;
}

export class MessageComposer {
  private readonly defaultMode: CompositionMode;
  private readonly matcher: SignalMatcher;
  private readonly threshold: number;
  private readonly maxRegenerations: number;
  private readonly timeoutMs: number;
  private readonly critiqueTimeoutMs: number;

  constructor(
    private readonly generator: ResponseGenerator,
    private readonly checker: ComplianceChecker,
    options: ComposerOptions = {}
  ) {
    this.defaultMode = options.defaultMode ?? 'fluid';
    this.matcher = options.signalMatcher ?? new LexicalSignalMatcher();
    this.threshold = options.signalThreshold ?? AI_CONFIG.SIGNAL_THRESHOLD;
    this.maxRegenerations = options.maxRegenerations ?? AI_CONFIG.CRITIQUE_MAX_REGENERATIONS;
    this.timeoutMs = options.timeoutMs ?? AI_CONFIG.COMPOSER_TIMEOUT_MS;
    this.critiqueTimeoutMs = options.critiqueTimeoutMs ?? AI_CONFIG.CRITIQUE_TIMEOUT_MS;
  }

  async compose(request: ComposeRequest): Promise<CompositionResult> {
    const { state, tools, journey, cannedResponses } = request;
    const conflicts = resolveConflicts(request.matches);
    const applied = conflicts.applied;
    const mode = resolveMode(applied, journey, this.defaultMode);
    const high = applied.filter(m => m.guideline.criticality === 'high').map(m => m.guideline);
    const values = collectCannedValues(state, tools);

    const trace: CompositionTrace = {
      mode,
      guidelines: request.matches.map(m => ({
        id: m.guideline.id,
        criticality: m.guideline.criticality,
        applied: !conflicts.overriddenBy.has(m.guideline.id),
        overriddenBy: conflicts.overriddenBy.get(m.guideline.id)
      })),
      tools: tools.map(t => ({ name: t.toolName, status: t.outcome.status })),
      journeyState: journey?.stateId,
      attempts: 0,
      violations: [],
      diagnostics: [...(request.diagnostics ?? []), ...conflicts.diagnostics]
    };
    tools.forEach(t => {
      if (t.outcome.status === 'missing_parameter') {
        trace.diagnostics.push({ kind: 'missing_parameter', toolName: t.toolName, parameters: t.outcome.missing });
      }
    });

    const finish = (text: string, status: CompositionStatus, cannedResponseId?: string): CompositionResult => {
      logger.info(`[MessageComposer] ${mode} -> ${status}${cannedResponseId ? ` (${cannedResponseId})` : ''}`);
      return { text, status, trace: { ...trace, cannedResponseId } };
    };

    const violation = tools.find(t => t.outcome.status === 'security_violation');
    if (violation) {
      logger.warn(`[MessageComposer] Forced deflection after security violation in ${violation.toolName}`);
      return finish(AI_CONFIG.DEFLECTION_MESSAGE, 'deflected');
    }

    // What the turn is about, for choosing canned responses without a draft
    const situation = [
      getLastUserMessage(state),
      ...applied.map(m => m.guideline.action ?? ''),
      journey?.instruction ?? ''
    ].join('\n');

    if (mode === 'strict') {
      const candidates = rankCandidates(cannedResponses, values, situation, this.matcher, this.threshold);
      const approved = await this.firstCompliant(candidates, high, request, trace.violations);
      if (approved) return finish(approved.text, 'canned', approved.response.id);
      logger.warn('[MessageComposer] STRICT mode: no approved response available');
      return finish(AI_CONFIG.NO_APPROVED_RESPONSE_MESSAGE, 'no_approved_response');
    }

    const styleAnchor = mode === 'composited'
      ? rankCandidates(cannedResponses, values, situation, this.matcher, Number.EPSILON)[0]
      : undefined;

    let feedback: DraftRequest['feedback'];
    while (trace.attempts <= this.maxRegenerations) {
      trace.attempts++;

      let draft: string;
      try {
        draft = await withTimeout(
          signal => this.generator.generate({
            state,
            mode,
            guidelines: applied.map(m => ({
              id: m.guideline.id,
              condition: m.guideline.condition,
              action: m.guideline.action,
              criticality: m.guideline.criticality
            })),
            journeyInstruction: journey?.instruction,
            tools,
            styleAnchor: styleAnchor?.text,
            feedback
          }, signal),
          { ms: this.timeoutMs, label: 'response generation', signal: request.signal, turnId: request.turnId }
        );
      } catch (error) {
        if (error instanceof TurnCancelledError) throw error;
        logger.err(`[MessageComposer] Generation failed: ${errorMessage(error)}`);
        break;
      }

      // FLUID: an approved template carrying the same signal replaces the draft
      const swap = mode === 'fluid'
        ? rankCandidates(cannedResponses, values, draft, this.matcher, this.threshold)[0]
        : undefined;
      const text = swap ? swap.text : draft;

      const found = await this.check(text, high, request);
      if (found.length === 0) {
        return swap ? finish(swap.text, 'canned', swap.response.id) : finish(draft, 'composed');
      }

      trace.violations.push(...found);
      found.forEach(v => trace.diagnostics.push({ kind: 'compliance_violation', guidelineId: v.guidelineId, detail: v.detail }));
      feedback = { previousDraft: text, violations: found.map(v => `${v.guidelineId}: ${v.detail}`) };
      logger.warn(`[MessageComposer] Draft ${trace.attempts} violates ${found.map(v => v.guidelineId).join(', ')}`);
    }

    // Fallback: any satisfied template related to the turn, however weakly
    const fallback = await this.firstCompliant(
      rankCandidates(cannedResponses, values, situation, this.matcher, Number.EPSILON),
      high,
      request,
      trace.violations
    );
    if (fallback) return finish(fallback.text, 'canned', fallback.response.id);
    return finish(AI_CONFIG.DEFLECTION_MESSAGE, 'deflected');
  }

  private async firstCompliant(
    candidates: CannedCandidate[],
    high: RegisteredGuideline[],
    request: ComposeRequest,
    violations: ComplianceViolation[]
  ): Promise<CannedCandidate | undefined> {
    for (const candidate of candidates) {
      const found = await this.check(candidate.text, high, request);
      if (found.length === 0) return candidate;
      violations.push(...found);
    }
    return undefined;
  }

  // Fails closed: a checker that cannot answer counts as a violation
  private async check(text: string, high: RegisteredGuideline[], request: ComposeRequest): Promise<ComplianceViolation[]> {
    if (high.length === 0) return [];
    try {
      const result = await withTimeout(
        signal => this.checker.check(text, high, request.state, signal),
        { ms: this.critiqueTimeoutMs, label: 'compliance check', signal: request.signal, turnId: request.turnId }
      );
      return result.violations;
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      logger.err(`[MessageComposer] Compliance check failed: ${errorMessage(error)}`);
      return high.map(g => ({ guidelineId: g.id, detail: 'Compliance check unavailable' }));
    }
  }
}
