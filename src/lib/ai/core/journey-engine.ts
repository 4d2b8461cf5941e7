import logger from 'jet-logger';
import { AI_CONFIG } from '../config';
import { evaluateAll, type ConditionEvaluator } from './condition-evaluator';
import { ConfigurationError, MatchingUnavailableError, TurnCancelledError, errorMessage } from './errors';
import { withTimeout } from '../../utils/timeout';
import { matchInMessages } from '../../utils/patterns';
import { getLastUserMessage, type ConversationState } from '../types/context';
import {
  JourneySchema,
  type ChatState,
  type Journey,
  type JourneyAdvance,
  type JourneyField,
  type JourneyInput,
  type JourneyInstance,
  type JourneyState,
  type Transition
} from '../types/journey';

// Pulls declared journey fields out of the conversation
export interface FactExtractor {
  extract(fields: JourneyField[], state: ConversationState, signal?: AbortSignal): Promise<Record<string, string>>;
}

export interface JourneyEngineOptions {
  threshold?: number;
  timeoutMs?: number;
  factExtractor?: FactExtractor;
}

export interface JourneyActivation {
  journey: Journey;
  confidence: number;
  reason: string;
}

interface CallOptions {
  signal?: AbortSignal;
  turnId?: string;
}

/**
 * Configuration-time graph checks. Returns the parsed journey.
 */
export function validateJourney(input: JourneyInput, toolNames?: ReadonlySet<string>): Journey {
  const journey = JourneySchema.parse(input);
  const ids = new Set<string>();

  journey.states.forEach(state => {
    if (ids.has(state.id)) {
      throw new ConfigurationError(`Journey "${journey.id}" declares state "${state.id}" twice`);
    }
    ids.add(state.id);
  });

  if (!ids.has(journey.initialStateId)) {
    throw new ConfigurationError(`Journey "${journey.id}" has unknown initial state "${journey.initialStateId}"`);
  }

  journey.transitions.forEach(t => {
    if (!ids.has(t.from) || !ids.has(t.to)) {
      throw new ConfigurationError(`Journey "${journey.id}" has a transition ${t.from} -> ${t.to} to an unknown state`);
    }
  });

  const fieldNames = new Set(journey.fields.map(f => f.name));
  journey.fields.forEach(field => {
    if (field.pattern === undefined) return;
    try {
      new RegExp(field.pattern, 'i');
    } catch {
      throw new ConfigurationError(`Journey "${journey.id}" field "${field.name}" has an invalid pattern`);
    }
  });

  journey.states.forEach(state => {
    const outgoing = journey.transitions.filter(t => t.from === state.id);
    const unconditional = outgoing.filter(t => t.condition === undefined);
    if (state.kind !== 'fork' && unconditional.length > 1) {
      throw new ConfigurationError(`Journey "${journey.id}" state "${state.id}" has ${unconditional.length} unconditional transitions`);
    }
    // Conditions are tried in declaration order and the unconditional one is the default
    const firstDefault = outgoing.findIndex(t => t.condition === undefined);
    if (firstDefault !== -1 && outgoing.slice(firstDefault).some(t => t.condition !== undefined)) {
      throw new ConfigurationError(`Journey "${journey.id}" state "${state.id}" declares a conditional transition after its default`);
    }
    if (state.kind === 'chat') {
      (state.collects ?? []).forEach(name => {
        if (!fieldNames.has(name)) {
          throw new ConfigurationError(`Journey "${journey.id}" state "${state.id}" collects undeclared field "${name}"`);
        }
      });
    }
    if (state.kind === 'tool' && toolNames && !toolNames.has(state.tool)) {
      throw new ConfigurationError(`Journey "${journey.id}" state "${state.id}" references unknown tool "${state.tool}"`);
    }
  });

  return journey;
}

export function findState(journey: Journey, stateId: string): JourneyState {
  const state = journey.states.find(s => s.id === stateId);
  if (!state) {
    throw new ConfigurationError(`Journey "${journey.id}" has no state "${stateId}"`);
  }
  return state;
}

// A chat state whose only purpose is asking for facts that are already known
export function isSkippable(state: ChatState, facts: Record<string, string>): boolean {
  const collects = state.collects ?? [];
  return collects.length > 0 && collects.every(name => Boolean(facts[name]));
}

export class JourneyEngine {
  private readonly threshold: number;
  private readonly timeoutMs: number;
  private readonly factExtractor?: FactExtractor;

  constructor(
    private readonly evaluator: ConditionEvaluator,
    options: JourneyEngineOptions = {}
  ) {
    this.threshold = options.threshold ?? AI_CONFIG.JOURNEY_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? AI_CONFIG.MATCHING_TIMEOUT_MS;
    this.factExtractor = options.factExtractor;
  }

  /**
   * Picks the journey to activate: highest confidence over any of its
   * activation conditions, declaration order on ties.
   */
  async selectActivation(
    journeys: readonly Journey[],
    state: ConversationState,
    options: CallOptions = {}
  ): Promise<JourneyActivation | null> {
    if (journeys.length === 0) return null;

    const conditions = journeys.flatMap(j => j.conditions.map(condition => ({ journey: j, condition })));
    const verdicts = await this.oracle(conditions.map(c => c.condition), state, 'journey activation', options);

    let best: JourneyActivation | null = null;
    for (let idx = 0; idx < conditions.length; idx++) {
      const verdict = verdicts[idx];
      const score = verdict.applies ? verdict.confidence : 0;
      if (score >= this.threshold && (!best || score > best.confidence)) {
        best = { journey: conditions[idx].journey, confidence: score, reason: verdict.reason };
      }
    }

    if (best) {
      logger.info(`[JourneyEngine] Activating journey ${best.journey.id} (score: ${best.confidence.toFixed(2)})`);
    }
    return best;
  }

  start(journey: Journey, now: Date = new Date()): JourneyInstance {
    return {
      journeyId: journey.id,
      stateId: journey.initialStateId,
      phase: 'pending',
      status: 'active',
      facts: {},
      path: [journey.initialStateId],
      activatedAt: now.toISOString()
    };
  }

  abandon(instance: JourneyInstance): JourneyInstance {
    logger.info(`[JourneyEngine] Journey ${instance.journeyId} abandoned at ${instance.stateId}`);
    return { ...instance, status: 'abandoned' };
  }

  // The customer has already been shown a state with no way out
  isFinished(journey: Journey, instance: JourneyInstance): boolean {
    return instance.status === 'active'
      && instance.phase === 'presented'
      && !journey.transitions.some(t => t.from === instance.stateId);
  }

  complete(instance: JourneyInstance): JourneyInstance {
    logger.info(`[JourneyEngine] Journey ${instance.journeyId} completed at ${instance.stateId}`);
    return { ...instance, status: 'completed' };
  }

  completeToolState(instance: JourneyInstance): JourneyInstance {
    return { ...instance, phase: 'presented' };
  }

  /**
   * Fills unknown journey fields from customer messages: field patterns first
   * (newest message wins), then the fact extractor for what is left.
   */
  async collectFacts(
    journey: Journey,
    instance: JourneyInstance,
    state: ConversationState,
    options: CallOptions = {}
  ): Promise<JourneyInstance> {
    const facts: Record<string, string> = { ...instance.facts };
    const customerMessages = state.messages.filter(m => m.role === 'user').map(m => m.content).reverse();

    journey.fields.forEach(field => {
      if (facts[field.name] || field.pattern === undefined) return;
      const value = matchInMessages(field.pattern, customerMessages);
      if (value) facts[field.name] = value;
    });

    const remaining = journey.fields.filter(f => !facts[f.name]);
    if (remaining.length > 0 && this.factExtractor && getLastUserMessage(state)) {
      const extractor = this.factExtractor;
      try {
        const extracted = await withTimeout(
          signal => extractor.extract(remaining, { ...state, facts }, signal),
          { ms: this.timeoutMs, label: 'fact extraction', signal: options.signal, turnId: options.turnId }
        );
        remaining.forEach(field => {
          const value = extracted[field.name]?.trim();
          if (value) facts[field.name] = value;
        });
      } catch (error) {
        if (error instanceof TurnCancelledError) throw error;
        logger.warn(`[JourneyEngine] Fact extraction failed for ${journey.id}: ${errorMessage(error)}`);
      }
    }

    const learned = Object.keys(facts).filter(name => facts[name] !== instance.facts[name]);
    if (learned.length === 0) return instance;
    logger.info(`[JourneyEngine] Learned facts for ${journey.id}: ${learned.join(', ')}`);
    return { ...instance, facts };
  }

  /**
   * Moves the instance as far as the conversation allows this turn. Returns a
   * new instance; the input is never modified. Deterministic for a
   * deterministic evaluator.
   */
  async advance(
    journey: Journey,
    instance: JourneyInstance,
    state: ConversationState,
    options: CallOptions = {}
  ): Promise<JourneyAdvance> {
    let current: JourneyInstance = { ...instance, path: [...instance.path] };
    const taken: Transition[] = [];
    const skipped: string[] = [];
    const maxSteps = journey.states.length * 2 + 1;

    for (let step = 0; step < maxSteps; step++) {
      const node = findState(journey, current.stateId);

      if (current.phase === 'pending') {
        if (node.kind === 'tool') {
          return { instance: current, outcome: { kind: 'tool', state: node }, taken, skipped };
        }
        if (node.kind === 'chat' && !isSkippable(node, current.facts)) {
          return {
            instance: { ...current, phase: 'presented' },
            outcome: { kind: 'chat', state: node, repeated: false },
            taken,
            skipped
          };
        }
        if (node.kind === 'chat') {
          logger.info(`[JourneyEngine] Skipping ${journey.id}/${node.id}: ${(node.collects ?? []).join(', ')} already known`);
          skipped.push(node.id);
        }
        current = { ...current, phase: 'presented' };
      }

      const outgoing = journey.transitions.filter(t => t.from === node.id);
      if (outgoing.length === 0) {
        logger.info(`[JourneyEngine] Journey ${journey.id} completed at ${node.id}`);
        return { instance: { ...current, status: 'completed' }, outcome: { kind: 'completed', state: node }, taken, skipped };
      }

      // Still waiting for the customer to answer this state's question
      if (node.kind === 'chat' && (node.collects ?? []).length > 0 && !isSkippable(node, current.facts)) {
        return { instance: current, outcome: { kind: 'chat', state: node, repeated: true }, taken, skipped };
      }

      const next = await this.chooseTransition(outgoing, { ...state, facts: current.facts }, options);
      if (!next) {
        logger.warn(`[JourneyEngine] Unresolved transition in ${journey.id} at ${node.id}; staying in state`);
        return { instance: current, outcome: { kind: 'unresolved', state: node }, taken, skipped };
      }

      taken.push(next);
      current = { ...current, stateId: next.to, phase: 'pending', path: [...current.path, next.to] };
    }

    logger.warn(`[JourneyEngine] Cycle guard hit in ${journey.id} at ${current.stateId}`);
    return { instance: current, outcome: { kind: 'unresolved', state: findState(journey, current.stateId) }, taken, skipped };
  }

  // Conditional transitions in declaration order; the unconditional one is the default
  private async chooseTransition(
    outgoing: Transition[],
    state: ConversationState,
    options: CallOptions
  ): Promise<Transition | undefined> {
    const conditional = outgoing.filter(t => t.condition !== undefined);
    const fallback = outgoing.find(t => t.condition === undefined);
    if (conditional.length === 0) return fallback;

    const verdicts = await this.oracle(conditional.map(t => t.condition ?? ''), state, 'transition', options);
    const index = verdicts.findIndex(v => v.applies && v.confidence >= this.threshold);
    return index === -1 ? fallback : conditional[index];
  }

  private async oracle(conditions: string[], state: ConversationState, label: string, options: CallOptions) {
    try {
      return await withTimeout(
        signal => evaluateAll(this.evaluator, conditions, state, signal),
        { ms: this.timeoutMs, label, signal: options.signal, turnId: options.turnId }
      );
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      logger.err(`[JourneyEngine] Oracle unavailable during ${label}: ${errorMessage(error)}`);
      throw new MatchingUnavailableError(`Journey ${label} is unavailable`, { cause: error });
    }
  }
}
