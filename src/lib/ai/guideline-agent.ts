import logger from 'jet-logger';
import { AI_CONFIG } from './config';
import { GlossaryStore } from './core/glossary-store';
import { GuidelineStore, isInScope, type ScopePosition } from './core/guideline-store';
import { GuidelineMatcher, compareMatches, type GuidelineMatcherOptions } from './core/guideline-matcher';
import { JourneyEngine, validateJourney, findState, type FactExtractor } from './core/journey-engine';
import { ToolCaller, type ParameterExtractor, type VariableRefresh } from './core/tool-caller';
import { MessageComposer, type ComposerOptions, type JourneyStep } from './core/message-composer';
import { CannedResponseStore } from './core/canned-responses';
import {
  ConfigurationError,
  MatchingUnavailableError,
  AgentError,
  SessionNotFoundError,
  TurnCancelledError,
  TurnFailedError,
  errorMessage
} from './core/errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import { createExecutionContext, type ExecutionContext } from '../utils/execution-context';
import { ContextVariableSchema, customerOwner, tagOwner } from './types/context';
import type { ConditionEvaluator } from './core/condition-evaluator';
import type { ComplianceChecker } from './core/compliance';
import type { ResponseGenerator } from './core/response-generator';
import type { ConversationMessage, ConversationState, ContextVariable, ContextVariableInput } from './types/context';
import type { CompositionMode, GuidelineInput, RegisteredGuideline } from './types/guideline';
import type { GlossaryTerm, GlossaryTermInput } from './types/glossary';
import type { Journey, JourneyInput, JourneyInstance, JourneyOutcome } from './types/journey';
import type { ToolDefinition, ToolInvocation } from './types/tool';
import type { CannedResponse, CannedResponseInput, CompositionStatus, CompositionTrace, Diagnostic } from './types/composition';
import type { ContextVariableStore, Session, SessionEvent, SessionEventPayload, SessionStore } from './types/session';

export interface AgentDefinition {
  name: string;
  description?: string;
  defaultCompositionMode?: CompositionMode;
  glossary?: GlossaryTermInput[];
  guidelines: GuidelineInput[];
  journeys?: JourneyInput[];
  tools?: ToolDefinition[];
  variables?: ContextVariableInput[];
  cannedResponses?: CannedResponseInput[];
}

export interface AgentDependencies {
  evaluator: ConditionEvaluator;
  generator: ResponseGenerator;
  checker: ComplianceChecker;
  sessions: SessionStore;
  variables: ContextVariableStore;
  factExtractor?: FactExtractor;
  parameterExtractor?: ParameterExtractor;
}

export interface GuidelineAgentOptions {
  maxTurnAttempts?: number;
  matcher?: GuidelineMatcherOptions;
  composer?: Omit<ComposerOptions, 'defaultMode'>;
  toolTimeoutMs?: number;
  clock?: () => Date;
}

export interface TurnResult {
  turnId: string;
  sessionId: string;
  reply: string;
  status: CompositionStatus;
  trace: CompositionTrace;
  journey?: JourneyInstance;
  attempts: number;
}

export interface AgentSummary {
  name: string;
  description: string;
  defaultCompositionMode: CompositionMode;
  guidelines: Array<Pick<RegisteredGuideline, 'id' | 'condition' | 'action' | 'criticality' | 'enabled' | 'scope' | 'tags'>>;
  journeys: Array<{ id: string; title: string; states: number }>;
  tools: string[];
  glossary: GlossaryTerm[];
  variables: string[];
  cannedResponses: number;
}

// Immutable view of the configuration for one turn
interface AgentSnapshot {
  guidelines: readonly RegisteredGuideline[];
  glossary: readonly GlossaryTerm[];
  journeys: readonly Journey[];
  cannedResponses: readonly CannedResponse[];
  variables: readonly ContextVariable[];
}

function toMessages(events: SessionEvent[]): ConversationMessage[] {
  const messages: ConversationMessage[] = [];
  events.forEach(event => {
    if (event.kind === 'message') {
      messages.push({ role: event.source === 'customer' ? 'user' : 'assistant', content: event.text });
    }
  });
  return messages;
}

function samePosition(a: ScopePosition, b: ScopePosition): boolean {
  return a.journeyId === b.journeyId && a.stateId === b.stateId;
}

function positionOf(instance: JourneyInstance | undefined): ScopePosition {
  return instance?.status === 'active' ? { journeyId: instance.journeyId, stateId: instance.stateId } : {};
}

/**
 * Turn pipeline: per-customer serialization, configuration snapshot,
 * variable refresh, guideline matching, journey advance, tool calls,
 * composition and an all-or-nothing commit.
 */
export class GuidelineAgent {
  readonly name: string;
  readonly description: string;
  readonly glossary: GlossaryStore;
  readonly guidelines: GuidelineStore;
  readonly matcher: GuidelineMatcher;
  readonly journeyEngine: JourneyEngine;
  readonly tools: ToolCaller;
  readonly composer: MessageComposer;

  private readonly journeys: readonly Journey[];
  private readonly variables: readonly ContextVariable[];
  private readonly cannedResponses: CannedResponseStore;
  private readonly defaultMode: CompositionMode;
  private readonly sessions: SessionStore;
  private readonly variableStore: ContextVariableStore;
  private readonly mutex = new KeyedMutex();
  private readonly maxTurnAttempts: number;
  private readonly clock: () => Date;

  constructor(definition: AgentDefinition, deps: AgentDependencies, options: GuidelineAgentOptions = {}) {
    this.name = definition.name;
    this.description = definition.description ?? '';
    this.defaultMode = definition.defaultCompositionMode ?? 'fluid';
    this.sessions = deps.sessions;
    this.variableStore = deps.variables;
    this.maxTurnAttempts = Math.max(1, options.maxTurnAttempts ?? AI_CONFIG.TURN_MAX_ATTEMPTS);
    this.clock = options.clock ?? (() => new Date());

    this.glossary = new GlossaryStore(definition.glossary ?? []);
    this.guidelines = new GuidelineStore(definition.guidelines);
    this.tools = new ToolCaller(definition.tools ?? [], {
      timeoutMs: options.toolTimeoutMs,
      parameterExtractor: deps.parameterExtractor
    });
    this.cannedResponses = new CannedResponseStore(definition.cannedResponses ?? []);

    const toolNames = new Set(this.tools.getRegisteredTools());
    this.journeys = Object.freeze((definition.journeys ?? []).map(j => Object.freeze(validateJourney(j, toolNames))));
    this.variables = Object.freeze((definition.variables ?? []).map(v => Object.freeze(ContextVariableSchema.parse(v))));
    this.validate(toolNames);

    this.matcher = new GuidelineMatcher(deps.evaluator, options.matcher);
    this.journeyEngine = new JourneyEngine(deps.evaluator, { factExtractor: deps.factExtractor });
    this.composer = new MessageComposer(deps.generator, deps.checker, {
      ...options.composer,
      defaultMode: this.defaultMode
    });

    logger.info(`[GuidelineAgent] ${this.name} initialized with ${this.guidelines.list().length} guidelines, ${this.journeys.length} journeys, ${toolNames.size} tools`);
  }

  private validate(toolNames: ReadonlySet<string>): void {
    const journeyIds = new Set(this.journeys.map(j => j.id));
    if (journeyIds.size !== this.journeys.length) {
      throw new ConfigurationError('Journey ids must be unique');
    }
    this.guidelines.validate(toolNames, journeyIds);
    this.tools.validate();

    const names = new Set<string>();
    this.variables.forEach(variable => {
      if (names.has(variable.name)) {
        throw new ConfigurationError(`Context variable "${variable.name}" is declared twice`);
      }
      names.add(variable.name);
      if (variable.refresher && !toolNames.has(variable.refresher)) {
        throw new ConfigurationError(`Context variable "${variable.name}" uses unknown refresher "${variable.refresher}"`);
      }
    });

    this.cannedResponses.list().forEach(response => {
      if (response.scope.kind !== 'global' && !journeyIds.has(response.scope.journeyId)) {
        throw new ConfigurationError(`Canned response "${response.id}" is scoped to unknown journey "${response.scope.journeyId}"`);
      }
    });
  }

  private snapshot(): AgentSnapshot {
    return {
      guidelines: this.guidelines.snapshot(),
      glossary: Object.freeze(this.glossary.listTerms()),
      journeys: this.journeys,
      cannedResponses: Object.freeze(this.cannedResponses.list()),
      variables: this.variables
    };
  }

  // ===== Sessions =====

  createSession(customerId: string, tags: string[] = []): Promise<Session> {
    return this.sessions.create({ customerId, tags });
  }

  async getSession(sessionId: string): Promise<Session> {
    const session = await this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  async listEvents(sessionId: string): Promise<SessionEvent[]> {
    await this.getSession(sessionId);
    return this.sessions.listEvents(sessionId);
  }

  // ===== Configuration edits (never visible to turns already running) =====

  upsertGlossaryTerm(input: GlossaryTermInput): GlossaryTerm {
    return this.glossary.upsertTerm(input);
  }

  setGuidelineEnabled(id: string, enabled: boolean): RegisteredGuideline {
    return this.guidelines.setEnabled(id, enabled);
  }

  // `tag` narrows the guideline list to guidelines carrying it
  describe(filter: { tag?: string } = {}): AgentSummary {
    const { tag } = filter;
    return {
      name: this.name,
      description: this.description,
      defaultCompositionMode: this.defaultMode,
      guidelines: this.guidelines.list().filter(g => !tag || (g.tags ?? []).includes(tag)).map(g => ({
        id: g.id,
        condition: g.condition,
        action: g.action,
        criticality: g.criticality,
        enabled: g.enabled,
        scope: g.scope,
        tags: g.tags ?? []
      })),
      journeys: this.journeys.map(j => ({ id: j.id, title: j.title, states: j.states.length })),
      tools: this.tools.getRegisteredTools(),
      glossary: this.glossary.listTerms(),
      variables: this.variables.map(v => v.name),
      cannedResponses: this.cannedResponses.list().length
    };
  }

  // ===== Turn processing =====

  /**
   * Processes one customer message. Turns of the same customer run one at a
   * time. Matching unavailability retries the whole turn, then propagates.
   */
  async processMessage(sessionId: string, text: string, options: { signal?: AbortSignal } = {}): Promise<TurnResult> {
    const session = await this.getSession(sessionId);

    return this.mutex.runExclusive(session.customerId, async () => {
      const carried = new Map<string, ToolInvocation>();
      for (let attempt = 1; ; attempt++) {
        const context = createExecutionContext(options.signal);
        try {
          const result = await this.runTurn(sessionId, text, context, carried);
          return { ...result, attempts: attempt };
        } catch (error) {
          context.discard();
          if (error instanceof MatchingUnavailableError && attempt < this.maxTurnAttempts) {
            logger.warn(`[GuidelineAgent] Matching unavailable (attempt ${attempt}/${this.maxTurnAttempts}), retrying turn`);
            continue;
          }
          if (error instanceof TurnCancelledError) {
            logger.info(`[GuidelineAgent] Turn ${context.executionId} cancelled; nothing committed`);
          } else {
            logger.err(`[GuidelineAgent] Turn ${context.executionId} failed: ${errorMessage(error)}`);
          }
          throw error instanceof AgentError ? error : new TurnFailedError(context.executionId, { cause: error });
        }
      }
    });
  }

  private async runTurn(
    sessionId: string,
    text: string,
    context: ExecutionContext,
    carried: Map<string, ToolInvocation>
  ): Promise<Omit<TurnResult, 'attempts'>> {
    const turnId = context.executionId;
    const signal = context.abortSignal;
    const call = { signal, turnId };
    const now = this.clock();

    const session = await this.getSession(sessionId);
    const snapshot = this.snapshot();
    const history = await this.sessions.listEvents(sessionId);
    const diagnostics: Diagnostic[] = [];
    const statusEvents: SessionEventPayload[] = [];

    logger.info(`[GuidelineAgent] Turn ${turnId} for session ${sessionId}`);

    // ===== Context variables =====
    const owner = customerOwner(session.customerId);
    const refreshables: VariableRefresh[] = snapshot.variables.flatMap(definition =>
      definition.scope === 'customer'
        ? [{ definition, owner }]
        : session.tags.map(tag => ({ definition, owner: tagOwner(tag) }))
    );
    const stored = await this.variableStore.getMany(refreshables.map(r => ({ name: r.definition.name, owner: r.owner })));
    refreshables.forEach((r, idx) => {
      r.stored = stored[idx];
    });
    context.throwIfAborted();

    let instance: JourneyInstance | undefined = session.journey;
    let journey = instance?.status === 'active' ? snapshot.journeys.find(j => j.id === instance?.journeyId) : undefined;
    if (instance?.status === 'active' && !journey) {
      logger.warn(`[GuidelineAgent] Session ${sessionId} points at unknown journey ${instance.journeyId}; dropping it`);
      instance = undefined;
    }
    // Its last state was shown on an earlier turn; leave room for a new journey
    if (instance?.status === 'active' && journey && this.journeyEngine.isFinished(journey, instance)) {
      statusEvents.push({ kind: 'status', source: 'system', status: 'journey_completed', detail: journey.id });
      instance = this.journeyEngine.complete(instance);
      journey = undefined;
    }
    const initialPosition = positionOf(instance);

    const state: ConversationState = {
      sessionId,
      customerId: session.customerId,
      tags: session.tags,
      messages: [...toMessages(history), { role: 'user', content: text }],
      variables: {},
      facts: instance?.status === 'active' ? { ...instance.facts } : {},
      glossary: [],
      toolResults: [],
      journey: instance && journey ? { id: journey.id, title: journey.title, stateId: instance.stateId } : undefined
    };

    const refreshed = await this.tools.refreshVariables(refreshables, { state, ...call }, now);
    diagnostics.push(...refreshed.diagnostics);
    refreshed.results.forEach(r => {
      if (r.refreshed) context.stageWrite({ name: r.name, owner: r.owner, value: r.value, refreshedAt: r.refreshedAt });
    });
    // Customer values win over tag values; among tags, the first one holding a value
    refreshed.results.forEach(r => {
      if (r.owner !== owner && r.value !== undefined && !(r.name in state.variables)) state.variables[r.name] = r.value;
    });
    refreshed.results.forEach(r => {
      if (r.owner === owner && r.value !== undefined) state.variables[r.name] = r.value;
    });

    state.glossary = this.glossary.relevantTerms(
      text,
      this.matcher.eligible(snapshot.guidelines, initialPosition),
      AI_CONFIG.MAX_GLOSSARY_TERMS,
      snapshot.glossary
    );

    // ===== Guideline matching =====
    let matches = await this.matcher.match({ state, guidelines: snapshot.guidelines, position: initialPosition, ...call });

    // ===== Journey =====
    const run = this.tools.begin({ state, ...call }, carried);
    let outcome: JourneyOutcome | undefined;

    if (instance?.status === 'active' && matches.some(m => m.guideline.journeyControl === 'abandon')) {
      statusEvents.push({ kind: 'status', source: 'system', status: 'journey_abandoned', detail: instance.journeyId });
      instance = this.journeyEngine.abandon(instance);
      journey = undefined;
    }

    if (instance?.status !== 'active' && snapshot.journeys.length > 0) {
      const abandonedNow = instance?.status === 'abandoned' ? instance.journeyId : undefined;
      const activation = await this.journeyEngine.selectActivation(
        snapshot.journeys.filter(j => j.id !== abandonedNow),
        state,
        call
      );
      if (activation) {
        journey = activation.journey;
        instance = this.journeyEngine.start(journey, now);
        statusEvents.push({ kind: 'status', source: 'system', status: 'journey_activated', detail: journey.id });
      }
    }

    if (instance?.status === 'active' && journey) {
      instance = await this.journeyEngine.collectFacts(journey, instance, state, call);
      state.facts = { ...instance.facts };

      for (let step = 0; step <= journey.states.length; step++) {
        const advance = await this.journeyEngine.advance(journey, instance, state, call);
        instance = advance.instance;
        outcome = advance.outcome;
        advance.skipped.forEach(stateId => {
          statusEvents.push({ kind: 'status', source: 'system', status: 'journey_state_skipped', detail: stateId });
        });

        if (outcome.kind === 'tool') {
          const invocation = await run.forState(outcome.state);
          if (invocation.outcome.status !== 'success') break;
          instance = this.journeyEngine.completeToolState(instance);
          continue;
        }
        if (outcome.kind === 'unresolved') {
          diagnostics.push({ kind: 'unresolved_transition', journeyId: journey.id, stateId: outcome.state.id });
        }
        if (outcome.kind === 'completed') {
          statusEvents.push({ kind: 'status', source: 'system', status: 'journey_completed', detail: journey.id });
        }
        break;
      }
      state.journey = { id: journey.id, title: journey.title, stateId: instance.stateId };
    }

    // Scope moved: drop guidelines left behind, match the newly eligible ones
    const position = positionOf(instance);
    if (!samePosition(position, initialPosition)) {
      const matchedIds = new Set(matches.map(m => m.guideline.id));
      const fresh = snapshot.guidelines.filter(g => g.scope.kind !== 'global' && !matchedIds.has(g.id));
      const extra = await this.matcher.match({ state, guidelines: fresh, position, ...call });
      matches = [...matches.filter(m => isInScope(m.guideline.scope, position)), ...extra].sort(compareMatches);
    }
    context.throwIfAborted();

    // ===== Tools =====
    await run.forGuidelines(matches);
    const invocations = await run.invocations();
    this.stageToolVariables(invocations, state, context, owner, now);
    state.toolResults = invocations.flatMap(i =>
      i.outcome.status === 'success' ? [{ toolName: i.toolName, data: i.outcome.data }] : []
    );

    // ===== Composition =====
    const composition = await this.composer.compose({
      state,
      matches,
      tools: invocations,
      journey: this.journeyStep(journey, instance, outcome),
      cannedResponses: snapshot.cannedResponses.filter(r => isInScope(r.scope, position)),
      diagnostics,
      ...call
    });

    // ===== Commit =====
    const events: SessionEventPayload[] = [
      { kind: 'message', source: 'customer', text },
      ...invocations.map((i): SessionEventPayload => ({ kind: 'tool', source: 'agent', toolName: i.toolName, status: i.outcome.status })),
      ...statusEvents,
      { kind: 'message', source: 'agent', text: composition.text, status: composition.status }
    ];

    // The session commit decides whether the turn happened; variables follow it
    const writes = context.stagedWrites();
    context.addPendingAction(async () => {
      await this.sessions.commitTurn(sessionId, { turnId, events, journey: instance });
    }, 'session');
    context.addPendingAction(async () => {
      if (writes.length > 0) await this.variableStore.writeMany(writes);
    }, 'variables');
    await context.commit();

    return {
      turnId,
      sessionId,
      reply: composition.text,
      status: composition.status,
      trace: composition.trace,
      journey: instance
    };
  }

  private journeyStep(
    journey: Journey | undefined,
    instance: JourneyInstance | undefined,
    outcome: JourneyOutcome | undefined
  ): JourneyStep | undefined {
    if (!journey || instance?.status !== 'active') return undefined;
    const node = findState(journey, instance.stateId);
    return {
      journeyId: journey.id,
      stateId: node.id,
      instruction: node.kind === 'chat' && outcome?.kind !== 'unresolved' ? node.instruction : undefined,
      stateMode: node.compositionMode,
      journeyMode: journey.compositionMode
    };
  }

  // Customer-scoped writes only; tag values change through refreshers
  private stageToolVariables(
    invocations: ToolInvocation[],
    state: ConversationState,
    context: ExecutionContext,
    owner: string,
    now: Date
  ): void {
    const definitions = new Map(this.variables.map(v => [v.name, v]));
    invocations.forEach(invocation => {
      Object.entries(invocation.variables).forEach(([name, value]) => {
        const definition = definitions.get(name);
        if (!definition) {
          logger.warn(`[GuidelineAgent] ${invocation.toolName} wrote undeclared variable ${name}; ignoring`);
          return;
        }
        if (definition.scope !== 'customer') {
          logger.warn(`[GuidelineAgent] ${invocation.toolName} wrote tag-scoped variable ${name}; ignoring`);
          return;
        }
        context.stageWrite({ name, owner, value, refreshedAt: now.toISOString() });
        state.variables[name] = value;
      });
    });
  }
}

