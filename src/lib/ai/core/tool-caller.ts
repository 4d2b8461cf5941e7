import logger from 'jet-logger';
import { z } from 'zod';
import { AI_CONFIG } from '../config';
import {
  ConfigurationError,
  SecurityViolationError,
  TimeoutError,
  TurnCancelledError,
  errorMessage
} from './errors';
import { withTimeout } from '../../utils/timeout';
import { matchInMessages } from '../../utils/patterns';
import type { ConversationState, ContextVariable, StoredVariable } from '../types/context';
import type { GuidelineMatch } from '../types/guideline';
import type { ToolState } from '../types/journey';
import type { Diagnostic } from '../types/composition';
import type {
  ParameterBinding,
  ToolContext,
  ToolDefinition,
  ToolInvocation,
  ToolOutcome
} from '../types/tool';

export interface ParameterSpec {
  name: string;
  required: boolean;
  binding: ParameterBinding;
  description: string;
}

// Fills parameters nothing else could resolve, from the conversation
export interface ParameterExtractor {
  extract(
    tool: ToolDefinition,
    parameters: ParameterSpec[],
    state: ConversationState,
    signal?: AbortSignal
  ): Promise<Record<string, unknown>>;
}

export interface ToolCallerOptions {
  timeoutMs?: number;
  refreshTimeoutMs?: number;
  parameterExtractor?: ParameterExtractor;
}

export interface ToolCallRequest {
  state: ConversationState;
  signal?: AbortSignal;
  turnId?: string;
}

export interface ResolvedArguments {
  args: Record<string, unknown>;
  missingCustomer: string[];
  missingContext: string[];
}

export interface VariableRefresh {
  definition: ContextVariable;
  owner: string;
  stored?: StoredVariable;
}

export interface RefreshResult {
  name: string;
  owner: string;
  value: unknown;
  refreshedAt: string;
  refreshed: boolean;
}

const DEFAULT_BINDING: ParameterBinding = { source: 'context' };

// Value at a dotted path inside a tool result
export function getPath(value: unknown, path: string): unknown {
  if (!path) return value;
  let current: unknown = value;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(key in current)) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

const isPresent = (value: unknown) => value !== undefined && value !== null && value !== '';

function isRetryable(outcome: ToolOutcome): boolean {
  return (outcome.status === 'error' || outcome.status === 'timeout') && outcome.retryable;
}

export function isStale(variable: VariableRefresh, now: Date): boolean {
  const { freshnessMs } = variable.definition;
  if (freshnessMs === undefined) return false;
  if (!variable.stored) return true;
  return now.getTime() - new Date(variable.stored.refreshedAt).getTime() > freshnessMs;
}

/**
 * Registry and executor for agent tools. Tool failures are returned as
 * outcomes and never thrown; only cancellation escapes.
 */
export class ToolCaller {
  private tools = new Map<string, ToolDefinition>();
  private readonly timeoutMs: number;
  private readonly refreshTimeoutMs: number;
  private readonly parameterExtractor?: ParameterExtractor;

  constructor(tools: ToolDefinition[] = [], options: ToolCallerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? AI_CONFIG.TOOL_TIMEOUT_MS;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? AI_CONFIG.REFRESH_TIMEOUT_MS;
    this.parameterExtractor = options.parameterExtractor;
    tools.forEach(t => this.registerTool(t));
  }

  // Register tool
  registerTool(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  getTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  // Get registered tool names
  getRegisteredTools(): string[] {
    return Array.from(this.tools.keys());
  }

  // Dependencies must exist and be acyclic
  validate(): void {
    for (const tool of this.tools.values()) {
      tool.dependsOn.forEach(dep => {
        if (!this.tools.has(dep)) {
          throw new ConfigurationError(`Tool "${tool.name}" depends on unknown tool "${dep}"`);
        }
      });
      Object.values(tool.parameters).forEach(binding => {
        if (binding?.fromTool && !this.tools.has(binding.fromTool.tool)) {
          throw new ConfigurationError(`Tool "${tool.name}" reads from unknown tool "${binding.fromTool.tool}"`);
        }
      });
    }
    this.layers(this.getRegisteredTools());
  }

  describeParameters(tool: ToolDefinition): ParameterSpec[] {
    const shape: Record<string, z.ZodTypeAny> = tool.inputSchema.shape;
    return Object.entries(shape).map(([name, schema]) => {
      const binding = tool.parameters[name] ?? DEFAULT_BINDING;
      return {
        name,
        required: !schema.isOptional(),
        binding,
        description: binding.description ?? schema.description ?? name
      };
    });
  }

  /**
   * Dependency closure of `names`, grouped into layers that can run
   * concurrently. Throws on cycles.
   */
  layers(names: string[]): string[][] {
    const pending = new Set<string>();
    const visit = (name: string) => {
      if (pending.has(name)) return;
      const tool = this.tools.get(name);
      if (!tool) return;
      pending.add(name);
      tool.dependsOn.forEach(visit);
    };
    names.forEach(visit);

    const done = new Set<string>();
    const layers: string[][] = [];
    while (pending.size > 0) {
      const layer = Array.from(pending).filter(name =>
        (this.tools.get(name)?.dependsOn ?? []).every(dep => done.has(dep))
      );
      if (layer.length === 0) {
        throw new ConfigurationError(`Tool dependency cycle among: ${Array.from(pending).join(', ')}`);
      }
      layer.forEach(name => {
        pending.delete(name);
        done.add(name);
      });
      layers.push(layer);
    }
    return layers;
  }

  /**
   * Resolution order per parameter: context variable, journey fact, earlier
   * tool result, pattern over customer messages (newest first), extractor.
   */
  async resolveArguments(
    tool: ToolDefinition,
    request: ToolCallRequest,
    results: Record<string, unknown>
  ): Promise<ResolvedArguments> {
    const { state } = request;
    const args: Record<string, unknown> = {};
    const specs = this.describeParameters(tool);
    const customerMessages = state.messages.filter(m => m.role === 'user').map(m => m.content).reverse();

    specs.forEach(({ name, binding }) => {
      const candidates: Array<() => unknown> = [
        () => (binding.fromVariable ? state.variables[binding.fromVariable] : undefined),
        () => state.facts[binding.fromFact ?? name],
        () => (binding.fromTool ? getPath(results[binding.fromTool.tool], binding.fromTool.path) : undefined),
        () => (binding.pattern ? matchInMessages(binding.pattern, customerMessages) : undefined)
      ];
      for (const candidate of candidates) {
        const value = candidate();
        if (isPresent(value)) {
          args[name] = value;
          break;
        }
      }
    });

    const unresolved = specs.filter(spec => spec.required && !isPresent(args[spec.name]));
    if (unresolved.length > 0 && this.parameterExtractor) {
      const extractor = this.parameterExtractor;
      try {
        const extracted = await withTimeout(
          signal => extractor.extract(tool, unresolved, state, signal),
          { ms: this.timeoutMs, label: `parameters for ${tool.name}`, signal: request.signal, turnId: request.turnId }
        );
        unresolved.forEach(spec => {
          if (isPresent(extracted[spec.name])) args[spec.name] = extracted[spec.name];
        });
      } catch (error) {
        if (error instanceof TurnCancelledError) throw error;
        logger.warn(`[ToolCaller] Parameter extraction failed for ${tool.name}: ${errorMessage(error)}`);
      }
    }

    const missing = specs.filter(spec => spec.required && !isPresent(args[spec.name]));
    return {
      args,
      missingCustomer: missing.filter(s => s.binding.source === 'customer').map(s => s.name),
      missingContext: missing.filter(s => s.binding.source === 'context').map(s => s.name)
    };
  }

  /**
   * Resolves arguments and runs one tool with its timeout and retry policy.
   */
  async invoke(
    toolName: string,
    request: ToolCallRequest,
    results: Record<string, unknown> = {},
    meta: { guidelineId?: string; stateId?: string; timeoutMs?: number; owner?: string } = {}
  ): Promise<ToolInvocation> {
    const base = { toolName, guidelineId: meta.guidelineId, stateId: meta.stateId };
    const tool = this.tools.get(toolName);
    if (!tool) {
      logger.warn(`[ToolCaller] Tool ${toolName} is not registered`);
      return { ...base, args: {}, attempts: 0, outcome: { status: 'skipped', reason: 'unknown tool' }, variables: {} };
    }

    const { args, missingCustomer, missingContext } = await this.resolveArguments(tool, request, results);
    if (missingCustomer.length > 0) {
      logger.info(`[ToolCaller] Deferring ${toolName}: waiting for ${missingCustomer.join(', ')}`);
      return { ...base, args, attempts: 0, outcome: { status: 'deferred', missing: missingCustomer }, variables: {} };
    }
    if (missingContext.length > 0) {
      logger.warn(`[ToolCaller] ${toolName} is missing context parameters: ${missingContext.join(', ')}`);
      return { ...base, args, attempts: 0, outcome: { status: 'missing_parameter', missing: missingContext }, variables: {} };
    }

    const context: Omit<ToolContext, 'signal'> = {
      sessionId: request.state.sessionId,
      customerId: request.state.customerId,
      tags: request.state.tags,
      variables: request.state.variables,
      messages: request.state.messages,
      results: { ...results },
      owner: meta.owner
    };
    const timeoutMs = meta.timeoutMs ?? tool.timeoutMs ?? this.timeoutMs;

    let attempts = 0;
    for (;;) {
      attempts++;
      const { outcome, variables } = await this.attempt(tool, context, args, request, timeoutMs);
      if (!isRetryable(outcome) || attempts > tool.maxRetries) {
        logger.info(`[ToolCaller] ${toolName} -> ${outcome.status} after ${attempts} attempt(s)`);
        return { ...base, args, attempts, outcome, variables };
      }
      logger.warn(`[ToolCaller] Retrying ${toolName} (attempt ${attempts + 1} of ${tool.maxRetries + 1})`);
    }
  }

  private async attempt(
    tool: ToolDefinition,
    context: Omit<ToolContext, 'signal'>,
    args: Record<string, unknown>,
    request: ToolCallRequest,
    timeoutMs: number
  ): Promise<{ outcome: ToolOutcome; variables: Record<string, unknown> }> {
    try {
      const result = await withTimeout(
        signal => tool.execute({ ...context, signal }, args),
        { ms: timeoutMs, label: `tool ${tool.name}`, signal: request.signal, turnId: request.turnId }
      );
      if (result.error) {
        return {
          outcome: { status: 'error', error: result.error, retryable: result.control?.retryAllowed ?? tool.retryable },
          variables: {}
        };
      }
      return {
        outcome: { status: 'success', data: result.data, cannedFields: result.cannedFields ?? {} },
        variables: result.variables ?? {}
      };
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      if (error instanceof SecurityViolationError) {
        logger.warn(`[ToolCaller] Security violation in ${tool.name}: ${error.message}`);
        return { outcome: { status: 'security_violation', error: error.message }, variables: {} };
      }
      if (error instanceof TimeoutError) {
        return { outcome: { status: 'timeout', error: error.message, retryable: true }, variables: {} };
      }
      logger.err(`[ToolCaller] ${tool.name} failed: ${errorMessage(error)}`);
      return { outcome: { status: 'error', error: errorMessage(error), retryable: tool.retryable }, variables: {} };
    }
  }

  /**
   * `carried` holds calls that already executed in an earlier attempt of the
   * same turn; they are reused instead of running the tool again.
   */
  begin(request: ToolCallRequest, carried: Map<string, ToolInvocation> = new Map()): ToolRun {
    return new ToolRun(this, request, carried);
  }

  /**
   * Refreshes stale variables through their refresher tools, concurrently.
   * A failed refresh keeps the stored value and records a diagnostic.
   */
  async refreshVariables(
    variables: VariableRefresh[],
    request: ToolCallRequest,
    now: Date = new Date()
  ): Promise<{ results: RefreshResult[]; diagnostics: Diagnostic[] }> {
    const diagnostics: Diagnostic[] = [];
    const stale = variables.filter(v => v.definition.refresher && isStale(v, now));
    if (stale.length > 0) {
      logger.info(`[ToolCaller] Refreshing ${stale.length} stale variable(s): ${stale.map(v => v.definition.name).join(', ')}`);
    }

    const results = await Promise.all(variables.map(async (variable): Promise<RefreshResult> => {
      const { name, refresher } = variable.definition;
      const current: RefreshResult = {
        name,
        owner: variable.owner,
        value: variable.stored?.value,
        refreshedAt: variable.stored?.refreshedAt ?? now.toISOString(),
        refreshed: false
      };
      if (!refresher || !stale.includes(variable)) return current;

      const invocation = await this.invoke(refresher, request, {}, { timeoutMs: this.refreshTimeoutMs, owner: variable.owner });
      if (invocation.outcome.status !== 'success') {
        const reason = 'error' in invocation.outcome ? invocation.outcome.error : invocation.outcome.status;
        logger.warn(`[ToolCaller] Refresh of ${name} failed: ${reason}`);
        diagnostics.push({ kind: 'refresh_failed', variable: name, reason });
        return current;
      }

      const value = name in invocation.variables ? invocation.variables[name] : invocation.outcome.data;
      return { ...current, value, refreshedAt: now.toISOString(), refreshed: true };
    }));

    return { results, diagnostics };
  }
}

/**
 * Tool calls of one turn. A tool runs at most once per run, however many
 * guidelines or journey states bind it.
 */
export class ToolRun {
  private calls = new Map<string, Promise<ToolInvocation>>();
  private skippedCalls: ToolInvocation[] = [];
  private completed: Record<string, unknown> = {};

  constructor(
    private readonly caller: ToolCaller,
    private readonly request: ToolCallRequest,
    private readonly carried: Map<string, ToolInvocation>
  ) {}

  /**
   * Guidelines fan out concurrently; inside a guideline the tools run in
   * dependency layers. A security violation skips the guideline's remaining tools.
   */
  async forGuidelines(matches: GuidelineMatch[]): Promise<ToolInvocation[]> {
    const bound = matches.filter(m => (m.guideline.tools ?? []).length > 0);
    const groups = await Promise.all(
      bound.map(m => this.runGroup(m.guideline.tools ?? [], { guidelineId: m.guideline.id }))
    );
    return groups.flat();
  }

  // Runs a journey tool state; the state's own invocation is last
  async forState(state: ToolState): Promise<ToolInvocation> {
    const invocations = await this.runGroup([state.tool], { stateId: state.id });
    const own = invocations.find(i => i.toolName === state.tool);
    if (!own) {
      return { toolName: state.tool, stateId: state.id, args: {}, attempts: 0, outcome: { status: 'skipped', reason: 'not run' }, variables: {} };
    }
    return own;
  }

  // Every invocation of the run, one per tool, in start order
  async invocations(): Promise<ToolInvocation[]> {
    const ran = await Promise.all(this.calls.values());
    const names = new Set(ran.map(i => i.toolName));
    return [...ran, ...this.skippedCalls.filter(i => !names.has(i.toolName))];
  }

  // Data of every successful call so far
  results(): Record<string, unknown> {
    return { ...this.completed };
  }

  private async runGroup(names: string[], meta: { guidelineId?: string; stateId?: string }): Promise<ToolInvocation[]> {
    const collected: ToolInvocation[] = [];
    let violation: string | undefined;

    for (const layer of this.caller.layers(names)) {
      if (violation) {
        layer.forEach(name => {
          if (this.calls.has(name)) return;
          const skipped: ToolInvocation = {
            toolName: name,
            ...meta,
            args: {},
            attempts: 0,
            outcome: { status: 'skipped', reason: `security violation in ${violation}` },
            variables: {}
          };
          this.skippedCalls.push(skipped);
          collected.push(skipped);
        });
        continue;
      }

      const layerResults = await Promise.all(layer.map(name => this.call(name, meta)));
      collected.push(...layerResults);
      violation = layerResults.find(i => i.outcome.status === 'security_violation')?.toolName;
    }

    return collected;
  }

  private call(name: string, meta: { guidelineId?: string; stateId?: string }): Promise<ToolInvocation> {
    const existing = this.calls.get(name);
    if (existing) return existing;

    const promise = (async (): Promise<ToolInvocation> => {
      const tool = this.caller.getTool(name);
      const dependencies = await Promise.all((tool?.dependsOn ?? []).map(dep => this.call(dep, meta)));
      const failed = dependencies.find(d => d.outcome.status !== 'success');
      if (failed) {
        return {
          toolName: name,
          ...meta,
          args: {},
          attempts: 0,
          outcome: { status: 'skipped', reason: `dependency ${failed.toolName} did not succeed` },
          variables: {}
        };
      }
      const previous = this.carried.get(name);
      const invocation = previous ?? await this.caller.invoke(name, this.request, this.results(), meta);
      if (previous) {
        logger.info(`[ToolCaller] Reusing ${name} from an earlier attempt of this turn`);
      } else if (invocation.attempts > 0) {
        this.carried.set(name, invocation);
      }
      if (invocation.outcome.status === 'success') this.completed[name] = invocation.outcome.data;
      return invocation;
    })();

    this.calls.set(name, promise);
    return promise;
  }
}
