import type { z } from 'zod';
import type { ConversationMessage } from './context';

export type ParameterSource = 'customer' | 'context';

// Where a tool argument comes from when the caller resolves it
export interface ParameterBinding {
  // customer: ask before calling; context: take it from session state
  source: ParameterSource;
  description?: string;
  pattern?: string;
  fromVariable?: string;
  fromFact?: string;
  fromTool?: { tool: string; path: string };
}

export interface ToolContext {
  sessionId: string;
  customerId: string;
  tags: string[];
  variables: Record<string, unknown>;
  messages: ConversationMessage[];
  results: Record<string, unknown>;
  // Set when refreshing a context variable: `customer:<id>` or `tag:<tag>`
  owner?: string;
  signal: AbortSignal;
}

export interface ToolResult {
  data?: unknown;
  error?: string;
  control?: { retryAllowed?: boolean };
  cannedFields?: Record<string, string>;
  variables?: Record<string, unknown>;
}

export interface ToolSpec<S extends z.AnyZodObject> {
  name: string;
  description: string;
  inputSchema: S;
  parameters?: Partial<Record<keyof z.infer<S> & string, ParameterBinding>>;
  dependsOn?: string[];
  timeoutMs?: number;
  maxRetries?: number;
  retryable?: boolean;
  execute: (context: ToolContext, args: z.infer<S>) => Promise<ToolResult>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
  parameters: Partial<Record<string, ParameterBinding>>;
  dependsOn: string[];
  timeoutMs?: number;
  maxRetries: number;
  retryable: boolean;
  execute: (context: ToolContext, args: Record<string, unknown>) => Promise<ToolResult>;
}

export function defineTool<S extends z.AnyZodObject>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    parameters: spec.parameters ?? {},
    dependsOn: spec.dependsOn ?? [],
    timeoutMs: spec.timeoutMs,
    maxRetries: spec.maxRetries ?? 0,
    retryable: spec.retryable ?? false,
    execute: (context, args) => spec.execute(context, spec.inputSchema.parse(args))
  };
}

export type ToolOutcome =
  | { status: 'success'; data: unknown; cannedFields: Record<string, string> }
  | { status: 'deferred'; missing: string[] }
  | { status: 'missing_parameter'; missing: string[] }
  | { status: 'error'; error: string; retryable: boolean }
  | { status: 'security_violation'; error: string }
  | { status: 'timeout'; error: string; retryable: boolean }
  | { status: 'skipped'; reason: string };

export const TOOL_STATUSES = [
  'success',
  'deferred',
  'missing_parameter',
  'error',
  'security_violation',
  'timeout',
  'skipped'
] as const satisfies readonly ToolOutcome['status'][];

export type ToolStatus = ToolOutcome['status'];

export interface ToolInvocation {
  toolName: string;
  guidelineId?: string;
  stateId?: string;
  args: Record<string, unknown>;
  attempts: number;
  outcome: ToolOutcome;
  variables: Record<string, unknown>;
}
