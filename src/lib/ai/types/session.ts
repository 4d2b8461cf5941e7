import type { JourneyInstance } from './journey';
import type { ToolStatus } from './tool';
import type { CompositionStatus } from './composition';
import type { StoredVariable, VariableKey, VariableWrite } from './context';

export type SessionEventPayload =
  | { kind: 'message'; source: 'customer'; text: string }
  | { kind: 'message'; source: 'agent'; text: string; status: CompositionStatus }
  | { kind: 'tool'; source: 'agent'; toolName: string; status: ToolStatus }
  | { kind: 'status'; source: 'system'; status: string; detail?: string };

export type SessionEvent = SessionEventPayload & {
  id: string;
  offset: number;
  turnId: string;
  createdAt: string;
};

export interface Session {
  id: string;
  customerId: string;
  tags: string[];
  journey?: JourneyInstance;
  eventCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface TurnCommit {
  turnId: string;
  events: SessionEventPayload[];
  journey?: JourneyInstance;
}

// Append-only event log per session; durability belongs to the implementation
export interface SessionStore {
  create(input: { customerId: string; tags?: string[] }): Promise<Session>;
  get(sessionId: string): Promise<Session | null>;
  listEvents(sessionId: string): Promise<SessionEvent[]>;
  commitTurn(sessionId: string, commit: TurnCommit): Promise<Session>;
}

export interface ContextVariableStore {
  getMany(keys: VariableKey[]): Promise<Array<StoredVariable | undefined>>;
  // All writes land or none do
  writeMany(writes: VariableWrite[]): Promise<void>;
}
