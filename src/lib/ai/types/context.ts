import { z } from 'zod';
import type { GlossaryTerm } from './glossary';

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

// Conversational context handed to the oracle, the generator and tools
export interface ConversationState {
  sessionId: string;
  customerId: string;
  tags: string[];
  messages: ConversationMessage[];
  variables: Record<string, unknown>;
  facts: Record<string, string>;
  glossary: GlossaryTerm[];
  toolResults: Array<{
    toolName: string;
    data: unknown;
  }>;
  journey?: {
    id: string;
    title: string;
    stateId: string;
  };
}

// Context variable definition
export const ContextVariableSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  scope: z.enum(['customer', 'tag']).default('customer'),
  freshnessMs: z.number().int().positive().optional(),
  refresher: z.string().min(1).optional().describe('Tool that produces a fresh value')
});

export type ContextVariableInput = z.input<typeof ContextVariableSchema>;
export type ContextVariable = z.infer<typeof ContextVariableSchema>;

export interface StoredVariable {
  value: unknown;
  refreshedAt: string;
}

// owner is `customer:<id>` or `tag:<tag>`
export interface VariableKey {
  name: string;
  owner: string;
}

export interface VariableWrite extends VariableKey, StoredVariable {}

export const customerOwner = (customerId: string) => `customer:${customerId}`;
export const tagOwner = (tag: string) => `tag:${tag}`;

export function getLastUserMessage(state: Pick<ConversationState, 'messages'>): string {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    if (state.messages[i].role === 'user') return state.messages[i].content;
  }
  return '';
}
