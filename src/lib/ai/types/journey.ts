import { z } from 'zod';
import { CompositionModeSchema } from './guideline';

const stateBase = {
  id: z.string().min(1),
  compositionMode: CompositionModeSchema.optional()
};

export const JourneyStateSchema = z.discriminatedUnion('kind', [
  z.object({
    ...stateBase,
    kind: z.literal('chat'),
    instruction: z.string().min(1),
    // Facts this state only exists to ask for; known facts make it skippable
    collects: z.array(z.string().min(1)).optional()
  }),
  z.object({
    ...stateBase,
    kind: z.literal('tool'),
    tool: z.string().min(1)
  }),
  z.object({
    ...stateBase,
    kind: z.literal('fork')
  })
]);

export const TransitionSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  condition: z.string().min(1).optional()
});

export const JourneyFieldSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  pattern: z.string().optional().describe('Regular expression; first capture group (or whole match) is the value')
});

export const JourneySchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  conditions: z.array(z.string().min(1)).min(1),
  initialStateId: z.string().min(1),
  states: z.array(JourneyStateSchema).min(1),
  transitions: z.array(TransitionSchema).default([]),
  fields: z.array(JourneyFieldSchema).default([]),
  compositionMode: CompositionModeSchema.optional()
});

export type JourneyInput = z.input<typeof JourneySchema>;
export type Journey = z.infer<typeof JourneySchema>;
export type JourneyState = z.infer<typeof JourneyStateSchema>;
export type ChatState = Extract<JourneyState, { kind: 'chat' }>;
export type ToolState = Extract<JourneyState, { kind: 'tool' }>;
export type Transition = z.infer<typeof TransitionSchema>;
export type JourneyField = z.infer<typeof JourneyFieldSchema>;

export type JourneyStatus = 'active' | 'completed' | 'abandoned';

// Per-session position inside a journey; references the journey by id
export interface JourneyInstance {
  journeyId: string;
  stateId: string;
  // pending: entered but not yet presented (chat) or executed (tool)
  phase: 'pending' | 'presented';
  status: JourneyStatus;
  facts: Record<string, string>;
  path: string[];
  activatedAt: string;
}

export type JourneyOutcome =
  | { kind: 'chat'; state: ChatState; repeated: boolean }
  | { kind: 'tool'; state: ToolState }
  | { kind: 'unresolved'; state: JourneyState }
  | { kind: 'completed'; state: JourneyState };

export interface JourneyAdvance {
  instance: JourneyInstance;
  outcome: JourneyOutcome;
  taken: Transition[];
  skipped: string[];
}
