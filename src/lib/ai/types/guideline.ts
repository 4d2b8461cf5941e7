import { z } from 'zod';

export const CRITICALITY_LEVELS = ['low', 'medium', 'high'] as const;

export const CriticalitySchema = z.enum(CRITICALITY_LEVELS);
export type Criticality = z.infer<typeof CriticalitySchema>;

export const CompositionModeSchema = z.enum(['fluid', 'composited', 'strict']);
export type CompositionMode = z.infer<typeof CompositionModeSchema>;

// Where a guideline (or canned response) is eligible
export const ScopeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('global') }),
  z.object({ kind: z.literal('journey'), journeyId: z.string().min(1) }),
  z.object({
    kind: z.literal('state'),
    journeyId: z.string().min(1),
    stateId: z.string().min(1)
  })
]);
export type Scope = z.infer<typeof ScopeSchema>;

// Schema for a guideline
export const GuidelineSchema = z.object({
  id: z.string().min(1),
  condition: z.string().min(1).describe('WHEN: natural-language predicate over the conversation'),
  action: z.string().min(1).optional().describe('WHAT: instruction for the agent; absent for observations'),
  criticality: CriticalitySchema.default('medium'),
  tools: z.array(z.string()).optional(),
  compositionMode: CompositionModeSchema.optional(),
  scope: ScopeSchema.default({ kind: 'global' }),
  enabled: z.boolean().default(true),
  conflictsWith: z.array(z.string()).optional().describe('Guideline ids whose actions contradict this one'),
  restrictions: z.array(z.string()).optional().describe('Regular expressions a compliant reply must not match'),
  journeyControl: z.literal('abandon').optional(),
  glossaryTerms: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional()
});

export type GuidelineInput = z.input<typeof GuidelineSchema>;
export type Guideline = z.infer<typeof GuidelineSchema>;

// Guideline as held by the store; `order` is its declaration sequence
export type RegisteredGuideline = Readonly<Guideline> & { readonly order: number };

// Match result with confidence score
export interface GuidelineMatch {
  guideline: RegisteredGuideline;
  score: number;
  reason: string;
}

export function criticalityRank(criticality: Criticality): number {
  return CRITICALITY_LEVELS.indexOf(criticality);
}
