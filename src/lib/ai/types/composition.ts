import { z } from 'zod';
import { ScopeSchema, type CompositionMode, type Criticality } from './guideline';
import type { ToolStatus } from './tool';

export const CannedResponseSchema = z.object({
  id: z.string().min(1),
  template: z.string().min(1).describe('Text with {{field}} placeholders'),
  signals: z.array(z.string().min(1)).min(1),
  scope: ScopeSchema.default({ kind: 'global' })
});

export type CannedResponseInput = z.input<typeof CannedResponseSchema>;
export type CannedResponse = z.infer<typeof CannedResponseSchema>;

export const COMPOSITION_STATUSES = ['composed', 'canned', 'no_approved_response', 'deflected'] as const;
export type CompositionStatus = (typeof COMPOSITION_STATUSES)[number];

export type Diagnostic =
  | { kind: 'ambiguous_guideline_conflict'; guidelineIds: [string, string]; winner: string }
  | { kind: 'unresolved_transition'; journeyId: string; stateId: string }
  | { kind: 'missing_parameter'; toolName: string; parameters: string[] }
  | { kind: 'refresh_failed'; variable: string; reason: string }
  | { kind: 'compliance_violation'; guidelineId: string; detail: string };

export interface CompositionTrace {
  mode: CompositionMode;
  guidelines: Array<{
    id: string;
    criticality: Criticality;
    applied: boolean;
    overriddenBy?: string;
  }>;
  tools: Array<{ name: string; status: ToolStatus }>;
  journeyState?: string;
  cannedResponseId?: string;
  attempts: number;
  violations: Array<{ guidelineId: string; detail: string }>;
  diagnostics: Diagnostic[];
}

export interface CompositionResult {
  text: string;
  status: CompositionStatus;
  trace: CompositionTrace;
}
