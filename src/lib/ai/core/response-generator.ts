import type { ConversationState } from '../types/context';
import type { CompositionMode, Criticality } from '../types/guideline';
import type { ToolInvocation } from '../types/tool';

export interface DraftGuideline {
  id: string;
  condition: string;
  action?: string;
  criticality: Criticality;
}

// Everything the generator may rely on for one draft
export interface DraftRequest {
  state: ConversationState;
  mode: CompositionMode;
  guidelines: DraftGuideline[];
  journeyInstruction?: string;
  tools: ToolInvocation[];
  // COMPOSITED: the reply must follow this template's structure and tone
  styleAnchor?: string;
  // Set on regeneration after a failed compliance check
  feedback?: {
    previousDraft: string;
    violations: string[];
  };
}

export interface ResponseGenerator {
  generate(request: DraftRequest, signal?: AbortSignal): Promise<string>;
}
