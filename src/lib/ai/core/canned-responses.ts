import { ConfigurationError } from './errors';
import { isInScope, type ScopePosition } from './guideline-store';
import { AI_CONFIG } from '../config';
import { CannedResponseSchema, type CannedResponse, type CannedResponseInput } from '../types/composition';

const FIELD_PATTERN = /\{\{\s*([\w.-]+)\s*\}\}/g;

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'be', 'can', 'do', 'for', 'i', 'in', 'is', 'it', 'its',
  'me', 'my', 'of', 'on', 'or', 'so', 'that', 'the', 'this', 'to', 'was', 'we', 'with', 'you', 'your'
]);

export function templateFields(template: string): string[] {
  return Array.from(template.matchAll(FIELD_PATTERN), m => m[1]);
}

/**
 * Fills `{{field}}` placeholders. Returns null when any field has no value:
 * an unsatisfied template is never emitted.
 */
export function renderTemplate(template: string, values: Record<string, string>): string | null {
  const missing = templateFields(template).filter(field => !values[field]);
  if (missing.length > 0) return null;
  return template.replace(FIELD_PATTERN, (_, field: string) => values[field]);
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0 && !STOPWORDS.has(token));
}

export interface SignalMatcher {
  // 0..1, how strongly `text` carries the signal phrase
  score(signal: string, text: string): number;
}

// Share of the signal's tokens that appear in the text
export class LexicalSignalMatcher implements SignalMatcher {
  score(signal: string, text: string): number {
    const signalTokens = new Set(tokenize(signal));
    if (signalTokens.size === 0) return 0;
    const textTokens = new Set(tokenize(text));
    let hits = 0;
    signalTokens.forEach(token => {
      if (textTokens.has(token)) hits++;
    });
    return hits / signalTokens.size;
  }
}

export interface CannedCandidate {
  response: CannedResponse;
  text: string;
  score: number;
}

export class CannedResponseStore {
  private responses: CannedResponse[] = [];

  constructor(responses: CannedResponseInput[] = []) {
    responses.forEach(r => this.add(r));
  }

  add(input: CannedResponseInput): CannedResponse {
    const response = Object.freeze(CannedResponseSchema.parse(input));
    if (this.responses.some(r => r.id === response.id)) {
      throw new ConfigurationError(`Canned response "${response.id}" already exists`);
    }
    this.responses.push(response);
    return response;
  }

  list(): CannedResponse[] {
    return [...this.responses];
  }

  forPosition(position: ScopePosition): CannedResponse[] {
    return this.responses.filter(r => isInScope(r.scope, position));
  }
}

/**
 * Satisfied templates ranked by their best signal score against `text`
 * (declaration order on ties). With a threshold, weaker candidates are dropped.
 */
export function rankCandidates(
  responses: readonly CannedResponse[],
  values: Record<string, string>,
  text: string,
  matcher: SignalMatcher,
  threshold: number = AI_CONFIG.SIGNAL_THRESHOLD
): CannedCandidate[] {
  const candidates: CannedCandidate[] = [];
  responses.forEach(response => {
    const rendered = renderTemplate(response.template, values);
    if (rendered === null) return;
    const score = Math.max(...response.signals.map(signal => matcher.score(signal, text)));
    if (score >= threshold) candidates.push({ response, text: rendered, score });
  });
  // Array.prototype.sort is stable, so declaration order survives ties
  return candidates.sort((a, b) => b.score - a.score);
}
