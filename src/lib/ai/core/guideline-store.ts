import logger from 'jet-logger';
import { ConfigurationError } from './errors';
import {
  GuidelineSchema,
  type GuidelineInput,
  type RegisteredGuideline,
  type Scope
} from '../types/guideline';

export interface ScopePosition {
  journeyId?: string;
  stateId?: string;
}

// Eligible in the current position: global, the active journey, or its current state
export function isInScope(scope: Scope, position: ScopePosition): boolean {
  switch (scope.kind) {
    case 'global':
      return true;
    case 'journey':
      return scope.journeyId === position.journeyId;
    case 'state':
      return scope.journeyId === position.journeyId && scope.stateId === position.stateId;
  }
}

/**
 * Holds condition/action rules. Entries are frozen; deactivation replaces the
 * entry, so snapshots taken by an in-flight turn never change.
 */
export class GuidelineStore {
  private guidelines = new Map<string, RegisteredGuideline>();
  private sequence = 0;

  constructor(guidelines: GuidelineInput[] = []) {
    guidelines.forEach(g => this.addGuideline(g));
  }

  addGuideline(input: GuidelineInput): RegisteredGuideline {
    const parsed = GuidelineSchema.parse(input);
    if (this.guidelines.has(parsed.id)) {
      throw new ConfigurationError(`Guideline "${parsed.id}" already exists`);
    }
    const registered: RegisteredGuideline = Object.freeze({ ...parsed, order: this.sequence++ });
    this.guidelines.set(parsed.id, registered);
    return registered;
  }

  getGuideline(id: string): RegisteredGuideline | undefined {
    return this.guidelines.get(id);
  }

  setEnabled(id: string, enabled: boolean): RegisteredGuideline {
    const current = this.guidelines.get(id);
    if (!current) {
      throw new ConfigurationError(`Guideline "${id}" does not exist`);
    }
    const next: RegisteredGuideline = Object.freeze({ ...current, enabled });
    this.guidelines.set(id, next);
    logger.info(`[GuidelineStore] Guideline ${id} ${enabled ? 'activated' : 'deactivated'}`);
    return next;
  }

  deactivate(id: string): RegisteredGuideline {
    return this.setEnabled(id, false);
  }

  activate(id: string): RegisteredGuideline {
    return this.setEnabled(id, true);
  }

  // All guidelines in declaration order, including disabled ones
  list(): RegisteredGuideline[] {
    return Array.from(this.guidelines.values()).sort((a, b) => a.order - b.order);
  }

  snapshot(): readonly RegisteredGuideline[] {
    return Object.freeze(this.list());
  }

  // Cross-reference check against tools and other guidelines
  validate(toolNames: ReadonlySet<string>, journeyIds: ReadonlySet<string>): void {
    for (const guideline of this.guidelines.values()) {
      (guideline.tools ?? []).forEach(tool => {
        if (!toolNames.has(tool)) {
          throw new ConfigurationError(`Guideline "${guideline.id}" references unknown tool "${tool}"`);
        }
      });
      (guideline.conflictsWith ?? []).forEach(other => {
        if (!this.guidelines.has(other)) {
          throw new ConfigurationError(`Guideline "${guideline.id}" conflicts with unknown guideline "${other}"`);
        }
      });
      (guideline.restrictions ?? []).forEach(pattern => {
        try {
          new RegExp(pattern, 'i');
        } catch {
          throw new ConfigurationError(`Guideline "${guideline.id}" has an invalid restriction: ${pattern}`);
        }
      });
      if (guideline.scope.kind !== 'global' && !journeyIds.has(guideline.scope.journeyId)) {
        throw new ConfigurationError(`Guideline "${guideline.id}" is scoped to unknown journey "${guideline.scope.journeyId}"`);
      }
    }
  }
}
