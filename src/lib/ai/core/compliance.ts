import logger from 'jet-logger';
import type { ConversationState } from '../types/context';
import type { RegisteredGuideline } from '../types/guideline';

export interface ComplianceViolation {
  guidelineId: string;
  detail: string;
}

export interface ComplianceReport {
  compliant: boolean;
  violations: ComplianceViolation[];
}

// Post-hoc check of a draft against HIGH-criticality guidelines
export interface ComplianceChecker {
  check(
    draft: string,
    guidelines: readonly RegisteredGuideline[],
    state: ConversationState,
    signal?: AbortSignal
  ): Promise<ComplianceReport>;
}

export function report(violations: ComplianceViolation[]): ComplianceReport {
  return { compliant: violations.length === 0, violations };
}

/**
 * Deterministic check: a draft violates a guideline when it matches one of
 * the guideline's restriction patterns.
 */
export class RuleComplianceChecker implements ComplianceChecker {
  async check(draft: string, guidelines: readonly RegisteredGuideline[]): Promise<ComplianceReport> {
    const violations: ComplianceViolation[] = [];
    guidelines.forEach(guideline => {
      (guideline.restrictions ?? []).forEach(pattern => {
        if (new RegExp(pattern, 'i').test(draft)) {
          violations.push({ guidelineId: guideline.id, detail: `Reply matches restricted pattern /${pattern}/` });
        }
      });
    });
    return report(violations);
  }
}

// Runs every checker; the draft is compliant only if all agree
export class CompositeComplianceChecker implements ComplianceChecker {
  constructor(private readonly checkers: ComplianceChecker[]) {}

  async check(
    draft: string,
    guidelines: readonly RegisteredGuideline[],
    state: ConversationState,
    signal?: AbortSignal
  ): Promise<ComplianceReport> {
    const reports = await Promise.all(this.checkers.map(c => c.check(draft, guidelines, state, signal)));
    const violations = reports.flatMap(r => r.violations);
    if (violations.length > 0) {
      logger.warn(`[Compliance] ${violations.length} violation(s): ${violations.map(v => v.guidelineId).join(', ')}`);
    }
    return report(violations);
  }
}
