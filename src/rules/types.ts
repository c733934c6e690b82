import type { ToolDefinition } from '../model/types.js';

/**
 * Outcome of one rule against one tool
 */
export interface RuleOutcome {
  passed: boolean;
  message: string;
}

/**
 * A pure predicate over a ToolDefinition. Rules never look at each other's
 * verdicts.
 */
export interface Rule {
  readonly id: string;
  readonly description: string;
  check(definition: ToolDefinition): RuleOutcome;
}

export interface Verdict {
  readonly ruleId: string;
  readonly passed: boolean;
  readonly message: string;
}

export interface ValidationReport {
  readonly toolName: string;
  readonly sourceUnit: string;
  readonly verdicts: readonly Verdict[];
  /** True iff every verdict passed */
  readonly overallPassed: boolean;
}

export interface CatalogReport {
  readonly sourceUnit: string;
  readonly reports: readonly ValidationReport[];
  readonly extractionErrors: readonly { unitId: string; message: string }[];
  /** Tool names declared more than once */
  readonly duplicateNames: readonly string[];
  readonly overallPassed: boolean;
}
