import { extractTools } from '../extractor/index.js';
import type { ToolDefinition } from '../model/types.js';
import { errorMessage } from '../utils/errors.js';
import { BUILTIN_RULES } from './builtin.js';
import type { CatalogReport, Rule, ValidationReport, Verdict } from './types.js';

export interface RuleEngine {
  /** Registered rules, in evaluation order */
  readonly rules: readonly Rule[];
  /** Run every rule against one tool */
  validate(definition: ToolDefinition): ValidationReport;
  /** Extract and validate every tool in a source unit */
  validateSource(source: string, sourceUnit: string): CatalogReport;
}

function runRule(rule: Rule, definition: ToolDefinition): Verdict {
  try {
    const outcome = rule.check(definition);
    return { ruleId: rule.id, passed: outcome.passed, message: outcome.message };
  } catch (error) {
    return { ruleId: rule.id, passed: false, message: `Rule failed to run: ${errorMessage(error)}` };
  }
}

function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Create a rule engine. Rules register in a fixed order at construction;
 * extending the set means passing a longer list, never editing a rule.
 */
export function createRuleEngine(rules: readonly Rule[] = BUILTIN_RULES): RuleEngine {
  const ids = new Set<string>();
  for (const rule of rules) {
    if (ids.has(rule.id)) {
      throw new Error(`Duplicate rule id "${rule.id}"`);
    }
    ids.add(rule.id);
  }
  const registered = Object.freeze([...rules]);

  const validate = (definition: ToolDefinition): ValidationReport => {
    // Exhaustive: every rule runs even after a failure
    const verdicts = registered.map((rule) => runRule(rule, definition));
    return {
      toolName: definition.name,
      sourceUnit: definition.sourceUnit,
      verdicts,
      overallPassed: verdicts.every((verdict) => verdict.passed),
    };
  };

  const validateSource = (source: string, sourceUnit: string): CatalogReport => {
    const reports: ValidationReport[] = [];
    const extractionErrors: { unitId: string; message: string }[] = [];

    for (const outcome of extractTools(source, sourceUnit)) {
      if (outcome.ok) {
        reports.push(validate(outcome.definition));
      } else {
        extractionErrors.push({ unitId: outcome.error.unitId, message: outcome.error.detail });
      }
    }

    const duplicateNames = findDuplicates(reports.map((report) => report.toolName));

    return {
      sourceUnit,
      reports,
      extractionErrors,
      duplicateNames,
      overallPassed:
        extractionErrors.length === 0 &&
        duplicateNames.length === 0 &&
        reports.every((report) => report.overallPassed),
    };
  };

  return { rules: registered, validate, validateSource };
}

const defaultEngine = createRuleEngine();

/**
 * Validate one tool with the built-in rules
 */
export function validateTool(definition: ToolDefinition): ValidationReport {
  return defaultEngine.validate(definition);
}

/**
 * Validate every tool in a source unit with the built-in rules
 */
export function validateCatalog(source: string, sourceUnit: string): CatalogReport {
  return defaultEngine.validateSource(source, sourceUnit);
}
