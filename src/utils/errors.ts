/**
 * Error kinds raised by the toolchain.
 *
 * Rule failures and test-case mismatches are never thrown; they are recorded
 * as verdicts and results. Only malformed input reaches these classes.
 */

/**
 * Base class for toolchain errors
 */
export class ToolchainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolchainError';
  }
}

/**
 * Tool source could not be turned into a ToolDefinition.
 * Fatal to the unit it names, not to the rest of the catalog.
 */
export class ExtractionError extends ToolchainError {
  readonly unitId: string;
  readonly detail: string;

  constructor(unitId: string, detail: string) {
    super(`${unitId}: ${detail}`);
    this.name = 'ExtractionError';
    this.unitId = unitId;
    this.detail = detail;
  }
}

/**
 * A ToolSpec failed validation. Raised before any source is emitted.
 */
export class SpecError extends ToolchainError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid tool spec:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'SpecError';
    this.issues = issues;
  }
}

/**
 * A catalog module could not be read or evaluated
 */
export class CatalogLoadError extends ToolchainError {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Failed to load catalog ${filePath}: ${detail}`);
    this.name = 'CatalogLoadError';
    this.filePath = filePath;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
