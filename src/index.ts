/**
 * tool-conformance
 *
 * Structural validation, generation and mock testing for catalogs of
 * delegating tools.
 */

export * from './runtime/index.js';

export type { Delegation, DelegationKind, Docstring, BodyShape, ParameterInfo, ToolDefinition } from './model/types.js';
export {
  describeDomain,
  inferDomain,
  isInDomain,
  kindOfDeclaredType,
  parameterDomain,
  restrictedParameters,
  sampleInDomain,
  sampleOutsideDomain,
} from './model/domain.js';
export type { DeclaredKind, ParameterDomain, ParameterKind } from './model/domain.js';

export { extractTool, extractTools, parseDocComment } from './extractor/index.js';
export type { ExtractionOutcome } from './extractor/index.js';

export { BUILTIN_RULES } from './rules/builtin.js';
export { createRuleEngine, validateCatalog, validateTool } from './rules/engine.js';
export type { RuleEngine } from './rules/engine.js';
export type { CatalogReport, Rule, RuleOutcome, ValidationReport, Verdict } from './rules/types.js';

export { generateCatalog, generateTool, renderTool } from './generator/template.js';
export { loadToolSpecFile, parseToolSpec, ToolSpecSchema } from './generator/schema.js';
export type { ParameterSpec, ToolSpec, ToolSpecInput } from './generator/schema.js';
export { COMMON_PARAMETERS, EXAMPLE_SPECS } from './generator/examples.js';

export * from './harness/index.js';

export { loadCatalog, loadToolSource } from './catalog/loader.js';
export { invokeTool } from './catalog/invoke.js';
export type { LiveTool, LoadedCatalog } from './catalog/types.js';

export {
  exitCodeFor,
  formatCatalogReport,
  formatTestReport,
  formatValidationReport,
  statusGlyph,
} from './formatters/report.js';

export { runSuite } from './suite/index.js';
export type { SuiteOptions, SuiteResult } from './suite/index.js';

export { createToolServer, inputSchemaOf, serveCatalog } from './server/tool-server.js';
export type { ServerInfo } from './server/tool-server.js';

export { getConfig, loadConfig } from './config/index.js';
export type { Config } from './config/index.js';

export { CatalogLoadError, ExtractionError, SpecError, ToolchainError } from './utils/errors.js';
export { TimeoutError } from './utils/timeout.js';
