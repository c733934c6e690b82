import type { ToolDefinition } from '../model/types.js';

/**
 * A tool as loaded from a catalog module: the exported value paired with
 * the definition extracted from its source
 */
export interface LiveTool {
  readonly name: string;
  /** Whatever the module exports under the tool's name */
  readonly exported: unknown;
  readonly definition: ToolDefinition;
}

export interface LoadedCatalog {
  readonly filePath: string;
  readonly tools: readonly LiveTool[];
  readonly extractionErrors: readonly { unitId: string; message: string }[];
  /** Extracted tool names the evaluated module does not export */
  readonly missing: readonly string[];
}
