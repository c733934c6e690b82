import ts from 'typescript';
import { ERROR_PREFIX } from '../runtime/index.js';

/**
 * Shape contract shared by the extractor, the rules and the generator.
 * Anything one side emits or looks for is defined here once.
 */

export { ERROR_PREFIX };

/**
 * Module specifier catalogs import the runtime from
 */
export const RUNTIME_MODULE = 'tool-conformance/runtime';

/**
 * Registration marker call
 */
export const MARKER_FUNCTION = 'defineTool';

/**
 * Declared type of the delegation-layer parameter
 */
export const CONTEXT_TYPE = 'ToolContext';

/**
 * Name the generator gives the context parameter
 */
export const CONTEXT_PARAMETER = 'ctx';

/**
 * Context properties holding the delegation layer
 */
export const HANDLERS_PROPERTY = 'handlers';
export const BACKEND_PROPERTY = 'backend';

/**
 * Returned when named handlers are not available
 */
export const NOT_INITIALIZED_MESSAGE = `${ERROR_PREFIX}Server not initialized`;

/**
 * Returned when the direct backend is not available
 */
export const INITIALIZATION_FAILED_MESSAGE = `${ERROR_PREFIX}Server initialization failed`;

/**
 * Tool name format: lowercase, starts with letter, 3-50 chars, only letters/numbers/underscores
 */
export const TOOL_NAME_REGEX = /^[a-z][a-z0-9_]{2,49}$/;

/**
 * Plain identifier (parameters, handler targets, methods)
 */
export const IDENTIFIER_REGEX = /^[A-Za-z_$][\w$]*$/;

/**
 * Names the generated body declares itself or reads from the enclosing scope
 */
export const RESERVED_PARAMETER_NAMES: ReadonlySet<string> = new Set([
  CONTEXT_PARAMETER,
  'result',
  'error',
  'resultText',
  'undefined',
  'Error',
  'String',
  'Number',
]);

/**
 * Words that cannot be bound by a declaration in module (strict) code
 */
export function isReservedWord(name: string): boolean {
  if (name === 'await' || name === 'arguments' || name === 'eval') {
    return true;
  }

  const token = ts.identifierToKeywordKind(ts.factory.createIdentifier(name));
  if (token === undefined) {
    return false;
  }

  return (
    (token >= ts.SyntaxKind.FirstReservedWord && token <= ts.SyntaxKind.LastReservedWord) ||
    (token >= ts.SyntaxKind.FirstFutureReservedWord && token <= ts.SyntaxKind.LastFutureReservedWord)
  );
}
