/**
 * Tool runtime
 *
 * The small surface that catalog modules import. `defineTool` is the
 * registration marker the validator looks for, and `ToolContext` is the
 * delegation layer handed to every tool as its first argument.
 *
 * This module must stay free of imports: the catalog loader evaluates it
 * alongside user catalogs.
 */

/**
 * Prefix every failure-path return starts with
 */
export const ERROR_PREFIX = 'Error: ';

/**
 * Brand carried by registered tools. Symbol.for keeps the brand stable when
 * this module is evaluated more than once (e.g. by the catalog loader).
 */
export const TOOL_MARKER: unique symbol = Symbol.for('tool-conformance.tool');

/**
 * A method on a delegation target. Resolves to a textual payload, a structured
 * result whose first element carries a `text` field, or rejects.
 */
export type DelegationMethod = (...args: unknown[]) => Promise<unknown>;

/**
 * Backend object reachable from a tool body
 */
export type DelegationTarget = Record<string, DelegationMethod>;

/**
 * Named handler lookup (transport, track, composition, ...)
 */
export type HandlerRegistry = Record<string, DelegationTarget>;

/**
 * Delegation layer passed explicitly to every tool
 */
export interface ToolContext {
  /** Named handlers, absent until the server is initialized */
  readonly handlers?: HandlerRegistry;
  /** Single direct delegation object, absent when initialization failed */
  readonly backend?: DelegationTarget;
}

/**
 * Any async tool callable. `never[]` accepts every parameter list.
 */
export type ToolHandler = (...args: never[]) => Promise<string>;

/**
 * An externally exposed tool
 */
export interface RegisteredTool<H extends ToolHandler = ToolHandler> {
  readonly [TOOL_MARKER]: true;
  readonly name: string;
  readonly handler: H;
}

/**
 * Mark a callable as an externally exposed tool.
 *
 * The name must match the exported binding: `export const play = defineTool('play', ...)`.
 */
export function defineTool<H extends ToolHandler>(name: string, handler: H): RegisteredTool<H> {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new TypeError('Tool name must be a non-empty string');
  }
  if (typeof handler !== 'function') {
    throw new TypeError(`Tool "${name}" must be registered with a callable`);
  }

  return Object.freeze({
    [TOOL_MARKER]: true as const,
    name,
    handler,
  });
}

/**
 * Check whether a value was produced by `defineTool`
 */
export function isRegisteredTool(value: unknown): value is RegisteredTool {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (Reflect.get(value, TOOL_MARKER) !== true) {
    return false;
  }
  return typeof Reflect.get(value, 'name') === 'string' && typeof Reflect.get(value, 'handler') === 'function';
}

/**
 * Unwrap a delegation result into the text a tool returns.
 *
 * Accepts a plain string, a list whose first entry has a `text` field, or an
 * object with a `message` field. Anything else yields the fallback.
 */
export function resultText(result: unknown, fallback: string): string {
  if (typeof result === 'string') {
    return result;
  }

  if (Array.isArray(result)) {
    const first: unknown = result[0];
    if (typeof first === 'object' && first !== null) {
      const text: unknown = Reflect.get(first, 'text');
      if (typeof text === 'string') {
        return text;
      }
    }
    return fallback;
  }

  if (typeof result === 'object' && result !== null) {
    const message: unknown = Reflect.get(result, 'message');
    if (typeof message === 'string') {
      return message;
    }
  }

  return fallback;
}
