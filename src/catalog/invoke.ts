import { isRegisteredTool, type ToolContext } from '../runtime/index.js';
import type { LiveTool } from './types.js';

/**
 * The function behind an export: the registered handler, or the export
 * itself when it is a bare function
 */
export function callableOf(exported: unknown): ((...args: never[]) => unknown) | null {
  if (isRegisteredTool(exported)) {
    return exported.handler;
  }
  return typeof exported === 'function' ? (...args: never[]) => Reflect.apply(exported, undefined, args) : null;
}

/**
 * Positional argument list for a call. Parameters missing from `args` are
 * passed as undefined so their defaults apply.
 */
export function positionalArgs(tool: LiveTool, context: ToolContext, args: Readonly<Record<string, unknown>>): unknown[] {
  const list: unknown[] = tool.definition.contextParameter !== null ? [context] : [];
  for (const parameter of tool.definition.parameters) {
    list.push(Object.hasOwn(args, parameter.name) ? args[parameter.name] : undefined);
  }
  return list;
}

/**
 * Call a live tool with named arguments
 *
 * @throws TypeError when the export is not callable
 */
export async function invokeTool(
  tool: LiveTool,
  context: ToolContext,
  args: Readonly<Record<string, unknown>> = {}
): Promise<unknown> {
  const callable = callableOf(tool.exported);
  if (!callable) {
    throw new TypeError(`Export "${tool.name}" is not callable`);
  }
  return await Reflect.apply(callable, undefined, positionalArgs(tool, context, args));
}
