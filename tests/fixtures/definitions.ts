import { createToolDefinition, type ToolDefinition } from '../../src/model/types.js';

/**
 * A definition that passes every built-in rule. Tests flip one field at a
 * time to isolate a rule.
 */
export function conformingDefinition(overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return createToolDefinition({
    name: 'set_tempo',
    sourceUnit: 'transport.tools.ts',
    line: 3,
    isAsyncCallable: true,
    hasRegistrationMarker: true,
    markerIssue: null,
    contextParameter: 'ctx',
    parameters: [{ name: 'bpm', declaredType: 'number', isOptional: false }],
    returnsPlainText: true,
    docstring: {
      summary: 'Set the session tempo',
      argSections: { bpm: 'Tempo in beats per minute (60-200)' },
    },
    bodyShape: {
      hasGuardedInitializationCheck: true,
      hasSurroundingFailureBoundary: true,
      errorMessagePrefixConsistent: true,
    },
    parameterValidationGuards: ['bpm'],
    delegation: { kind: 'delegated', target: 'transport', method: 'set_tempo' },
    ...overrides,
  });
}

/**
 * Hand-written conforming tool
 */
export const SET_TEMPO_SOURCE = `import { defineTool, resultText, type ToolContext } from 'tool-conformance/runtime';

/**
 * Set the session tempo
 *
 * @param bpm - Tempo in beats per minute (60-200)
 */
export const set_tempo = defineTool('set_tempo', async (ctx: ToolContext, bpm: number): Promise<string> => {
  if (bpm < 60 || bpm > 200) {
    return 'Error: bpm must be between 60 and 200';
  }

  try {
    if (!ctx.handlers) {
      return 'Error: Server not initialized';
    }
    const result = await ctx.handlers.transport.set_tempo(bpm);
    return resultText(result, 'Tempo updated');
  } catch (error) {
    return \`Error: \${error instanceof Error ? error.message : String(error)}\`;
  }
});
`;

/**
 * The same tool without its registration marker
 */
export const SET_TEMPO_WITHOUT_MARKER = SET_TEMPO_SOURCE.replace(
  "defineTool('set_tempo', async (ctx: ToolContext, bpm: number): Promise<string> => {",
  'async (ctx: ToolContext, bpm: number): Promise<string> => {'
).replace(/\n\}\);\n$/, '\n};\n');
