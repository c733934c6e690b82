import { describe, it, expect } from 'vitest';
import { BUILTIN_RULES } from '../../src/rules/builtin.js';
import { validateTool } from '../../src/rules/engine.js';
import type { ToolDefinition } from '../../src/model/types.js';
import { conformingDefinition } from '../fixtures/definitions.js';

function failingRules(definition: ToolDefinition): string[] {
  return validateTool(definition)
    .verdicts.filter((verdict) => !verdict.passed)
    .map((verdict) => verdict.ruleId);
}

function messageOf(definition: ToolDefinition, ruleId: string): string | undefined {
  return validateTool(definition).verdicts.find((verdict) => verdict.ruleId === ruleId)?.message;
}

describe('built-in rules', () => {
  it('should register the rules in report order', () => {
    expect(BUILTIN_RULES.map((rule) => rule.id)).toEqual([
      'registration-marker',
      'async-callable',
      'text-return',
      'failure-boundary',
      'initialization-guard',
      'error-prefix',
      'docstring',
      'parameter-guards',
      'parameter-types',
      'tool-name',
    ]);
  });

  it('should pass a conforming definition', () => {
    const report = validateTool(conformingDefinition());
    expect(report.overallPassed).toBe(true);
    expect(report.verdicts).toHaveLength(BUILTIN_RULES.length);
  });

  // Each violation flips exactly one rule
  it.each<[string, Partial<ToolDefinition>]>([
    ['registration-marker', { hasRegistrationMarker: false }],
    ['async-callable', { isAsyncCallable: false }],
    ['text-return', { returnsPlainText: false }],
    [
      'failure-boundary',
      {
        bodyShape: {
          hasGuardedInitializationCheck: true,
          hasSurroundingFailureBoundary: false,
          errorMessagePrefixConsistent: true,
        },
      },
    ],
    [
      'initialization-guard',
      {
        bodyShape: {
          hasGuardedInitializationCheck: false,
          hasSurroundingFailureBoundary: true,
          errorMessagePrefixConsistent: true,
        },
      },
    ],
    [
      'error-prefix',
      {
        bodyShape: {
          hasGuardedInitializationCheck: true,
          hasSurroundingFailureBoundary: true,
          errorMessagePrefixConsistent: false,
        },
      },
    ],
    ['docstring', { docstring: { summary: '', argSections: { bpm: 'Tempo in beats per minute (60-200)' } } }],
    ['parameter-guards', { parameterValidationGuards: [] }],
    ['parameter-types', { parameters: [{ name: 'bpm', declaredType: null, isOptional: false }] }],
    ['tool-name', { name: 'SetTempo' }],
  ])('should fail only %s for its violation', (ruleId, overrides) => {
    expect(failingRules(conformingDefinition(overrides))).toEqual([ruleId]);
  });

  describe('messages', () => {
    it('should use the marker issue when there is one', () => {
      const definition = conformingDefinition({
        hasRegistrationMarker: false,
        markerIssue: "defineTool('tempo') does not match the exported name 'set_tempo'",
      });
      expect(messageOf(definition, 'registration-marker')).toBe(
        "defineTool('tempo') does not match the exported name 'set_tempo'"
      );
    });

    it('should name the missing marker', () => {
      expect(messageOf(conformingDefinition({ hasRegistrationMarker: false }), 'registration-marker')).toBe(
        "Missing registration marker defineTool('set_tempo', ...)"
      );
    });

    it('should list every docstring problem', () => {
      const definition = conformingDefinition({ docstring: { summary: '', argSections: {} } });
      expect(messageOf(definition, 'docstring')).toBe(
        "Doc comment incomplete (missing summary line; undocumented parameters: bpm); add '@param name - description' entries"
      );
    });

    it('should name unguarded parameters with their domain', () => {
      expect(messageOf(conformingDefinition({ parameterValidationGuards: [] }), 'parameter-guards')).toBe(
        'Add validation guards before delegation for: bpm (between 60 and 200)'
      );
    });

    it('should point at the backend for direct tools', () => {
      const definition = conformingDefinition({
        delegation: { kind: 'direct', method: 'record' },
        bodyShape: {
          hasGuardedInitializationCheck: false,
          hasSurroundingFailureBoundary: true,
          errorMessagePrefixConsistent: true,
        },
      });
      expect(messageOf(definition, 'initialization-guard')).toBe(
        "Check 'if (!ctx.backend)' and return an error before delegating"
      );
    });
  });

  it('should not demand guards for unrestricted parameters', () => {
    const definition = conformingDefinition({
      docstring: { summary: 'Set the session tempo', argSections: { bpm: 'Tempo in beats per minute' } },
      parameterValidationGuards: [],
    });
    expect(failingRules(definition)).toEqual([]);
  });

  it('should accept tool names at the length limits', () => {
    expect(failingRules(conformingDefinition({ name: 'abc' }))).toEqual([]);
    expect(failingRules(conformingDefinition({ name: `a${'b'.repeat(49)}` }))).toEqual([]);
    expect(failingRules(conformingDefinition({ name: `a${'b'.repeat(50)}` }))).toEqual(['tool-name']);
    expect(failingRules(conformingDefinition({ name: 'ab' }))).toEqual(['tool-name']);
  });
});
