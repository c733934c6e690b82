import { describe, it, expect, vi } from 'vitest';
import { loadToolSource } from '../../src/catalog/loader.js';
import { EXAMPLE_SPECS } from '../../src/generator/examples.js';
import { generateTool } from '../../src/generator/template.js';
import { runBattery } from '../../src/harness/index.js';
import type { TestCase } from '../../src/harness/types.js';
import { validateTool } from '../../src/rules/engine.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const TEMPO_SPEC = {
  name: 'set_tempo',
  description: 'Set the session tempo',
  delegationTarget: 'transport',
  parameters: [{ name: 'bpm', type: 'number', description: '60-200' }],
};

function tempoCase(id: string, bpm: number, expected: Pick<TestCase, 'expectedOutcomeKind' | 'expectedText' | 'expectNoInvocations'>): TestCase {
  return {
    id,
    description: `Set tempo to ${String(bpm)}`,
    registryConfig: { available: true, defaultBehavior: { kind: 'return', value: 'Tempo set' } },
    invocationArgs: { bpm },
    ...expected,
  };
}

describe('generated tools under the harness', () => {
  it('should run a generated tempo tool end to end', async () => {
    const tool = await loadToolSource(generateTool(TEMPO_SPEC), 'set_tempo');
    expect(validateTool(tool.definition).overallPassed).toBe(true);

    const report = await runBattery(tool, {
      timeoutMs: 1000,
      cases: [
        tempoCase('valid', 132, { expectedOutcomeKind: 'success', expectedText: 'Tempo set' }),
        tempoCase('out-of-range', 999, { expectedOutcomeKind: 'error', expectNoInvocations: true }),
      ],
    });

    const [registration, valid, outOfRange] = report.results;
    expect(registration?.status).toBe('passed');
    expect(valid?.output).toBe('Tempo set');
    expect(valid?.invocations).toEqual([{ target: 'transport', method: 'set_tempo', args: [132] }]);
    expect(outOfRange?.output).toBe('Error: bpm must be between 60 and 200');
    expect(outOfRange?.invocations).toEqual([]);
    expect(report.overallPassed).toBe(true);
  });

  it.each(Object.entries(EXAMPLE_SPECS))('should pass the standard battery for %s', async (_key, spec) => {
    const tool = await loadToolSource(generateTool(spec), spec.name);
    const report = await runBattery(tool, { timeoutMs: 1000 });

    expect(report.results.filter((result) => result.status === 'failed')).toEqual([]);
    expect(report.results[1]?.invocations).toEqual([]);
  });
});
