import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, vi } from 'vitest';
import { runSuite } from '../../src/suite/index.js';

vi.mock('../../src/config/index.js', () => ({
  getConfig: () => ({
    harness: { caseTimeoutMs: 1000 },
    suite: {},
    logging: { level: 'info' },
  }),
}));

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const FIXTURES = resolve(dirname(fileURLToPath(import.meta.url)), '../fixtures');

describe('runSuite', () => {
  it('should validate and test a conforming catalog', async () => {
    const result = await runSuite({ catalogPath: join(FIXTURES, 'transport.tools.ts') });

    expect(result.loadError).toBeNull();
    expect(result.validation?.overallPassed).toBe(true);
    expect(result.tests.map((report) => [report.toolName, report.overallPassed])).toEqual([
      ['set_tempo', true],
      ['record', true],
    ]);
    expect(result.passed).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.report.startsWith('Catalog: transport.tools.ts\n\n✅ set_tempo')).toBe(true);
    expect(result.report.endsWith('Functional tests: ✅ 2 passed')).toBe(true);
  });

  it('should only validate in quick mode', async () => {
    const result = await runSuite({ catalogPath: join(FIXTURES, 'transport.tools.ts'), quick: true });

    expect(result.tests).toEqual([]);
    expect(result.exitCode).toBe(0);
    expect(result.report).not.toContain('Functional tests');
  });

  it('should test every tool even when validation fails', async () => {
    const result = await runSuite({ catalogPath: join(FIXTURES, 'mixed.tools.ts') });

    const stop = result.validation?.reports.find((report) => report.toolName === 'stop');
    expect(stop?.verdicts.filter((verdict) => !verdict.passed).map((verdict) => verdict.ruleId)).toEqual([
      'failure-boundary',
    ]);

    const stopTests = result.tests.find((report) => report.toolName === 'stop');
    expect(stopTests?.results.find((test) => test.caseId === 'delegation-failure')).toMatchObject({
      status: 'failed',
      outcomeKind: 'raised',
      output: 'Simulated delegation failure',
    });
    expect(result.exitCode).toBe(1);
    expect(result.passed).toBe(false);
  });

  it('should stop after validation in ci mode when validation fails', async () => {
    const result = await runSuite({ catalogPath: join(FIXTURES, 'mixed.tools.ts'), ci: true });

    expect(result.validation?.overallPassed).toBe(false);
    expect(result.tests).toEqual([]);
    expect(result.exitCode).toBe(1);
  });

  it('should report a missing catalog path', async () => {
    const result = await runSuite();

    expect(result.loadError).toBe('No catalog path given (pass catalogPath or set TOOLCHECK_CATALOG_PATH)');
    expect(result.validation).toBeNull();
    expect(result.exitCode).toBe(1);
  });

  it('should report an unreadable catalog', async () => {
    const result = await runSuite({ catalogPath: join(FIXTURES, 'missing.tools.ts') });

    expect(result.loadError?.startsWith(`Failed to read catalog ${join(FIXTURES, 'missing.tools.ts')}:`)).toBe(true);
    expect(result.exitCode).toBe(1);
  });

  it('should keep the validation report when the module fails to load', async () => {
    const result = await runSuite({ catalogPath: join(FIXTURES, 'broken.tools.ts') });

    expect(result.validation?.overallPassed).toBe(true);
    expect(result.loadError).toContain('Catalog failed to initialize');
    expect(result.passed).toBe(false);
  });
});
