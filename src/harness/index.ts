import { invokeTool } from '../catalog/invoke.js';
import type { LiveTool } from '../catalog/types.js';
import { getConfig } from '../config/index.js';
import { ERROR_PREFIX } from '../model/conventions.js';
import { isRegisteredTool } from '../runtime/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { standardCases } from './cases.js';
import { createMockRegistry } from './mock-registry.js';
import type { BatteryOptions, OutcomeKind, TestCase, TestReport, TestResult } from './types.js';

/**
 * Mock Execution Harness
 *
 * Runs a live tool against a battery of cases, one at a time, each with a
 * fresh MockRegistry. Whatever the tool does (returns, raises, never
 * settles) ends up as a TestResult.
 */

interface Outcome {
  kind: OutcomeKind;
  output?: string;
}

function registrationResult(tool: LiveTool): TestResult {
  const base = {
    caseId: 'registration',
    description: 'Export is registered under its name with an async callable',
    invocations: [],
  };

  const { exported } = tool;
  let mismatch: string | null = null;
  if (!isRegisteredTool(exported)) {
    mismatch = 'Export does not carry the registration marker';
  } else if (exported.name !== tool.name) {
    mismatch = `Registered as "${exported.name}" but exported as "${tool.name}"`;
  } else if (exported.handler.constructor.name !== 'AsyncFunction') {
    mismatch = 'Registered callable is not async';
  }

  return mismatch === null
    ? { ...base, status: 'passed', outcomeKind: null }
    : { ...base, status: 'failed', outcomeKind: null, mismatch };
}

function classify(value: unknown): Outcome {
  if (typeof value !== 'string') {
    return { kind: 'non-text', output: String(value) };
  }
  return { kind: value.startsWith(ERROR_PREFIX) ? 'error' : 'success', output: value };
}

async function runCase(tool: LiveTool, testCase: TestCase, timeoutMs: number): Promise<TestResult> {
  const base = { caseId: testCase.id, description: testCase.description };

  if (testCase.skipReason !== undefined) {
    return { ...base, status: 'skipped', outcomeKind: null, mismatch: testCase.skipReason, invocations: [] };
  }

  const registry = createMockRegistry(testCase.registryConfig);
  let outcome: Outcome;
  try {
    const value = await withTimeout(
      invokeTool(tool, registry.context(), testCase.invocationArgs),
      timeoutMs,
      `${tool.name} (${testCase.id})`
    );
    outcome = classify(value);
  } catch (error) {
    outcome =
      error instanceof TimeoutError
        ? { kind: 'hung', output: error.message }
        : { kind: 'raised', output: errorMessage(error) };
  }

  const invocations = registry.invocations;
  const problems: string[] = [];
  if (outcome.kind !== testCase.expectedOutcomeKind) {
    problems.push(`expected ${testCase.expectedOutcomeKind} outcome, got ${outcome.kind}`);
  }
  if (testCase.expectedText !== undefined && outcome.output !== testCase.expectedText) {
    problems.push(`expected "${testCase.expectedText}", got "${outcome.output ?? ''}"`);
  }
  if (testCase.expectNoInvocations && invocations.length > 0) {
    problems.push(`expected no delegation calls, got ${String(invocations.length)}`);
  }

  const result: TestResult = {
    ...base,
    status: problems.length === 0 ? 'passed' : 'failed',
    outcomeKind: outcome.kind,
    invocations,
    ...(outcome.output !== undefined ? { output: outcome.output } : {}),
    ...(problems.length > 0 ? { mismatch: problems.join('; ') } : {}),
  };

  logger.debug('Test case finished', {
    tool: tool.name,
    caseId: testCase.id,
    status: result.status,
    outcomeKind: outcome.kind,
  });

  return result;
}

/**
 * Run the registration check and then the standard (or given) cases
 */
export async function runBattery(tool: LiveTool, options: BatteryOptions = {}): Promise<TestReport> {
  const timeoutMs = options.timeoutMs ?? getConfig().harness.caseTimeoutMs;
  const cases = options.cases ?? standardCases(tool);

  const results: TestResult[] = [registrationResult(tool)];
  // One case at a time, in order
  for (const testCase of cases) {
    results.push(await runCase(tool, testCase, timeoutMs));
  }

  const overallPassed = results.every((result) => result.status !== 'failed');
  if (!overallPassed) {
    logger.info('Tool failed functional tests', {
      tool: tool.name,
      failed: results.filter((result) => result.status === 'failed').map((result) => result.caseId),
    });
  }

  return { toolName: tool.name, results, overallPassed };
}

export { standardCases, happyArgs, MOCK_FAILURE_MESSAGE, MOCK_SUCCESS_TEXT } from './cases.js';
export { MockRegistry, createMockRegistry, BACKEND_TARGET } from './mock-registry.js';
export type { Invocation, MethodBehavior, RegistryConfig } from './mock-registry.js';
export type { BatteryOptions, OutcomeKind, TestCase, TestReport, TestResult, TestStatus } from './types.js';
