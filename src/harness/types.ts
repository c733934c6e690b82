import type { Invocation, RegistryConfig } from './mock-registry.js';

/**
 * What a tool call came back with
 */
export type OutcomeKind = 'success' | 'error' | 'raised' | 'hung' | 'non-text';

export interface TestCase {
  readonly id: string;
  readonly description: string;
  readonly registryConfig: RegistryConfig;
  /** Named arguments; omitted parameters take their defaults */
  readonly invocationArgs: Readonly<Record<string, unknown>>;
  readonly expectedOutcomeKind: OutcomeKind;
  /** Exact text the tool must return */
  readonly expectedText?: string;
  /** The tool must not reach the delegation layer */
  readonly expectNoInvocations?: boolean;
  /** Recorded as skipped instead of run */
  readonly skipReason?: string;
}

export type TestStatus = 'passed' | 'failed' | 'skipped';

export interface TestResult {
  readonly caseId: string;
  readonly description: string;
  readonly status: TestStatus;
  /** Null when the case did not run */
  readonly outcomeKind: OutcomeKind | null;
  readonly output?: string;
  /** Why a failed case failed, or why a skipped one was skipped */
  readonly mismatch?: string;
  readonly invocations: readonly Invocation[];
}

export interface TestReport {
  readonly toolName: string;
  readonly results: readonly TestResult[];
  /** True unless a result failed; skipped results do not count */
  readonly overallPassed: boolean;
}

export interface BatteryOptions {
  /** Per-case timeout, defaults to the configured harness timeout */
  readonly timeoutMs?: number;
  /** Replaces the standard cases; the registration check still runs */
  readonly cases?: readonly TestCase[];
}
