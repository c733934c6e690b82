import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import { loadCatalog } from '../catalog/loader.js';
import { getConfig } from '../config/index.js';
import { exitCodeFor, formatCatalogReport, formatTestReport, statsBar } from '../formatters/report.js';
import { runBattery } from '../harness/index.js';
import type { LoadedCatalog } from '../catalog/types.js';
import type { TestReport } from '../harness/types.js';
import { validateCatalog } from '../rules/engine.js';
import type { CatalogReport } from '../rules/types.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface SuiteOptions {
  /** Catalog module to check, defaults to TOOLCHECK_CATALOG_PATH */
  catalogPath?: string;
  /** Static validation only, no functional tests */
  quick?: boolean;
  /** Skip functional tests once validation has failed */
  ci?: boolean;
  /** Per-case timeout, defaults to TOOLCHECK_CASE_TIMEOUT_MS */
  caseTimeoutMs?: number;
}

export interface SuiteResult {
  readonly validation: CatalogReport | null;
  readonly tests: readonly TestReport[];
  /** Why the catalog could not be read, evaluated or configured */
  readonly loadError: string | null;
  readonly passed: boolean;
  readonly exitCode: number;
  /** Rendered text of everything above */
  readonly report: string;
}

function failure(loadError: string, validation: CatalogReport | null = null): SuiteResult {
  const sections = validation ? [formatCatalogReport(validation)] : [];
  sections.push(`❌ ${loadError}`);
  return { validation, tests: [], loadError, passed: false, exitCode: 1, report: sections.join('\n\n') };
}

function testSummary(tests: readonly TestReport[]): string {
  const passed = tests.filter((report) => report.overallPassed).length;
  return `Functional tests: ${
    statsBar([
      { count: passed, status: 'passed' },
      { count: tests.length - passed, status: 'failed' },
    ]) || 'none run'
  }`;
}

/**
 * Validate a catalog, then exercise each of its tools against the mock
 * harness. Never throws: every problem ends up in the result.
 */
export async function runSuite(options: SuiteOptions = {}): Promise<SuiteResult> {
  let catalogPath: string | undefined;
  let caseTimeoutMs: number;
  try {
    const config = getConfig();
    catalogPath = options.catalogPath ?? config.suite.catalogPath;
    caseTimeoutMs = options.caseTimeoutMs ?? config.harness.caseTimeoutMs;
  } catch (error) {
    return failure(errorMessage(error));
  }

  if (!catalogPath) {
    return failure('No catalog path given (pass catalogPath or set TOOLCHECK_CATALOG_PATH)');
  }

  const absolutePath = resolve(catalogPath);
  logger.info('Running validation suite', { catalog: absolutePath, quick: options.quick ?? false });

  let source: string;
  try {
    source = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    logger.error('Failed to read catalog', { catalog: absolutePath, error: errorMessage(error) });
    return failure(`Failed to read catalog ${catalogPath}: ${errorMessage(error)}`);
  }

  const validation = validateCatalog(source, basename(absolutePath));
  const sections = [formatCatalogReport(validation)];
  const tests: TestReport[] = [];
  const missing: string[] = [];

  const skipTests = options.quick === true || (options.ci === true && !validation.overallPassed);
  if (!skipTests) {
    let catalog: LoadedCatalog;
    try {
      catalog = await loadCatalog(absolutePath);
    } catch (error) {
      return failure(errorMessage(error), validation);
    }

    missing.push(...catalog.missing);
    for (const tool of catalog.tools) {
      tests.push(await runBattery(tool, { timeoutMs: caseTimeoutMs }));
    }
    sections.push(...missing.map((name) => `❌ ${name}: declared but not exported`));
    sections.push(...tests.map(formatTestReport), testSummary(tests));
  }

  const exitCode = missing.length > 0 ? 1 : exitCodeFor([validation, ...tests]);
  logger.info('Validation suite finished', {
    catalog: absolutePath,
    validationPassed: validation.overallPassed,
    testedTools: tests.length,
    exitCode,
  });

  return {
    validation,
    tests,
    loadError: null,
    passed: exitCode === 0,
    exitCode,
    report: sections.join('\n\n'),
  };
}
