import type { TestReport, TestStatus } from '../harness/types.js';
import type { CatalogReport, ValidationReport } from '../rules/types.js';

/**
 * Plain-text rendering of validation and test reports, one line per rule
 * or case
 */

const INDENT = '  ';

/**
 * Glyph for a line's status
 */
export function statusGlyph(status: TestStatus): string {
  switch (status) {
    case 'passed':
      return '✅';
    case 'failed':
      return '❌';
    case 'skipped':
      return '⏭️';
  }
}

function passGlyph(passed: boolean): string {
  return statusGlyph(passed ? 'passed' : 'failed');
}

/**
 * Summary line with counts per status
 * Example: "✅ 5 passed  ·  ❌ 1 failed"
 */
export function statsBar(stats: Array<{ count: number; status: TestStatus }>): string {
  return stats
    .filter(({ count }) => count > 0)
    .map(({ count, status }) => `${statusGlyph(status)} ${String(count)} ${status}`)
    .join('  ·  ');
}

export function formatValidationReport(report: ValidationReport): string {
  const lines = [`${passGlyph(report.overallPassed)} ${report.toolName}`];
  for (const verdict of report.verdicts) {
    lines.push(`${INDENT}${passGlyph(verdict.passed)} ${verdict.ruleId}: ${verdict.message}`);
  }
  return lines.join('\n');
}

export function formatTestReport(report: TestReport): string {
  const lines = [`${passGlyph(report.overallPassed)} ${report.toolName}`];
  for (const result of report.results) {
    let line = `${INDENT}${statusGlyph(result.status)} ${result.caseId}: ${result.description}`;
    if (result.mismatch !== undefined) {
      line += result.status === 'skipped' ? ` (skipped: ${result.mismatch})` : ` (${result.mismatch})`;
    }
    lines.push(line);
  }
  return lines.join('\n');
}

/**
 * Render a catalog: header, every tool, then extraction failures,
 * duplicate names and a summary
 */
export function formatCatalogReport(report: CatalogReport): string {
  const sections = [`Catalog: ${report.sourceUnit}`, ...report.reports.map(formatValidationReport)];

  const problems = [
    ...report.extractionErrors.map(({ unitId, message }) => `${statusGlyph('failed')} ${unitId}: ${message}`),
    ...report.duplicateNames.map((name) => `${statusGlyph('failed')} Duplicate tool name "${name}"`),
  ];
  if (problems.length > 0) {
    sections.push(problems.join('\n'));
  }

  const passed = report.reports.filter((tool) => tool.overallPassed).length;
  const failed = report.reports.length - passed + report.extractionErrors.length;
  sections.push(
    statsBar([
      { count: passed, status: 'passed' },
      { count: failed, status: 'failed' },
    ]) || 'No tools found'
  );

  return sections.join('\n\n');
}

/**
 * Process exit code for a run: 0 when everything passed, 1 otherwise
 */
export function exitCodeFor(reports: ReadonlyArray<{ readonly overallPassed: boolean }>): number {
  return reports.every((report) => report.overallPassed) ? 0 : 1;
}
