/**
 * Human and JSON renderings of a pipeline run.
 */
import chalk from 'chalk';
import type { PipelineResult, ToolReport } from '../../core/pipeline/index.js';

/**
 * One summary line per stage, e.g. `✗ markdownlint (structural-lint) exit 1`.
 */
export function formatStageLine(report: ToolReport): string {
  const label = `${report.tool} (${report.stage})`;
  if (report.passed) {
    return chalk.green(`✓ ${label}`);
  }
  const suffix = report.advisory ? ' (advisory)' : '';
  const colour = report.advisory ? chalk.yellow : chalk.red;
  return colour(`✗ ${label} exit ${report.exitCode}${suffix}`);
}

export function formatSummary(result: PipelineResult): string {
  const lines = result.reports.map(formatStageLine);
  const failed = result.reports.filter((r) => !r.passed && !r.advisory).length;
  lines.push('');
  lines.push(
    result.passed
      ? chalk.bold.green(`${result.mode}: all stages passed`)
      : chalk.bold.red(`${result.mode}: ${failed} stage(s) failed`)
  );
  return lines.join('\n');
}

export function formatJson(result: PipelineResult): string {
  return JSON.stringify(result, null, 2);
}
