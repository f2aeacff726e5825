/**
 * Run report generation
 *
 * Provides formatting for reconciliation results:
 * - Human-readable console output with colors
 * - Compact one-line summary
 * - JSON format for CI/automation
 *
 * @module engine/report
 */

import chalk from 'chalk';
import type { ItemAction, ItemResult } from './reconcile.js';
import type { RunReport, TypeReport } from './pipeline.js';

// =============================================================================
// Types
// =============================================================================

export type ReportFormat = 'human' | 'json' | 'compact';

export interface ReportOptions {
  format: ReportFormat;
  /** Show one line per item, not only per resource type */
  detailed?: boolean;
  /** Only show failed items and types */
  failuresOnly?: boolean;
}

export interface FormattedReport {
  /** The formatted string output */
  output: string;
  /** Summary line for quick display */
  summary: string;
  suggestedExitCode: number;
}

// =============================================================================
// Formatting Utilities
// =============================================================================

function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural ?? `${singular}s`);
}

function actionIcon(action: ItemAction): string {
  switch (action) {
    case 'create':
      return chalk.green('+');
    case 'update':
      return chalk.yellow('~');
    case 'delete':
      return chalk.red('-');
    case 'unchanged':
      return chalk.gray('=');
    case 'invalid':
      return chalk.red('!');
  }
}

function typeStatusLabel(report: TypeReport): string {
  if (report.status === 'skipped') return chalk.yellow('SKIP');
  if (report.status === 'failed' || !report.execution.success) return chalk.red('FAIL');
  return chalk.green('OK');
}

function formatCounts(report: TypeReport): string {
  const { created, updated, deleted, unchanged, failed } = report.execution.summary;
  const parts = [`+${created}`, `~${updated}`, `-${deleted}`, `=${unchanged}`];
  if (failed > 0) parts.push(chalk.red(`x${failed}`));
  return chalk.gray(parts.join(' '));
}

function formatItem(result: ItemResult, dryRun: boolean): string {
  const verb = dryRun && result.action !== 'unchanged' ? `would ${result.action}` : result.action;
  let line = `      ${actionIcon(result.action)} ${result.naturalKey} ${chalk.gray(`(${verb})`)}`;
  if (result.changedPaths && result.changedPaths.length > 0) {
    line += chalk.gray(` ${result.changedPaths.join(', ')}`);
  }
  if (result.alreadyAbsent) {
    line += chalk.gray(' already absent');
  }
  if (!result.success) {
    line += `\n        ${chalk.red(`Error: ${result.error ?? 'unknown error'}`)}`;
  }
  return line;
}

function formatTypeReport(report: TypeReport, options: Omit<ReportOptions, 'format'>): string {
  const lines: string[] = [];
  lines.push(`  ${typeStatusLabel(report).padEnd(4)} ${report.resourceType}  ${formatCounts(report)}`);
  if (report.reason) {
    lines.push(chalk.gray(`       ${report.reason}`));
  }

  if (options.detailed || options.failuresOnly) {
    const items = options.failuresOnly
      ? report.execution.results.filter((result) => !result.success)
      : report.execution.results;
    for (const item of items) {
      lines.push(formatItem(item, report.execution.dryRun));
    }
  }

  return lines.join('\n');
}

// =============================================================================
// Human-Readable Report
// =============================================================================

export function formatHumanReport(
  report: RunReport,
  options: Omit<ReportOptions, 'format'> = {}
): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push('');
  lines.push(chalk.bold('='.repeat(60)));
  lines.push(chalk.bold.cyan(report.dryRun ? '  Reconciliation Plan' : '  Reconciliation Report'));
  lines.push(chalk.bold('='.repeat(60)));
  lines.push('');

  if (report.dryRun) {
    lines.push(chalk.yellow.bold('[DRY RUN] No changes were applied'));
    lines.push('');
  }

  const types = options.failuresOnly
    ? report.types.filter((type) => type.status !== 'reconciled' || !type.execution.success)
    : report.types;

  if (types.length === 0) {
    lines.push(chalk.gray(options.failuresOnly ? '  No failures' : '  No resource types processed'));
  } else {
    for (const type of types) {
      lines.push(formatTypeReport(type, options));
    }
  }
  lines.push('');

  lines.push(chalk.bold('Summary:'));
  lines.push(`  Created:   ${chalk.green(summary.created)}`);
  lines.push(`  Updated:   ${chalk.yellow(summary.updated)}`);
  lines.push(`  Deleted:   ${chalk.red(summary.deleted)}`);
  lines.push(`  Unchanged: ${chalk.gray(summary.unchanged)}`);
  lines.push(`  Failed:    ${summary.failed > 0 ? chalk.red(summary.failed) : chalk.gray('0')}`);
  lines.push('');

  const errors = report.types.flatMap((type) => type.execution.errors);
  if (errors.length > 0) {
    lines.push(chalk.red.bold('Errors:'));
    for (const message of errors) {
      lines.push(chalk.red(`  x ${message}`));
    }
    lines.push('');
  }

  lines.push(report.success ? chalk.green.bold('Status: SUCCESS') : chalk.red.bold('Status: FAILED'));
  lines.push(chalk.bold('='.repeat(60)));
  lines.push('');

  return lines.join('\n');
}

// =============================================================================
// Compact Report
// =============================================================================

/**
 * One-line summary of a run
 */
export function formatCompactReport(report: RunReport): string {
  const status = report.success ? chalk.green('SUCCESS') : chalk.red('FAILED');
  const dryRunLabel = report.dryRun ? chalk.yellow('[DRY RUN] ') : '';
  const { created, updated, deleted, unchanged, failed } = report.summary;
  const typeCount = report.types.length;

  return (
    `${dryRunLabel}${status}: ${created} created, ${updated} updated, ${deleted} deleted, ` +
    `${unchanged} unchanged, ${failed} failed across ${typeCount} ${pluralize(typeCount, 'resource type')}`
  );
}

// =============================================================================
// JSON Report
// =============================================================================

export function formatJsonReport(report: RunReport): string {
  const jsonReport = {
    success: report.success,
    dryRun: report.dryRun,
    summary: report.summary,
    types: report.types.map((type) => ({
      resourceType: type.resourceType,
      status: type.status,
      reason: type.reason,
      success: type.execution.success,
      summary: type.execution.summary,
      results: type.execution.results,
      errors: type.execution.errors,
    })),
  };

  return JSON.stringify(jsonReport, null, 2);
}

// =============================================================================
// Main Report Generator
// =============================================================================

/**
 * Generate a formatted report
 */
export function generateReport(report: RunReport, options: ReportOptions): FormattedReport {
  let output: string;
  switch (options.format) {
    case 'json':
      output = formatJsonReport(report);
      break;
    case 'compact':
      output = formatCompactReport(report);
      break;
    default:
      output = formatHumanReport(report, options);
      break;
  }

  return {
    output,
    summary: formatCompactReport(report),
    suggestedExitCode: report.success ? 0 : 1,
  };
}
