/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ResourceTypeDefinition } from '../schemas/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * One row per resource type: id, kind, dialects and flags
 */
export function formatTypeTable(
  rows: ReadonlyArray<{ definition: ResourceTypeDefinition; dialects: readonly string[] }>
): string {
  const width = Math.max(0, ...rows.map((row) => row.definition.id.length));
  return rows
    .map(({ definition, dialects }) => {
      const flags = [definition.kind, dialects.join('+')];
      if (definition.requiresProFeature) flags.push('pro');
      if (!definition.updatable) flags.push('immutable');
      return `  ${chalk.cyan(definition.id.padEnd(width))}  ${chalk.gray(`[${flags.join(', ')}]`)} ${definition.description}`;
    })
    .join('\n');
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}
