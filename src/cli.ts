#!/usr/bin/env node
/**
 * nexus-reconcile CLI - Desired-state configuration for Nexus Repository Manager
 *
 * Commands:
 * - plan: Show what would change between desired and remote state
 * - apply: Create, update and delete remote objects to match the desired state
 * - types: List the resource types that can be managed
 */

import chalk from 'chalk';
import { Command, Option } from 'commander';
import type { CommandContext, CommandResult } from './types.js';
import { applyCommand, createContext, parseGlobalOptions, planCommand, typesCommand } from './commands/index.js';
import { PRO_FEATURE_MODES } from './api/license.js';
import { DEFAULT_CONFIG_PATH } from './config/loader.js';
import { printResult, error } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Main CLI program
 */
const program = new Command()
  .name('nexus-reconcile')
  .description('Reconcile Nexus Repository Manager configuration with a desired-state file')
  .version(VERSION)
  .addOption(
    new Option('-c, --config <path>', 'Desired-state YAML file')
      .env('NEXUS_RECONCILE_CONFIG')
      .default(DEFAULT_CONFIG_PATH)
  )
  // Credentials fall back to NEXUS_URL / NEXUS_USERNAME / NEXUS_PASSWORD
  .addOption(new Option('--url <url>', 'Server base URL'))
  .addOption(new Option('--username <name>', 'User to authenticate as'))
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('--only <selectors...>', 'Restrict to resource type ids, categories or "repositories"')
  )
  .addOption(
    new Option('--pro <mode>', 'Reconcile Pro-only resource types')
      .choices(PRO_FEATURE_MODES)
      .default('auto')
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

function context(): CommandContext {
  const options = parseGlobalOptions(program.opts());
  if (options.json) {
    // No escape codes inside JSON strings
    chalk.level = 0;
  }
  return createContext(options);
}

async function run<T>(
  name: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const ctx = context();

  try {
    const result = await execute(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (ctx.outputFormat === 'json') {
      printResult({ success: false, message: `${name} failed`, errors: [message] }, 'json');
    } else {
      error(`${name} failed: ${message}`);
    }
    process.exit(1);
  }
}

/**
 * plan command - Show what would change
 */
program
  .command('plan')
  .description('Show the changes apply would make, without making them')
  .option('--failures-only', 'Only list items that cannot be reconciled')
  .action(async (cmdOpts: { failuresOnly?: boolean }) => {
    await run('Plan', (ctx) => planCommand(ctx, { failuresOnly: cmdOpts.failuresOnly }));
  });

/**
 * apply command - Reconcile
 */
program
  .command('apply')
  .description('Create, update and delete remote objects to match the desired state')
  .option('--detailed', 'List every item, not only per-type counts')
  .action(async (cmdOpts: { detailed?: boolean }) => {
    await run('Apply', (ctx) => applyCommand(ctx, { detailed: cmdOpts.detailed }));
  });

/**
 * types command - List manageable resource types
 */
program
  .command('types')
  .description('List the resource types that can be managed, in reconciliation order')
  .action(async () => {
    await run('Types', (ctx) => typesCommand(ctx));
  });

program.parseAsync().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
