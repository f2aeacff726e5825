/**
 * apply command - Reconcile the server with the desired state
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../engine/pipeline.js';
import { generateReport } from '../engine/report.js';
import { dryRunNotice, header, verbose } from '../utils/output.js';
import { runDesiredState, type CommandDependencies } from './run.js';

export interface ApplyOptions {
  /** Show every item, not only the per-type counts */
  detailed?: boolean;
}

/**
 * Execute the apply command; honours the global --dry-run flag
 */
export async function applyCommand(
  ctx: CommandContext,
  options: ApplyOptions = {},
  deps: CommandDependencies = {}
): Promise<CommandResult<RunReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose('Executing apply command', globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Apply Desired State');
    if (globalOpts.dryRun) {
      dryRunNotice();
    }
  }

  const result = await runDesiredState(ctx, globalOpts.dryRun, deps);

  if (outputFormat === 'human' && result.data) {
    // Failed items are always listed
    const report = generateReport(result.data, {
      format: 'human',
      detailed: options.detailed,
      failuresOnly: !options.detailed && !result.success,
    });
    console.log(report.output);
  }

  return result;
}
