/**
 * plan command - Show what apply would change, without changing anything
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../engine/pipeline.js';
import { generateReport } from '../engine/report.js';
import { header, info, verbose } from '../utils/output.js';
import { runDesiredState, type CommandDependencies } from './run.js';

export interface PlanOptions {
  /** Only list failed items and types */
  failuresOnly?: boolean;
}

/**
 * Execute the plan command: a dry run with per-item detail
 */
export async function planCommand(
  ctx: CommandContext,
  options: PlanOptions = {},
  deps: CommandDependencies = {}
): Promise<CommandResult<RunReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose('Executing plan command', globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Reconciliation Plan');
    info('Comparing desired state with the server...');
  }

  const result = await runDesiredState(ctx, true, deps);

  if (outputFormat === 'human' && result.data) {
    const report = generateReport(result.data, {
      format: 'human',
      detailed: !options.failuresOnly,
      failuresOnly: options.failuresOnly,
    });
    console.log(report.output);
  }

  return result;
}
