/**
 * Shared plumbing for plan and apply: load the desired state, connect,
 * resolve the Pro gate and run the pipeline
 */

import type { CommandContext, CommandResult } from '../types.js';
import { createClient, type NexusClient } from '../api/client.js';
import { NexusResourceApi, type ResourceApi } from '../api/resources.js';
import { resolveProFeature } from '../api/license.js';
import { createDefaultRegistry } from '../schemas/index.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import { loadDesiredState } from '../config/loader.js';
import { runReconciliation, type DesiredState, type RunReport } from '../engine/pipeline.js';
import { formatCompactReport } from '../engine/report.js';
import { verbose } from '../utils/output.js';

/**
 * Collaborators a command may be handed instead of building its own
 */
export interface CommandDependencies {
  registry?: SchemaRegistry;
  client?: NexusClient;
  api?: ResourceApi;
}

function needsProFeature(registry: SchemaRegistry, desired: DesiredState): boolean {
  return Object.keys(desired).some(
    (id) => registry.has(id) && registry.getResourceType(id).requiresProFeature
  );
}

/**
 * Run one reconciliation pass
 */
export async function runDesiredState(
  ctx: CommandContext,
  dryRun: boolean,
  deps: CommandDependencies = {}
): Promise<CommandResult<RunReport>> {
  const { options, logger } = ctx;
  const registry = deps.registry ?? createDefaultRegistry();

  verbose(`Loading desired state from ${options.config}`, options.verbose);
  const desired = await loadDesiredState(options.config, registry);

  const client =
    deps.client ??
    createClient(
      { baseUrl: options.url, username: options.username, debug: options.verbose },
      { logger: logger.child({ component: 'http' }) }
    );
  const api = deps.api ?? new NexusResourceApi(client);

  verbose(`Server: ${client.getConfig().baseUrl}`, options.verbose);

  // Only ask the server when a Pro-only type is actually requested
  const proFeatureAvailable = needsProFeature(registry, desired)
    ? await resolveProFeature(options.pro, client)
    : options.pro === 'yes';
  verbose(`Pro features: ${proFeatureAvailable ? 'available' : 'unavailable'}`, options.verbose);

  const report = await runReconciliation({
    registry,
    api,
    desired,
    dryRun,
    only: options.only,
    proFeatureAvailable,
    logger,
  });

  const errors = report.types.flatMap((type) => type.execution.errors);
  return {
    success: report.success,
    message: formatCompactReport(report),
    data: report,
    errors: errors.length > 0 ? errors : undefined,
  };
}
