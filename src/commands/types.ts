/**
 * types command - List the resource types the tool can manage
 */

import type { CommandContext, CommandResult } from '../types.js';
import { createDefaultRegistry } from '../schemas/index.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import type { Dialect, ResourceTypeDefinition } from '../schemas/types.js';
import { matchesSelector } from '../engine/pipeline.js';
import { order } from '../engine/order.js';
import { formatTypeTable, header } from '../utils/output.js';

export interface TypeListing {
  id: string;
  category: string;
  kind: ResourceTypeDefinition['kind'];
  dialects: Dialect[];
  naturalKeyField: string;
  requiresProFeature: boolean;
  updatable: boolean;
  description: string;
}

/**
 * List registered resource types in reconciliation order
 */
export async function typesCommand(
  ctx: CommandContext,
  registry: SchemaRegistry = createDefaultRegistry()
): Promise<CommandResult<TypeListing[]>> {
  const only = ctx.options.only;
  const types = order(registry.list()).filter(
    (type) => !only || only.some((selector) => matchesSelector(type, selector))
  );

  const rows = types.map((definition) => ({ definition, dialects: registry.dialectsOf(definition.id) }));

  if (ctx.outputFormat === 'human') {
    header('Resource Types');
    console.log(formatTypeTable(rows));
  }

  return {
    success: true,
    message: `${types.length} resource type(s)`,
    data: rows.map(({ definition, dialects }) => ({
      id: definition.id,
      category: definition.category,
      kind: definition.kind,
      dialects,
      naturalKeyField: definition.naturalKeyField,
      requiresProFeature: definition.requiresProFeature,
      updatable: definition.updatable,
      description: definition.description,
    })),
  };
}
