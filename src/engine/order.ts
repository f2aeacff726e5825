/**
 * Dependency ordering of resource types
 *
 * The set of resource categories is closed, so the order is a fixed table
 * rather than a graph computed at run time. Each stage still declares what
 * it depends on: the declarations are checked for cycles once, and the
 * pipeline uses them to skip dependents of a resource type that failed.
 */

import type { ResourceCategory, ResourceTypeDefinition } from '../schemas/types.js';
import { CyclicDependencyError } from './errors.js';

/**
 * One row of the dependency table
 */
export interface DependencyStage {
  /** Categories reconciled together in this stage */
  categories: readonly ResourceCategory[];
  /** Categories that must be reconciled before this stage */
  dependsOn: readonly ResourceCategory[];
}

/**
 * Static processing order, referenced entities first
 */
export const DEPENDENCY_TABLE: readonly DependencyStage[] = [
  { categories: ['blob-store'], dependsOn: [] },
  { categories: ['cleanup-policy'], dependsOn: [] },
  { categories: ['routing-rule'], dependsOn: [] },
  { categories: ['content-selector'], dependsOn: [] },
  { categories: ['ssl-certificate'], dependsOn: [] },
  { categories: ['ldap-connection'], dependsOn: ['ssl-certificate'] },
  { categories: ['security-realms'], dependsOn: ['ldap-connection'] },
  { categories: ['privilege'], dependsOn: ['content-selector'] },
  { categories: ['role'], dependsOn: ['privilege'] },
  { categories: ['user'], dependsOn: ['role'] },
  { categories: ['anonymous-access'], dependsOn: ['user', 'security-realms'] },
  { categories: ['user-tokens'], dependsOn: ['security-realms'] },
  {
    categories: ['hosted-repository', 'proxy-repository'],
    dependsOn: ['blob-store', 'cleanup-policy', 'routing-rule', 'ssl-certificate'],
  },
  { categories: ['group-repository'], dependsOn: ['hosted-repository', 'proxy-repository'] },
];

/**
 * Verify that the declared dependencies of a table form no cycle and that
 * every dependency sits in a strictly earlier stage
 *
 * @throws CyclicDependencyError naming the first cycle or misplaced dependency found
 */
export function validateDependencyTable(table: readonly DependencyStage[]): void {
  const edges = new Map<ResourceCategory, readonly ResourceCategory[]>();
  for (const stage of table) {
    for (const category of stage.categories) {
      edges.set(category, stage.dependsOn);
    }
  }

  const done = new Set<ResourceCategory>();
  const visiting: ResourceCategory[] = [];

  const visit = (category: ResourceCategory): void => {
    if (done.has(category)) return;
    const start = visiting.indexOf(category);
    if (start !== -1) {
      throw new CyclicDependencyError([...visiting.slice(start), category]);
    }
    visiting.push(category);
    for (const dependency of edges.get(category) ?? []) {
      visit(dependency);
    }
    visiting.pop();
    done.add(category);
  };

  for (const category of edges.keys()) {
    visit(category);
  }

  table.forEach((stage, index) => {
    for (const dependency of stage.dependsOn) {
      const at = stageOf(dependency, table);
      if (at !== -1 && at < index) continue;
      const dependent = stage.categories[0] ?? 'unknown';
      throw new CyclicDependencyError(
        [dependent, dependency],
        `Resource stage '${dependent}' depends on '${dependency}', which is not in an earlier stage`
      );
    }
  });
}

/**
 * Stage index of a category in a table; -1 when the table does not list it
 */
export function stageOf(
  category: ResourceCategory,
  table: readonly DependencyStage[] = DEPENDENCY_TABLE
): number {
  return table.findIndex((stage) => stage.categories.includes(category));
}

/**
 * Sequence resource types so referenced entities come first.
 * Types within one stage are ordered by id.
 *
 * @throws CyclicDependencyError if the table declares a cycle
 * @throws Error if a category is missing from the table
 */
export function order<T extends Pick<ResourceTypeDefinition, 'id' | 'category'>>(
  resourceTypes: readonly T[],
  table: readonly DependencyStage[] = DEPENDENCY_TABLE
): T[] {
  validateDependencyTable(table);

  const ranked = resourceTypes.map((type) => {
    const stage = stageOf(type.category, table);
    if (stage === -1) {
      throw new Error(`Resource category '${type.category}' has no stage in the dependency table`);
    }
    return { type, stage };
  });

  ranked.sort((a, b) => {
    if (a.stage !== b.stage) return a.stage - b.stage;
    if (a.type.id < b.type.id) return -1;
    if (a.type.id > b.type.id) return 1;
    return 0;
  });

  return ranked.map(({ type }) => type);
}

/**
 * Categories a category directly or transitively depends on
 */
export function dependenciesOf(
  category: ResourceCategory,
  table: readonly DependencyStage[] = DEPENDENCY_TABLE
): Set<ResourceCategory> {
  const result = new Set<ResourceCategory>();
  const pending = [...(table[stageOf(category, table)]?.dependsOn ?? [])];

  while (pending.length > 0) {
    const next = pending.pop();
    if (next === undefined || result.has(next)) continue;
    result.add(next);
    pending.push(...(table[stageOf(next, table)]?.dependsOn ?? []));
  }

  return result;
}
