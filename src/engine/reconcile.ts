/**
 * Reconciliation driver
 *
 * Executes the change records of one resource type against the API:
 * 1. Creates and updates, in plan order
 * 2. Deletes, after everything that might still reference them was re-pointed
 *
 * Every record yields exactly one report entry. A failing item is recorded
 * and the remaining items still run. In dry-run mode no mutating call is
 * made and the report shows what would have happened.
 */

import type { ResourceApi } from '../api/resources.js';
import { isAlreadyAbsent } from '../api/resources.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { ResourceTypeDefinition } from '../schemas/types.js';
import type { ChangeAction, ChangeRecord } from './diff.js';
import { ExecutionError, toError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * `invalid` marks desired items that never reached the diff
 */
export type ItemAction = ChangeAction | 'invalid';

/**
 * Outcome for one item
 */
export interface ItemResult {
  naturalKey: string;
  action: ItemAction;
  success: boolean;
  /** Sorted dotted paths that differed (updates only) */
  changedPaths?: string[];
  /** DELETE answered 404: the item was already gone */
  alreadyAbsent?: boolean;
  error?: string;
}

export interface ExecutionSummary {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  failed: number;
}

/**
 * Result of reconciling one resource type
 */
export interface ExecutionReport {
  resourceType: string;
  dryRun: boolean;
  results: ItemResult[];
  summary: ExecutionSummary;
  /** Messages for every failed item */
  errors: string[];
  success: boolean;
}

export interface ReconcileOptions {
  logger?: ApiLogger;
}

// =============================================================================
// Report helpers
// =============================================================================

export function emptySummary(): ExecutionSummary {
  return { created: 0, updated: 0, deleted: 0, unchanged: 0, failed: 0 };
}

/**
 * Recount a summary from item results
 */
export function summarize(results: readonly ItemResult[]): ExecutionSummary {
  const summary = emptySummary();
  for (const result of results) {
    if (!result.success) {
      summary.failed++;
      continue;
    }
    switch (result.action) {
      case 'create':
        summary.created++;
        break;
      case 'update':
        summary.updated++;
        break;
      case 'delete':
        summary.deleted++;
        break;
      case 'unchanged':
        summary.unchanged++;
        break;
      case 'invalid':
        break;
    }
  }
  return summary;
}

/**
 * Build a report from item results
 */
export function buildReport(
  resourceType: string,
  dryRun: boolean,
  results: ItemResult[]
): ExecutionReport {
  const errors = results
    .filter((result) => !result.success)
    .map((result) => `${resourceType} '${result.naturalKey}': ${result.error ?? 'unknown error'}`);
  return {
    resourceType,
    dryRun,
    results,
    summary: summarize(results),
    errors,
    success: errors.length === 0,
  };
}

/**
 * Creates and updates first (stable), then deletes
 */
export function executionOrder(records: readonly ChangeRecord[]): ChangeRecord[] {
  return [
    ...records.filter((record) => record.action !== 'delete'),
    ...records.filter((record) => record.action === 'delete'),
  ];
}

// =============================================================================
// Execution
// =============================================================================

async function execute(
  type: ResourceTypeDefinition,
  record: ChangeRecord,
  api: ResourceApi
): Promise<ItemResult> {
  const base = { naturalKey: record.naturalKey, action: record.action };

  switch (record.action) {
    case 'unchanged':
      return { ...base, success: true };

    case 'create':
      if (type.kind === 'singleton') {
        throw new Error(`${type.id} is a singleton and cannot be created`);
      }
      await api.create(type, record.item);
      return { ...base, success: true };

    case 'update':
      if (!type.updatable) {
        throw new Error(`${type.id} items cannot be updated in place`);
      }
      await api.update(type, record.naturalKey, record.item);
      return { ...base, success: true, changedPaths: record.changedPaths };

    case 'delete':
      if (type.kind === 'singleton') {
        throw new Error(`${type.id} is a singleton and cannot be deleted`);
      }
      try {
        await api.delete(type, record.naturalKey);
        return { ...base, success: true };
      } catch (error) {
        if (isAlreadyAbsent(error)) {
          return { ...base, success: true, alreadyAbsent: true };
        }
        throw error;
      }
  }
}

function planned(record: ChangeRecord): ItemResult {
  return {
    naturalKey: record.naturalKey,
    action: record.action,
    success: true,
    changedPaths: record.action === 'update' ? record.changedPaths : undefined,
  };
}

/**
 * Apply change records for one resource type
 *
 * @param type - Resource type the records belong to
 * @param changeRecords - Output of the diff engine
 * @param dryRun - Report without calling any mutating endpoint
 * @param api - Remote collaborator
 */
export async function reconcile(
  type: ResourceTypeDefinition,
  changeRecords: readonly ChangeRecord[],
  dryRun: boolean,
  api: ResourceApi,
  options: ReconcileOptions = {}
): Promise<ExecutionReport> {
  const log = (options.logger ?? defaultLogger).child({ resourceType: type.id });
  const results: ItemResult[] = [];

  for (const record of executionOrder(changeRecords)) {
    if (dryRun) {
      results.push(planned(record));
      continue;
    }

    try {
      const result = await execute(type, record, api);
      if (record.action !== 'unchanged') {
        log.info(`${record.action} ${record.naturalKey}`, {
          alreadyAbsent: result.alreadyAbsent,
        });
      }
      results.push(result);
    } catch (error) {
      const failure = new ExecutionError(type.id, record.naturalKey, toError(error));
      log.error(`${record.action} ${record.naturalKey} failed`, failure);
      results.push({
        naturalKey: record.naturalKey,
        action: record.action,
        success: false,
        changedPaths: record.action === 'update' ? record.changedPaths : undefined,
        error: failure.originalError?.message ?? failure.message,
      });
    }
  }

  return buildReport(type.id, dryRun, results);
}
