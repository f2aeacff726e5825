/**
 * Reconciliation pipeline
 *
 * Runs every requested resource type through
 *   merge defaults → detect dialect → normalize → fetch remote → diff → reconcile
 * in dependency order, one type at a time.
 *
 * Failure handling:
 * - A desired item that cannot be normalized fails alone; its natural key is
 *   never deleted remotely
 * - A resource type whose remote state cannot be fetched fails as a whole,
 *   and every type depending on it is skipped
 * - Pro-only types are skipped with zero changes when the feature is unavailable
 */

import type { ResourceApi } from '../api/resources.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import { nullablePaths } from '../schemas/registry.js';
import type { Dialect, ResourceCategory, ResourceTypeDefinition } from '../schemas/types.js';
import { getPath, keyToString, type Document } from './document.js';
import { mergeWithLayers, type DefaultLayers } from './merge.js';
import { normalizeItem, type CanonicalItem } from './normalize.js';
import { diff, diffSingleton, type ChangeRecord, type DiffOptions } from './diff.js';
import { dependenciesOf, order } from './order.js';
import {
  buildReport,
  emptySummary,
  reconcile,
  type ExecutionReport,
  type ExecutionSummary,
  type ItemResult,
} from './reconcile.js';
import { NormalizationError, RemoteFetchError, formatError, isReconcileError, toError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Desired state of one resource type, as supplied by the config loader
 */
export interface ResourceInput {
  /** Raw items; singletons carry exactly one */
  items: Document[];
  /** Global, type and format default layers */
  layers?: DefaultLayers;
  /** Force a dialect instead of detecting it from key shape */
  dialect?: Dialect;
}

export type DesiredState = Readonly<Record<string, ResourceInput>>;

export type TypeStatus = 'reconciled' | 'skipped' | 'failed';

export interface TypeReport {
  resourceType: string;
  status: TypeStatus;
  /** Why the type was skipped or failed */
  reason?: string;
  execution: ExecutionReport;
}

export interface RunReport {
  dryRun: boolean;
  types: TypeReport[];
  summary: ExecutionSummary;
  success: boolean;
}

export interface PipelineOptions {
  registry: SchemaRegistry;
  api: ResourceApi;
  desired: DesiredState;
  dryRun: boolean;
  /** Resource type ids, categories or `repositories`; all types when empty */
  only?: readonly string[];
  /** Whether Pro-only resource types may be reconciled */
  proFeatureAvailable: boolean;
  logger?: ApiLogger;
}

/**
 * Canonical desired set of one resource type
 */
export interface DesiredSet {
  items: CanonicalItem[];
  /** Per-item failures (normalization, duplicate keys) */
  invalid: ItemResult[];
  /** Natural keys that must not be deleted remotely */
  skipKeys: Set<string>;
  /** An invalid item had no usable key: no delete is safe */
  suppressDeletes: boolean;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Whether a resource type matches an `--only` selector
 */
export function matchesSelector(type: ResourceTypeDefinition, selector: string): boolean {
  return (
    selector === type.id ||
    selector === type.category ||
    (selector === 'repositories' && type.repositoryType !== undefined)
  );
}

function isSelected(type: ResourceTypeDefinition, only: readonly string[] | undefined): boolean {
  return !only || only.length === 0 || only.some((selector) => matchesSelector(type, selector));
}

// =============================================================================
// Stages
// =============================================================================

/**
 * Merge defaults into, and normalize, every raw item of one resource type
 */
export function buildDesiredSet(
  registry: SchemaRegistry,
  type: ResourceTypeDefinition,
  input: ResourceInput,
  log: ApiLogger = defaultLogger
): DesiredSet {
  const normalized: { key: string; item: CanonicalItem }[] = [];
  const invalid: ItemResult[] = [];
  const skipKeys = new Set<string>();
  let suppressDeletes = false;

  input.items.forEach((raw, index) => {
    const merged = mergeWithLayers(input.layers ?? {}, raw);
    const dialect = input.dialect ?? registry.detectDialect(type.id, merged);
    const schema = registry.getSchema(type.id, dialect);

    try {
      const result = normalizeItem(merged, schema, { naturalKeyField: type.naturalKeyField });
      if (result.passthroughKeys.length > 0) {
        log.debug(`Passing through unknown keys`, {
          resourceType: type.id,
          keys: result.passthroughKeys,
        });
      }
      const key =
        type.kind === 'singleton' ? type.id : keyToString(getPath(result.item, type.naturalKeyField));
      if (key === undefined) {
        suppressDeletes = true;
        invalid.push({
          naturalKey: `#${index + 1}`,
          action: 'invalid',
          success: false,
          error: `Natural key '${type.naturalKeyField}' of ${type.id} must be a scalar value`,
        });
        return;
      }
      normalized.push({ key, item: result.item });
    } catch (error) {
      if (!(error instanceof NormalizationError)) throw error;
      const key = error.naturalKey ?? keyToString(getPath(merged, type.naturalKeyField));
      if (key === undefined) {
        suppressDeletes = true;
      } else {
        skipKeys.add(key);
      }
      invalid.push({
        naturalKey: key ?? `#${index + 1}`,
        action: 'invalid',
        success: false,
        error: error.message,
      });
    }
  });

  // Duplicated natural keys are ambiguous: reject every occurrence
  const counts = new Map<string, number>();
  for (const { key } of normalized) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const items: CanonicalItem[] = [];
  for (const { key, item } of normalized) {
    if ((counts.get(key) ?? 0) > 1) {
      skipKeys.add(key);
      invalid.push({
        naturalKey: key,
        action: 'invalid',
        success: false,
        error: `duplicate natural key '${key}' in desired state`,
      });
      continue;
    }
    items.push(item);
  }

  return { items, invalid, skipKeys, suppressDeletes };
}

/**
 * Diff options derived from a resource type and its schema
 */
export function diffOptionsFor(registry: SchemaRegistry, type: ResourceTypeDefinition): DiffOptions {
  const nullable = new Set<string>();
  for (const dialect of registry.dialectsOf(type.id)) {
    for (const path of nullablePaths(registry.getSchema(type.id, dialect))) {
      nullable.add(path);
    }
  }
  return {
    ignorePaths: [...(type.systemPaths ?? []), ...(type.writeOnlyPaths ?? [])],
    nullablePaths: nullable,
    readOnlyField: type.readOnlyField,
    protectedKeys: type.protectedKeys,
    updatable: type.updatable,
  };
}

/**
 * Classify desired against remote for one resource type
 */
export function planChanges(
  registry: SchemaRegistry,
  type: ResourceTypeDefinition,
  desired: DesiredSet,
  remote: Document[],
  log: ApiLogger = defaultLogger
): ChangeRecord[] {
  const options = { ...diffOptionsFor(registry, type), skipKeys: desired.skipKeys };

  if (type.kind === 'singleton') {
    const [item] = desired.items;
    return item ? [diffSingleton(item, remote[0], type.id, options)] : [];
  }

  const records = diff(desired.items, remote, type.naturalKeyField, options);
  if (!desired.suppressDeletes) {
    return records;
  }

  const withheld = records.filter((record) => record.action === 'delete');
  if (withheld.length > 0) {
    log.warn(`Withholding ${withheld.length} deletion(s): an invalid item has no natural key`, {
      resourceType: type.id,
    });
  }
  return records.filter((record) => record.action !== 'delete');
}

// =============================================================================
// Pipeline
// =============================================================================

function typeFailure(resourceType: string, dryRun: boolean, reason: string): TypeReport {
  const execution = buildReport(resourceType, dryRun, []);
  return {
    resourceType,
    status: 'failed',
    reason,
    execution: { ...execution, errors: [reason], success: false },
  };
}

function typeSkipped(resourceType: string, dryRun: boolean, reason: string): TypeReport {
  return { resourceType, status: 'skipped', reason, execution: buildReport(resourceType, dryRun, []) };
}

function addSummaries(total: ExecutionSummary, part: ExecutionSummary): void {
  total.created += part.created;
  total.updated += part.updated;
  total.deleted += part.deleted;
  total.unchanged += part.unchanged;
  total.failed += part.failed;
}

async function runType(
  options: PipelineOptions,
  type: ResourceTypeDefinition,
  input: ResourceInput,
  log: ApiLogger
): Promise<TypeReport> {
  const desired = buildDesiredSet(options.registry, type, input, log);

  let remote: Document[];
  try {
    remote = await options.api.list(type);
  } catch (error) {
    const failure = new RemoteFetchError(type.id, toError(error));
    log.error(failure.message, failure.originalError);
    return typeFailure(type.id, options.dryRun, failure.message);
  }

  const records = planChanges(options.registry, type, desired, remote, log);
  const execution = await reconcile(type, records, options.dryRun, options.api, { logger: log });
  const report = buildReport(type.id, options.dryRun, [...desired.invalid, ...execution.results]);

  return { resourceType: type.id, status: 'reconciled', execution: report };
}

/**
 * Reconcile every resource type present in the desired state
 */
export async function runReconciliation(options: PipelineOptions): Promise<RunReport> {
  const log = options.logger ?? defaultLogger;
  const reports: TypeReport[] = [];

  const requested: ResourceTypeDefinition[] = [];
  for (const id of Object.keys(options.desired)) {
    if (!options.registry.has(id)) {
      reports.push(typeFailure(id, options.dryRun, `Unknown resource type '${id}'`));
      continue;
    }
    const type = options.registry.getResourceType(id);
    if (isSelected(type, options.only)) {
      requested.push(type);
    }
  }

  const failedCategories = new Set<ResourceCategory>();

  for (const type of order(requested)) {
    const typeLog = log.child({ resourceType: type.id });

    if (type.requiresProFeature && !options.proFeatureAvailable) {
      typeLog.info('Skipping: Pro feature not available');
      reports.push(typeSkipped(type.id, options.dryRun, 'Pro feature not available'));
      continue;
    }

    const blockedBy = Array.from(dependenciesOf(type.category)).filter((category) =>
      failedCategories.has(category)
    );
    if (blockedBy.length > 0) {
      const reason = `Skipped: depends on failed ${blockedBy.join(', ')}`;
      typeLog.warn(reason);
      failedCategories.add(type.category);
      reports.push({ ...typeFailure(type.id, options.dryRun, reason), status: 'skipped' });
      continue;
    }

    const input = options.desired[type.id];
    if (!input) continue;

    try {
      const report = await runType(options, type, input, typeLog);
      if (report.status === 'failed') {
        failedCategories.add(type.category);
      }
      reports.push(report);
    } catch (error) {
      // UnknownSchemaError for a forced dialect, or an unexpected failure
      const message = isReconcileError(error) ? error.message : formatError(error);
      typeLog.error(message, toError(error));
      failedCategories.add(type.category);
      reports.push(typeFailure(type.id, options.dryRun, message));
    }
  }

  const summary = emptySummary();
  for (const report of reports) {
    addSummaries(summary, report.execution.summary);
  }

  return {
    dryRun: options.dryRun,
    types: reports,
    summary,
    success: reports.every((report) => report.execution.success),
  };
}
