/**
 * Diff engine
 *
 * Compares the canonical desired set with the observed remote set by natural
 * key and classifies every item as create, update, delete or unchanged.
 *
 * Notes:
 * - Updates carry the complete canonical item: the API replaces whole
 *   documents, changed paths are reported for observability only
 * - Read-only (built-in) and protected remote items are filtered out before
 *   diffing; they are never updated or deleted
 * - A renamed item shows up as delete-of-old plus create-of-new, the API has
 *   no identifier that survives a rename
 */

import {
  cloneDeep,
  deepEqual,
  deletePath,
  getPath,
  keyToString,
  leafPaths,
  type Document,
} from './document.js';
import type { CanonicalItem } from './normalize.js';

/**
 * Item as returned by the API; assumed canonical
 */
export type RemoteItem = Document;

/**
 * A single attribute difference
 */
export interface FieldChange {
  path: string;
  remote: unknown;
  desired: unknown;
}

export type ChangeAction = 'create' | 'update' | 'delete' | 'unchanged';

export interface CreateRecord {
  action: 'create';
  naturalKey: string;
  item: CanonicalItem;
}

export interface UpdateRecord {
  action: 'update';
  naturalKey: string;
  /** Sorted dotted paths that differ */
  changedPaths: string[];
  changes: FieldChange[];
  item: CanonicalItem;
}

export interface DeleteRecord {
  action: 'delete';
  naturalKey: string;
}

export interface UnchangedRecord {
  action: 'unchanged';
  naturalKey: string;
}

export type ChangeRecord = CreateRecord | UpdateRecord | DeleteRecord | UnchangedRecord;

/**
 * Options for the diff operation
 */
export interface DiffOptions {
  /** Paths excluded from comparison (server-generated or write-only) */
  ignorePaths?: Iterable<string>;
  /** Paths where an absent value equals `null` */
  nullablePaths?: Iterable<string>;
  /** Remote flag marking system-managed items */
  readOnlyField?: string;
  /** Natural keys never updated or deleted */
  protectedKeys?: Iterable<string>;
  /** Natural keys whose desired item could not be built; never deleted */
  skipKeys?: Iterable<string>;
  /** When false, matching items are always unchanged */
  updatable?: boolean;
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Check if a remote item is flagged as read-only/system-managed
 */
export function isReadOnlyItem(item: RemoteItem, readOnlyField: string | undefined): boolean {
  return readOnlyField !== undefined && item[readOnlyField] === true;
}

/**
 * Index items by natural key; items without a usable key are dropped
 */
export function indexByKey<T extends Document>(items: readonly T[], naturalKeyField: string): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    const key = keyToString(getPath(item, naturalKeyField));
    if (key !== undefined) {
      index.set(key, item);
    }
  }
  return index;
}

/**
 * Compute the attribute-level differences between a desired and a remote item
 */
export function computeChanges(
  desired: Document,
  remote: Document,
  options: Pick<DiffOptions, 'ignorePaths' | 'nullablePaths'> = {}
): FieldChange[] {
  const nullable = new Set(options.nullablePaths ?? []);
  const left = cloneDeep(desired);
  const right = cloneDeep(remote);
  for (const path of options.ignorePaths ?? []) {
    deletePath(left, path);
    deletePath(right, path);
  }

  const paths = new Set<string>([...leafPaths(left), ...leafPaths(right)]);
  const changes: FieldChange[] = [];

  for (const path of Array.from(paths).sort(compareKeys)) {
    const desiredValue = getPath(left, path);
    const remoteValue = getPath(right, path);

    if (deepEqual(desiredValue, remoteValue)) continue;

    const absentVersusNull =
      (desiredValue === undefined && remoteValue === null) ||
      (desiredValue === null && remoteValue === undefined);
    if (absentVersusNull && nullable.has(path)) continue;

    changes.push({ path, remote: remoteValue, desired: desiredValue });
  }

  return changes;
}

/**
 * Main diff function - classifies desired and remote items by natural key.
 * Desired items come first in natural-key order, then deletions.
 */
export function diff(
  desiredSet: readonly CanonicalItem[],
  remoteSet: readonly RemoteItem[],
  naturalKeyField: string,
  options: DiffOptions = {}
): ChangeRecord[] {
  const protectedKeys = new Set(options.protectedKeys ?? []);
  const skipKeys = new Set(options.skipKeys ?? []);
  const updatable = options.updatable ?? true;
  const ignorePaths = [
    ...(options.ignorePaths ?? []),
    ...(options.readOnlyField ? [options.readOnlyField] : []),
  ];

  const desiredByKey = indexByKey(desiredSet, naturalKeyField);
  const allRemote = indexByKey(remoteSet, naturalKeyField);

  // Built-in and protected items are out of scope entirely
  const excluded = new Set<string>();
  const remoteByKey = new Map<string, RemoteItem>();
  for (const [key, item] of allRemote) {
    if (isReadOnlyItem(item, options.readOnlyField) || protectedKeys.has(key)) {
      excluded.add(key);
    } else {
      remoteByKey.set(key, item);
    }
  }

  const records: ChangeRecord[] = [];

  for (const key of Array.from(desiredByKey.keys()).sort(compareKeys)) {
    const item = desiredByKey.get(key);
    if (!item) continue;

    if (excluded.has(key) || protectedKeys.has(key)) {
      records.push({ action: 'unchanged', naturalKey: key });
      continue;
    }

    const remote = remoteByKey.get(key);
    if (!remote) {
      records.push({ action: 'create', naturalKey: key, item });
      continue;
    }

    const changes = updatable
      ? computeChanges(item, remote, { ignorePaths, nullablePaths: options.nullablePaths })
      : [];

    if (changes.length > 0) {
      records.push({
        action: 'update',
        naturalKey: key,
        changedPaths: changes.map((change) => change.path),
        changes,
        item,
      });
    } else {
      records.push({ action: 'unchanged', naturalKey: key });
    }
  }

  for (const key of Array.from(remoteByKey.keys()).sort(compareKeys)) {
    if (desiredByKey.has(key) || skipKeys.has(key)) continue;
    records.push({ action: 'delete', naturalKey: key });
  }

  return records;
}

/**
 * Diff a settings singleton. There is nothing to create or delete: the
 * document is either replaced or left alone. A missing remote document is
 * treated as empty.
 */
export function diffSingleton(
  desired: CanonicalItem,
  remote: RemoteItem | undefined,
  naturalKey: string,
  options: Pick<DiffOptions, 'ignorePaths' | 'nullablePaths'> = {}
): UpdateRecord | UnchangedRecord {
  const changes = computeChanges(desired, remote ?? {}, options);
  if (changes.length === 0) {
    return { action: 'unchanged', naturalKey };
  }
  return {
    action: 'update',
    naturalKey,
    changedPaths: changes.map((change) => change.path),
    changes,
    item: desired,
  };
}

/**
 * Count records per action
 */
export function summarizeChanges(records: readonly ChangeRecord[]): Record<ChangeAction, number> {
  const summary: Record<ChangeAction, number> = { create: 0, update: 0, delete: 0, unchanged: 0 };
  for (const record of records) {
    summary[record.action]++;
  }
  return summary;
}

/**
 * Whether any record requires a mutating call
 */
export function hasChanges(records: readonly ChangeRecord[]): boolean {
  return records.some((record) => record.action !== 'unchanged');
}
