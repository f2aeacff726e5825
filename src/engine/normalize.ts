/**
 * Field normalizer
 *
 * Turns one merged raw item into the canonical document the API accepts:
 * 1. Dotted keys are written at their path
 * 2. Legacy keys from the schema field map are translated to their canonical path
 * 3. Everything else is copied under its own name (unknown keys pass through)
 * 4. Schema defaults fill paths that are still empty
 * 5. The schema's finalize hook derives computed attributes
 * 6. Required fields are validated
 *
 * When one item carries the same attribute in both dialects, the key applied
 * last in iteration order wins.
 */

import type { Schema } from '../schemas/types.js';
import { canonicalRoots } from '../schemas/registry.js';
import {
  cloneDeep,
  getPath,
  isPlainObject,
  keyToString,
  leafPaths,
  setPath,
  type Document,
} from './document.js';
import { deepMerge } from './merge.js';
import { NormalizationError } from './errors.js';

/**
 * Canonical, fully-defaulted item
 */
export type CanonicalItem = Document;

export interface NormalizeOptions {
  /** Attribute holding the natural key (for error reporting) */
  naturalKeyField?: string;
}

export interface NormalizeResult {
  item: CanonicalItem;
  /** Keys copied through because the schema does not know them */
  passthroughKeys: string[];
  /** Legacy keys that were translated */
  translatedKeys: string[];
}

/**
 * Write a value at a path; mappings merge into an existing mapping,
 * anything else replaces what is there
 */
function writeValue(target: Document, path: string, value: unknown): void {
  const existing = getPath(target, path);
  if (isPlainObject(existing) && isPlainObject(value)) {
    setPath(target, path, deepMerge(existing, value));
  } else {
    setPath(target, path, cloneDeep(value));
  }
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

/**
 * Normalize a raw item, reporting which keys were translated or passed through
 *
 * @throws NormalizationError when a required field is missing or the
 *   schema's finalize hook reports a problem
 */
export function normalizeItem(
  mergedRaw: Document,
  schema: Schema,
  options: NormalizeOptions = {}
): NormalizeResult {
  const naturalKeyField = options.naturalKeyField ?? 'name';
  const roots = canonicalRoots(schema);
  const item: CanonicalItem = {};
  const passthroughKeys: string[] = [];
  const translatedKeys: string[] = [];

  for (const [key, value] of Object.entries(mergedRaw)) {
    if (value === undefined) continue;

    if (key.includes('.')) {
      writeValue(item, key, value);
      continue;
    }

    const mapping = schema.fieldMap[key];
    if (mapping !== undefined) {
      translatedKeys.push(key);
      const path = typeof mapping === 'string' ? mapping : mapping.path;
      const mapped = typeof mapping === 'string' ? value : mapping.transform(value);
      if (mapped !== undefined) {
        writeValue(item, path, mapped);
      }
      continue;
    }

    if (!roots.has(key)) {
      passthroughKeys.push(key);
    }
    writeValue(item, key, value);
  }

  const defaults = schema.defaultValues;
  for (const path of leafPaths(defaults)) {
    if (isMissing(getPath(item, path))) {
      setPath(item, path, cloneDeep(getPath(defaults, path)));
    }
  }

  if (schema.finalize) {
    const problems = schema.finalize(item);
    if (problems.length > 0) {
      const [first] = problems;
      const naturalKey = keyToString(getPath(item, naturalKeyField));
      throw new NormalizationError(
        schema.resourceType,
        naturalKey,
        first.path,
        `${schema.resourceType} '${naturalKey ?? '(unnamed item)'}': ${first.message}`
      );
    }
  }

  for (const path of schema.requiredFields) {
    if (isMissing(getPath(item, path))) {
      throw new NormalizationError(
        schema.resourceType,
        keyToString(getPath(item, naturalKeyField)),
        path
      );
    }
  }

  return { item, passthroughKeys, translatedKeys };
}

/**
 * Normalize a raw item into its canonical form
 *
 * @throws NormalizationError
 */
export function normalize(
  mergedRaw: Document,
  schema: Schema,
  options: NormalizeOptions = {}
): CanonicalItem {
  return normalizeItem(mergedRaw, schema, options).item;
}
