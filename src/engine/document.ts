/**
 * Nested document helpers
 *
 * Desired and remote resources are exchanged as JSON-like trees. Attribute
 * locations inside them are addressed by dotted paths
 * (e.g. `storage.blobStoreName`).
 */

/**
 * A JSON-like mapping
 */
export type Document = Record<string, unknown>;

/**
 * Check if a value is a plain mapping (not an array, not null)
 */
export function isPlainObject(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a dotted path into its segments
 */
export function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

/**
 * Read the value at a dotted path; `undefined` if any segment is missing
 */
export function getPath(doc: Document, path: string): unknown {
  let current: unknown = doc;
  for (const segment of splitPath(path)) {
    if (!isPlainObject(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Write a value at a dotted path, creating intermediate mappings.
 * A non-mapping value sitting on the way is replaced.
 */
export function setPath(doc: Document, path: string, value: unknown): void {
  const segments = splitPath(path);
  if (segments.length === 0) {
    return;
  }

  let current = doc;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Document = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

/**
 * Remove the value at a dotted path (no-op if absent)
 */
export function deletePath(doc: Document, path: string): void {
  const segments = splitPath(path);
  if (segments.length === 0) {
    return;
  }
  const parent = segments.length === 1 ? doc : getPath(doc, segments.slice(0, -1).join('.'));
  if (isPlainObject(parent)) {
    delete parent[segments[segments.length - 1]];
  }
}

/**
 * Deep copy of a JSON-like value
 */
export function cloneDeep<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Flatten a document into its leaf paths.
 * Scalars, arrays and empty mappings are leaves.
 */
export function leafPaths(doc: Document, prefix = ''): string[] {
  const paths: string[] = [];
  for (const [key, value] of Object.entries(doc)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value) && Object.keys(value).length > 0) {
      paths.push(...leafPaths(value, path));
    } else {
      paths.push(path);
    }
  }
  return paths;
}

/**
 * Deep structural equality; key order is irrelevant, array order is not
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => deepEqual(item, b[index]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) {
      return false;
    }
    return keysA.every((key) => key in b && deepEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Render a natural-key value as a string
 */
export function keyToString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}
