/**
 * Schema registry
 *
 * Holds the immutable resource type definitions and their per-dialect
 * schemas. Dialects are never merged here: the normalizer copies canonical
 * keys as-is and only translates keys found in the legacy field map, which
 * is what lets one document mix both dialects.
 */

import { getPath, leafPaths, splitPath, type Document } from '../engine/document.js';
import { UnknownSchemaError } from '../engine/errors.js';
import {
  DIALECTS,
  mappingPath,
  type Dialect,
  type ResourceTypeDefinition,
  type ResourceTypeRegistration,
  type Schema,
} from './types.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Registry of resource types and schemas
 */
export class SchemaRegistry {
  private readonly definitions = new Map<string, ResourceTypeDefinition>();
  private readonly schemas = new Map<string, Map<Dialect, Schema>>();

  /**
   * Register a resource type with its dialect schemas
   *
   * @throws Error if the resource type id is already registered
   */
  register(registration: ResourceTypeRegistration): this {
    const { definition } = registration;
    if (this.definitions.has(definition.id)) {
      throw new Error(`Resource type '${definition.id}' is already registered`);
    }

    const byDialect = new Map<Dialect, Schema>();
    for (const dialect of DIALECTS) {
      const schema = registration.schemas[dialect];
      if (!schema) continue;
      byDialect.set(
        dialect,
        deepFreeze({
          ...schema,
          resourceType: definition.id,
          dialect,
          defaultValues: structuredClone(schema.defaultValues),
        })
      );
    }

    this.definitions.set(definition.id, deepFreeze({ ...definition }));
    this.schemas.set(definition.id, byDialect);
    return this;
  }

  /**
   * Get the schema for a (resource type, dialect) pair
   *
   * @throws UnknownSchemaError when no schema is registered for the pair
   */
  getSchema(resourceType: string, dialect: Dialect): Schema {
    const schema = this.schemas.get(resourceType)?.get(dialect);
    if (!schema) {
      throw new UnknownSchemaError(resourceType, dialect);
    }
    return schema;
  }

  /**
   * @throws UnknownSchemaError for unregistered resource types
   */
  getResourceType(id: string): ResourceTypeDefinition {
    const definition = this.definitions.get(id);
    if (!definition) {
      throw new UnknownSchemaError(id);
    }
    return definition;
  }

  has(id: string): boolean {
    return this.definitions.has(id);
  }

  /**
   * All registered resource types, in registration order
   */
  list(): ResourceTypeDefinition[] {
    return Array.from(this.definitions.values());
  }

  /**
   * Dialects registered for a resource type
   */
  dialectsOf(resourceType: string): Dialect[] {
    return Array.from(this.schemas.get(resourceType)?.keys() ?? []);
  }

  /**
   * Pick a dialect from the key shape of a raw item.
   * Any key found in the legacy field map selects the legacy dialect.
   */
  detectDialect(resourceType: string, raw: Document): Dialect {
    const registered = this.schemas.get(resourceType);
    if (!registered || registered.size === 0) {
      throw new UnknownSchemaError(resourceType);
    }

    const legacy = registered.get('legacy');
    if (legacy && Object.keys(raw).some((key) => key in legacy.fieldMap)) {
      return 'legacy';
    }
    return registered.has('current') ? 'current' : 'legacy';
  }
}

/**
 * Top-level attribute names the schema knows as canonical
 */
export function canonicalRoots(schema: Schema): Set<string> {
  const roots = new Set<string>(Object.keys(schema.defaultValues));
  for (const path of schema.requiredFields) {
    roots.add(splitPath(path)[0]);
  }
  for (const mapping of Object.values(schema.fieldMap)) {
    roots.add(splitPath(mappingPath(mapping))[0]);
  }
  return roots;
}

/**
 * Paths whose schema default is `null`.
 * Absent and `null` compare equal only at these paths.
 */
export function nullablePaths(schema: Schema): Set<string> {
  const defaults = schema.defaultValues;
  return new Set(
    leafPaths(defaults).filter((path) => getPath(defaults, path) === null)
  );
}
