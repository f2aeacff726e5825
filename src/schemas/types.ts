/**
 * Schema registry types
 *
 * A resource type describes one configuration domain of the server
 * (a repository format/type pair, roles, cleanup policies, …). Each resource
 * type owns one schema per input dialect.
 */

import type { Document } from '../engine/document.js';

/**
 * Input key-shape conventions
 * - current: nested canonical keys, exactly what the API accepts
 * - legacy: flat snake_case keys from older role variables
 */
export type Dialect = 'current' | 'legacy';

export const DIALECTS: readonly Dialect[] = ['current', 'legacy'];

/**
 * Repository types
 */
export type RepositoryType = 'hosted' | 'proxy' | 'group';

/**
 * Resource categories; each maps to one stage of the dependency table
 */
export type ResourceCategory =
  | 'blob-store'
  | 'cleanup-policy'
  | 'routing-rule'
  | 'content-selector'
  | 'ssl-certificate'
  | 'ldap-connection'
  | 'security-realms'
  | 'privilege'
  | 'role'
  | 'user'
  | 'anonymous-access'
  | 'user-tokens'
  | 'hosted-repository'
  | 'proxy-repository'
  | 'group-repository';

/**
 * Collections hold many items keyed by a natural key; singletons are one
 * settings document that can only be updated
 */
export type ResourceKind = 'collection' | 'singleton';

/**
 * Static description of a resource type
 */
export interface ResourceTypeDefinition {
  /** Unique id, e.g. "maven2-hosted-repository" or "role" */
  id: string;
  category: ResourceCategory;
  kind: ResourceKind;
  /** Attribute used to correlate desired and remote items; empty for singletons */
  naturalKeyField: string;
  /** Whether the repository format also has a group variant */
  supportsGroupVariant: boolean;
  /** Only reconciled when the Pro feature set is licensed */
  requiresProFeature: boolean;
  /** False for immutable objects (matching items are never updated) */
  updatable: boolean;
  /** Remote flag marking built-in, system-managed items */
  readOnlyField?: string;
  /** Natural keys that are never updated or deleted */
  protectedKeys?: readonly string[];
  /** Server-generated attributes ignored when diffing */
  systemPaths?: readonly string[];
  /** Attributes the API accepts but never returns (passwords) */
  writeOnlyPaths?: readonly string[];
  /** Repository format as used by the API (repository types only) */
  format?: string;
  /** Repository type (repository types only) */
  repositoryType?: RepositoryType;
  /** One-line description for `nexus-reconcile types` */
  description: string;
}

/**
 * Value transform applied when a legacy key is translated
 * Returning `undefined` drops the key.
 */
export type ValueTransform = (value: unknown) => unknown;

/**
 * Target of a legacy key: a dotted canonical path, optionally transformed
 */
export type FieldMapping = string | { path: string; transform: ValueTransform };

/**
 * A problem found by a schema's finalize hook
 */
export interface SchemaProblem {
  path: string;
  message: string;
}

/**
 * Derives computed attributes after mapping and defaulting.
 * Mutates the item and returns any problems found.
 */
export type FinalizeHook = (item: Document) => SchemaProblem[];

/**
 * Schema for one (resource type, dialect) pair
 */
export interface Schema {
  resourceType: string;
  dialect: Dialect;
  /** Legacy key → canonical dotted path */
  fieldMap: Readonly<Record<string, FieldMapping>>;
  /** Merged underneath at the lowest precedence */
  defaultValues: Readonly<Document>;
  /** Dotted paths that must be present after normalization */
  requiredFields: readonly string[];
  finalize?: FinalizeHook;
}

/**
 * Schema input as written by the definitions (dialect and type are filled in)
 */
export type SchemaSpec = Omit<Schema, 'resourceType' | 'dialect'>;

/**
 * A resource type together with its dialect schemas
 */
export interface ResourceTypeRegistration {
  definition: ResourceTypeDefinition;
  schemas: Partial<Record<Dialect, SchemaSpec>>;
}

/**
 * Resolve a field mapping to its path
 */
export function mappingPath(mapping: FieldMapping): string {
  return typeof mapping === 'string' ? mapping : mapping.path;
}
