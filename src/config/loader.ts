/**
 * Desired-state YAML loading
 *
 * Reads the operator's desired-state file and turns it into per-resource-type
 * inputs for the pipeline: raw items plus the default layers that apply to
 * them.
 *
 * File layout:
 *   defaults:
 *     repositories: { global, hosted, proxy, group, formats: { <format>: … } }
 *     <resource type id>: { … }          # type layer for other resource types
 *   dialects:
 *     <type id | category | repositories>: current | legacy
 *   resources:
 *     <resource type id>: [ … ]          # singletons take one mapping
 *     repositories:
 *       <format>: { hosted: [ … ], proxy: [ … ], group: [ … ] }
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isPlainObject, type Document } from '../engine/document.js';
import type { DefaultLayers } from '../engine/merge.js';
import { matchesSelector, type DesiredState, type ResourceInput } from '../engine/pipeline.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import { REPOSITORY_FORMATS, repositoryTypeId } from '../schemas/definitions/repositories.js';
import { DIALECTS, type Dialect, type RepositoryType, type ResourceCategory } from '../schemas/types.js';

// =============================================================================
// Errors
// =============================================================================

export type ConfigErrorCode = 'CONFIG_NOT_FOUND' | 'CONFIG_PARSE_ERROR' | 'CONFIG_INVALID';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_CONFIG_PATH = 'nexus-reconcile.yaml';

const REPOSITORY_TYPES: readonly RepositoryType[] = ['hosted', 'proxy', 'group'];

export interface LoadOptions {
  /** Directory relative paths resolve against (defaults to cwd) */
  basePath?: string;
}

/**
 * Repository defaults block
 */
interface RepositoryDefaults {
  global?: Document;
  byType: Partial<Record<RepositoryType, Document>>;
  byFormat: Record<string, Document>;
}

// =============================================================================
// Helpers
// =============================================================================

function optionalMapping(value: unknown, path: string, issues: string[]): Document | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isPlainObject(value)) {
    issues.push(`${path} must be a mapping`);
    return undefined;
  }
  return value;
}

function itemList(value: unknown, path: string, issues: string[]): Document[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    issues.push(`${path} must be a list of mappings`);
    return [];
  }
  const items: Document[] = [];
  value.forEach((entry: unknown, index) => {
    if (isPlainObject(entry)) {
      items.push(entry);
    } else {
      issues.push(`${path}[${index}] must be a mapping`);
    }
  });
  return items;
}

function isDialect(value: unknown): value is Dialect {
  return typeof value === 'string' && DIALECTS.some((dialect) => dialect === value);
}

function isRepositoryType(value: string): value is RepositoryType {
  return REPOSITORY_TYPES.some((type) => type === value);
}

// =============================================================================
// Sections
// =============================================================================

function readRepositoryDefaults(value: unknown, issues: string[]): RepositoryDefaults {
  const result: RepositoryDefaults = { byType: {}, byFormat: {} };
  const block = optionalMapping(value, 'defaults.repositories', issues);
  if (!block) return result;

  for (const [key, layer] of Object.entries(block)) {
    const path = `defaults.repositories.${key}`;
    if (key === 'global') {
      result.global = optionalMapping(layer, path, issues);
    } else if (key === 'formats') {
      for (const [format, formatLayer] of Object.entries(optionalMapping(layer, path, issues) ?? {})) {
        if (!REPOSITORY_FORMATS.some((known) => known.format === format)) {
          issues.push(`${path}.${format}: unknown repository format`);
          continue;
        }
        const mapping = optionalMapping(formatLayer, `${path}.${format}`, issues);
        if (mapping) result.byFormat[format] = mapping;
      }
    } else if (isRepositoryType(key)) {
      result.byType[key] = optionalMapping(layer, path, issues);
    } else {
      issues.push(`${path}: expected global, hosted, proxy, group or formats`);
    }
  }
  return result;
}

function readDialects(value: unknown, issues: string[]): Map<string, Dialect> {
  const result = new Map<string, Dialect>();
  for (const [selector, dialect] of Object.entries(optionalMapping(value, 'dialects', issues) ?? {})) {
    if (isDialect(dialect)) {
      result.set(selector, dialect);
    } else {
      issues.push(`dialects.${selector} must be one of ${DIALECTS.join(', ')}`);
    }
  }
  return result;
}

function singletonItems(
  value: unknown,
  path: string,
  category: ResourceCategory,
  issues: string[]
): Document[] {
  if (value === undefined || value === null) return [];
  // `anonymous-access: true` is shorthand for `{ enabled: true }`
  if (typeof value === 'boolean') return [{ enabled: value }];
  // A realm list is the server's own shape for the active realms
  if (category === 'security-realms' && Array.isArray(value)) {
    if (!value.every((realm) => typeof realm === 'string')) {
      issues.push(`${path} must list realm names`);
      return [];
    }
    return [{ active: value }];
  }
  if (!isPlainObject(value)) {
    issues.push(`${path} must be a mapping`);
    return [];
  }
  return [value];
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Turn a parsed desired-state document into pipeline inputs
 *
 * Resource type ids the registry does not know are kept, so the run can
 * report them as failed instead of silently ignoring them.
 *
 * @throws ConfigError (CONFIG_INVALID) listing every structural problem found
 */
export function buildDesiredState(
  document: unknown,
  registry: SchemaRegistry,
  sourcePath?: string
): DesiredState {
  const issues: string[] = [];
  const root = document === null || document === undefined ? {} : document;
  if (!isPlainObject(root)) {
    throw new ConfigError('Desired state must be a mapping', 'CONFIG_INVALID', { path: sourcePath });
  }

  for (const key of Object.keys(root)) {
    if (key !== 'defaults' && key !== 'dialects' && key !== 'resources') {
      issues.push(`${key}: unknown top-level key (expected defaults, dialects, resources)`);
    }
  }

  const defaults = optionalMapping(root.defaults, 'defaults', issues) ?? {};
  const repositoryDefaults = readRepositoryDefaults(defaults.repositories, issues);
  const typeDefaults = new Map<string, Document>();
  for (const [id, layer] of Object.entries(defaults)) {
    if (id === 'repositories') continue;
    const mapping = optionalMapping(layer, `defaults.${id}`, issues);
    if (mapping) typeDefaults.set(id, mapping);
  }

  const dialects = readDialects(root.dialects, issues);
  const dialectFor = (id: string): Dialect | undefined => {
    if (dialects.has(id)) return dialects.get(id);
    if (!registry.has(id)) return undefined;
    const type = registry.getResourceType(id);
    for (const [selector, dialect] of dialects) {
      if (matchesSelector(type, selector)) return dialect;
    }
    return undefined;
  };

  const desired: Record<string, ResourceInput> = {};
  const add = (id: string, items: Document[], layers: DefaultLayers): void => {
    const dialect = dialectFor(id);
    desired[id] = dialect ? { items, layers, dialect } : { items, layers };
  };

  const resources = optionalMapping(root.resources, 'resources', issues) ?? {};
  for (const [key, value] of Object.entries(resources)) {
    if (key === 'repositories') {
      const formats = optionalMapping(value, 'resources.repositories', issues) ?? {};
      for (const [format, byType] of Object.entries(formats)) {
        const known = REPOSITORY_FORMATS.find((candidate) => candidate.format === format);
        if (!known) {
          issues.push(`resources.repositories.${format}: unknown repository format`);
          continue;
        }
        for (const [type, list] of Object.entries(
          optionalMapping(byType, `resources.repositories.${format}`, issues) ?? {}
        )) {
          const path = `resources.repositories.${format}.${type}`;
          if (!isRepositoryType(type) || !known.types.includes(type)) {
            issues.push(`${path}: ${format} has no ${type} repositories`);
            continue;
          }
          add(repositoryTypeId(format, type), itemList(list, path, issues), {
            global: repositoryDefaults.global,
            type: repositoryDefaults.byType[type],
            format: repositoryDefaults.byFormat[format],
          });
        }
      }
      continue;
    }

    const path = `resources.${key}`;
    const definition = registry.has(key) ? registry.getResourceType(key) : undefined;
    let items: Document[];
    if (definition?.kind === 'singleton') {
      items = singletonItems(value, path, definition.category, issues);
    } else if (!registry.has(key) && isPlainObject(value)) {
      items = [value];
    } else {
      items = itemList(value, path, issues);
    }
    add(key, items, { type: typeDefaults.get(key) });
  }

  if (issues.length > 0) {
    throw new ConfigError(
      `Invalid desired state${sourcePath ? ` in ${sourcePath}` : ''}:\n  - ${issues.join('\n  - ')}`,
      'CONFIG_INVALID',
      { path: sourcePath, issues }
    );
  }

  return desired;
}

/**
 * Parse desired-state YAML text
 *
 * @throws ConfigError (CONFIG_PARSE_ERROR, CONFIG_INVALID)
 */
export function parseDesiredState(
  content: string,
  registry: SchemaRegistry,
  sourcePath?: string
): DesiredState {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse desired state YAML: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR',
      { path: sourcePath, originalError: err }
    );
  }
  return buildDesiredState(document, registry, sourcePath);
}

/**
 * Load and parse a desired-state file
 *
 * @throws ConfigError if the file is missing, unreadable, malformed or invalid
 */
export async function loadDesiredState(
  configPath: string,
  registry: SchemaRegistry,
  options: LoadOptions = {}
): Promise<DesiredState> {
  const absolutePath = isAbsolute(configPath)
    ? configPath
    : resolve(options.basePath ?? process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Desired state file not found: ${absolutePath}`, 'CONFIG_NOT_FOUND', {
      path: absolutePath,
    });
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read desired state file: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_NOT_FOUND',
      { path: absolutePath, originalError: err }
    );
  }

  return parseDesiredState(content, registry, absolutePath);
}
