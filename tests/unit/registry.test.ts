/**
 * Unit Tests: Schema Registry
 *
 * Tests registration, lookup, dialect detection and the derived
 * canonical-root / nullable-path sets.
 */

import { describe, it, expect } from 'vitest';
import {
  SchemaRegistry,
  canonicalRoots,
  createDefaultRegistry,
  nullablePaths,
  repositoryTypeId,
  type ResourceTypeRegistration,
} from '../../src/schemas/index.js';
import { UnknownSchemaError } from '../../src/engine/errors.js';

function widgetRegistration(): ResourceTypeRegistration {
  return {
    definition: {
      id: 'widget',
      category: 'role',
      kind: 'collection',
      naturalKeyField: 'name',
      supportsGroupVariant: false,
      requiresProFeature: false,
      updatable: true,
      description: 'Test widgets',
    },
    schemas: {
      current: {
        fieldMap: {},
        defaultValues: { size: { width: 1, height: null } },
        requiredFields: ['name'],
      },
      legacy: {
        fieldMap: { widget_width: 'size.width' },
        defaultValues: { size: { width: 1, height: null } },
        requiredFields: ['name'],
      },
    },
  };
}

describe('SchemaRegistry', () => {
  it('returns the schema registered for a resource type and dialect', () => {
    const registry = new SchemaRegistry().register(widgetRegistration());

    const schema = registry.getSchema('widget', 'legacy');

    expect(schema.resourceType).toBe('widget');
    expect(schema.dialect).toBe('legacy');
    expect(schema.fieldMap).toEqual({ widget_width: 'size.width' });
  });

  it('throws UnknownSchemaError for unregistered pairs', () => {
    const registry = new SchemaRegistry().register(widgetRegistration());

    expect(() => registry.getSchema('gadget', 'current')).toThrow(UnknownSchemaError);
    expect(() => registry.getSchema('blob-store', 'legacy')).toThrow(
      "No schema registered for resource type 'blob-store' and dialect 'legacy'"
    );
    expect(() => registry.getResourceType('gadget')).toThrow("Unknown resource type 'gadget'");
  });

  it('rejects duplicate registrations', () => {
    const registry = new SchemaRegistry().register(widgetRegistration());

    expect(() => registry.register(widgetRegistration())).toThrow(
      "Resource type 'widget' is already registered"
    );
  });

  it('freezes registered schemas', () => {
    const registry = new SchemaRegistry().register(widgetRegistration());
    const schema = registry.getSchema('widget', 'current');

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.defaultValues)).toBe(true);
  });

  it('detects the legacy dialect from any legacy key', () => {
    const registry = new SchemaRegistry().register(widgetRegistration());

    expect(registry.detectDialect('widget', { name: 'w', widget_width: 3 })).toBe('legacy');
    expect(registry.detectDialect('widget', { name: 'w', size: { width: 3 } })).toBe('current');
    expect(() => registry.detectDialect('gadget', {})).toThrow(UnknownSchemaError);
  });

  it('derives canonical roots and nullable paths from a schema', () => {
    const registry = new SchemaRegistry().register(widgetRegistration());
    const schema = registry.getSchema('widget', 'legacy');

    expect(Array.from(canonicalRoots(schema)).sort()).toEqual(['name', 'size']);
    expect(Array.from(nullablePaths(schema))).toEqual(['size.height']);
  });
});

describe('createDefaultRegistry', () => {
  const registry = createDefaultRegistry();

  it('registers every repository format and type the server offers', () => {
    expect(registry.has(repositoryTypeId('maven2', 'hosted'))).toBe(true);
    expect(registry.has('maven-group-repository')).toBe(true);
    expect(registry.has('go-proxy-repository')).toBe(true);
    expect(registry.has('go-hosted-repository')).toBe(false);
    expect(registry.has('apt-group-repository')).toBe(false);
  });

  it('registers the non-repository resource types', () => {
    const ids = registry
      .list()
      .filter((type) => type.repositoryType === undefined)
      .map((type) => type.id);

    expect(ids).toEqual([
      'blob-store',
      'cleanup-policy',
      'routing-rule',
      'content-selector',
      'ssl-certificate',
      'ldap-connection',
      'security-realms',
      'privilege',
      'role',
      'user',
      'anonymous-access',
      'user-tokens',
    ]);
  });

  it('describes repository types by format and type', () => {
    expect(registry.getResourceType('docker-proxy-repository')).toMatchObject({
      category: 'proxy-repository',
      format: 'docker',
      repositoryType: 'proxy',
      naturalKeyField: 'name',
      supportsGroupVariant: true,
      writeOnlyPaths: ['httpClient.authentication.password'],
    });
    expect(registry.getResourceType('helm-hosted-repository').supportsGroupVariant).toBe(false);
  });

  it('lists both dialects for types with legacy keys', () => {
    expect(registry.dialectsOf('cleanup-policy')).toEqual(['current', 'legacy']);
    expect(registry.dialectsOf('routing-rule')).toEqual(['current']);
  });
});
