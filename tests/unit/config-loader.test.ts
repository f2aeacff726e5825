/**
 * Unit Tests: Desired-state loading
 *
 * Tests YAML → pipeline inputs:
 * - repository sections expand to per-(format, type) resource types
 * - default layers attach in Global → Type → Format order
 * - dialect selectors
 * - every structural problem reported at once
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ConfigError,
  buildDesiredState,
  loadDesiredState,
  parseDesiredState,
} from '../../src/config/index.js';
import { createDefaultRegistry } from '../../src/schemas/index.js';

const registry = createDefaultRegistry();

const DESIRED_YAML = `
defaults:
  repositories:
    global:
      storage:
        blobStoreName: shared
    proxy:
      negativeCache:
        timeToLive: 60
    formats:
      maven2:
        maven:
          layoutPolicy: PERMISSIVE
  role:
    description: managed
dialects:
  cleanup-policy: legacy
resources:
  repositories:
    maven2:
      proxy:
        - name: central
          proxy:
            remoteUrl: https://repo.example.test/maven2
  cleanup-policy:
    - name: weekly
  role:
    - id: dev
      name: Developers
  anonymous-access: true
`;

describe('parseDesiredState', () => {
  it('expands repository sections and attaches default layers', () => {
    const desired = parseDesiredState(DESIRED_YAML, registry);

    expect(Object.keys(desired)).toEqual(['maven-proxy-repository', 'cleanup-policy', 'role', 'anonymous-access']);
    expect(desired['maven-proxy-repository']).toEqual({
      items: [{ name: 'central', proxy: { remoteUrl: 'https://repo.example.test/maven2' } }],
      layers: {
        global: { storage: { blobStoreName: 'shared' } },
        type: { negativeCache: { timeToLive: 60 } },
        format: { maven: { layoutPolicy: 'PERMISSIVE' } },
      },
    });
  });

  it('attaches type defaults and forced dialects to other resource types', () => {
    const desired = parseDesiredState(DESIRED_YAML, registry);

    expect(desired.role).toEqual({
      items: [{ id: 'dev', name: 'Developers' }],
      layers: { type: { description: 'managed' } },
    });
    expect(desired['cleanup-policy']?.dialect).toBe('legacy');
  });

  it('accepts a boolean for a settings singleton', () => {
    expect(parseDesiredState(DESIRED_YAML, registry)['anonymous-access']?.items).toEqual([{ enabled: true }]);
  });

  it('accepts the active realm list for security realms', () => {
    const desired = parseDesiredState(
      'resources:\n  security-realms:\n    - NexusAuthenticatingRealm\n    - LdapRealm\n',
      registry
    );

    expect(desired['security-realms']?.items).toEqual([{ active: ['NexusAuthenticatingRealm', 'LdapRealm'] }]);
  });

  it('rejects a realm list with entries that are not names', () => {
    expect(() => parseDesiredState('resources:\n  security-realms:\n    - enabled: true\n', registry)).toThrow(
      'resources.security-realms must list realm names'
    );
  });

  it('applies category selectors in the dialects block', () => {
    const desired = parseDesiredState(
      'dialects:\n  repositories: legacy\nresources:\n  repositories:\n    npm:\n      hosted:\n        - name: npm-internal\n',
      registry
    );

    expect(desired['npm-hosted-repository']?.dialect).toBe('legacy');
  });

  it('keeps unknown resource type ids for the run to report', () => {
    const desired = parseDesiredState('resources:\n  widget:\n    name: w\n', registry);

    expect(desired.widget?.items).toEqual([{ name: 'w' }]);
  });

  it('treats an empty document as an empty desired state', () => {
    expect(parseDesiredState('', registry)).toEqual({});
  });

  it('reports malformed YAML as a parse error', () => {
    let caught: unknown;
    try {
      parseDesiredState('resources: [unclosed', registry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: 'CONFIG_PARSE_ERROR' });
  });
});

describe('buildDesiredState', () => {
  it('collects every structural problem into one error', () => {
    const document = {
      extra: 1,
      dialects: { role: 'ancient' },
      resources: {
        repositories: { cobol: {}, go: { hosted: [] } },
        role: [{ id: 'dev' }, 'oops'],
        'user-tokens': ['not', 'a', 'mapping'],
      },
    };

    let caught: unknown;
    try {
      buildDesiredState(document, registry, 'desired.yaml');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: 'CONFIG_INVALID',
      message: [
        'Invalid desired state in desired.yaml:',
        '  - extra: unknown top-level key (expected defaults, dialects, resources)',
        '  - dialects.role must be one of current, legacy',
        '  - resources.repositories.cobol: unknown repository format',
        '  - resources.repositories.go.hosted: go has no hosted repositories',
        '  - resources.role[1] must be a mapping',
        '  - resources.user-tokens must be a mapping',
      ].join('\n'),
    });
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => buildDesiredState(['a'], registry)).toThrow('Desired state must be a mapping');
  });
});

describe('loadDesiredState', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nexus-reconcile-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file relative to the base path', async () => {
    writeFileSync(join(dir, 'desired.yaml'), 'resources:\n  blob-store:\n    - name: default\n');

    const desired = await loadDesiredState('desired.yaml', registry, { basePath: dir });

    expect(desired['blob-store']?.items).toEqual([{ name: 'default' }]);
  });

  it('names the absolute path of a missing file', async () => {
    await expect(loadDesiredState('missing.yaml', registry, { basePath: dir })).rejects.toMatchObject({
      code: 'CONFIG_NOT_FOUND',
      message: `Desired state file not found: ${join(dir, 'missing.yaml')}`,
    });
  });
});
