/**
 * Unit Tests: Resource API endpoints and the Pro license probe
 */

import { describe, it, expect } from 'vitest';
import type { NexusClient } from '../../src/api/client.js';
import { NexusResourceApi, isAlreadyAbsent, toDocuments } from '../../src/api/resources.js';
import { detectProFeature, resolveProFeature } from '../../src/api/license.js';
import { ApiRequestError } from '../../src/api/retry.js';
import type { HttpMethod, RequestOptions } from '../../src/api/types.js';
import { createDefaultRegistry } from '../../src/schemas/index.js';
import { buildDesiredSet, planChanges } from '../../src/engine/pipeline.js';
import { createLogger } from '../../src/api/logger.js';

interface RecordedRequest {
  method: HttpMethod;
  path: string;
  body?: unknown;
}

/**
 * Records requests and answers from a table keyed by `METHOD path`
 */
class RecordingClient implements NexusClient {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly responses: Record<string, unknown | Error> = {}) {}

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    this.requests.push(options.body === undefined ? { method, path } : { method, path, body: options.body });
    const response = this.responses[`${method} ${path}`];
    if (response instanceof Error) throw response;
    return response;
  }

  getConfig() {
    return { baseUrl: 'http://nexus.test', hasPassword: false };
  }
}

const registry = createDefaultRegistry();

describe('NexusResourceApi', () => {
  it('lists repositories of one format and type from the settings endpoint', async () => {
    const client = new RecordingClient({
      'GET /v1/repositorySettings': [
        { name: 'releases', format: 'maven2', type: 'hosted' },
        { name: 'central', format: 'maven2', type: 'proxy' },
        { name: 'npm-internal', format: 'npm', type: 'hosted' },
      ],
    });

    const items = await new NexusResourceApi(client).list(registry.getResourceType('maven-hosted-repository'));

    expect(items).toEqual([{ name: 'releases', format: 'maven2', type: 'hosted' }]);
  });

  it('reports the routing rule of a proxy under its request attribute', async () => {
    const client = new RecordingClient({
      'GET /v1/repositorySettings': [
        { name: 'central', format: 'maven2', type: 'proxy', routingRuleName: 'block-snapshots' },
      ],
    });

    const items = await new NexusResourceApi(client).list(registry.getResourceType('maven-proxy-repository'));

    expect(items).toEqual([{ name: 'central', format: 'maven2', type: 'proxy', routingRule: 'block-snapshots' }]);
  });

  it('leaves an applied proxy with a routing rule unchanged', async () => {
    const type = registry.getResourceType('maven-proxy-repository');
    const logger = createLogger({ level: 'error', sink: () => {} });
    const desired = buildDesiredSet(
      registry,
      type,
      {
        items: [
          { name: 'central', proxy: { remoteUrl: 'https://repo.example.test/maven2/' }, routingRule: 'block-snapshots' },
        ],
      },
      logger
    );
    const [applied] = desired.items;
    expect(applied?.routingRule).toBe('block-snapshots');

    const { routingRule, ...served } = applied ?? {};
    const client = new RecordingClient({
      'GET /v1/repositorySettings': [
        {
          ...served,
          format: 'maven2',
          type: 'proxy',
          url: 'http://nexus.test/repository/central',
          routingRuleName: routingRule,
        },
      ],
    });

    const remote = await new NexusResourceApi(client).list(type);
    const records = planChanges(registry, type, desired, remote, logger);

    expect(records.map((record) => record.action)).toEqual(['unchanged']);
  });

  it('writes repositories under their format path and deletes by name', async () => {
    const client = new RecordingClient();
    const api = new NexusResourceApi(client);
    const type = registry.getResourceType('maven-group-repository');

    await api.create(type, { name: 'public' });
    await api.update(type, 'public', { name: 'public' });
    await api.delete(type, 'public');

    expect(client.requests).toEqual([
      { method: 'POST', path: '/v1/repositories/maven/group', body: { name: 'public' } },
      { method: 'PUT', path: '/v1/repositories/maven/group/public', body: { name: 'public' } },
      { method: 'DELETE', path: '/v1/repositories/public' },
    ]);
  });

  it('reads blob store details per store', async () => {
    const client = new RecordingClient({
      'GET /v1/blobstores': [{ name: 'default', type: 'File', blobCount: 3 }],
      'GET /v1/blobstores/file/default': { path: 'default', softQuota: null },
    });

    const items = await new NexusResourceApi(client).list(registry.getResourceType('blob-store'));

    expect(items).toEqual([{ path: 'default', softQuota: null, name: 'default', type: 'file' }]);
  });

  it('sends blob stores to their type endpoint without the type attribute', async () => {
    const client = new RecordingClient();

    await new NexusResourceApi(client).update(registry.getResourceType('blob-store'), 'fast', {
      name: 'fast',
      type: 'file',
      path: '/data/fast',
    });

    expect(client.requests).toEqual([
      { method: 'PUT', path: '/v1/blobstores/file/fast', body: { name: 'fast', path: '/data/fast' } },
    ]);
  });

  it('creates privileges under their privilege type', async () => {
    const client = new RecordingClient();

    await new NexusResourceApi(client).create(registry.getResourceType('privilege'), {
      name: 'npm-read',
      type: 'repository-view',
    });

    expect(client.requests[0]?.path).toBe('/v1/security/privileges/repository-view');
  });

  it('wraps the active realm list and unwraps it on update', async () => {
    const client = new RecordingClient({ 'GET /v1/security/realms/active': ['NexusAuthenticatingRealm'] });
    const api = new NexusResourceApi(client);
    const type = registry.getResourceType('security-realms');

    expect(await api.list(type)).toEqual([{ active: ['NexusAuthenticatingRealm'] }]);
    await api.update(type, 'security-realms', { active: ['NexusAuthenticatingRealm', 'LdapRealm'] });

    expect(client.requests[1]).toEqual({
      method: 'PUT',
      path: '/v1/security/realms/active',
      body: ['NexusAuthenticatingRealm', 'LdapRealm'],
    });
  });

  it('encodes natural keys in paths', async () => {
    const client = new RecordingClient();

    await new NexusResourceApi(client).delete(registry.getResourceType('ssl-certificate'), 'AB:CD');

    expect(client.requests[0]?.path).toBe('/v1/security/ssl/truststore/AB%3ACD');
  });

  it('refuses to create or delete settings singletons', async () => {
    const api = new NexusResourceApi(new RecordingClient());
    const type = registry.getResourceType('anonymous-access');

    await expect(api.create(type, { enabled: true })).rejects.toThrow(
      'anonymous-access is a singleton and cannot be created'
    );
    await expect(api.delete(type, 'anonymous-access')).rejects.toThrow(
      'anonymous-access is a singleton and cannot be deleted'
    );
  });
});

describe('isAlreadyAbsent', () => {
  it('recognizes 404 responses only', () => {
    expect(isAlreadyAbsent(new ApiRequestError('gone', 404))).toBe(true);
    expect(isAlreadyAbsent(new ApiRequestError('denied', 403))).toBe(false);
    expect(isAlreadyAbsent(new Error('gone'))).toBe(false);
  });
});

describe('toDocuments', () => {
  it('rejects responses that are not lists', () => {
    expect(() => toDocuments({ items: [] }, 'role')).toThrow('Unexpected response listing role: expected an array');
  });
});

describe('Pro feature detection', () => {
  it('treats a readable license as Pro', async () => {
    expect(await detectProFeature(new RecordingClient({ 'GET /v1/system/license': { contactName: 'ops' } }))).toBe(
      true
    );
  });

  it('treats 402, 403 and 404 as Community', async () => {
    for (const status of [402, 403, 404]) {
      const client = new RecordingClient({ 'GET /v1/system/license': new ApiRequestError('no', status) });
      expect(await detectProFeature(client)).toBe(false);
    }
  });

  it('propagates other failures', async () => {
    const client = new RecordingClient({ 'GET /v1/system/license': new ApiRequestError('down', 500) });

    await expect(detectProFeature(client)).rejects.toThrow('down');
  });

  it('only asks the server in auto mode', async () => {
    const client = new RecordingClient();

    expect(await resolveProFeature('yes', client)).toBe(true);
    expect(await resolveProFeature('no', client)).toBe(false);
    expect(client.requests).toEqual([]);
  });
});
