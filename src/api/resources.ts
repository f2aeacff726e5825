/**
 * Resource API
 *
 * Per resource type LIST / CREATE / UPDATE / DELETE against the Nexus REST
 * API. The engine only sees the ResourceApi interface; NexusResourceApi maps
 * each resource category onto its endpoints.
 */

import type { NexusClient } from './client.js';
import { isNotFoundError } from './retry.js';
import { isPlainObject, type Document } from '../engine/document.js';
import type { ResourceCategory, ResourceTypeDefinition } from '../schemas/types.js';
import { formatPathSegment } from '../schemas/definitions/repositories.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Remote collaborator used by the pipeline and the reconciliation driver.
 * Singletons return a one-element list and only support update.
 */
export interface ResourceApi {
  list(type: ResourceTypeDefinition): Promise<Document[]>;
  create(type: ResourceTypeDefinition, item: Document): Promise<void>;
  update(type: ResourceTypeDefinition, naturalKey: string, item: Document): Promise<void>;
  /** A 404 rejects with an ApiRequestError; the driver treats it as already absent */
  delete(type: ResourceTypeDefinition, naturalKey: string): Promise<void>;
}

interface Endpoint {
  list(client: NexusClient, type: ResourceTypeDefinition): Promise<Document[]>;
  create?(client: NexusClient, type: ResourceTypeDefinition, item: Document): Promise<void>;
  update(client: NexusClient, type: ResourceTypeDefinition, key: string, item: Document): Promise<void>;
  remove?(client: NexusClient, type: ResourceTypeDefinition, key: string): Promise<void>;
}

// =============================================================================
// Helpers
// =============================================================================

function segment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Narrow a list response to documents
 *
 * @throws Error when the response is not an array
 */
export function toDocuments(value: unknown, what: string): Document[] {
  if (!Array.isArray(value)) {
    throw new Error(`Unexpected response listing ${what}: expected an array`);
  }
  return value.filter(isPlainObject);
}

function toDocument(value: unknown, what: string): Document {
  if (!isPlainObject(value)) {
    throw new Error(`Unexpected response reading ${what}: expected an object`);
  }
  return value;
}

function stringField(item: Document, field: string): string {
  const value = item[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Item is missing '${field}'`);
  }
  return value;
}

/**
 * Standard collection: GET/POST on the base path, PUT/DELETE on base/{key}
 */
function collection(basePath: string): Endpoint {
  return {
    async list(client, type) {
      return toDocuments(await client.request('GET', basePath), type.id);
    },
    async create(client, _type, item) {
      await client.request('POST', basePath, { body: item });
    },
    async update(client, _type, key, item) {
      await client.request('PUT', `${basePath}/${segment(key)}`, { body: item });
    },
    async remove(client, _type, key) {
      await client.request('DELETE', `${basePath}/${segment(key)}`);
    },
  };
}

/**
 * Settings document read and replaced at one path
 */
function singleton(path: string): Endpoint {
  return {
    async list(client, type) {
      return [toDocument(await client.request('GET', path), type.id)];
    },
    async update(client, _type, _key, item) {
      await client.request('PUT', path, { body: item });
    },
  };
}

// =============================================================================
// Endpoints
// =============================================================================

function repositoryPath(type: ResourceTypeDefinition): string {
  if (!type.format || !type.repositoryType) {
    throw new Error(`Resource type '${type.id}' is not a repository type`);
  }
  return `/v1/repositories/${formatPathSegment(type.format)}/${type.repositoryType}`;
}

/**
 * Proxy settings report the rule as `routingRuleName`; requests send `routingRule`
 */
function withRoutingRule(repo: Document): Document {
  if (!('routingRuleName' in repo)) return repo;
  const { routingRuleName, ...rest } = repo;
  return { ...rest, routingRule: routingRuleName };
}

const repositories: Endpoint = {
  async list(client, type) {
    const all = toDocuments(await client.request('GET', '/v1/repositorySettings'), type.id);
    return all
      .filter((repo) => repo.format === type.format && repo.type === type.repositoryType)
      .map(withRoutingRule);
  },
  async create(client, type, item) {
    await client.request('POST', repositoryPath(type), { body: item });
  },
  async update(client, type, key, item) {
    await client.request('PUT', `${repositoryPath(type)}/${segment(key)}`, { body: item });
  },
  async remove(client, _type, key) {
    await client.request('DELETE', `/v1/repositories/${segment(key)}`);
  },
};

/**
 * The list endpoint only returns summaries with a display type ("File", "S3");
 * the full configuration comes from the per-type endpoint, which omits name and type.
 */
const blobStores: Endpoint = {
  async list(client, type) {
    const summaries = toDocuments(await client.request('GET', '/v1/blobstores'), type.id);
    const stores: Document[] = [];
    for (const summary of summaries) {
      const name = stringField(summary, 'name');
      const storeType = stringField(summary, 'type').toLowerCase();
      const detail = toDocument(
        await client.request('GET', `/v1/blobstores/${segment(storeType)}/${segment(name)}`),
        `${type.id} '${name}'`
      );
      stores.push({ ...detail, name, type: storeType });
    }
    return stores;
  },
  async create(client, _type, item) {
    const { type: storeType, ...body } = item;
    await client.request('POST', `/v1/blobstores/${segment(String(storeType))}`, { body });
  },
  async update(client, _type, key, item) {
    const { type: storeType, ...body } = item;
    await client.request('PUT', `/v1/blobstores/${segment(String(storeType))}/${segment(key)}`, {
      body,
    });
  },
  async remove(client, _type, key) {
    await client.request('DELETE', `/v1/blobstores/${segment(key)}`);
  },
};

/**
 * Trusted certificates are added from their PEM encoding and are immutable
 */
const truststore: Endpoint = {
  async list(client, type) {
    return toDocuments(await client.request('GET', '/v1/security/ssl/truststore'), type.id);
  },
  async create(client, _type, item) {
    await client.request('POST', '/v1/security/ssl/truststore', {
      body: stringField(item, 'pem'),
      headers: { 'Content-Type': 'application/json' },
    });
  },
  async update() {
    throw new Error('Trusted certificates cannot be updated');
  },
  async remove(client, _type, key) {
    await client.request('DELETE', `/v1/security/ssl/truststore/${segment(key)}`);
  },
};

/**
 * Privileges are created and updated under a path naming their type
 */
const privileges: Endpoint = {
  async list(client, type) {
    return toDocuments(await client.request('GET', '/v1/security/privileges'), type.id);
  },
  async create(client, _type, item) {
    const privilegeType = stringField(item, 'type');
    await client.request('POST', `/v1/security/privileges/${segment(privilegeType)}`, { body: item });
  },
  async update(client, _type, key, item) {
    const privilegeType = stringField(item, 'type');
    await client.request('PUT', `/v1/security/privileges/${segment(privilegeType)}/${segment(key)}`, {
      body: item,
    });
  },
  async remove(client, _type, key) {
    await client.request('DELETE', `/v1/security/privileges/${segment(key)}`);
  },
};

/**
 * Active realms are a plain list on the wire and `{ active: [...] }` in canonical form
 */
const realms: Endpoint = {
  async list(client, type) {
    const active = await client.request('GET', '/v1/security/realms/active');
    if (!Array.isArray(active)) {
      throw new Error(`Unexpected response reading ${type.id}: expected an array`);
    }
    return [{ active }];
  },
  async update(client, _type, _key, item) {
    await client.request('PUT', '/v1/security/realms/active', { body: item.active ?? [] });
  },
};

const ENDPOINTS: Readonly<Record<ResourceCategory, Endpoint>> = {
  'blob-store': blobStores,
  'cleanup-policy': collection('/v1/cleanup-policies'),
  'routing-rule': collection('/v1/routing-rules'),
  'content-selector': collection('/v1/security/content-selectors'),
  'ssl-certificate': truststore,
  'ldap-connection': collection('/v1/security/ldap'),
  'security-realms': realms,
  privilege: privileges,
  role: collection('/v1/security/roles'),
  user: collection('/v1/security/users'),
  'anonymous-access': singleton('/v1/security/anonymous'),
  'user-tokens': singleton('/v1/security/user-tokens'),
  'hosted-repository': repositories,
  'proxy-repository': repositories,
  'group-repository': repositories,
};

// =============================================================================
// Implementation
// =============================================================================

/**
 * ResourceApi backed by a NexusClient
 */
export class NexusResourceApi implements ResourceApi {
  constructor(private readonly client: NexusClient) {}

  private endpoint(type: ResourceTypeDefinition): Endpoint {
    return ENDPOINTS[type.category];
  }

  async list(type: ResourceTypeDefinition): Promise<Document[]> {
    return this.endpoint(type).list(this.client, type);
  }

  async create(type: ResourceTypeDefinition, item: Document): Promise<void> {
    const endpoint = this.endpoint(type);
    if (!endpoint.create) {
      throw new Error(`${type.id} is a singleton and cannot be created`);
    }
    await endpoint.create(this.client, type, item);
  }

  async update(type: ResourceTypeDefinition, naturalKey: string, item: Document): Promise<void> {
    await this.endpoint(type).update(this.client, type, naturalKey, item);
  }

  async delete(type: ResourceTypeDefinition, naturalKey: string): Promise<void> {
    const endpoint = this.endpoint(type);
    if (!endpoint.remove) {
      throw new Error(`${type.id} is a singleton and cannot be deleted`);
    }
    await endpoint.remove(this.client, type, naturalKey);
  }
}

/**
 * Whether an error from ResourceApi.delete means the item is already gone
 */
export function isAlreadyAbsent(error: unknown): boolean {
  return isNotFoundError(error);
}
