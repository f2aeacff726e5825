/**
 * Repository resource types
 *
 * One resource type per (format, repository type) pair. Attributes shared by
 * every format live in the per-type base schema; each format adds its own
 * section (`maven`, `docker`, `apt`, …) and legacy keys.
 */

import { getPath, isPlainObject, type Document } from '../../engine/document.js';
import { deepMerge } from '../../engine/merge.js';
import type {
  FieldMapping,
  FinalizeHook,
  RepositoryType,
  ResourceCategory,
  ResourceTypeRegistration,
  SchemaProblem,
} from '../types.js';
import { upper } from './transforms.js';

// =============================================================================
// Format table
// =============================================================================

export interface RepositoryFormat {
  /** Format name as reported by the API */
  format: string;
  /** Repository types the server offers for this format */
  types: readonly RepositoryType[];
  defaults?: Partial<Record<RepositoryType, Document>>;
  requiredFields?: Partial<Record<RepositoryType, readonly string[]>>;
  fieldMap?: Partial<Record<RepositoryType, Readonly<Record<string, FieldMapping>>>>;
  writeOnlyPaths?: Partial<Record<RepositoryType, readonly string[]>>;
}

const MAVEN_SECTION = {
  maven: { versionPolicy: 'RELEASE', layoutPolicy: 'STRICT', contentDisposition: 'INLINE' },
};

const MAVEN_LEGACY: Record<string, FieldMapping> = {
  version_policy: { path: 'maven.versionPolicy', transform: upper },
  layout_policy: { path: 'maven.layoutPolicy', transform: upper },
  content_disposition: { path: 'maven.contentDisposition', transform: upper },
};

const DOCKER_SECTION = {
  docker: { v1Enabled: false, forceBasicAuth: true, httpPort: null, httpsPort: null },
};

const DOCKER_LEGACY: Record<string, FieldMapping> = {
  http_port: 'docker.httpPort',
  https_port: 'docker.httpsPort',
  v1_enabled: 'docker.v1Enabled',
  force_basic_auth: 'docker.forceBasicAuth',
};

export const REPOSITORY_FORMATS: readonly RepositoryFormat[] = [
  {
    format: 'maven2',
    types: ['hosted', 'proxy', 'group'],
    defaults: { hosted: MAVEN_SECTION, proxy: MAVEN_SECTION },
    fieldMap: { hosted: MAVEN_LEGACY, proxy: MAVEN_LEGACY },
  },
  { format: 'npm', types: ['hosted', 'proxy', 'group'] },
  {
    format: 'docker',
    types: ['hosted', 'proxy', 'group'],
    defaults: {
      hosted: DOCKER_SECTION,
      proxy: { ...DOCKER_SECTION, dockerProxy: { indexType: 'REGISTRY', indexUrl: null } },
      group: DOCKER_SECTION,
    },
    fieldMap: {
      hosted: DOCKER_LEGACY,
      proxy: {
        ...DOCKER_LEGACY,
        index_type: { path: 'dockerProxy.indexType', transform: upper },
        index_url: 'dockerProxy.indexUrl',
      },
      group: DOCKER_LEGACY,
    },
  },
  { format: 'pypi', types: ['hosted', 'proxy', 'group'] },
  {
    format: 'raw',
    types: ['hosted', 'proxy', 'group'],
    defaults: {
      hosted: { raw: { contentDisposition: 'ATTACHMENT' } },
      proxy: { raw: { contentDisposition: 'ATTACHMENT' } },
    },
    fieldMap: {
      hosted: { content_disposition: { path: 'raw.contentDisposition', transform: upper } },
      proxy: { content_disposition: { path: 'raw.contentDisposition', transform: upper } },
    },
  },
  {
    format: 'nuget',
    types: ['hosted', 'proxy', 'group'],
    defaults: {
      proxy: { nugetProxy: { nugetVersion: 'V3', queryCacheItemMaxAge: 3600 } },
    },
    fieldMap: {
      proxy: {
        nuget_version: { path: 'nugetProxy.nugetVersion', transform: upper },
        query_cache_item_max_age: 'nugetProxy.queryCacheItemMaxAge',
      },
    },
  },
  { format: 'rubygems', types: ['hosted', 'proxy', 'group'] },
  {
    format: 'yum',
    types: ['hosted', 'proxy', 'group'],
    defaults: {
      hosted: { yum: { repodataDepth: 0, deployPolicy: 'STRICT' } },
    },
    fieldMap: {
      hosted: {
        repodata_depth: 'yum.repodataDepth',
        deploy_policy: { path: 'yum.deployPolicy', transform: upper },
      },
    },
  },
  {
    format: 'apt',
    types: ['hosted', 'proxy'],
    defaults: { proxy: { apt: { flat: false } } },
    requiredFields: {
      hosted: ['apt.distribution', 'aptSigning.keypair'],
      proxy: ['apt.distribution'],
    },
    fieldMap: {
      hosted: {
        distribution: 'apt.distribution',
        keypair: 'aptSigning.keypair',
        passphrase: 'aptSigning.passphrase',
      },
      proxy: { distribution: 'apt.distribution', flat: 'apt.flat' },
    },
    writeOnlyPaths: { hosted: ['aptSigning'] },
  },
  { format: 'helm', types: ['hosted', 'proxy'] },
  { format: 'go', types: ['proxy', 'group'] },
];

/**
 * Formats whose API path segment differs from the reported format name
 */
const FORMAT_PATH_SEGMENTS: Readonly<Record<string, string>> = {
  maven2: 'maven',
};

export function formatPathSegment(format: string): string {
  return FORMAT_PATH_SEGMENTS[format] ?? format;
}

export function repositoryTypeId(format: string, repositoryType: RepositoryType): string {
  return `${formatPathSegment(format)}-${repositoryType}-repository`;
}

// =============================================================================
// Shared per-type schemas
// =============================================================================

const STORAGE = { blobStoreName: 'default', strictContentTypeValidation: true };

const BASE_DEFAULTS: Record<RepositoryType, Document> = {
  hosted: {
    online: true,
    storage: { ...STORAGE, writePolicy: 'ALLOW_ONCE' },
    cleanup: null,
  },
  proxy: {
    online: true,
    storage: STORAGE,
    cleanup: null,
    proxy: { contentMaxAge: 1440, metadataMaxAge: 1440 },
    negativeCache: { enabled: true, timeToLive: 1440 },
    httpClient: { blocked: false, autoBlock: true, authentication: null },
    routingRule: null,
  },
  group: {
    online: true,
    storage: STORAGE,
  },
};

const BASE_REQUIRED: Record<RepositoryType, readonly string[]> = {
  hosted: ['name'],
  proxy: ['name', 'proxy.remoteUrl'],
  group: ['name', 'group.memberNames'],
};

const COMMON_LEGACY: Record<string, FieldMapping> = {
  blob_store: 'storage.blobStoreName',
  strict_content_validation: 'storage.strictContentTypeValidation',
};

const BASE_LEGACY: Record<RepositoryType, Record<string, FieldMapping>> = {
  hosted: {
    ...COMMON_LEGACY,
    write_policy: { path: 'storage.writePolicy', transform: upper },
    cleanup_policies: 'cleanup.policyNames',
  },
  proxy: {
    ...COMMON_LEGACY,
    cleanup_policies: 'cleanup.policyNames',
    remote_url: 'proxy.remoteUrl',
    maximum_component_age: 'proxy.contentMaxAge',
    maximum_metadata_age: 'proxy.metadataMaxAge',
    negative_cache_enabled: 'negativeCache.enabled',
    negative_cache_ttl: 'negativeCache.timeToLive',
    blocked: 'httpClient.blocked',
    auto_block: 'httpClient.autoBlock',
    remote_username: 'httpClient.authentication.username',
    remote_password: 'httpClient.authentication.password',
    ntlm_host: 'httpClient.authentication.ntlmHost',
    ntlm_domain: 'httpClient.authentication.ntlmDomain',
    routing_rule: 'routingRule',
  },
  group: {
    ...COMMON_LEGACY,
    member_repos: 'group.memberNames',
  },
};

const CATEGORIES: Record<RepositoryType, ResourceCategory> = {
  hosted: 'hosted-repository',
  proxy: 'proxy-repository',
  group: 'group-repository',
};

/**
 * Server-reported attributes that are not part of the request document
 */
const SYSTEM_PATHS: Record<RepositoryType, readonly string[]> = {
  hosted: ['url', 'format', 'type'],
  proxy: ['url', 'format', 'type', 'routingRuleName'],
  group: ['url', 'format', 'type'],
};

// =============================================================================
// Proxy authentication
// =============================================================================

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Derive `httpClient.authentication.type` from the credentials given.
 * NTLM needs username, password, host and domain; plain auth needs both
 * username and password.
 */
export const deriveAuthenticationType: FinalizeHook = (item) => {
  const auth = getPath(item, 'httpClient.authentication');
  if (!isPlainObject(auth)) return [];

  const problems: SchemaProblem[] = [];
  const hasUser = isSet(auth.username);
  const hasPassword = isSet(auth.password);

  if (isSet(auth.ntlmHost) || isSet(auth.ntlmDomain)) {
    if (!(hasUser && hasPassword && isSet(auth.ntlmHost) && isSet(auth.ntlmDomain))) {
      problems.push({
        path: 'httpClient.authentication',
        message: 'NTLM authentication requires username, password, ntlmHost and ntlmDomain',
      });
    } else {
      auth.type = 'ntlm';
    }
  } else if (hasUser || hasPassword) {
    if (!(hasUser && hasPassword)) {
      problems.push({
        path: 'httpClient.authentication',
        message: 'username authentication requires both username and password',
      });
    } else {
      auth.type = 'username';
    }
  }

  return problems;
};

// =============================================================================
// Registrations
// =============================================================================

/**
 * Build the registration for one (format, repository type) pair
 */
export function repositoryRegistration(
  formatEntry: RepositoryFormat,
  repositoryType: RepositoryType
): ResourceTypeRegistration {
  const defaultValues = deepMerge(BASE_DEFAULTS[repositoryType], formatEntry.defaults?.[repositoryType] ?? {});
  const requiredFields = [
    ...BASE_REQUIRED[repositoryType],
    ...(formatEntry.requiredFields?.[repositoryType] ?? []),
  ];
  const finalize = repositoryType === 'proxy' ? deriveAuthenticationType : undefined;

  return {
    definition: {
      id: repositoryTypeId(formatEntry.format, repositoryType),
      category: CATEGORIES[repositoryType],
      kind: 'collection',
      naturalKeyField: 'name',
      supportsGroupVariant: formatEntry.types.includes('group'),
      requiresProFeature: false,
      updatable: true,
      systemPaths: SYSTEM_PATHS[repositoryType],
      writeOnlyPaths: [
        ...(repositoryType === 'proxy' ? ['httpClient.authentication.password'] : []),
        ...(formatEntry.writeOnlyPaths?.[repositoryType] ?? []),
      ],
      format: formatEntry.format,
      repositoryType,
      description: `${formatEntry.format} ${repositoryType} repositories`,
    },
    schemas: {
      current: { fieldMap: {}, defaultValues, requiredFields, finalize },
      legacy: {
        fieldMap: { ...BASE_LEGACY[repositoryType], ...formatEntry.fieldMap?.[repositoryType] },
        defaultValues,
        requiredFields,
        finalize,
      },
    },
  };
}

export function repositoryRegistrations(
  formats: readonly RepositoryFormat[] = REPOSITORY_FORMATS
): ResourceTypeRegistration[] {
  return formats.flatMap((formatEntry) => formatEntry.types.map((type) => repositoryRegistration(formatEntry, type)));
}
