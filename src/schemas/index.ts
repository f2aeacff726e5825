/**
 * Schema registry module
 */

import { SchemaRegistry } from './registry.js';
import { repositoryRegistrations } from './definitions/repositories.js';
import { blobStore, cleanupPolicy, contentSelector, routingRule } from './definitions/storage.js';
import {
  anonymousAccess,
  ldapConnection,
  privilege,
  role,
  securityRealms,
  sslCertificate,
  user,
  userTokens,
} from './definitions/security.js';
import type { ResourceTypeRegistration } from './types.js';

export { SchemaRegistry, canonicalRoots, nullablePaths } from './registry.js';
export {
  REPOSITORY_FORMATS,
  formatPathSegment,
  repositoryTypeId,
  repositoryRegistration,
  repositoryRegistrations,
  deriveAuthenticationType,
} from './definitions/repositories.js';
export type { RepositoryFormat } from './definitions/repositories.js';
export { AUTHENTICATING_REALM, REALM_SWITCHES } from './definitions/security.js';
export * from './types.js';

/**
 * Every resource type the tool manages
 */
export function defaultRegistrations(): ResourceTypeRegistration[] {
  return [
    blobStore,
    cleanupPolicy,
    routingRule,
    contentSelector,
    sslCertificate,
    ldapConnection,
    securityRealms,
    privilege,
    role,
    user,
    anonymousAccess,
    userTokens,
    ...repositoryRegistrations(),
  ];
}

/**
 * Registry loaded with the full catalogue
 */
export function createDefaultRegistry(): SchemaRegistry {
  const registry = new SchemaRegistry();
  for (const registration of defaultRegistrations()) {
    registry.register(registration);
  }
  return registry;
}
