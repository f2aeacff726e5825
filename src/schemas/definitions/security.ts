/**
 * Security resource types: trust store, LDAP, realms, privileges, roles,
 * users, anonymous access and user tokens
 */

import { X509Certificate } from 'node:crypto';
import { isPlainObject } from '../../engine/document.js';
import type { FieldMapping, FinalizeHook, ResourceTypeRegistration, SchemaSpec } from '../types.js';
import { stateToEnabled, upper } from './transforms.js';

// =============================================================================
// SSL trust store
// =============================================================================

/**
 * Trusted certificates are identified by their SHA-1 fingerprint
 */
const certificateIdentity: FinalizeHook = (item) => {
  if (typeof item.pem !== 'string') {
    return [{ path: 'pem', message: 'pem must be a PEM encoded certificate' }];
  }
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(item.pem);
  } catch (error) {
    return [
      {
        path: 'pem',
        message: `invalid certificate: ${error instanceof Error ? error.message : String(error)}`,
      },
    ];
  }
  if (item.id === undefined || item.id === null) {
    item.id = certificate.fingerprint;
  }
  return [];
};

export const sslCertificate: ResourceTypeRegistration = {
  definition: {
    id: 'ssl-certificate',
    category: 'ssl-certificate',
    kind: 'collection',
    naturalKeyField: 'id',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: false,
    systemPaths: [
      'fingerprint',
      'serialNumber',
      'issuerCommonName',
      'issuerOrganization',
      'issuerOrganizationalUnit',
      'subjectCommonName',
      'subjectOrganization',
      'subjectOrganizationalUnit',
      'issuedOn',
      'expiresOn',
    ],
    description: 'Certificates in the SSL trust store',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: {},
      requiredFields: ['id', 'pem'],
      finalize: certificateIdentity,
    },
  },
};

// =============================================================================
// LDAP
// =============================================================================

const LDAP_DEFAULTS = {
  protocol: 'LDAP',
  port: 389,
  authScheme: 'NONE',
  connectionTimeoutSeconds: 30,
  connectionRetryDelaySeconds: 300,
  maxIncidentsCount: 3,
  useTrustStore: false,
  ldapGroupsAsRoles: true,
  userSubtree: false,
  groupSubtree: false,
};

const LDAP_REQUIRED = ['name', 'host', 'searchBase'];

/**
 * Empty attributes are dropped and the group type is derived from the group
 * attributes given: a group object class means STATIC, a member-of
 * attribute means DYNAMIC
 */
const ldapGroupType: FinalizeHook = (item) => {
  for (const [key, value] of Object.entries(item)) {
    if (value === '') {
      delete item[key];
    }
  }

  if (item.groupType === undefined || item.groupType === null) {
    if (item.groupObjectClass !== undefined) {
      item.groupType = 'STATIC';
    } else if (item.userMemberOfAttribute !== undefined) {
      item.groupType = 'DYNAMIC';
    }
  }

  if (item.groupType === 'STATIC') {
    const missing = ['groupObjectClass', 'groupIdAttribute', 'groupMemberAttribute'].filter(
      (key) => item[key] === undefined
    );
    if (missing.length > 0) {
      return [{ path: missing[0], message: `STATIC group mapping requires ${missing.join(', ')}` }];
    }
  }
  if (item.groupType === 'DYNAMIC' && item.userMemberOfAttribute === undefined) {
    return [
      { path: 'userMemberOfAttribute', message: 'DYNAMIC group mapping requires userMemberOfAttribute' },
    ];
  }
  return [];
};

const LDAP_LEGACY: Record<string, FieldMapping> = {
  ldap_name: 'name',
  ldap_protocol: { path: 'protocol', transform: upper },
  ldap_hostname: 'host',
  ldap_port: 'port',
  ldap_search_base: 'searchBase',
  ldap_auth: { path: 'authScheme', transform: upper },
  ldap_auth_realm: 'authRealm',
  ldap_auth_username: 'authUsername',
  ldap_auth_password: 'authPassword',
  ldap_use_trust_store: 'useTrustStore',
  ldap_user_base_dn: 'userBaseDn',
  ldap_user_filter: 'userLdapFilter',
  ldap_user_object_class: 'userObjectClass',
  ldap_user_id_attribute: 'userIdAttribute',
  ldap_user_real_name_attribute: 'userRealNameAttribute',
  ldap_user_email_attribute: 'userEmailAddressAttribute',
  ldap_user_password_attribute: 'userPasswordAttribute',
  ldap_user_subtree: 'userSubtree',
  ldap_map_groups_as_roles: 'ldapGroupsAsRoles',
  ldap_group_base_dn: 'groupBaseDn',
  ldap_group_subtree: 'groupSubtree',
  ldap_group_object_class: 'groupObjectClass',
  ldap_group_id_attribute: 'groupIdAttribute',
  ldap_group_member_attribute: 'groupMemberAttribute',
  ldap_group_member_format: 'groupMemberFormat',
  ldap_user_member_of_attribute: 'userMemberOfAttribute',
};

export const ldapConnection: ResourceTypeRegistration = {
  definition: {
    id: 'ldap-connection',
    category: 'ldap-connection',
    kind: 'collection',
    naturalKeyField: 'name',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    systemPaths: ['id', 'order'],
    writeOnlyPaths: ['authPassword'],
    description: 'LDAP server connections',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: LDAP_DEFAULTS,
      requiredFields: LDAP_REQUIRED,
      finalize: ldapGroupType,
    },
    legacy: {
      fieldMap: LDAP_LEGACY,
      defaultValues: LDAP_DEFAULTS,
      requiredFields: LDAP_REQUIRED,
      finalize: ldapGroupType,
    },
  },
};

// =============================================================================
// Realms
// =============================================================================

export const AUTHENTICATING_REALM = 'NexusAuthenticatingRealm';

/**
 * Legacy boolean switch → realm id
 */
export const REALM_SWITCHES: Readonly<Record<string, string>> = {
  ldap_realm: 'LdapRealm',
  docker_bearer_token_realm: 'DockerToken',
  npm_bearer_token_realm: 'NpmToken',
  nuget_api_key_realm: 'NuGetApiKey',
  rut_auth_realm: 'rutauth-realm',
  user_token_realm: 'User-Token-Realm',
  saml_realm: 'SamlRealm',
};

const SWITCHES_PATH = 'realmSwitches';

/**
 * Turn collected boolean switches into the active realm list:
 * the authenticating realm first, then every enabled switch in declaration order
 */
const activeRealms: FinalizeHook = (item) => {
  const switches = item[SWITCHES_PATH];
  delete item[SWITCHES_PATH];
  if (!isPlainObject(switches)) return [];

  const current = Array.isArray(item.active)
    ? item.active.filter((realm): realm is string => typeof realm === 'string')
    : [AUTHENTICATING_REALM];
  const active = current.includes(AUTHENTICATING_REALM) ? current : [AUTHENTICATING_REALM, ...current];

  for (const realm of Object.values(REALM_SWITCHES)) {
    const enabled = switches[realm];
    if (enabled === true && !active.includes(realm)) {
      active.push(realm);
    } else if (enabled === false && active.includes(realm)) {
      active.splice(active.indexOf(realm), 1);
    }
  }

  item.active = active;
  return [];
};

export const securityRealms: ResourceTypeRegistration = {
  definition: {
    id: 'security-realms',
    category: 'security-realms',
    kind: 'singleton',
    naturalKeyField: '',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    description: 'Active security realms, in order',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: {},
      requiredFields: ['active'],
    },
    legacy: {
      fieldMap: Object.fromEntries(
        Object.entries(REALM_SWITCHES).map(([key, realm]) => [key, `${SWITCHES_PATH}.${realm}`])
      ),
      defaultValues: {},
      requiredFields: ['active'],
      finalize: activeRealms,
    },
  },
};

// =============================================================================
// Privileges, roles, users
// =============================================================================

export const privilege: ResourceTypeRegistration = {
  definition: {
    id: 'privilege',
    category: 'privilege',
    kind: 'collection',
    naturalKeyField: 'name',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    readOnlyField: 'readOnly',
    description: 'Privileges (application, repository, wildcard, script, selector)',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: { description: '' },
      requiredFields: ['name', 'type'],
    },
  },
};

export const role: ResourceTypeRegistration = {
  definition: {
    id: 'role',
    category: 'role',
    kind: 'collection',
    naturalKeyField: 'id',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    readOnlyField: 'readOnly',
    systemPaths: ['source'],
    description: 'Roles',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: { description: '', privileges: [], roles: [] },
      requiredFields: ['id', 'name'],
    },
  },
};

const USER_DEFAULTS = { source: 'default', status: 'active', roles: [], externalRoles: [] };
const USER_REQUIRED = ['userId', 'firstName', 'lastName', 'emailAddress'];

export const user: ResourceTypeRegistration = {
  definition: {
    id: 'user',
    category: 'user',
    kind: 'collection',
    naturalKeyField: 'userId',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    readOnlyField: 'readOnly',
    protectedKeys: ['admin', 'anonymous'],
    writeOnlyPaths: ['password'],
    description: 'Local users',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: USER_DEFAULTS,
      requiredFields: USER_REQUIRED,
    },
    legacy: {
      fieldMap: {
        username: 'userId',
        first_name: 'firstName',
        last_name: 'lastName',
        email: 'emailAddress',
      },
      defaultValues: USER_DEFAULTS,
      requiredFields: USER_REQUIRED,
    },
  },
};

// =============================================================================
// Settings singletons
// =============================================================================

const ANONYMOUS_SCHEMA: SchemaSpec = {
  fieldMap: {},
  defaultValues: { userId: 'anonymous', realmName: 'NexusAuthorizingRealm' },
  requiredFields: ['enabled'],
};

export const anonymousAccess: ResourceTypeRegistration = {
  definition: {
    id: 'anonymous-access',
    category: 'anonymous-access',
    kind: 'singleton',
    naturalKeyField: '',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    description: 'Anonymous access settings',
  },
  schemas: {
    current: ANONYMOUS_SCHEMA,
    legacy: {
      ...ANONYMOUS_SCHEMA,
      fieldMap: { anonymous_access: 'enabled', user_id: 'userId', realm_name: 'realmName' },
    },
  },
};

const USER_TOKEN_DEFAULTS = {
  enabled: true,
  protectContent: false,
  expirationEnabled: false,
  expirationDays: 30,
};

export const userTokens: ResourceTypeRegistration = {
  definition: {
    id: 'user-tokens',
    category: 'user-tokens',
    kind: 'singleton',
    naturalKeyField: '',
    supportsGroupVariant: false,
    requiresProFeature: true,
    updatable: true,
    description: 'User token settings (Pro)',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: USER_TOKEN_DEFAULTS,
      requiredFields: ['enabled'],
    },
    legacy: {
      fieldMap: {
        state: { path: 'enabled', transform: stateToEnabled },
        required_for_auth: 'protectContent',
        expire_tokens: 'expirationEnabled',
        expiration_days: 'expirationDays',
      },
      defaultValues: USER_TOKEN_DEFAULTS,
      requiredFields: ['enabled'],
    },
  },
};
