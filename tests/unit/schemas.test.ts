/**
 * Unit Tests: Resource type definitions
 *
 * Tests the per-type behaviour carried by the built-in schemas:
 * legacy translations, derived attributes and type-specific validation.
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { normalize } from '../../src/engine/normalize.js';
import { diffOptionsFor } from '../../src/engine/pipeline.js';
import { createDefaultRegistry } from '../../src/schemas/index.js';
import { daysToSeconds, releaseTypeToPrerelease, stateToEnabled } from '../../src/schemas/definitions/transforms.js';

const registry = createDefaultRegistry();

function legacy(resourceType: string, raw: Record<string, unknown>) {
  return normalize(raw, registry.getSchema(resourceType, 'legacy'));
}

function current(resourceType: string, raw: Record<string, unknown>, naturalKeyField = 'name') {
  return normalize(raw, registry.getSchema(resourceType, 'current'), { naturalKeyField });
}

describe('transforms', () => {
  it('converts day counts to seconds strings', () => {
    expect(daysToSeconds(1)).toBe('86400');
    expect(daysToSeconds('7')).toBe('604800');
    expect(daysToSeconds(null)).toBeUndefined();
    expect(daysToSeconds('soon')).toBe('soon');
    expect(daysToSeconds('')).toBe('');
  });

  it('maps release types and states', () => {
    expect(releaseTypeToPrerelease('prereleases')).toBe(true);
    expect(releaseTypeToPrerelease('RELEASES')).toBe(false);
    expect(releaseTypeToPrerelease('ANY')).toBe('ANY');
    expect(stateToEnabled('present')).toBe(true);
    expect(stateToEnabled('absent')).toBe(false);
  });
});

describe('cleanup policies', () => {
  it('translates every legacy criterion', () => {
    expect(
      legacy('cleanup-policy', {
        name: 'npm-prereleases',
        criteriaLastDownloaded: 30,
        criteriaReleaseType: 'PRERELEASES',
        criteriaAssetRegex: '.*-SNAPSHOT.*',
      })
    ).toEqual({
      name: 'npm-prereleases',
      criteria: { lastDownloaded: '2592000', isPrerelease: true, regexKey: '.*-SNAPSHOT.*' },
    });
  });
});

describe('blob stores', () => {
  it('defaults a file store path to its name', () => {
    expect(current('blob-store', { name: 'fast' })).toEqual({
      name: 'fast',
      type: 'file',
      softQuota: null,
      path: 'fast',
    });
  });

  it('leaves S3 stores without a path', () => {
    expect(current('blob-store', { name: 'cloud', type: 's3' })).toEqual({
      name: 'cloud',
      type: 's3',
      softQuota: null,
    });
  });
});

describe('proxy repositories', () => {
  const base = { name: 'central', remote_url: 'https://repo.example.test/maven2' };

  it('derives username authentication from legacy credentials', () => {
    const item = legacy('maven-proxy-repository', {
      ...base,
      remote_username: 'bot',
      remote_password: 'test-secret',
    });

    expect(item.httpClient).toEqual({
      blocked: false,
      autoBlock: true,
      authentication: { username: 'bot', password: 'test-secret', type: 'username' },
    });
    expect(item.proxy).toEqual({
      remoteUrl: 'https://repo.example.test/maven2',
      contentMaxAge: 1440,
      metadataMaxAge: 1440,
    });
  });

  it('derives NTLM authentication when host and domain are given', () => {
    const item = legacy('maven-proxy-repository', {
      ...base,
      remote_username: 'bot',
      remote_password: 'test-secret',
      ntlm_host: 'workstation',
      ntlm_domain: 'CORP',
    });

    expect(item.httpClient).toMatchObject({ authentication: { type: 'ntlm', ntlmDomain: 'CORP' } });
  });

  it('keeps authentication null without credentials', () => {
    expect(legacy('maven-proxy-repository', base).httpClient).toEqual({
      blocked: false,
      autoBlock: true,
      authentication: null,
    });
  });

  it('rejects incomplete credentials', () => {
    expect(() => legacy('maven-proxy-repository', { ...base, remote_username: 'bot' })).toThrow(
      "maven-proxy-repository 'central': username authentication requires both username and password"
    );
    expect(() =>
      legacy('maven-proxy-repository', { ...base, remote_username: 'bot', ntlm_host: 'workstation' })
    ).toThrow(
      "maven-proxy-repository 'central': NTLM authentication requires username, password, ntlmHost and ntlmDomain"
    );
  });

  it('compares absent and null alike at every null default', () => {
    const options = diffOptionsFor(registry, registry.getResourceType('docker-proxy-repository'));

    expect(Array.from(options.nullablePaths ?? []).sort()).toEqual([
      'cleanup',
      'docker.httpPort',
      'docker.httpsPort',
      'dockerProxy.indexUrl',
      'httpClient.authentication',
      'routingRule',
    ]);
    expect(options.ignorePaths).toEqual([
      'url',
      'format',
      'type',
      'routingRuleName',
      'httpClient.authentication.password',
    ]);
  });
});

describe('hosted repositories', () => {
  it('maps legacy docker connector ports', () => {
    const item = legacy('docker-hosted-repository', { name: 'images', http_port: 8082, v1_enabled: true });

    expect(item.docker).toEqual({ v1Enabled: true, forceBasicAuth: true, httpPort: 8082, httpsPort: null });
  });

  it('requires apt signing settings', () => {
    expect(() => current('apt-hosted-repository', { name: 'debs', apt: { distribution: 'bookworm' } })).toThrow(
      "Missing required field 'aptSigning.keypair' in apt-hosted-repository 'debs'"
    );
  });
});

describe('security realms', () => {
  it('turns legacy switches into the active realm list', () => {
    expect(
      legacy('security-realms', {
        ldap_realm: true,
        docker_bearer_token_realm: false,
        npm_bearer_token_realm: true,
      })
    ).toEqual({ active: ['NexusAuthenticatingRealm', 'LdapRealm', 'NpmToken'] });
  });

  it('applies switches on top of an explicit list', () => {
    expect(
      legacy('security-realms', { active: ['LdapRealm', 'NpmToken'], npm_bearer_token_realm: false })
    ).toEqual({ active: ['NexusAuthenticatingRealm', 'LdapRealm'] });
  });
});

describe('LDAP connections', () => {
  const base = { name: 'corp', host: 'ldap.example.test', searchBase: 'dc=example,dc=test' };

  it('derives a static group mapping from group attributes', () => {
    const item = current('ldap-connection', {
      ...base,
      authRealm: '',
      groupObjectClass: 'groupOfNames',
      groupIdAttribute: 'cn',
      groupMemberAttribute: 'member',
    });

    expect(item.groupType).toBe('STATIC');
    expect(item).not.toHaveProperty('authRealm');
  });

  it('derives a dynamic group mapping from the member-of attribute', () => {
    expect(current('ldap-connection', { ...base, userMemberOfAttribute: 'memberOf' }).groupType).toBe('DYNAMIC');
  });

  it('rejects an incomplete static mapping', () => {
    expect(() =>
      current('ldap-connection', { ...base, groupType: 'STATIC', groupObjectClass: 'groupOfNames' })
    ).toThrow("ldap-connection 'corp': STATIC group mapping requires groupIdAttribute, groupMemberAttribute");
  });

  it('upper-cases legacy enum values', () => {
    const item = legacy('ldap-connection', {
      ldap_name: 'corp',
      ldap_hostname: 'ldap.example.test',
      ldap_search_base: 'dc=example,dc=test',
      ldap_protocol: 'ldaps',
      ldap_port: 636,
    });

    expect(item).toMatchObject({ name: 'corp', protocol: 'LDAPS', port: 636, authScheme: 'NONE' });
  });
});

describe('SSL certificates', () => {
  const pem = readFileSync(new URL('../fixtures/test-ca.pem', import.meta.url), 'utf8');

  it('identifies a certificate by its SHA-1 fingerprint', () => {
    expect(current('ssl-certificate', { pem }, 'id')).toEqual({
      pem,
      id: 'E4:DA:C2:3C:83:DA:39:4A:5F:EB:17:68:38:E7:D5:8F:D8:26:33:73',
    });
  });

  it('rejects text that is not a certificate', () => {
    expect(() => current('ssl-certificate', { pem: 'not a certificate' }, 'id')).toThrow(
      /^ssl-certificate '\(unnamed item\)': invalid certificate/
    );
  });
});

describe('settings', () => {
  it('fills anonymous access defaults around the legacy switch', () => {
    expect(legacy('anonymous-access', { anonymous_access: true })).toEqual({
      enabled: true,
      userId: 'anonymous',
      realmName: 'NexusAuthorizingRealm',
    });
  });

  it('maps a module-style state to the user token switch', () => {
    expect(legacy('user-tokens', { state: 'present', expire_tokens: true })).toEqual({
      enabled: true,
      protectContent: false,
      expirationEnabled: true,
      expirationDays: 30,
    });
  });

  it('maps legacy user keys', () => {
    expect(
      normalize(
        { username: 'jdoe', first_name: 'Jane', last_name: 'Doe', email: 'jdoe@example.test' },
        registry.getSchema('user', 'legacy'),
        { naturalKeyField: 'userId' }
      )
    ).toEqual({
      userId: 'jdoe',
      firstName: 'Jane',
      lastName: 'Doe',
      emailAddress: 'jdoe@example.test',
      source: 'default',
      status: 'active',
      roles: [],
      externalRoles: [],
    });
  });
});
