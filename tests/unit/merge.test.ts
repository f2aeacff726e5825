/**
 * Unit Tests: Default Merger and document helpers
 *
 * Tests layered default merging:
 * - Nested mappings merge, scalars and lists are replaced
 * - Missing layers behave as empty mappings
 * - Inputs are never mutated
 */

import { describe, it, expect } from 'vitest';
import { deepMerge, mergeDefaults, mergeLayers, mergeWithLayers } from '../../src/engine/merge.js';
import {
  deepEqual,
  deletePath,
  getPath,
  keyToString,
  leafPaths,
  setPath,
} from '../../src/engine/document.js';

describe('deepMerge', () => {
  it('keeps sibling keys from the lower layer', () => {
    const result = deepMerge(
      { storage: { blobStoreName: 'default', strictContentTypeValidation: true } },
      { storage: { blobStoreName: 'fast' } }
    );

    expect(result).toEqual({
      storage: { blobStoreName: 'fast', strictContentTypeValidation: true },
    });
  });

  it('replaces lists instead of concatenating them', () => {
    const result = deepMerge(
      { cleanup: { policyNames: ['weekly', 'monthly'] } },
      { cleanup: { policyNames: ['daily'] } }
    );

    expect(result).toEqual({ cleanup: { policyNames: ['daily'] } });
  });

  it('lets a scalar replace a mapping and the reverse', () => {
    expect(deepMerge({ cleanup: { policyNames: ['a'] } }, { cleanup: null })).toEqual({ cleanup: null });
    expect(deepMerge({ cleanup: null }, { cleanup: { policyNames: ['a'] } })).toEqual({
      cleanup: { policyNames: ['a'] },
    });
  });

  it('does not mutate its inputs', () => {
    const target = { storage: { blobStoreName: 'default' } };
    const source = { storage: { writePolicy: 'ALLOW' } };

    const result = deepMerge(target, source);

    expect(target).toEqual({ storage: { blobStoreName: 'default' } });
    expect(source).toEqual({ storage: { writePolicy: 'ALLOW' } });
    expect(result.storage).not.toBe(target.storage);
  });
});

describe('mergeDefaults', () => {
  it('applies Global → Type → Format → Item precedence', () => {
    const result = mergeDefaults(
      { online: true, storage: { blobStoreName: 'default' } },
      { storage: { writePolicy: 'ALLOW_ONCE' } },
      { storage: { blobStoreName: 'maven-blobs' }, maven: { versionPolicy: 'RELEASE' } },
      { name: 'releases', maven: { versionPolicy: 'SNAPSHOT' } }
    );

    expect(result).toEqual({
      online: true,
      storage: { blobStoreName: 'maven-blobs', writePolicy: 'ALLOW_ONCE' },
      maven: { versionPolicy: 'SNAPSHOT' },
      name: 'releases',
    });
  });

  it('treats missing layers as empty', () => {
    expect(mergeDefaults(undefined, undefined, undefined, { name: 'a' })).toEqual({ name: 'a' });
    expect(mergeWithLayers({}, { name: 'a' })).toEqual({ name: 'a' });
  });

  it('merges an arbitrary ordered list of layers', () => {
    expect(mergeLayers([{ a: 1, b: 1 }, undefined, { b: 2 }, { c: 3 }])).toEqual({ a: 1, b: 2, c: 3 });
  });
});

describe('document helpers', () => {
  it('reads and writes dotted paths', () => {
    const doc: Record<string, unknown> = { storage: 'flat' };

    setPath(doc, 'storage.blobStoreName', 'default');
    setPath(doc, 'proxy.remoteUrl', 'https://repo.example.test');

    expect(doc).toEqual({
      storage: { blobStoreName: 'default' },
      proxy: { remoteUrl: 'https://repo.example.test' },
    });
    expect(getPath(doc, 'proxy.remoteUrl')).toBe('https://repo.example.test');
    expect(getPath(doc, 'proxy.missing.deeper')).toBeUndefined();
  });

  it('deletes a nested path and ignores missing ones', () => {
    const doc = { httpClient: { authentication: { password: 'test-secret', username: 'bot' } } };

    deletePath(doc, 'httpClient.authentication.password');
    deletePath(doc, 'nothing.here');

    expect(doc).toEqual({ httpClient: { authentication: { username: 'bot' } } });
  });

  it('lists leaf paths; lists and empty mappings are leaves', () => {
    expect(leafPaths({ a: { b: 1, c: [1, 2], d: {} }, e: null }).sort()).toEqual([
      'a.b',
      'a.c',
      'a.d',
      'e',
    ]);
  });

  it('compares structurally, ignoring key order but not list order', () => {
    expect(deepEqual({ a: 1, b: { c: [1, 2] } }, { b: { c: [1, 2] }, a: 1 })).toBe(true);
    expect(deepEqual({ c: [1, 2] }, { c: [2, 1] })).toBe(false);
    expect(deepEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
  });

  it('renders natural keys as strings', () => {
    expect(keyToString('admin')).toBe('admin');
    expect(keyToString(42)).toBe('42');
    expect(keyToString(undefined)).toBeUndefined();
    expect(keyToString({ name: 'x' })).toBeUndefined();
  });
});
