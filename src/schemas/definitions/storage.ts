/**
 * Blob stores, cleanup policies, routing rules and content selectors
 */

import type { FinalizeHook, ResourceTypeRegistration } from '../types.js';
import { daysToSeconds, releaseTypeToPrerelease } from './transforms.js';

/**
 * File blob stores default their path to the store name, which is what the
 * server reports back when the path was omitted on create
 */
const defaultFilePath: FinalizeHook = (item) => {
  if (item.type === 'file' && (item.path === undefined || item.path === null)) {
    item.path = item.name;
  }
  return [];
};

export const blobStore: ResourceTypeRegistration = {
  definition: {
    id: 'blob-store',
    category: 'blob-store',
    kind: 'collection',
    naturalKeyField: 'name',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    systemPaths: ['blobCount', 'totalSizeInBytes', 'availableSpaceInBytes', 'unavailable'],
    writeOnlyPaths: ['bucketConfiguration.bucketSecurity.secretAccessKey'],
    description: 'File and S3 blob stores',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: { type: 'file', softQuota: null },
      requiredFields: ['name', 'type'],
      finalize: defaultFilePath,
    },
  },
};

export const cleanupPolicy: ResourceTypeRegistration = {
  definition: {
    id: 'cleanup-policy',
    category: 'cleanup-policy',
    kind: 'collection',
    naturalKeyField: 'name',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    readOnlyField: 'readOnly',
    description: 'Component cleanup policies',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: {},
      requiredFields: ['name'],
    },
    // Flat criteria keys in days, as accepted by older playbooks
    legacy: {
      fieldMap: {
        criteriaLastBlobUpdated: { path: 'criteria.lastBlobUpdated', transform: daysToSeconds },
        criteriaLastDownloaded: { path: 'criteria.lastDownloaded', transform: daysToSeconds },
        criteriaReleaseType: { path: 'criteria.isPrerelease', transform: releaseTypeToPrerelease },
        criteriaAssetRegex: 'criteria.regexKey',
        isPrerelease: 'criteria.isPrerelease',
        regexKey: 'criteria.regexKey',
      },
      defaultValues: {},
      requiredFields: ['name'],
    },
  },
};

export const routingRule: ResourceTypeRegistration = {
  definition: {
    id: 'routing-rule',
    category: 'routing-rule',
    kind: 'collection',
    naturalKeyField: 'name',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    description: 'Proxy routing rules',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: { description: '', mode: 'BLOCK' },
      requiredFields: ['name', 'matchers'],
    },
  },
};

export const contentSelector: ResourceTypeRegistration = {
  definition: {
    id: 'content-selector',
    category: 'content-selector',
    kind: 'collection',
    naturalKeyField: 'name',
    supportsGroupVariant: false,
    requiresProFeature: false,
    updatable: true,
    description: 'CSEL content selectors',
  },
  schemas: {
    current: {
      fieldMap: {},
      defaultValues: { type: 'csel', description: '' },
      requiredFields: ['name', 'expression'],
    },
    legacy: {
      fieldMap: { search_expression: 'expression' },
      defaultValues: { type: 'csel', description: '' },
      requiredFields: ['name', 'expression'],
    },
  },
};
