/**
 * Value transforms used by legacy field maps
 */

import type { ValueTransform } from '../types.js';

export const SECONDS_PER_DAY = 86400;

/**
 * Enum-like values were accepted in lower case by older inputs
 */
export const upper: ValueTransform = (value) =>
  typeof value === 'string' ? value.toUpperCase() : value;

/**
 * Day counts become the seconds string the API stores.
 * Null skips the key; non-numeric values pass through for the server to reject.
 */
export const daysToSeconds: ValueTransform = (value) => {
  if (value === null || value === undefined) return undefined;
  const days = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(days) || (typeof value === 'string' && value.trim() === '')) {
    return value;
  }
  return String(Math.round(days * SECONDS_PER_DAY));
};

/**
 * RELEASES / PRERELEASES to the boolean `isPrerelease` flag
 */
export const releaseTypeToPrerelease: ValueTransform = (value) => {
  if (typeof value !== 'string') return value;
  switch (value.toUpperCase()) {
    case 'PRERELEASES':
      return true;
    case 'RELEASES':
      return false;
    default:
      return value;
  }
};

/**
 * Module-style `state` values to an enabled flag
 */
export const stateToEnabled: ValueTransform = (value) => {
  if (typeof value !== 'string') return value;
  switch (value.toLowerCase()) {
    case 'present':
    case 'enabled':
      return true;
    case 'absent':
    case 'disabled':
      return false;
    default:
      return value;
  }
};
