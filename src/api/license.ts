/**
 * Pro feature detection
 *
 * Community installations answer the license endpoint with 402/403/404;
 * any 2xx means a Pro license is installed.
 */

import type { NexusClient } from './client.js';
import { ApiRequestError } from './retry.js';

const UNLICENSED_STATUSES = new Set([402, 403, 404]);

/**
 * Probe `GET /v1/system/license`
 *
 * @throws the underlying error for statuses other than 402/403/404
 */
export async function detectProFeature(client: NexusClient): Promise<boolean> {
  try {
    await client.request('GET', '/v1/system/license', { skipRetry: true });
    return true;
  } catch (error) {
    if (error instanceof ApiRequestError && UNLICENSED_STATUSES.has(error.status)) {
      return false;
    }
    throw error;
  }
}

export type ProFeatureMode = 'auto' | 'yes' | 'no';

export const PRO_FEATURE_MODES: readonly ProFeatureMode[] = ['auto', 'yes', 'no'];

/**
 * Resolve the CLI `--pro` switch; `auto` asks the server
 */
export async function resolveProFeature(
  mode: ProFeatureMode,
  client: NexusClient
): Promise<boolean> {
  switch (mode) {
    case 'yes':
      return true;
    case 'no':
      return false;
    case 'auto':
      return detectProFeature(client);
  }
}
