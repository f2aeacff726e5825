/**
 * Layered default merging
 *
 * Layers are applied lowest precedence first:
 *   Global → Type (hosted/proxy/group) → Format (maven2, docker, …) → Item
 *
 * Merge semantics:
 * 1. Nested mappings merge key-by-key, so sibling keys from lower layers survive
 * 2. Scalars from a higher layer replace lower values
 * 3. Lists are replaced wholesale, never concatenated, so an item can pin an
 *    exact list (e.g. cleanup policy names)
 */

import { cloneDeep, isPlainObject, type Document } from './document.js';

/**
 * Default layer names in precedence order (lowest first)
 */
export const DEFAULT_LAYERS = ['global', 'type', 'format', 'item'] as const;

export type DefaultLayer = (typeof DEFAULT_LAYERS)[number];

/**
 * Default documents for the three non-item layers.
 * A missing layer is treated as an empty mapping.
 */
export interface DefaultLayers {
  global?: Document;
  type?: Document;
  format?: Document;
}

/**
 * Deep merge two mappings; `source` wins. Neither argument is mutated.
 */
export function deepMerge(target: Document, source: Document): Document {
  const result: Document = cloneDeep(target);

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(targetValue) && isPlainObject(sourceValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = cloneDeep(sourceValue);
    }
  }

  return result;
}

/**
 * Merge an ordered list of layers (lowest precedence first)
 */
export function mergeLayers(layers: ReadonlyArray<Document | undefined>): Document {
  let result: Document = {};
  for (const layer of layers) {
    if (layer) {
      result = deepMerge(result, layer);
    }
  }
  return result;
}

/**
 * Merge the global, type and format defaults underneath one raw item
 */
export function mergeDefaults(
  globalDefaults: Document | undefined,
  typeDefaults: Document | undefined,
  formatDefaults: Document | undefined,
  itemRaw: Document
): Document {
  return mergeLayers([globalDefaults, typeDefaults, formatDefaults, itemRaw]);
}

/**
 * Convenience form taking the layers as one struct
 */
export function mergeWithLayers(layers: DefaultLayers, itemRaw: Document): Document {
  return mergeDefaults(layers.global, layers.type, layers.format, itemRaw);
}
