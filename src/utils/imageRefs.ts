/**
 * Image reference helpers - Turn the service's opaque payload into image sources
 */

const COLLECTION_KEYS = ['images', 'urls', 'image_urls', 'results'] as const;

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

/**
 * Collect displayable image sources from a recommendation payload.
 *
 * Accepts a single string, an array of strings, or an object holding such an
 * array under one of the known keys. Anything else yields no images.
 */
export function normalizeImageRefs(payload: unknown): string[] {
  if (isNonEmptyString(payload)) {
    return [payload];
  }

  if (Array.isArray(payload)) {
    return payload.filter(isNonEmptyString);
  }

  if (typeof payload === 'object' && payload !== null) {
    for (const key of COLLECTION_KEYS) {
      const value: unknown = Reflect.get(payload, key);
      if (isNonEmptyString(value) || Array.isArray(value)) {
        return normalizeImageRefs(value);
      }
    }
  }

  return [];
}
