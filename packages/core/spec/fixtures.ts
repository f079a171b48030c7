import type { Ranger, ResolvedRange, Resource } from '#resource';

export const LAST_MODIFIED = new Date('2024-01-01T00:00:00Z');

/**
 * creates a plain resource with fixed validators
 * @param overrides validator values to replace
 * @param overrides.etag entity tag of the resource
 * @param overrides.lastModified last modification time
 * @returns resource for condition tests
 */
export function createResource(overrides?: {
  etag?: string;
  lastModified?: Date;
}): Resource {
  return {
    etag: () => overrides?.etag ?? '"v1"',
    lastModified: () => overrides?.lastModified ?? LAST_MODIFIED,
    ttl: () => 60,
  };
}

/**
 * creates a byte ranger over the given text
 * @param text content of the ranger
 * @returns ranger whose count is the text length
 */
export function createRanger(text = '0123456789'): Ranger {
  return {
    ...createResource(),
    units: () => ['bytes'],
    count: () => text.length,
    range: (range: ResolvedRange) => ({
      contentRange: { ...range, total: text.length },
      resource: createResource(),
    }),
  };
}

/**
 * runs a function and returns what it throws
 * @param fn function expected to throw
 * @returns the thrown value, or undefined if nothing was thrown
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  return undefined;
}
