import { parseHttpDate, toHttpSeconds } from '#date';
import { lastHeader, splitList } from '#headers';

import type { IncomingHttpHeaders } from 'node:http';

import type { Resource } from '#resource';

/**
 * detects a write conflict from If-Unmodified-Since and If-Match
 *
 * operations call this before applying a mutation; the pipeline never invokes it.
 * @param resource the current version of the resource about to be modified
 * @param headers request headers
 * @returns true if the client's view of the resource is outdated
 * @example
 * ```typescript
 * patch: async (vars, request) => {
 *   const note = await notes.find(vars.get('id'));
 *   if (hasWriteConflict(note, request.headers)) {
 *     throw preconditionFailed();
 *   }
 *   // apply the patch safely from here
 * }
 * ```
 */
export function hasWriteConflict(
  resource: Resource,
  headers: IncomingHttpHeaders,
): boolean {
  const unmodifiedSince = parseHttpDate(
    lastHeader(headers, 'if-unmodified-since'),
  );

  if (
    unmodifiedSince &&
    toHttpSeconds(unmodifiedSince) < toHttpSeconds(resource.lastModified())
  ) {
    return true;
  }

  // etags are opaque, If-Match is compared whole
  const expected = lastHeader(headers, 'if-match');

  return !!expected && expected !== resource.etag();
}

/**
 * decides whether the client's cached copy is still current
 * @param resource the resource about to be written
 * @param headers request headers
 * @returns true if the response should be 304 Not Modified
 */
export function isNotModified(
  resource: Resource,
  headers: IncomingHttpHeaders,
): boolean {
  const modifiedSince = parseHttpDate(lastHeader(headers, 'if-modified-since'));

  if (
    modifiedSince &&
    toHttpSeconds(modifiedSince) >= toHttpSeconds(resource.lastModified())
  ) {
    return true;
  }

  const etag = resource.etag();

  return splitList(lastHeader(headers, 'if-none-match')).includes(etag);
}

/**
 * evaluates an If-Range precondition, which holds either an etag or a date
 * @param resource the full resource the range applies to
 * @param ifRange raw If-Range header value
 * @returns true if the range may be honoured
 */
export function ifRangeMatches(
  resource: Resource,
  ifRange: string | undefined,
): boolean {
  if (!ifRange) {
    return true;
  }

  const date = parseHttpDate(ifRange);

  if (date) {
    return toHttpSeconds(date) === toHttpSeconds(resource.lastModified());
  }

  return ifRange === resource.etag();
}
