/** value that an operation may produce synchronously or asynchronously */
export type MaybePromise<T> = T | Promise<T>;

/**
 * an addressable entity served by an endpoint
 *
 * validators are exposed as methods so that a plain object resource can be
 * serialised by the default json encoder without leaking them into the payload.
 * @example
 * ```typescript
 * const note: Resource = {
 *   text: 'hello',
 *   etag: () => '"v1"',
 *   lastModified: () => new Date('2024-01-01T00:00:00Z'),
 *   ttl: () => 60,
 * };
 * ```
 */
export interface Resource {
  /** opaque tag identifying the current version, compared by exact match */
  etag(): string;
  /** time of the last modification, compared at second precision */
  lastModified(): Date;
  /** caching lifetime in seconds, 0 for no explicit freshness */
  ttl(): number;
}

/** a parsed but not yet resolved range; an absent bound denotes an open form */
export interface RangeRequest {
  /** range unit, e.g. bytes */
  unit: string;
  /** first unit index, absent for a suffix range (last n units) */
  from?: number;
  /** last unit index (inclusive), or the suffix length when from is absent */
  to?: number;
}

/** a range resolved to concrete inclusive bounds within the resource */
export interface ResolvedRange {
  unit: string;
  from: number;
  to: number;
}

/** the span actually served and the total addressable size */
export interface ContentRange extends ResolvedRange {
  /** total number of units, undefined when the resource cannot tell */
  total: number | undefined;
}

/** outcome of extracting a span from a ranger */
export interface RangeResult {
  contentRange: ContentRange;
  resource: Resource;
}

/** a resource able to return a sub-span of itself */
export interface Ranger extends Resource {
  /** supported range units, advertised in Accept-Ranges */
  units(): string[];
  /** total number of units available */
  count(): number;
  /**
   * extracts the requested span, only called with a range already resolved
   * against units() and count()
   */
  range(range: ResolvedRange): MaybePromise<RangeResult>;
}

/** encoded bytes of a resource together with their media type */
export interface Representation {
  contentType: string;
  body: Buffer;
}

/** a resource that controls its own encoding instead of the encoder registry */
export interface Marshaler extends Resource {
  marshal(accept: string | undefined): MaybePromise<Representation>;
}

/**
 * checks whether a resource supports partial responses
 * @param resource resource to inspect
 * @returns true if the resource implements the ranger contract
 */
export function isRanger(resource: Resource): resource is Ranger {
  return (
    'units' in resource &&
    typeof resource.units === 'function' &&
    'count' in resource &&
    typeof resource.count === 'function' &&
    'range' in resource &&
    typeof resource.range === 'function'
  );
}

/**
 * checks whether a resource encodes itself
 * @param resource resource to inspect
 * @returns true if the resource implements the marshaler contract
 */
export function isMarshaler(resource: Resource): resource is Marshaler {
  return 'marshal' in resource && typeof resource.marshal === 'function';
}
