import { rangeNotSatisfiable } from '#errors';

import type {
  ContentRange,
  RangeRequest,
  Ranger,
  ResolvedRange,
} from '#resource';

// a single range spec: <unit>=<from>-<to>, <unit>=<from>- or <unit>=-<suffix>
const RANGE_PATTERN = /^([A-Za-z][\w.-]*)=(\d*)-(\d*)$/;

/**
 * parses a Range header holding a single range
 * @param header raw Range header value
 * @returns the parsed range, or undefined for malformed or multi-range values
 * @example
 * ```typescript
 * parseRange('bytes=0-4'); // { unit: 'bytes', from: 0, to: 4 }
 * parseRange('bytes=-5'); // { unit: 'bytes', to: 5 }
 * parseRange('bytes=0-1,4-5'); // undefined
 * ```
 */
export function parseRange(header: string | undefined): RangeRequest | undefined {
  const match = header ? RANGE_PATTERN.exec(header.trim()) : null;

  if (!match) {
    return undefined;
  }

  const [, unit = '', rawFrom = '', rawTo = ''] = match;

  if (!rawFrom && !rawTo) {
    return undefined;
  }

  const from = rawFrom ? Number(rawFrom) : undefined;
  const to = rawTo ? Number(rawTo) : undefined;

  if (
    (from !== undefined && !Number.isSafeInteger(from)) ||
    (to !== undefined && !Number.isSafeInteger(to))
  ) {
    return undefined;
  }

  return {
    unit,
    ...(from !== undefined && { from }),
    ...(to !== undefined && { to }),
  };
}

/**
 * checks a parsed range against what the ranger declares
 * @param range parsed range
 * @param ranger resource the range applies to
 * @returns false if the unit is unknown or a closed span is reversed
 */
export function validateRange(range: RangeRequest, ranger: Ranger): boolean {
  if (!ranger.units().includes(range.unit)) {
    return false;
  }

  return (
    range.from === undefined || range.to === undefined || range.from <= range.to
  );
}

/**
 * resolves open and suffix forms to concrete bounds within the ranger
 * @param range a range that passed validateRange
 * @param ranger resource the range applies to
 * @returns inclusive bounds, with the end clamped to the last unit
 * @throws {HTTPError} 416 when no requested unit exists in the resource
 */
export function adjustRange(range: RangeRequest, ranger: Ranger): ResolvedRange {
  const count = ranger.count();
  const { unit } = range;

  if (range.from === undefined) {
    // suffix form: the last n units
    const length = range.to ?? 0;

    if (length === 0 || count === 0) {
      throw rangeNotSatisfiable(unit, count);
    }

    return { unit, from: Math.max(count - length, 0), to: count - 1 };
  }

  if (range.from >= count) {
    throw rangeNotSatisfiable(unit, count);
  }

  return {
    unit,
    from: range.from,
    to: Math.min(range.to ?? count - 1, count - 1),
  };
}

/**
 * formats a Content-Range header value
 * @param contentRange the served span
 * @returns `<unit> <from>-<to>/<total>`, with `*` for an unknown total
 */
export function formatContentRange(contentRange: ContentRange): string {
  const { unit, from, to, total } = contentRange;

  return `${unit} ${from}-${to}/${total ?? '*'}`;
}

/**
 * tells whether the served span is a strict part of the resource
 * @param contentRange the served span
 * @returns true unless the span covers every unit from the first to the last
 */
export function isPartialContent(contentRange: ContentRange): boolean {
  const { from, to, total } = contentRange;

  return from !== 0 || total === undefined || to !== total - 1;
}
