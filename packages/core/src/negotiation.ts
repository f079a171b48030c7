import { deflateSync, gzipSync } from 'node:zlib';

import { notAcceptable } from '#errors';
import { isMarshaler } from '#resource';

import type { MaybePromise, Representation, Resource } from '#resource';

/** encodes a resource for a single media type */
export type Encoder = (resource: Resource) => MaybePromise<Buffer | string>;

/** encoders keyed by media type, in order of server preference */
export type Encoders = Readonly<Record<string, Encoder>>;

/** content codings the pipeline can apply, in order of server preference */
export const COMPRESSION_ENCODINGS = ['gzip', 'deflate'] as const;

/** a content coding the pipeline can apply */
export type CompressionEncoding = (typeof COMPRESSION_ENCODINGS)[number];

/** an entry of a quality list header such as Accept or Accept-Encoding */
export interface QualityEntry {
  value: string;
  quality: number;
}

/** serialises the resource itself as json, its validator methods are skipped */
export const jsonEncoder: Encoder = (resource) => JSON.stringify(resource);

/**
 * parses a comma separated header with optional q parameters
 * @param header raw header value
 * @returns entries in header order, lower-cased, with quality defaulting to 1
 */
export function parseQualityList(header: string | undefined): QualityEntry[] {
  return (header ?? '')
    .split(',')
    .map((part) => {
      const [rawValue = '', ...params] = part.split(';');
      const qParam = params
        .map((param) => param.trim().toLowerCase())
        .find((param) => param.startsWith('q='));
      const quality = qParam ? Number(qParam.slice(2)) : 1;

      return {
        value: rawValue.trim().toLowerCase(),
        quality: Number.isFinite(quality) ? quality : 0,
      };
    })
    .filter(({ value }) => value.length > 0);
}

/**
 * finds the quality an Accept header gives to a media type
 * @param entries parsed Accept header
 * @param mediaType candidate media type
 * @returns quality of the most specific matching range, 0 when none matches
 */
function acceptQuality(entries: QualityEntry[], mediaType: string): number {
  const [type] = mediaType.toLowerCase().split('/');
  let best: { specificity: number; quality: number } = {
    specificity: -1,
    quality: 0,
  };

  for (const { value, quality } of entries) {
    const specificity =
      value === mediaType.toLowerCase()
        ? 2
        : value === `${type}/*`
          ? 1
          : value === '*/*'
            ? 0
            : -1;

    if (specificity > best.specificity) {
      best = { specificity, quality };
    }
  }

  return best.quality;
}

/**
 * selects the representation to send for an Accept header
 * @param accept raw Accept header
 * @param alternatives media types the server can produce, most preferred first
 * @returns the selected media type, or undefined if none is acceptable
 */
export function selectMediaType(
  accept: string | undefined,
  alternatives: readonly string[],
): string | undefined {
  const entries = parseQualityList(accept);

  if (entries.length === 0) {
    return alternatives[0];
  }

  let selected: { mediaType: string; quality: number } | undefined;

  for (const mediaType of alternatives) {
    const quality = acceptQuality(entries, mediaType);

    if (quality > 0 && quality > (selected?.quality ?? 0)) {
      selected = { mediaType, quality };
    }
  }

  return selected?.mediaType;
}

/**
 * encodes a resource into the representation negotiated from an Accept header
 * @param resource the resource to encode
 * @param accept raw Accept header
 * @param encoders available encoders keyed by media type
 * @returns media type and encoded bytes
 * @throws {HTTPError} 406 when no encoder satisfies the Accept header
 */
export async function marshal(
  resource: Resource,
  accept: string | undefined,
  encoders: Encoders,
): Promise<Representation> {
  if (isMarshaler(resource)) {
    return resource.marshal(accept);
  }

  const alternatives = Object.keys(encoders);
  const contentType = selectMediaType(accept, alternatives);
  const encoder = contentType ? encoders[contentType] : undefined;

  if (!contentType || !encoder) {
    throw notAcceptable(alternatives);
  }

  const encoded = await encoder(resource);

  return {
    contentType,
    body: typeof encoded === 'string' ? Buffer.from(encoded) : encoded,
  };
}

/**
 * decides which content coding, if any, to apply to a body
 * @param body the encoded representation
 * @param acceptEncoding raw Accept-Encoding header
 * @param threshold smallest body size in bytes worth compressing
 * @returns the coding to apply, or undefined to send the body as is
 */
export function negotiateCompression(
  body: Buffer,
  acceptEncoding: string | undefined,
  threshold: number,
): CompressionEncoding | undefined {
  if (body.length === 0 || body.length < threshold) {
    return undefined;
  }

  const entries = parseQualityList(acceptEncoding);
  const wildcard = entries.find(({ value }) => value === '*');
  let selected: { encoding: CompressionEncoding; quality: number } | undefined;

  for (const encoding of COMPRESSION_ENCODINGS) {
    const quality =
      entries.find(({ value }) => value === encoding)?.quality ??
      wildcard?.quality ??
      0;

    if (quality > 0 && quality > (selected?.quality ?? 0)) {
      selected = { encoding, quality };
    }
  }

  return selected?.encoding;
}

/**
 * applies a content coding to a body
 * @param body bytes to compress
 * @param encoding coding returned by negotiateCompression
 * @returns compressed bytes
 */
export function compress(body: Buffer, encoding: CompressionEncoding): Buffer {
  switch (encoding) {
    case 'gzip':
      return gzipSync(body);
    case 'deflate':
      return deflateSync(body);
  }
}
