import { jsonEncoder } from '@restline/core';

import type { Encoders } from '@restline/core';

/**
 * default HTTP server port
 * @description port used when neither the options nor RESTLINE_PORT give one.
 * @example
 * ```typescript
 * const port = options.port ?? DEFAULT_HTTP_PORT;
 * ```
 */
export const DEFAULT_HTTP_PORT = 8080;
/**
 * default HTTP server host address
 * @description address used when neither the options nor RESTLINE_HOST give one.
 */
export const DEFAULT_HOST = '0.0.0.0';
/**
 * default compression threshold in bytes
 * @description bodies smaller than this are sent without a content coding.
 */
export const DEFAULT_COMPRESSION_THRESHOLD = 1024;
/**
 * default encoders
 * @description representations offered when the options declare none.
 */
export const DEFAULT_ENCODERS: Encoders = Object.freeze({
  'application/json': jsonEncoder,
});
