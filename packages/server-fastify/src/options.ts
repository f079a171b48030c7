import {
  DEFAULT_COMPRESSION_THRESHOLD,
  DEFAULT_ENCODERS,
} from '#constants/defaults';

import type { PipelineOptions, ResolvedPipelineOptions } from '#types';

/**
 * applies defaults to pipeline settings
 * @param options partial settings given by the caller
 * @returns settings with encoders, compression threshold and clock filled in
 * @throws {Error} when no encoder is configured or the threshold is negative
 */
export function resolvePipelineOptions(
  options: PipelineOptions = {},
): ResolvedPipelineOptions {
  const encoders = options.encoders ?? DEFAULT_ENCODERS;
  const compressionThreshold =
    options.compressionThreshold ?? DEFAULT_COMPRESSION_THRESHOLD;

  if (Object.keys(encoders).length === 0) {
    throw new Error('At least one encoder must be configured.');
  }

  if (!(compressionThreshold >= 0)) {
    throw new Error(
      `Invalid compression threshold ${compressionThreshold}, expected a non-negative number of bytes.`,
    );
  }

  return {
    encoders,
    compressionThreshold,
    now: options.now ?? (() => new Date()),
  };
}
