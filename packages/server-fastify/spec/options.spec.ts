import { describe, expect, it } from 'vitest';

import { DEFAULT_ENCODERS } from '#constants/defaults';
import { resolvePipelineOptions } from '#options';

describe('fn:resolvePipelineOptions', () => {
  it('should apply the defaults', () => {
    const options = resolvePipelineOptions();

    expect(options.encoders).toBe(DEFAULT_ENCODERS);
    expect(options.compressionThreshold).toBe(1024);
    expect(options.now()).toBeInstanceOf(Date);
  });

  it('should keep the given settings', () => {
    const now = (): Date => new Date('2024-01-01T00:00:00Z');
    const encoders = { 'text/plain': () => 'text' };

    expect(
      resolvePipelineOptions({ encoders, compressionThreshold: 0, now }),
    ).toEqual({ encoders, compressionThreshold: 0, now });
  });

  it('should reject an empty encoder registry', () => {
    expect(() => resolvePipelineOptions({ encoders: {} })).toThrow(
      'At least one encoder must be configured.',
    );
  });

  it('should reject a negative compression threshold', () => {
    expect(() => resolvePipelineOptions({ compressionThreshold: -1 })).toThrow(
      'Invalid compression threshold -1, expected a non-negative number of bytes.',
    );
  });
});
