import { describe, expect, it } from 'vitest';

import { resolveListenOptions } from '#config';

describe('fn:resolveListenOptions', () => {
  it('should apply defaults when nothing is configured', () => {
    expect(resolveListenOptions({}, {})).toEqual({
      port: 8080,
      host: '0.0.0.0',
    });
  });

  it('should read the environment when options are absent', () => {
    expect(
      resolveListenOptions({}, { RESTLINE_PORT: '3000', RESTLINE_HOST: '::1' }),
    ).toEqual({ port: 3000, host: '::1' });
  });

  it('should prefer explicit options over the environment', () => {
    expect(
      resolveListenOptions(
        { port: 4000, host: '127.0.0.1' },
        { RESTLINE_PORT: '3000', RESTLINE_HOST: '::1' },
      ),
    ).toEqual({ port: 4000, host: '127.0.0.1' });
  });

  it('should ignore an empty port variable', () => {
    expect(resolveListenOptions({}, { RESTLINE_PORT: ' ' }).port).toBe(8080);
  });

  it('should reject a port variable that is not an integer', () => {
    expect(() => resolveListenOptions({}, { RESTLINE_PORT: 'http' })).toThrow(
      'Invalid RESTLINE_PORT "http", expected an integer between 0 and 65535.',
    );
  });

  it('should reject a port out of range', () => {
    expect(() => resolveListenOptions({ port: 70000 }, {})).toThrow(
      'Invalid port 70000, expected an integer between 0 and 65535.',
    );
  });
});
