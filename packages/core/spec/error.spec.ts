import { describe, expect, it } from 'vitest';

import { describeError } from '#error';

describe('fn:describeError', () => {
  it('should describe Error objects with name, message, and stack', () => {
    const result = describeError(new TypeError('Type error message'));

    expect(result).toEqual({
      type: 'Error',
      name: 'TypeError',
      message: 'Type error message',
      stack: expect.stringContaining('TypeError: Type error message'),
    });
  });

  it('should describe the cause of an error', () => {
    const error = new Error('outer', { cause: 'inner' });

    const result = describeError(error);

    expect(result).toMatchObject({
      message: 'outer',
      cause: { type: 'string', value: 'inner' },
    });
  });

  it('should describe primitives', () => {
    expect(describeError('oops')).toEqual({ type: 'string', value: 'oops' });
    expect(describeError(42)).toEqual({ type: 'number', value: 42 });
    expect(describeError(undefined)).toEqual({
      type: 'undefined',
      value: undefined,
    });
  });

  it('should describe symbols, functions and null', () => {
    expect(describeError(Symbol('signal'))).toEqual({
      type: 'symbol',
      value: 'Symbol(signal)',
    });
    expect(describeError(function failing() {})).toEqual({
      type: 'function',
      name: 'failing',
    });
    expect(describeError(null)).toEqual({ type: 'null', value: 'null' });
  });
});
