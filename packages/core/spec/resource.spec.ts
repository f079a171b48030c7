import { describe, expect, it } from 'vitest';

import { isMarshaler, isRanger } from '#resource';

import { createRanger, createResource } from './fixtures';

describe('fn:isRanger', () => {
  it('should detect resources able to serve sub-spans', () => {
    expect(isRanger(createRanger())).toBe(true);
  });

  it('should reject plain resources', () => {
    expect(isRanger(createResource())).toBe(false);
  });
});

describe('fn:isMarshaler', () => {
  it('should detect resources encoding themselves', () => {
    const image = {
      ...createResource(),
      marshal: () => ({ contentType: 'image/png', body: Buffer.alloc(0) }),
    };

    expect(isMarshaler(image)).toBe(true);
  });

  it('should reject plain resources', () => {
    expect(isMarshaler(createResource())).toBe(false);
  });
});
