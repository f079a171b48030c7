import { describe, expect, it } from 'vitest';

import { allowedMethods, resolveMethodHandler } from '#dispatcher';

import { createNote, fullEndpoint, readOnlyEndpoint } from './fixtures';

import type { Note } from './fixtures';

import type { RouteVars } from '#types';

describe('fn:allowedMethods', () => {
  it('should list every method in canonical order for a full endpoint', () => {
    expect(allowedMethods(fullEndpoint)).toEqual([
      'HEAD',
      'GET',
      'PATCH',
      'PUT',
      'POST',
      'DELETE',
    ]);
  });

  it('should include HEAD whenever GET is implemented', () => {
    expect(allowedMethods(readOnlyEndpoint)).toEqual(['HEAD', 'GET']);
  });

  it('should return an empty list for an endpoint without capabilities', () => {
    expect(allowedMethods({})).toEqual([]);
  });

  it('should return the same list on every call', () => {
    const endpoint = { delete: () => undefined, put: () => createNote() };

    expect(allowedMethods(endpoint)).toEqual(['PUT', 'DELETE']);
    expect(allowedMethods(endpoint)).toEqual(allowedMethods(endpoint));
  });
});

describe('fn:resolveMethodHandler', () => {
  it('should resolve methods case-insensitively', () => {
    expect(resolveMethodHandler(readOnlyEndpoint, 'get')).toBeTypeOf(
      'function',
    );
    expect(resolveMethodHandler(readOnlyEndpoint, 'Head')).toBeTypeOf(
      'function',
    );
  });

  it('should return undefined for a method the endpoint does not implement', () => {
    expect(resolveMethodHandler(readOnlyEndpoint, 'DELETE')).toBeUndefined();
  });

  it('should return undefined for OPTIONS and unknown methods', () => {
    expect(resolveMethodHandler(fullEndpoint, 'OPTIONS')).toBeUndefined();
    expect(resolveMethodHandler(fullEndpoint, 'TRACE')).toBeUndefined();
  });

  it('should detect capabilities declared as class methods', () => {
    class Notes {
      public readonly note = createNote();

      public get(_vars: RouteVars): Note {
        return this.note;
      }
    }

    const notes = new Notes();

    expect(allowedMethods(notes)).toEqual(['HEAD', 'GET']);
  });
});
