import { vi } from 'vitest';

import type {
  Marshaler,
  Ranger,
  Representation,
  ResolvedRange,
  Resource,
} from '@restline/core';

import type { Endpoint, PostResult, ResourceOperation } from '#types';

export const LAST_MODIFIED = new Date('2024-01-01T00:00:00Z');
export const LAST_MODIFIED_HTTP = 'Mon, 01 Jan 2024 00:00:00 GMT';
export const NOW = new Date('2024-06-01T12:00:00Z');
export const now = (): Date => NOW;

/** a json resource holding a short note */
export interface Note extends Resource {
  text: string;
}

/**
 * creates a plain note serialised by the json encoder
 * @param text content of the note
 * @param etag entity tag of the note
 * @returns note resource with a 60s lifetime
 */
export function createNote(text = 'hello', etag = '"n1"'): Note {
  return {
    text,
    etag: () => etag,
    lastModified: () => LAST_MODIFIED,
    ttl: () => 60,
  };
}

/** a plain-text document supporting byte ranges */
export class TextDocument implements Ranger, Marshaler {
  readonly #text: string;
  readonly #etag: string;

  constructor(text: string, etag = '"d1"') {
    this.#text = text;
    this.#etag = etag;
  }

  public etag(): string {
    return this.#etag;
  }

  public lastModified(): Date {
    return LAST_MODIFIED;
  }

  public ttl(): number {
    return 30;
  }

  public units(): string[] {
    return ['bytes'];
  }

  public count(): number {
    return this.#text.length;
  }

  public range(range: ResolvedRange): {
    contentRange: ResolvedRange & { total: number };
    resource: TextDocument;
  } {
    return {
      contentRange: { ...range, total: this.#text.length },
      resource: new TextDocument(
        this.#text.slice(range.from, range.to + 1),
        this.#etag,
      ),
    };
  }

  public marshal(): Representation {
    return { contentType: 'text/plain', body: Buffer.from(this.#text) };
  }
}

export const getNote = vi.fn<ResourceOperation>();
export const patchNote = vi.fn<ResourceOperation>();
export const putNote = vi.fn<ResourceOperation>();
export const postNote =
  vi.fn<(...args: Parameters<ResourceOperation>) => PostResult>();
export const deleteNote = vi.fn<(...args: Parameters<ResourceOperation>) => void>();

/** endpoint implementing every method */
export const fullEndpoint: Endpoint = {
  get: getNote,
  patch: patchNote,
  put: putNote,
  post: postNote,
  delete: deleteNote,
};

/** endpoint implementing only reads */
export const readOnlyEndpoint: Endpoint = { get: getNote };
