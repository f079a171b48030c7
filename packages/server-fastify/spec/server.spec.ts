import { describe, expect, it, vi } from 'vitest';

import { ResourceServer } from '#server';

import { createNote, now } from './fixtures';

import type { Log } from '@restline/core';

describe('cl:ResourceServer', () => {
  it('should serve registered endpoints', async () => {
    const server = new ResourceServer({ now }).register('/notes/:id', {
      get: () => createNote(),
    });

    const response = await server.fastify.inject({
      method: 'GET',
      url: '/notes/1',
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers.expires).toBe('Sat, 01 Jun 2024 12:01:00 GMT');
    expect(response.json()).toEqual({ text: 'hello' });
  });

  it('should pass url-encoded bodies to operations', async () => {
    const server = new ResourceServer().register('/notes', {
      post: (_vars, request) => ({
        resource: createNote(
          typeof request.body === 'object' &&
            request.body !== null &&
            'text' in request.body &&
            typeof request.body.text === 'string'
            ? request.body.text
            : '',
        ),
        location: '/notes/1',
      }),
    });

    const response = await server.fastify.inject({
      method: 'POST',
      url: '/notes',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: 'text=from+a+form',
    });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({ text: 'from a form' });
  });

  it('should answer unknown routes with a json 404', async () => {
    const server = new ResourceServer();

    const response = await server.fastify.inject({
      method: 'GET',
      url: '/nowhere',
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      code: 404,
      message: 'Not Found',
      description: 'no resource at GET /nowhere',
    });
  });

  it('should log unexpected failures through the log function', async () => {
    const log = vi.fn<Log>();
    const server = new ResourceServer({ log }).register('/notes/:id', {
      get: () => {
        throw new Error('database unavailable');
      },
    });

    const response = await server.fastify.inject({
      method: 'GET',
      url: '/notes/1',
    });

    expect(response.statusCode).toBe(500);
    expect(log).toHaveBeenCalledWith(
      'error',
      'unexpected failure while serving a resource',
      expect.objectContaining({
        error: expect.objectContaining({ message: 'database unavailable' }),
        method: 'GET',
        url: '/notes/1',
      }),
    );
  });

  it('should not report as started before start is called', () => {
    expect(new ResourceServer().started).toBe(false);
  });

  it('should do nothing when stopped before starting', async () => {
    const server = new ResourceServer();

    await expect(server.stop()).resolves.toBeUndefined();
  });
});
