import { HTTP_CREATED } from '@restline/core';

import { writeResource } from '#writer';

import type { FastifyReply } from 'fastify';

import type { HandlerContext, Poster } from '#types';

/**
 * creates the handler serving POST
 * @param endpoint endpoint implementing the post operation
 * @returns the method handler
 */
export function createPostHandler(
  endpoint: Poster,
): (context: HandlerContext) => Promise<FastifyReply> {
  return async (context) => {
    const { resource, location } = await endpoint.post(
      context.vars,
      context.request,
    );

    if (location) {
      context.reply.header('location', location);
    }

    if (resource === null) {
      return context.reply.code(HTTP_CREATED).send();
    }

    return writeResource(resource, context, 'create');
  };
}
