import { HTTP_NO_CONTENT } from '@restline/core';

import type { FastifyReply } from 'fastify';

import type { Deleter, HandlerContext } from '#types';

/**
 * creates the handler serving DELETE
 * @param endpoint endpoint implementing the delete operation
 * @returns the method handler
 */
export function createDeleteHandler(
  endpoint: Deleter,
): (context: HandlerContext) => Promise<FastifyReply> {
  return async (context) => {
    await endpoint.delete(context.vars, context.request);

    return context.reply.code(HTTP_NO_CONTENT).send();
  };
}
