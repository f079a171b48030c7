import { HTTP_OK } from '@restline/core';

import { writeResource } from '#writer';

import type { FastifyReply } from 'fastify';

import type { HandlerContext, ResourceOperation } from '#types';

/**
 * creates the handler serving PATCH or PUT
 *
 * write-conflict checks are left to the operation, which knows the current
 * state to compare against.
 * @param operation the patch or put operation of the endpoint
 * @returns the method handler
 */
export function createModifyHandler(
  operation: ResourceOperation,
): (context: HandlerContext) => Promise<FastifyReply> {
  return async (context) => {
    const resource = await operation(context.vars, context.request);

    if (resource === null) {
      return context.reply.code(HTTP_OK).send();
    }

    return writeResource(resource, context, 'modify');
  };
}
