import { HTTP_NO_CONTENT } from '@restline/core';

import type { FastifyReply } from 'fastify';

import type { HandlerContext } from '#types';

/**
 * answers OPTIONS from the endpoint capabilities alone, no operation is called
 * @param context handler context of the request
 * @param allowed methods implemented by the endpoint, in canonical order
 * @returns the sent reply
 */
export async function writeOptions(
  context: HandlerContext,
  allowed: readonly string[],
): Promise<FastifyReply> {
  return context.reply
    .code(HTTP_NO_CONTENT)
    .header('allow', allowed.join(', '))
    .header('content-type', Object.keys(context.options.encoders).join(';'))
    .send();
}
