import {
  HTTP_NOT_MODIFIED,
  HTTP_NO_CONTENT,
  adjustRange,
  formatContentRange,
  ifRangeMatches,
  isNotModified,
  isPartialContent,
  isRanger,
  lastHeader,
  parseRange,
  validateRange,
} from '@restline/core';

import { appendVary, writeResource } from '#writer';

import type { Resource } from '@restline/core';
import type { FastifyReply } from 'fastify';

import type { Getter, HandlerContext } from '#types';

/**
 * narrows a ranger to the span asked by the Range header, if any applies
 * @param resource the resource returned by the get operation
 * @param context handler context of the request
 * @returns the resource to write, partial or whole
 */
async function applyRange(
  resource: Resource,
  context: HandlerContext,
): Promise<Resource> {
  const { request, reply } = context;

  const header = lastHeader(request.headers, 'range');

  if (!isRanger(resource) || header === undefined) {
    return resource;
  }

  appendVary(reply, 'Range');

  const range = parseRange(header);

  if (!range || !validateRange(range, resource)) {
    request.log.debug({ range: header }, 'ignoring unusable range header');

    return resource;
  }

  if (!ifRangeMatches(resource, lastHeader(request.headers, 'if-range'))) {
    request.log.debug(
      { range: header },
      'if-range validator is stale, serving the full resource',
    );

    return resource;
  }

  const { contentRange, resource: partial } = await resource.range(
    adjustRange(range, resource),
  );

  if (isPartialContent(contentRange)) {
    reply.header('content-range', formatContentRange(contentRange));
  }

  return partial;
}

/**
 * creates the handler serving GET and HEAD
 * @param endpoint endpoint implementing the get operation
 * @returns the method handler
 */
export function createGetHandler(
  endpoint: Getter,
): (context: HandlerContext) => Promise<FastifyReply> {
  return async (context) => {
    const resource = await endpoint.get(context.vars, context.request);

    if (resource === null) {
      return context.reply.code(HTTP_NO_CONTENT).send();
    }

    if (isRanger(resource)) {
      context.reply.header('accept-ranges', resource.units().join(', '));
    }

    // revalidation comes before any range work
    if (isNotModified(resource, context.request.headers)) {
      return context.reply.code(HTTP_NOT_MODIFIED).send();
    }

    return writeResource(await applyRange(resource, context), context, 'read');
  };
}
