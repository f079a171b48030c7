import {
  HTTPError,
  HTTP_CREATED,
  HTTP_NOT_MODIFIED,
  HTTP_NO_CONTENT,
  HTTP_OK,
  HTTP_PARTIAL_CONTENT,
  MS_PER_SECOND,
  compress,
  describeError,
  formatHttpDate,
  internalServerError,
  isNotModified,
  lastHeader,
  marshal,
  negotiateCompression,
} from '@restline/core';

import { isHeadRequest } from '#request-context';

import type { Resource } from '@restline/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

import type { DirectWriter, HandlerContext } from '#types';

/** what the written resource results from, which decides the success status */
export type WriteKind = 'read' | 'modify' | 'create';

/**
 * checks whether a resource writes its own response
 * @param resource resource to inspect
 * @returns true if the resource implements the direct writer contract
 */
export function isDirectWriter(resource: Resource): resource is DirectWriter {
  return (
    'writeResponse' in resource && typeof resource.writeResponse === 'function'
  );
}

/**
 * adds a request header name to Vary, keeping earlier entries
 * @param reply fastify reply object
 * @param header request header the response depends on
 */
export function appendVary(reply: FastifyReply, header: string): void {
  const current = reply.getHeader('vary');
  const values = (typeof current === 'string' ? current.split(',') : [])
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (!values.some((value) => value.toLowerCase() === header.toLowerCase())) {
    values.push(header);
  }

  reply.header('vary', values.join(', '));
}

/**
 * selects the success status for a representation
 * @param kind what the resource results from
 * @param body final bytes of the representation
 * @param partial whether a Content-Range header was set
 * @returns the status code
 */
function selectStatus(kind: WriteKind, body: Buffer, partial: boolean): number {
  if (kind === 'create') {
    return HTTP_CREATED;
  }

  if (body.length === 0) {
    return kind === 'read' ? HTTP_NO_CONTENT : HTTP_OK;
  }

  return partial ? HTTP_PARTIAL_CONTENT : HTTP_OK;
}

/**
 * writes a resource: revalidation, validators, negotiation, compression, status
 * @param resource the resource to represent
 * @param context handler context of the request
 * @param kind what the resource results from
 * @returns the sent reply
 */
export async function writeResource(
  resource: Resource,
  context: HandlerContext,
  kind: WriteKind,
): Promise<FastifyReply> {
  const { request, reply, options } = context;

  if (isNotModified(resource, request.headers)) {
    reply.removeHeader('content-range');

    return reply.code(HTTP_NOT_MODIFIED).send();
  }

  appendVary(reply, 'Accept');
  reply.header('last-modified', formatHttpDate(resource.lastModified()));
  reply.header('etag', resource.etag());
  reply.header(
    'expires',
    formatHttpDate(
      new Date(options.now().getTime() + resource.ttl() * MS_PER_SECOND),
    ),
  );

  if (isDirectWriter(resource)) {
    await resource.writeResponse(request, reply);

    // a writer settling without sending would leave the request open
    if (!reply.sent && !reply.raw.headersSent) {
      throw new Error('direct writer settled without sending a response');
    }

    return reply;
  }

  const representation = await marshal(
    resource,
    lastHeader(request.headers, 'accept'),
    options.encoders,
  );
  reply.header('content-type', representation.contentType);

  let { body } = representation;
  const encoding = negotiateCompression(
    body,
    lastHeader(request.headers, 'accept-encoding'),
    options.compressionThreshold,
  );

  if (encoding) {
    body = compress(body, encoding);
    reply.header('content-encoding', encoding);
    appendVary(reply, 'Accept-Encoding');
  }

  const status = selectStatus(kind, body, reply.hasHeader('content-range'));
  reply.code(status);

  if (status === HTTP_NO_CONTENT) {
    return reply.send();
  }

  // HEAD carries the same length as GET, only the bytes are left out
  reply.header('content-length', String(body.length));

  return isHeadRequest(request) || body.length === 0
    ? reply.send()
    : reply.send(body);
}

/**
 * translates an error into its response, dropping any success headers
 * @param error HTTPError thrown by the pipeline or an operation, or anything unexpected
 * @param context the request and reply to answer
 * @param context.request the fastify request object
 * @param context.reply the fastify reply object
 * @returns the sent reply
 */
export function writeError(
  error: unknown,
  context: { request: FastifyRequest; reply: FastifyReply },
): FastifyReply {
  const { request, reply } = context;

  if (!(error instanceof HTTPError)) {
    request.log.error(
      {
        error: describeError(error),
        url: request.url,
        method: request.method,
      },
      'unexpected failure while serving a resource',
    );
  }

  if (reply.sent) {
    // the response was handed over already, nothing consistent can follow
    return reply;
  }

  const httpError = error instanceof HTTPError ? error : internalServerError();

  // validators and freshness describe the resource, not the error
  for (const header of [
    'content-range',
    'content-encoding',
    'content-length',
    'etag',
    'last-modified',
    'expires',
    'accept-ranges',
  ]) {
    reply.removeHeader(header);
  }

  return reply
    .code(httpError.code)
    .headers(httpError.headers)
    .send(httpError.body);
}
