import { OPTIONS, notFound, methodNotAllowed } from '@restline/core';

import { allowedMethods, resolveMethodHandler } from '#dispatcher';
import { writeOptions } from '#handlers/index';
import { resolvePipelineOptions } from '#options';
import { extractRouteVars } from '#request-context';
import { writeError } from '#writer';

import type {
  FastifyPluginAsync,
  FastifyReply,
  FastifyRequest,
  HTTPMethods,
} from 'fastify';

import type { Endpoint, HandlerContext, PipelineOptions } from '#types';

/** every method routed to an endpoint, including those it may not implement */
const ROUTED_METHODS: HTTPMethods[] = [
  'GET',
  'HEAD',
  'PATCH',
  'PUT',
  'POST',
  'DELETE',
  'OPTIONS',
];

/**
 * creates a fastify route handler serving every method of an endpoint
 * @param endpoint the endpoint exposing the resource
 * @param options settings of the response pipeline
 * @returns the route handler
 */
export function createEndpointHandler(
  endpoint: Endpoint,
  options?: PipelineOptions,
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply> {
  const resolved = resolvePipelineOptions(options);
  // capabilities are fixed for the lifetime of the endpoint
  const allowed = allowedMethods(endpoint);

  return async (request, reply) => {
    const context: HandlerContext = {
      request,
      reply,
      vars: extractRouteVars(request),
      options: resolved,
    };

    try {
      if (request.method.toUpperCase() === OPTIONS) {
        return await writeOptions(context, allowed);
      }

      const handler = resolveMethodHandler(endpoint, request.method);

      if (!handler) {
        throw allowed.length > 0
          ? methodNotAllowed(request.method, allowed)
          : notFound();
      }

      return await handler(context);
    } catch (error) {
      return writeError(error, context);
    }
  };
}

/**
 * creates a fastify plugin binding an endpoint to a route
 * @param path route path, with :name segments becoming route variables
 * @param endpoint the endpoint exposing the resource
 * @param options settings of the response pipeline
 * @returns the plugin to register
 * @example
 * ```typescript
 * await fastify.register(registerEndpoint('/notes/:id', notesEndpoint));
 * ```
 */
export function registerEndpoint(
  path: string,
  endpoint: Endpoint,
  options?: PipelineOptions,
): FastifyPluginAsync {
  const handler = createEndpointHandler(endpoint, options);

  return async (fastify) => {
    fastify.route({
      method: ROUTED_METHODS,
      url: path,
      // HEAD is served by the GET operation through the dispatcher
      exposeHeadRoute: false,
      handler,
    });
  };
}
