import type { FastifyRequest } from 'fastify';

import type { RouteVars } from '#types';

/**
 * extracts the route variables bound by the router
 * @param request fastify request object holding the route params
 * @returns variables in the order the route declares them
 */
export function extractRouteVars(request: FastifyRequest): RouteVars {
  const { params } = request;

  if (typeof params !== 'object' || params === null) {
    return new Map();
  }

  return new Map(
    Object.entries(params).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string',
    ),
  );
}

/**
 * tells whether the request only asks for headers
 * @param request fastify request object
 * @returns true for HEAD requests
 */
export function isHeadRequest(request: FastifyRequest): boolean {
  return request.method.toUpperCase() === 'HEAD';
}
