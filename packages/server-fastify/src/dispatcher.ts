import { SUPPORTED_METHODS, toSupportedMethod } from '@restline/core';

import {
  createDeleteHandler,
  createGetHandler,
  createModifyHandler,
  createPostHandler,
} from '#handlers/index';

import type { SupportedMethod } from '@restline/core';

import type { Endpoint, MethodHandler } from '#types';

/** resolves, per method, the handler an endpoint implements */
const DISPATCH_TABLE: Record<
  SupportedMethod,
  (endpoint: Endpoint) => MethodHandler | undefined
> = {
  HEAD: (endpoint) => DISPATCH_TABLE.GET(endpoint),
  GET: (endpoint) =>
    endpoint.get
      ? createGetHandler({ get: endpoint.get.bind(endpoint) })
      : undefined,
  PATCH: (endpoint) =>
    endpoint.patch ? createModifyHandler(endpoint.patch.bind(endpoint)) : undefined,
  PUT: (endpoint) =>
    endpoint.put ? createModifyHandler(endpoint.put.bind(endpoint)) : undefined,
  POST: (endpoint) =>
    endpoint.post
      ? createPostHandler({ post: endpoint.post.bind(endpoint) })
      : undefined,
  DELETE: (endpoint) =>
    endpoint.delete
      ? createDeleteHandler({ delete: endpoint.delete.bind(endpoint) })
      : undefined,
};

/**
 * returns the handler serving a method for an endpoint
 * @param endpoint the endpoint exposing the resource
 * @param method request method, matched case-insensitively
 * @returns the handler, or undefined when the endpoint does not implement the method
 */
export function resolveMethodHandler(
  endpoint: Endpoint,
  method: string,
): MethodHandler | undefined {
  const supported = toSupportedMethod(method);

  return supported ? DISPATCH_TABLE[supported](endpoint) : undefined;
}

/**
 * lists the methods an endpoint implements
 * @param endpoint the endpoint exposing the resource
 * @returns methods in canonical order: HEAD, GET, PATCH, PUT, POST, DELETE
 */
export function allowedMethods(endpoint: Endpoint): SupportedMethod[] {
  return SUPPORTED_METHODS.filter(
    (method) => DISPATCH_TABLE[method](endpoint) !== undefined,
  );
}
