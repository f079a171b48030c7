import type { Encoders, MaybePromise, Resource } from '@restline/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/** route variables extracted by the router, in declaration order */
export type RouteVars = ReadonlyMap<string, string>;

/** an operation returning the resource to represent, or null for no body */
export type ResourceOperation = (
  vars: RouteVars,
  request: FastifyRequest,
) => MaybePromise<Resource | null>;

/** implemented by endpoints allowing the GET and HEAD methods */
export interface Getter {
  /** returns the resource, null produces 204 No Content */
  get: ResourceOperation;
}

/** implemented by endpoints allowing the PATCH method */
export interface Patcher {
  /** returns the patched resource, null produces 200 without a body */
  patch: ResourceOperation;
}

/** implemented by endpoints allowing the PUT method */
export interface Putter {
  /** returns the modified resource, null produces 200 without a body */
  put: ResourceOperation;
}

/** outcome of a create operation */
export interface PostResult {
  /** the created resource, null produces 201 without a body */
  resource: Resource | null;
  /** uri of the created resource, sent as the Location header */
  location?: string;
}

/** implemented by endpoints allowing the POST method */
export interface Poster {
  post(vars: RouteVars, request: FastifyRequest): MaybePromise<PostResult>;
}

/** implemented by endpoints allowing the DELETE method */
export interface Deleter {
  delete(vars: RouteVars, request: FastifyRequest): MaybePromise<void>;
}

/**
 * an access point exposing a resource, implementing any subset of the method capabilities
 * @example
 * ```typescript
 * const endpoint: Endpoint = {
 *   get: async (vars) => {
 *     const note = await notes.find(vars.get('id'));
 *     if (!note) {
 *       throw notFound();
 *     }
 *     return note;
 *   },
 * };
 * ```
 */
export type Endpoint = Partial<Getter & Patcher & Putter & Poster & Deleter>;

/**
 * a resource that writes its own response once validators and Expires are set,
 * e.g. to stream its body or add a Content-Disposition header
 *
 * the reply must be sent before writeResponse settles, otherwise the request
 * ends with 500 Internal Server Error.
 */
export interface DirectWriter extends Resource {
  writeResponse(
    request: FastifyRequest,
    reply: FastifyReply,
  ): MaybePromise<unknown>;
}

/** settings of the response pipeline */
export interface PipelineOptions {
  /** encoders keyed by media type, most preferred first (default: json only) */
  encoders?: Encoders;
  /** smallest body size in bytes worth compressing (default: 1024) */
  compressionThreshold?: number;
  /** clock used to compute Expires (default: the current time) */
  now?: () => Date;
}

/** pipeline settings with every default applied */
export type ResolvedPipelineOptions = Required<PipelineOptions>;

/** handler context for serving one request */
export interface HandlerContext {
  request: FastifyRequest;
  reply: FastifyReply;
  vars: RouteVars;
  options: ResolvedPipelineOptions;
}

/** serves one method of an endpoint */
export type MethodHandler = (context: HandlerContext) => Promise<FastifyReply>;
