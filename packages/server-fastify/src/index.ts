export type {
  Deleter,
  DirectWriter,
  Endpoint,
  Getter,
  HandlerContext,
  MethodHandler,
  Patcher,
  PipelineOptions,
  PostResult,
  Poster,
  Putter,
  ResolvedPipelineOptions,
  ResourceOperation,
  RouteVars,
} from '#types';
export type { ListenOptions, ResolvedListenOptions } from '#config';
export type { ResourceServerOptions } from '#server';
export type { WriteKind } from '#writer';

export * from '#constants/defaults';
export { ResourceServer } from '#server';
export { createEndpointHandler, registerEndpoint } from '#endpoint';
export { allowedMethods, resolveMethodHandler } from '#dispatcher';
export { appendVary, isDirectWriter, writeError, writeResource } from '#writer';
export { createLoggerConfig, setupNotFoundHandler } from '#logging';
export { resolveListenOptions } from '#config';
export { resolvePipelineOptions } from '#options';
export { extractRouteVars } from '#request-context';
