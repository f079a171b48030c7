export type { Log, LogLevel } from '#logging';
export type {
  JsonArray,
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';
export type {
  ContentRange,
  Marshaler,
  MaybePromise,
  RangeRequest,
  RangeResult,
  Ranger,
  Representation,
  ResolvedRange,
  Resource,
} from '#resource';
export type { SupportedMethod } from '#methods';
export type {
  CompressionEncoding,
  Encoder,
  Encoders,
  QualityEntry,
} from '#negotiation';
export type { ErrorBody } from '#errors';

export * from '#constants/http';
export * from '#constants/time';
export { describeError } from '#error';
export { isJsonObject, isJsonValue } from '#json';
export { toLogLevel } from '#logging';
export { formatHttpDate, parseHttpDate, toHttpSeconds } from '#date';
export { lastHeader, splitList } from '#headers';
export { isMarshaler, isRanger } from '#resource';
export { OPTIONS, SUPPORTED_METHODS, toSupportedMethod } from '#methods';
export { hasWriteConflict, ifRangeMatches, isNotModified } from '#conditions';
export {
  adjustRange,
  formatContentRange,
  isPartialContent,
  parseRange,
  validateRange,
} from '#range';
export {
  COMPRESSION_ENCODINGS,
  compress,
  jsonEncoder,
  marshal,
  negotiateCompression,
  parseQualityList,
  selectMediaType,
} from '#negotiation';
export {
  HTTPError,
  badRequest,
  conflict,
  internalServerError,
  methodNotAllowed,
  notAcceptable,
  notFound,
  preconditionFailed,
  rangeNotSatisfiable,
  unsupportedMediaType,
} from '#errors';
