import {
  HTTP_BAD_REQUEST,
  HTTP_CONFLICT,
  HTTP_INTERNAL_SERVER_ERROR,
  HTTP_METHOD_NOT_ALLOWED,
  HTTP_NOT_ACCEPTABLE,
  HTTP_NOT_FOUND,
  HTTP_PRECONDITION_FAILED,
  HTTP_RANGE_NOT_SATISFIABLE,
  HTTP_UNSUPPORTED_MEDIA_TYPE,
} from '#constants/http';

import type { JsonObject } from '#json';

/** json body sent with every error response */
export interface ErrorBody extends JsonObject {
  code: number;
  message: string;
}

/**
 * HTTP error with customizable status code, headers, and response body
 *
 * operations throw (or reject with) an HTTPError to end the request with the
 * matching status; the pipeline never retries after one.
 */
export class HTTPError extends Error {
  public readonly code: number;
  public readonly headers: Record<string, string>;
  public readonly body: string;

  /**
   * creates an http error with the specified code, headers, and body
   * @param params error parameters
   * @param params.code http status code
   * @param params.message short human readable reason
   * @param params.description optional detail about the failed condition
   * @param params.headers optional http headers
   */
  constructor(params: {
    code: number;
    message: string;
    description?: string;
    headers?: Record<string, string>;
  }) {
    const { code, message, description, headers } = params;

    super(message);

    const body: ErrorBody = {
      code,
      message,
      ...(description !== undefined && { description }),
    };

    this.name = 'HTTPError';
    this.code = code;
    this.headers = {
      'content-type': 'application/json',
      ...headers,
    };
    this.body = JSON.stringify(body);
  }
}

/**
 * signals that no resource or operation matches the request
 * @param description optional detail
 * @returns 404 error
 */
export function notFound(description?: string): HTTPError {
  return new HTTPError({
    code: HTTP_NOT_FOUND,
    message: 'Not Found',
    description,
  });
}

/**
 * signals that the endpoint exists but does not implement the method
 * @param method the rejected request method
 * @param allowed methods the endpoint implements
 * @returns 405 error carrying the Allow header
 */
export function methodNotAllowed(
  method: string,
  allowed: readonly string[],
): HTTPError {
  return new HTTPError({
    code: HTTP_METHOD_NOT_ALLOWED,
    message: 'Method Not Allowed',
    description: `${method} is not supported by this resource`,
    headers: { allow: allowed.join(', ') },
  });
}

/**
 * signals that the request conflicts with the current state of the resource
 * @param description optional detail
 * @returns 409 error
 */
export function conflict(description?: string): HTTPError {
  return new HTTPError({
    code: HTTP_CONFLICT,
    message: 'Conflict',
    description,
  });
}

/**
 * signals that a precondition (If-Match, If-Unmodified-Since) did not hold
 * @param description optional detail
 * @returns 412 error
 */
export function preconditionFailed(description?: string): HTTPError {
  return new HTTPError({
    code: HTTP_PRECONDITION_FAILED,
    message: 'Precondition Failed',
    description,
  });
}

/**
 * signals that the request body is in a format the operation cannot read
 * @param supported media types the operation accepts
 * @returns 415 error
 */
export function unsupportedMediaType(...supported: string[]): HTTPError {
  return new HTTPError({
    code: HTTP_UNSUPPORTED_MEDIA_TYPE,
    message: 'Unsupported Media Type',
    description:
      supported.length > 0
        ? `supported media types: ${supported.join(', ')}`
        : undefined,
  });
}

/**
 * signals that no available representation satisfies the Accept header
 * @param alternatives media types the server can produce
 * @returns 406 error
 */
export function notAcceptable(alternatives: readonly string[]): HTTPError {
  return new HTTPError({
    code: HTTP_NOT_ACCEPTABLE,
    message: 'Not Acceptable',
    description: `available representations: ${alternatives.join(', ')}`,
  });
}

/**
 * signals that a well-formed range lies outside the resource
 * @param unit the requested range unit
 * @param count total number of units of the resource
 * @returns 416 error carrying the unsatisfied Content-Range
 */
export function rangeNotSatisfiable(unit: string, count: number): HTTPError {
  return new HTTPError({
    code: HTTP_RANGE_NOT_SATISFIABLE,
    message: 'Range Not Satisfiable',
    description: `the resource holds ${count} ${unit}`,
    headers: { 'content-range': `${unit} */${count}` },
  });
}

/**
 * signals a request the operation cannot process
 * @param description optional detail
 * @returns 400 error
 */
export function badRequest(description?: string): HTTPError {
  return new HTTPError({
    code: HTTP_BAD_REQUEST,
    message: 'Bad Request',
    description,
  });
}

/**
 * wraps an unexpected failure without exposing its details to the client
 * @returns 500 error
 */
export function internalServerError(): HTTPError {
  return new HTTPError({
    code: HTTP_INTERNAL_SERVER_ERROR,
    message: 'Internal Server Error',
    description: 'an unexpected error occurred, check server logs for details',
  });
}
