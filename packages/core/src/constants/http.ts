/**
 * HTTP 200 OK status code
 * @description standard response for successful HTTP requests.
 */
export const HTTP_OK = 200;
/**
 * HTTP 201 Created status code
 * @description the request has been fulfilled and resulted in a new resource being created.
 */
export const HTTP_CREATED = 201;
/**
 * HTTP 204 No Content status code
 * @description the server successfully processed the request but is not returning any content.
 */
export const HTTP_NO_CONTENT = 204;
/**
 * HTTP 206 Partial Content status code
 * @description the body carries only the span announced by the Content-Range header.
 */
export const HTTP_PARTIAL_CONTENT = 206;
/**
 * HTTP 304 Not Modified status code
 * @description the cached representation held by the client is still current.
 */
export const HTTP_NOT_MODIFIED = 304;
/**
 * HTTP 400 Bad Request status code
 * @description the server cannot or will not process the request due to client error.
 */
export const HTTP_BAD_REQUEST = 400;
/**
 * HTTP 404 Not Found status code
 * @description the requested resource could not be found on the server.
 */
export const HTTP_NOT_FOUND = 404;
/**
 * HTTP 405 Method Not Allowed status code
 * @description the request method is not supported for the requested resource.
 */
export const HTTP_METHOD_NOT_ALLOWED = 405;
/**
 * HTTP 406 Not Acceptable status code
 * @description the requested resource is capable of generating only content not acceptable
 * according to the Accept headers sent in the request.
 */
export const HTTP_NOT_ACCEPTABLE = 406;
/**
 * HTTP 409 Conflict status code
 * @description the request could not be completed due to a conflict with the current state.
 */
export const HTTP_CONFLICT = 409;
/**
 * HTTP 412 Precondition Failed status code
 * @description a conditional header of the request did not hold for the current resource.
 */
export const HTTP_PRECONDITION_FAILED = 412;
/**
 * HTTP 415 Unsupported Media Type status code
 * @description the media format of the requested data is not supported by the server.
 */
export const HTTP_UNSUPPORTED_MEDIA_TYPE = 415;
/**
 * HTTP 416 Range Not Satisfiable status code
 * @description none of the requested units overlap the current extent of the resource.
 */
export const HTTP_RANGE_NOT_SATISFIABLE = 416;
/**
 * HTTP 500 Internal Server Error status code
 * @description a generic error message when the server encounters an unexpected condition.
 */
export const HTTP_INTERNAL_SERVER_ERROR = 500;
