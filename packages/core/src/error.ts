import type { JsonifibleObject } from '#json';

/**
 * converts anything thrown by a caller-supplied operation into a loggable record
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function describeError(error: unknown): JsonifibleObject {
  if (error instanceof Error) {
    return {
      type: 'Error',
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause !== undefined && { cause: describeError(error.cause) }),
    };
  }

  switch (typeof error) {
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type: typeof error, value: error };
    case 'bigint':
    case 'symbol':
      return { type: typeof error, value: String(error) };
    case 'function':
      return { type: 'function', name: error.name || 'anonymous' };
    default:
      return { type: error === null ? 'null' : 'object', value: String(error) };
  }
}
