/**
 * methods an endpoint can implement, in the canonical order used for the Allow header
 * @description shared by the dispatcher and the allow-list builder so the two never diverge
 */
export const SUPPORTED_METHODS = [
  'HEAD',
  'GET',
  'PATCH',
  'PUT',
  'POST',
  'DELETE',
] as const;

/** a method that may be dispatched to an endpoint operation */
export type SupportedMethod = (typeof SUPPORTED_METHODS)[number];

/** method answered by the pipeline itself, never by an operation */
export const OPTIONS = 'OPTIONS';

/**
 * normalises a request method to one of the supported methods
 * @param method raw request method in any case
 * @returns the supported method, or undefined for anything else (including OPTIONS)
 */
export function toSupportedMethod(method: string): SupportedMethod | undefined {
  const upper = method.toUpperCase();

  return SUPPORTED_METHODS.find((supported) => supported === upper);
}
