import type { IncomingHttpHeaders } from 'node:http';

/**
 * extracts the last value from http headers when multiple values exist
 * @param headers incoming http headers object
 * @param header header name to extract
 * @returns last header value or undefined if not found
 */
export function lastHeader(
  headers: IncomingHttpHeaders,
  header: string,
): string | undefined {
  const targetHeader = header.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === targetHeader) {
      if (Array.isArray(value)) {
        return value[value.length - 1];
      }

      return value;
    }
  }

  return undefined;
}

/**
 * splits a semicolon-delimited list header (If-None-Match) into trimmed entries
 * @param value raw header value
 * @returns non-empty entries; commas stay part of an entry since etags are opaque
 */
export function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
