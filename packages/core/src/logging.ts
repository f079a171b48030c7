import type { JsonifibleObject } from '#json';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** receives log records from the server and the pipeline */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;

const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

/**
 * narrows an arbitrary level label, as emitted by pino, to a known log level
 * @param label level label to check
 * @returns the matching log level or info when the label is unknown
 */
export function toLogLevel(label: unknown): LogLevel {
  return LOG_LEVELS.find((level) => level === label) ?? 'info';
}
