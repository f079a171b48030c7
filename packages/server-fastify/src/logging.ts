import { isJsonObject, notFound, toLogLevel } from '@restline/core';

import type { Log } from '@restline/core';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';

/**
 * forwards one line written by pino to a custom log function
 * @param log custom logging function
 * @param line serialised log record
 */
function forwardLogLine(log: Log, line: string): void {
  let parsed: unknown;

  try {
    parsed = JSON.parse(line);
  } catch {
    // fallback for non-JSON log messages
    log('info', line.trim());

    return;
  }

  if (!isJsonObject(parsed)) {
    log('info', line.trim());

    return;
  }

  const { level, message, ...meta } = parsed;
  const text = typeof message === 'string' ? message : '';

  if (Object.keys(meta).length > 0) {
    log(toLogLevel(level), text, meta);
  } else {
    log(toLogLevel(level), text);
  }
}

/**
 * creates fastify logger configuration that bridges to a custom log function
 * when no log function is provided, logging is disabled
 * @param log optional custom logging function
 * @returns fastify logger configuration object
 * @example
 * ```typescript
 * const fastify = Fastify({
 *   logger: createLoggerConfig((level, message, data) => {
 *     console.log(`[${level}] ${message}`, data);
 *   }),
 * });
 * ```
 */
export function createLoggerConfig(log?: Log): FastifyServerOptions['logger'] {
  if (!log) {
    return false;
  }

  return {
    level: 'trace',
    messageKey: 'message',
    errorKey: 'error',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    // bridge fastify's pino logger to our custom Log function
    stream: {
      write: (line: string) => forwardLogLine(log, line),
    },
  };
}

/**
 * sets up the catch-all route handler for undefined routes
 * @param server the fastify server instance to configure
 */
export function setupNotFoundHandler(server: FastifyInstance): void {
  server.setNotFoundHandler(async (request, reply) => {
    const error = notFound(`no resource at ${request.method} ${request.url}`);

    return reply.code(error.code).headers(error.headers).send(error.body);
  });
}
