import formbody from '@fastify/formbody';
import fastify from 'fastify';

import { resolveListenOptions } from '#config';
import { registerEndpoint } from '#endpoint';
import { createLoggerConfig, setupNotFoundHandler } from '#logging';

import type { Log } from '@restline/core';
import type { FastifyInstance } from 'fastify';

import type { ListenOptions } from '#config';
import type { Endpoint, PipelineOptions } from '#types';

/**
 * configuration options for the resource server
 * @example
 * ```typescript
 * const server = new ResourceServer({
 *   port: 3000,
 *   log: (level, message, meta) => console.log(`[${level}] ${message}`, meta),
 * });
 * ```
 */
export interface ResourceServerOptions extends ListenOptions, PipelineOptions {
  /** receives fastify and pipeline log records, logging is disabled without it */
  log?: Log;
}

/** http server exposing endpoints through the response pipeline */
export class ResourceServer {
  #fastify: FastifyInstance;
  #options: ResourceServerOptions;
  #started = false;

  /**
   * creates a resource server with a fastify instance ready for endpoints
   * @param options configuration options for the server
   */
  constructor(options: ResourceServerOptions = {}) {
    this.#options = options;
    this.#fastify = fastify({
      logger: createLoggerConfig(options.log),
    });

    // lets operations read url-encoded bodies
    void this.#fastify.register(formbody);
    setupNotFoundHandler(this.#fastify);
  }

  /**
   * gets the underlying fastify instance, e.g. for inject in tests
   * @returns the fastify instance
   */
  public get fastify(): FastifyInstance {
    return this.#fastify;
  }

  /**
   * gets whether the server is listening
   * @returns true between start and stop
   */
  public get started(): boolean {
    return this.#started;
  }

  /**
   * exposes an endpoint at a route path
   * @param path route path, with :name segments becoming route variables
   * @param endpoint the endpoint exposing the resource
   * @returns this server for chaining
   * @throws {Error} when the server is already started
   */
  public register(path: string, endpoint: Endpoint): this {
    if (this.#started) {
      throw new Error(
        `Cannot register ${path} after the server has started. Register endpoints before calling start().`,
      );
    }

    void this.#fastify.register(
      registerEndpoint(path, endpoint, {
        encoders: this.#options.encoders,
        compressionThreshold: this.#options.compressionThreshold,
        now: this.#options.now,
      }),
    );

    return this;
  }

  /**
   * starts the HTTP server and begins listening for connections
   * @throws {Error} when server is already started or fails to bind to port
   */
  public async start(): Promise<void> {
    if (this.#started) {
      throw new Error(
        'HTTP server already started. Call stop() before starting again.',
      );
    }

    const { port, host } = resolveListenOptions(this.#options);

    try {
      await this.#fastify.listen({ port, host });
      this.#started = true;
    } catch (error) {
      throw new Error(
        `Failed to start HTTP server on ${host}:${port}: ${
          error instanceof Error ? error.message : 'Unknown server start error'
        }. Check if port is available and host is valid.`,
      );
    }

    this.#options.log?.('info', 'resource server started', { host, port });
  }

  /**
   * stops the server and releases the listening socket
   * @throws {Error} when server shutdown fails
   */
  public async stop(): Promise<void> {
    if (this.#started) {
      try {
        await this.#fastify.close();
        this.#started = false;
        this.#options.log?.('info', 'resource server stopped');
      } catch (error) {
        throw new Error(
          `Failed to stop HTTP server: ${
            error instanceof Error ? error.message : 'Unknown shutdown error'
          }`,
        );
      }
    }
  }
}
