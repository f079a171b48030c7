import { DEFAULT_HOST, DEFAULT_HTTP_PORT } from '#constants/defaults';

/** where the server listens */
export interface ListenOptions {
  /** port number for the HTTP server (default: RESTLINE_PORT or 8080) */
  port?: number;
  /** host address for the HTTP server (default: RESTLINE_HOST or '0.0.0.0') */
  host?: string;
}

/** the listen address with every default applied */
export type ResolvedListenOptions = Required<ListenOptions>;

/** highest tcp port number */
const MAX_PORT = 65535;

/**
 * parses a port number from an environment variable
 * @param value raw environment value
 * @returns the port, or undefined when the variable is not set
 * @throws {Error} when the value is not a valid port number
 */
function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const port = Number(value);

  if (!Number.isInteger(port)) {
    throw new Error(
      `Invalid RESTLINE_PORT "${value}", expected an integer between 0 and ${MAX_PORT}.`,
    );
  }

  return port;
}

/**
 * resolves the listen address from options, then the environment, then defaults
 * @param options explicit listen options
 * @param env environment variables to fall back on
 * @returns host and port to listen on
 * @throws {Error} when the port is out of range
 */
export function resolveListenOptions(
  options: ListenOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedListenOptions {
  const port = options.port ?? parsePort(env.RESTLINE_PORT) ?? DEFAULT_HTTP_PORT;
  const host = options.host ?? (env.RESTLINE_HOST || DEFAULT_HOST);

  if (!Number.isInteger(port) || port < 0 || port > MAX_PORT) {
    throw new Error(
      `Invalid port ${port}, expected an integer between 0 and ${MAX_PORT}.`,
    );
  }

  return { port, host };
}
