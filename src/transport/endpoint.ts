import { Either } from 'effect';
import { DEFAULT_HOST, DEFAULT_PORT } from '@core/defaults';
import type { Endpoint } from '@core/types';

const SCHEME = 'mc://';
const PORT = /^\d+$/;

const splitAddress = (address: string): Either.Either<{ host: string; port?: string }, string> => {
  if (address.startsWith('[')) {
    const close = address.indexOf(']');
    if (close < 0) {
      return Either.left('IPv6 address is missing its closing bracket');
    }
    const rest = address.slice(close + 1);
    if (rest.length > 0 && !rest.startsWith(':')) {
      return Either.left('unexpected text after IPv6 address');
    }
    return Either.right({ host: address.slice(1, close), port: rest.length > 0 ? rest.slice(1) : undefined });
  }
  const separator = address.indexOf(':');
  // A bare IPv6 literal has several colons and no port.
  if (separator < 0 || separator !== address.lastIndexOf(':')) {
    return Either.right({ host: address });
  }
  return Either.right({ host: address.slice(0, separator), port: address.slice(separator + 1) });
};

/**
 * Parse a single server address: `host`, `host:port`, `[v6]:port` or `mc://host:port`.
 * Query strings and paths after an `mc://` address are ignored.
 */
export const parseServer = (server: string): Either.Either<Endpoint, string> => {
  const trimmed = server.trim();
  const address = trimmed.startsWith(SCHEME) ? trimmed.slice(SCHEME.length).split(/[/?#]/, 1)[0] ?? '' : trimmed;
  return splitAddress(address).pipe(
    Either.mapLeft((reason) => `server "${server}": ${reason}`),
    Either.flatMap(({ host, port }): Either.Either<Endpoint, string> => {
      if (host.length === 0) {
        return Either.left(`server "${server}" has no host`);
      }
      if (port === undefined) {
        return Either.right({ host, port: DEFAULT_PORT });
      }
      const value = PORT.test(port) ? Number(port) : Number.NaN;
      if (!(value >= 1 && value <= 65535)) {
        return Either.left(`server "${server}" has an invalid port "${port}"`);
      }
      return Either.right({ host, port: value });
    }),
  );
};

/** Pick the endpoint from `server`, falling back to `host`/`port`. */
export const resolveEndpoint = (options: {
  server?: string;
  host?: string;
  port?: number;
}): Either.Either<Endpoint, string> =>
  options.server !== undefined
    ? parseServer(options.server)
    : Either.right({ host: options.host ?? DEFAULT_HOST, port: options.port ?? DEFAULT_PORT });
