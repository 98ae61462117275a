import { Context, Effect, Either, Layer } from 'effect';
import { clientOptionsSchema, decodeWith, optionsContext } from '@core/validation';
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_TIMEOUT,
  defaultDeserializer,
  defaultSerializer,
  resolveDuration,
} from '@core/defaults';
import { IllegalInputError } from '@core/errors';
import type { ClientOptions, ConnectionSettings, ResolvedClientOptions } from '@core/types';
import { Connection } from '@transport/connection';
import { resolveEndpoint } from '@transport/endpoint';
import { netConnector } from '@transport/net-connector';

export class ConnectionService extends Context.Tag('ConnectionService')<ConnectionService, Connection>() {}

export type MemcacheEnv = ConnectionService;

const validateBaseOptions = <V, R>(
  options: ClientOptions<V, R>,
): Effect.Effect<ClientOptions<V, R>, IllegalInputError> =>
  decodeWith(clientOptionsSchema, options, 'createClient options', optionsContext).pipe(Effect.as(options));

/** Validate options and fill in defaults; the raw-bytes deserializer stands in when none is given. */
export const normalizeClientOptions = <V, R>(
  options: ClientOptions<V, R>,
): Effect.Effect<ResolvedClientOptions<V, R | Buffer>, IllegalInputError> =>
  Effect.gen(function* () {
    const base = options.validateOptions === false ? options : yield* validateBaseOptions(options);
    const endpoint = resolveEndpoint(base);
    if (Either.isLeft(endpoint)) {
      return yield* Effect.fail(new IllegalInputError(endpoint.left, optionsContext));
    }
    return {
      connection: {
        endpoint: endpoint.right,
        connectTimeout: resolveDuration(base.connectTimeout, DEFAULT_CONNECT_TIMEOUT),
        timeout: resolveDuration(base.timeout, DEFAULT_TIMEOUT),
        noDelay: base.noDelay ?? true,
        connector: base.connector ?? netConnector,
      },
      policy: {
        ignoreExc: base.ignoreExc ?? false,
        keyPrefix: base.keyPrefix ?? '',
      },
      codec: {
        serializer: base.serializer ?? defaultSerializer,
        deserializer: base.deserializer ?? defaultDeserializer,
      },
    };
  });

/** Scoped layer owning the client's one connection; closing the scope closes the socket. */
export const createConnectionLayer = (settings: ConnectionSettings): Layer.Layer<ConnectionService> =>
  Layer.scoped(
    ConnectionService,
    Effect.acquireRelease(
      Effect.sync(() => new Connection(settings)),
      (connection) => connection.close(),
    ),
  );
