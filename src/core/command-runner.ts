import { Cause, Effect, Exit, Option } from 'effect';
import type { MemcacheError, TimeoutError, TransportError } from '@core/errors';
import { formatMemcacheError } from '@core/errors';
import type { MemcacheErrorContext } from '@core/types';
import { ConnectionService } from '@core/services';
import type { Connection } from '@transport/connection';

const describeFailure = <E extends MemcacheError>(cause: Cause.Cause<E>): string =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => (Cause.isInterruptedOnly(cause) ? 'interrupted' : Cause.pretty(cause)),
    onSome: formatMemcacheError,
  });

/**
 * Runs exchanges against the client's connection. Each exchange holds the
 * connection lock, connects on demand, and faults the connection on any
 * failure or interruption so the next call starts from a fresh socket.
 */
export class CommandRunner {
  observe<A, E, R>(context: MemcacheErrorContext, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
    return effect.pipe(
      Effect.annotateLogs({
        operation: context.operation,
        key: context.key ?? '',
      }),
      Effect.withSpan(`memcache.${context.operation}`, {
        attributes: {
          key: context.key ?? '',
        },
      }),
    );
  }

  run<A, E extends MemcacheError>(
    context: MemcacheErrorContext,
    exchange: (connection: Connection) => Effect.Effect<A, E>,
  ): Effect.Effect<A, E | TimeoutError | TransportError, ConnectionService> {
    const effect = Effect.gen(function* () {
      const connection = yield* ConnectionService;
      return yield* connection.exclusive(
        connection.ensureConnected(context).pipe(
          Effect.zipRight(exchange(connection)),
          Effect.onExit((exit) =>
            Exit.isFailure(exit) ? connection.fault(context, describeFailure(exit.cause)) : Effect.void,
          ),
        ),
      );
    });
    return this.observe(context, effect);
  }

  /** Call into caller-supplied code, mapping anything it throws. */
  runSync<T, E extends MemcacheError>(
    action: () => T,
    toError: (cause: unknown) => E,
  ): Effect.Effect<T, E> {
    return Effect.try({ try: action, catch: toError });
  }
}
