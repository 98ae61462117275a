import { Effect, Either } from 'effect';
import type { MemcacheError } from '@core/errors';
import { UnknownError } from '@core/errors';
import type { CommandRunner } from '@core/command-runner';
import type { KeyBuilder } from '@core/key-builder';
import type { Operation } from '@core/operations';
import type { ConnectionService } from '@core/services';
import type { Deserializer, MemcacheErrorContext } from '@core/types';
import { encode } from '@protocol/encoder';
import { readValues } from '@protocol/reader';

/** A fetched value, with its cas token when `gets` was used. */
export type Fetched<R> = {
  value: R;
  cas?: string;
};

/**
 * Multi-key retrieval in one round trip: every key is checked, one
 * `get`/`gets` line is written, and `VALUE` blocks are collected until `END`.
 * Keys the server does not return are simply absent from the result.
 */
export class BatchFetcher<R> {
  constructor(
    private readonly runner: CommandRunner,
    private readonly keys: KeyBuilder,
    private readonly deserializer: Deserializer<R>,
  ) {}

  fetch(
    operation: Operation,
    verb: 'get' | 'gets',
    keys: ReadonlyArray<string>,
  ): Effect.Effect<Map<string, Fetched<R>>, MemcacheError, ConnectionService> {
    if (keys.length === 0) {
      return Effect.succeed(new Map());
    }
    const callerKeys = new Map<string, string>();
    for (const key of keys) {
      callerKeys.set(this.keys.qualify(key), key);
    }
    const [only] = callerKeys.keys();
    const context: MemcacheErrorContext = { operation, key: callerKeys.size === 1 ? only : undefined };
    const command = encode({ name: verb, keys: [...callerKeys.keys()] }, operation);
    if (Either.isLeft(command)) {
      return Effect.fail(command.left);
    }
    const bytes = command.right;
    return this.runner.run(context, (connection) =>
      Effect.gen(this, function* () {
        yield* connection.write(bytes, context);
        const blocks = yield* readValues(connection.reader(context), context);
        const result = new Map<string, Fetched<R>>();
        for (const block of blocks) {
          const key = callerKeys.get(block.key);
          if (key === undefined) {
            continue;
          }
          if (verb === 'gets' && block.cas === undefined) {
            return yield* Effect.fail(new UnknownError(`gets reply for ${block.key} carries no cas token`, context));
          }
          const blockContext = { operation, key: block.key };
          const value = yield* this.runner.runSync(
            () => this.deserializer(key, block.data, block.flags),
            (cause) => new UnknownError(`deserializer failed for ${block.key}`, blockContext, cause),
          );
          result.set(key, { value, cas: block.cas });
        }
        return result;
      }),
    );
  }
}
