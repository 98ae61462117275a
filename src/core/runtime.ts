import { Effect, Either } from 'effect';
import type { MemcacheError } from '@core/errors';
import { formatMemcacheError, IllegalInputError, isCacheFailure } from '@core/errors';
import { BatchFetcher, type Fetched } from '@core/batch';
import { CommandRunner } from '@core/command-runner';
import { type NoreplyOperation, resolveNoreply } from '@core/defaults';
import { KeyBuilder } from '@core/key-builder';
import { Operation } from '@core/operations';
import { ConnectionService, type MemcacheEnv } from '@core/services';
import { convertStats } from '@core/stats';
import type {
  CasToken,
  CasValue,
  ClientPolicy,
  ConnectionState,
  CounterDelta,
  FlushAllOptions,
  MemcacheErrorContext,
  NoreplyOptions,
  RetrievalOptions,
  StatValue,
  StoreOptions,
  ValueCodec,
} from '@core/types';
import { decodeCasToken, decodeDelta, decodeWith, keySchema, serializedValueSchema } from '@core/validation';
import type { Reply } from '@protocol/decoder';
import { type Command, encode, type StorageVerb } from '@protocol/encoder';
import { readExpected, readStats } from '@protocol/reader';

type Accept<A> = (reply: Reply) => A | undefined;

const acceptStored: Accept<boolean> = (reply) => (reply.type === 'STORED' ? true : undefined);

const acceptStoredOrNot: Accept<boolean> = (reply) => {
  if (reply.type === 'STORED') {
    return true;
  }
  return reply.type === 'NOT_STORED' ? false : undefined;
};

const acceptCas: Accept<boolean | null> = (reply) => {
  switch (reply.type) {
    case 'STORED':
      return true;
    case 'EXISTS':
      return false;
    case 'NOT_FOUND':
      return null;
    default:
      return undefined;
  }
};

const acceptDeleted: Accept<boolean> = (reply) => {
  if (reply.type === 'DELETED') {
    return true;
  }
  return reply.type === 'NOT_FOUND' ? false : undefined;
};

const acceptTouched: Accept<boolean> = (reply) => {
  if (reply.type === 'TOUCHED') {
    return true;
  }
  return reply.type === 'NOT_FOUND' ? false : undefined;
};

const acceptCounter: Accept<bigint | null> = (reply) => {
  if (reply.type === 'NUMBER') {
    return reply.value;
  }
  return reply.type === 'NOT_FOUND' ? null : undefined;
};

const acceptOk: Accept<boolean> = (reply) => (reply.type === 'OK' ? true : undefined);

const storeAccept: Record<StorageVerb, Accept<boolean>> = {
  set: acceptStored,
  add: acceptStoredOrNot,
  replace: acceptStoredOrNot,
  append: acceptStoredOrNot,
  prepend: acceptStoredOrNot,
};

const encodeCommand = (command: Command, operation: Operation): Effect.Effect<Buffer, IllegalInputError> => {
  const result = encode(command, operation);
  return Either.isRight(result) ? Effect.succeed(result.right) : Effect.fail(result.left);
};

type PreparedValue = {
  readonly key: string;
  readonly wireKey: string;
  readonly context: MemcacheErrorContext;
  readonly data: Uint8Array | string;
  readonly flags: number;
};

type PreparedCommand = {
  readonly key: string;
  readonly context: MemcacheErrorContext;
  readonly bytes: Buffer;
};

/**
 * Command engine: validates and encodes each call before any I/O, then runs
 * the exchange on the shared connection. Mutations honour `noreply`;
 * retrievals honour `ignoreExc`.
 */
export class MemcacheRuntime<V, R> {
  private readonly runner = new CommandRunner();
  private readonly keys: KeyBuilder;
  private readonly batch: BatchFetcher<R>;

  constructor(
    private readonly policy: ClientPolicy,
    private readonly codec: ValueCodec<V, R>,
  ) {
    this.keys = new KeyBuilder({ prefix: policy.keyPrefix });
    this.batch = new BatchFetcher(this.runner, this.keys, codec.deserializer);
  }

  get = (key: string, options?: RetrievalOptions): Effect.Effect<R | null, MemcacheError, MemcacheEnv> =>
    this.retrieve(Operation.Get, 'get', [key], options).pipe(
      Effect.map((found) => {
        const hit = found.get(key);
        return hit ? hit.value : null;
      }),
    );

  gets = (key: string, options?: RetrievalOptions): Effect.Effect<CasValue<R> | null, MemcacheError, MemcacheEnv> =>
    this.retrieve(Operation.Gets, 'gets', [key], options).pipe(
      Effect.map((found) => toCasValues(found).get(key) ?? null),
    );

  getMany = (
    keys: ReadonlyArray<string>,
    options?: RetrievalOptions,
  ): Effect.Effect<Map<string, R>, MemcacheError, MemcacheEnv> =>
    this.retrieve(Operation.GetMany, 'get', keys, options).pipe(
      Effect.map((found) => new Map([...found].map(([key, hit]): [string, R] => [key, hit.value]))),
    );

  getsMany = (
    keys: ReadonlyArray<string>,
    options?: RetrievalOptions,
  ): Effect.Effect<Map<string, CasValue<R>>, MemcacheError, MemcacheEnv> =>
    this.retrieve(Operation.GetsMany, 'gets', keys, options).pipe(Effect.map(toCasValues));

  set = (key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    this.store(Operation.Set, 'set', key, value, options);

  add = (key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    this.store(Operation.Add, 'add', key, value, options);

  replace = (key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    this.store(Operation.Replace, 'replace', key, value, options);

  append = (key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    this.store(Operation.Append, 'append', key, value, options);

  prepend = (key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    this.store(Operation.Prepend, 'prepend', key, value, options);

  cas = (
    key: string,
    value: V,
    cas: CasToken,
    options?: StoreOptions,
  ): Effect.Effect<boolean | null, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const prepared = yield* this.prepareValue(Operation.Cas, key, value);
      const token = yield* decodeCasToken(cas, prepared.context);
      const noreply = resolveNoreply(Operation.Cas, options?.noreply);
      const bytes = yield* encodeCommand(
        {
          name: 'cas',
          key: prepared.wireKey,
          flags: prepared.flags,
          expire: options?.expire ?? 0,
          data: prepared.data,
          cas: token,
          noreply,
        },
        Operation.Cas,
      );
      return yield* this.exchange<boolean | null>(prepared.context, bytes, noreply, true, acceptCas);
    });

  delete = (key: string, options?: NoreplyOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const context = this.contextFor(Operation.Delete, key);
      const noreply = resolveNoreply(Operation.Delete, options?.noreply);
      const bytes = yield* encodeCommand({ name: 'delete', key: this.keys.qualify(key), noreply }, Operation.Delete);
      return yield* this.exchange(context, bytes, noreply, true, acceptDeleted);
    });

  incr = (
    key: string,
    delta: CounterDelta,
    options?: NoreplyOptions,
  ): Effect.Effect<bigint | null, MemcacheError, MemcacheEnv> => this.counter(Operation.Incr, key, delta, options);

  decr = (
    key: string,
    delta: CounterDelta,
    options?: NoreplyOptions,
  ): Effect.Effect<bigint | null, MemcacheError, MemcacheEnv> => this.counter(Operation.Decr, key, delta, options);

  touch = (key: string, options?: StoreOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const context = this.contextFor(Operation.Touch, key);
      const noreply = resolveNoreply(Operation.Touch, options?.noreply);
      const bytes = yield* encodeCommand(
        { name: 'touch', key: this.keys.qualify(key), expire: options?.expire ?? 0, noreply },
        Operation.Touch,
      );
      return yield* this.exchange(context, bytes, noreply, true, acceptTouched);
    });

  setMany = (
    values: Iterable<readonly [string, V]>,
    options?: StoreOptions,
  ): Effect.Effect<Map<string, boolean>, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const noreply = resolveNoreply(Operation.SetMany, options?.noreply);
      const commands = yield* Effect.forEach([...values], ([key, value]) =>
        Effect.gen(this, function* () {
          const prepared = yield* this.prepareValue(Operation.SetMany, key, value);
          const bytes = yield* encodeCommand(
            {
              name: 'set',
              key: prepared.wireKey,
              flags: prepared.flags,
              expire: options?.expire ?? 0,
              data: prepared.data,
              noreply,
            },
            Operation.SetMany,
          );
          return { key, context: prepared.context, bytes };
        }),
      );
      return yield* this.pipeline(Operation.SetMany, commands, noreply, acceptStored);
    });

  deleteMany = (
    keys: ReadonlyArray<string>,
    options?: NoreplyOptions,
  ): Effect.Effect<Map<string, boolean>, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const noreply = resolveNoreply(Operation.DeleteMany, options?.noreply);
      const commands = yield* Effect.forEach(keys, (key) =>
        encodeCommand({ name: 'delete', key: this.keys.qualify(key), noreply }, Operation.DeleteMany).pipe(
          Effect.map((bytes) => ({ key, context: this.contextFor(Operation.DeleteMany, key), bytes })),
        ),
      );
      return yield* this.pipeline(Operation.DeleteMany, commands, noreply, acceptDeleted);
    });

  stats = (...args: string[]): Effect.Effect<Record<string, StatValue>, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const context: MemcacheErrorContext = { operation: Operation.Stats };
      const bytes = yield* encodeCommand({ name: 'stats', args }, Operation.Stats);
      return yield* this.runner.run(context, (connection) =>
        connection.write(bytes, context).pipe(
          Effect.zipRight(readStats(connection.reader(context), context)),
          Effect.map(convertStats),
        ),
      );
    });

  flushAll = (options?: FlushAllOptions): Effect.Effect<boolean, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const context: MemcacheErrorContext = { operation: Operation.FlushAll };
      const noreply = resolveNoreply(Operation.FlushAll, options?.noreply);
      const bytes = yield* encodeCommand({ name: 'flush_all', delay: options?.delay ?? 0, noreply }, Operation.FlushAll);
      return yield* this.exchange(context, bytes, noreply, true, acceptOk);
    });

  /** Send `quit` and drop the socket without waiting; does nothing when not connected. */
  quit = (): Effect.Effect<void, MemcacheError, MemcacheEnv> =>
    Effect.gen(this, function* () {
      const context: MemcacheErrorContext = { operation: Operation.Quit };
      const bytes = yield* encodeCommand({ name: 'quit' }, Operation.Quit);
      const connection = yield* ConnectionService;
      yield* this.runner.observe(
        context,
        connection.exclusive(
          Effect.suspend(() =>
            connection.state === 'Connected'
              ? connection.write(bytes, context).pipe(Effect.ensuring(connection.close()))
              : connection.close(),
          ),
        ),
      );
    });

  state = (): Effect.Effect<ConnectionState, never, MemcacheEnv> =>
    ConnectionService.pipe(Effect.map((connection) => connection.state));

  private contextFor(operation: Operation, key: string): MemcacheErrorContext {
    return { operation, key: this.keys.qualify(key) };
  }

  private retrieve(
    operation: Operation,
    verb: 'get' | 'gets',
    keys: ReadonlyArray<string>,
    options: RetrievalOptions | undefined,
  ): Effect.Effect<Map<string, Fetched<R>>, MemcacheError, MemcacheEnv> {
    const fetched = this.batch.fetch(operation, verb, keys);
    if (!(options?.ignoreExc ?? this.policy.ignoreExc)) {
      return fetched;
    }
    return fetched.pipe(
      Effect.catchIf(isCacheFailure, (error) =>
        Effect.logWarning(`treating failure as a cache miss: ${formatMemcacheError(error)}`).pipe(
          Effect.annotateLogs({ operation }),
          Effect.as(new Map<string, Fetched<R>>()),
        ),
      ),
    );
  }

  private prepareValue(operation: Operation, key: string, value: V): Effect.Effect<PreparedValue, IllegalInputError> {
    return Effect.gen(this, function* () {
      const context = this.contextFor(operation, key);
      const wireKey = yield* decodeWith(keySchema, this.keys.qualify(key), 'key', context);
      const serialized = yield* this.runner.runSync(
        () => this.codec.serializer(key, value),
        (cause) => new IllegalInputError(`serializer failed for ${context.key}`, context, undefined, cause),
      );
      const [data, flags] = yield* decodeWith(serializedValueSchema, serialized, 'serialized value', context);
      return { key, wireKey, context, data, flags };
    });
  }

  private store(
    operation: NoreplyOperation,
    verb: StorageVerb,
    key: string,
    value: V,
    options: StoreOptions | undefined,
  ): Effect.Effect<boolean, MemcacheError, MemcacheEnv> {
    return Effect.gen(this, function* () {
      const prepared = yield* this.prepareValue(operation, key, value);
      const noreply = resolveNoreply(operation, options?.noreply);
      const bytes = yield* encodeCommand(
        {
          name: verb,
          key: prepared.wireKey,
          flags: prepared.flags,
          expire: options?.expire ?? 0,
          data: prepared.data,
          noreply,
        },
        operation,
      );
      return yield* this.exchange(prepared.context, bytes, noreply, true, storeAccept[verb]);
    });
  }

  private counter(
    operation: typeof Operation.Incr | typeof Operation.Decr,
    key: string,
    delta: CounterDelta,
    options: NoreplyOptions | undefined,
  ): Effect.Effect<bigint | null, MemcacheError, MemcacheEnv> {
    return Effect.gen(this, function* () {
      const context = this.contextFor(operation, key);
      const amount = yield* decodeDelta(delta, context);
      const noreply = resolveNoreply(operation, options?.noreply);
      const bytes = yield* encodeCommand(
        { name: operation, key: this.keys.qualify(key), delta: amount, noreply },
        operation,
      );
      return yield* this.exchange<bigint | null>(context, bytes, noreply, null, acceptCounter);
    });
  }

  /** Write one command and, unless noreply, read its single reply line. */
  private exchange<A>(
    context: MemcacheErrorContext,
    bytes: Buffer,
    noreply: boolean,
    acknowledged: A,
    accept: Accept<A>,
  ): Effect.Effect<A, MemcacheError, MemcacheEnv> {
    return this.runner.run(context, (connection) =>
      Effect.gen(function* () {
        yield* connection.write(bytes, context);
        if (noreply) {
          return acknowledged;
        }
        return yield* readExpected(connection.reader(context), context, accept);
      }),
    );
  }

  /** Write every command in one chunk, then read the replies in order. */
  private pipeline(
    operation: Operation,
    commands: ReadonlyArray<PreparedCommand>,
    noreply: boolean,
    accept: Accept<boolean>,
  ): Effect.Effect<Map<string, boolean>, MemcacheError, MemcacheEnv> {
    if (commands.length === 0) {
      return Effect.succeed(new Map());
    }
    const context: MemcacheErrorContext = { operation };
    return this.runner.run(context, (connection) =>
      Effect.gen(function* () {
        yield* connection.write(Buffer.concat(commands.map((command) => command.bytes)), context);
        const results = new Map<string, boolean>();
        for (const command of commands) {
          results.set(
            command.key,
            noreply ? true : yield* readExpected(connection.reader(command.context), command.context, accept),
          );
        }
        return results;
      }),
    );
  }
}

const toCasValues = <R>(found: Map<string, Fetched<R>>): Map<string, CasValue<R>> => {
  const result = new Map<string, CasValue<R>>();
  for (const [key, { value, cas }] of found) {
    if (cas !== undefined) {
      result.set(key, { value, cas });
    }
  }
  return result;
};
