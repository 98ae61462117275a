import { Cause, Effect, Either, Exit, ManagedRuntime } from 'effect';
import type { ManagedRuntime as ManagedRuntimeType } from 'effect/ManagedRuntime';
import type {
  CasToken,
  ClientOptions,
  CounterDelta,
  Deserializer,
  FlushAllOptions,
  MemcacheClient,
  MemcacheClientEffect,
  NoreplyOptions,
  RetrievalOptions,
  StoreOptions,
} from '@core/types';
import type { IllegalInputError, MemcacheError } from '@core/errors';
import { MemcacheRuntime } from '@core/runtime';
import { createConnectionLayer, type MemcacheEnv, normalizeClientOptions } from '@core/services';

type ClientRuntime = ManagedRuntimeType<MemcacheEnv, never>;

class MemcachePromiseClient<V, R> implements MemcacheClient<V, R> {
  constructor(
    private readonly runtime: MemcacheRuntime<V, R>,
    private readonly managedRuntime: ClientRuntime,
  ) {}

  private run<A>(effect: Effect.Effect<A, MemcacheError, MemcacheEnv>): Promise<A> {
    return this.managedRuntime.runPromiseExit(effect).then(unwrapExit);
  }

  get = (key: string, options?: RetrievalOptions) => this.run(this.runtime.get(key, options));
  gets = (key: string, options?: RetrievalOptions) => this.run(this.runtime.gets(key, options));
  getMany = (keys: ReadonlyArray<string>, options?: RetrievalOptions) => this.run(this.runtime.getMany(keys, options));
  getsMany = (keys: ReadonlyArray<string>, options?: RetrievalOptions) =>
    this.run(this.runtime.getsMany(keys, options));
  set = (key: string, value: V, options?: StoreOptions) => this.run(this.runtime.set(key, value, options));
  setMany = (values: Iterable<readonly [string, V]>, options?: StoreOptions) =>
    this.run(this.runtime.setMany(values, options));
  add = (key: string, value: V, options?: StoreOptions) => this.run(this.runtime.add(key, value, options));
  replace = (key: string, value: V, options?: StoreOptions) => this.run(this.runtime.replace(key, value, options));
  append = (key: string, value: V, options?: StoreOptions) => this.run(this.runtime.append(key, value, options));
  prepend = (key: string, value: V, options?: StoreOptions) => this.run(this.runtime.prepend(key, value, options));
  cas = (key: string, value: V, cas: CasToken, options?: StoreOptions) =>
    this.run(this.runtime.cas(key, value, cas, options));
  delete = (key: string, options?: NoreplyOptions) => this.run(this.runtime.delete(key, options));
  deleteMany = (keys: ReadonlyArray<string>, options?: NoreplyOptions) =>
    this.run(this.runtime.deleteMany(keys, options));
  incr = (key: string, delta: CounterDelta, options?: NoreplyOptions) =>
    this.run(this.runtime.incr(key, delta, options));
  decr = (key: string, delta: CounterDelta, options?: NoreplyOptions) =>
    this.run(this.runtime.decr(key, delta, options));
  touch = (key: string, options?: StoreOptions) => this.run(this.runtime.touch(key, options));
  stats = (...args: string[]) => this.run(this.runtime.stats(...args));
  flushAll = (options?: FlushAllOptions) => this.run(this.runtime.flushAll(options));
  quit = () => this.run(this.runtime.quit());
  state = () => this.run(this.runtime.state());
  close = () => this.managedRuntime.dispose();
}

class MemcacheEffectClient<V, R> implements MemcacheClientEffect<V, R> {
  constructor(
    private readonly runtime: MemcacheRuntime<V, R>,
    private readonly managedRuntime: ClientRuntime,
  ) {}

  private provide<A, E>(effect: Effect.Effect<A, E, MemcacheEnv>): Effect.Effect<A, E> {
    return effect.pipe(Effect.provide(this.managedRuntime));
  }

  get = (key: string, options?: RetrievalOptions) => this.provide(this.runtime.get(key, options));
  gets = (key: string, options?: RetrievalOptions) => this.provide(this.runtime.gets(key, options));
  getMany = (keys: ReadonlyArray<string>, options?: RetrievalOptions) =>
    this.provide(this.runtime.getMany(keys, options));
  getsMany = (keys: ReadonlyArray<string>, options?: RetrievalOptions) =>
    this.provide(this.runtime.getsMany(keys, options));
  set = (key: string, value: V, options?: StoreOptions) => this.provide(this.runtime.set(key, value, options));
  setMany = (values: Iterable<readonly [string, V]>, options?: StoreOptions) =>
    this.provide(this.runtime.setMany(values, options));
  add = (key: string, value: V, options?: StoreOptions) => this.provide(this.runtime.add(key, value, options));
  replace = (key: string, value: V, options?: StoreOptions) => this.provide(this.runtime.replace(key, value, options));
  append = (key: string, value: V, options?: StoreOptions) => this.provide(this.runtime.append(key, value, options));
  prepend = (key: string, value: V, options?: StoreOptions) => this.provide(this.runtime.prepend(key, value, options));
  cas = (key: string, value: V, cas: CasToken, options?: StoreOptions) =>
    this.provide(this.runtime.cas(key, value, cas, options));
  delete = (key: string, options?: NoreplyOptions) => this.provide(this.runtime.delete(key, options));
  deleteMany = (keys: ReadonlyArray<string>, options?: NoreplyOptions) =>
    this.provide(this.runtime.deleteMany(keys, options));
  incr = (key: string, delta: CounterDelta, options?: NoreplyOptions) =>
    this.provide(this.runtime.incr(key, delta, options));
  decr = (key: string, delta: CounterDelta, options?: NoreplyOptions) =>
    this.provide(this.runtime.decr(key, delta, options));
  touch = (key: string, options?: StoreOptions) => this.provide(this.runtime.touch(key, options));
  stats = (...args: string[]) => this.provide(this.runtime.stats(...args));
  flushAll = (options?: FlushAllOptions) => this.provide(this.runtime.flushAll(options));
  quit = () => this.provide(this.runtime.quit());
  state = () => this.provide(this.runtime.state());
  close = () => Effect.promise(() => this.managedRuntime.dispose());
}

type ClientResources<V, R> = {
  runtime: MemcacheRuntime<V, R>;
  managedRuntime: ClientRuntime;
};

/** Resolve a failed exit to its typed error, rethrowing defects as they are. */
const unwrapExit = <A, E>(exit: Exit.Exit<A, E>): A => {
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  const failureOrCause = Cause.failureOrCause(exit.cause);
  if (Either.isLeft(failureOrCause)) {
    throw failureOrCause.left;
  }
  throw Cause.squash(exit.cause);
};

const runPromiseOrThrow = async <A, E>(effect: Effect.Effect<A, E>): Promise<A> => {
  const exit = await Effect.runPromiseExit(effect);
  return unwrapExit(exit);
};

const buildResources = <V, R>(
  options: ClientOptions<V, R>,
): Effect.Effect<ClientResources<V, R | Buffer>, IllegalInputError> =>
  Effect.gen(function* () {
    const { connection, policy, codec } = yield* normalizeClientOptions(options);
    return {
      runtime: new MemcacheRuntime(policy, codec),
      managedRuntime: ManagedRuntime.make(createConnectionLayer(connection)),
    };
  });

/** Build an Effect-based client; nothing connects until the first command. */
export function createClientEffect<V, R>(
  options: ClientOptions<V, R> & { deserializer: Deserializer<R> },
): Effect.Effect<MemcacheClientEffect<V, R>, IllegalInputError>;
export function createClientEffect<V = string | Uint8Array>(
  options?: ClientOptions<V, Buffer>,
): Effect.Effect<MemcacheClientEffect<V, Buffer>, IllegalInputError>;
export function createClientEffect<V, R>(
  options: ClientOptions<V, R> = {},
): Effect.Effect<MemcacheClientEffect<V, R | Buffer>, IllegalInputError> {
  return buildResources(options).pipe(
    Effect.map(({ runtime, managedRuntime }) => new MemcacheEffectClient(runtime, managedRuntime)),
  );
}

/** Build a Promise-based client; nothing connects until the first command. */
export function createClient<V, R>(
  options: ClientOptions<V, R> & { deserializer: Deserializer<R> },
): Promise<MemcacheClient<V, R>>;
export function createClient<V = string | Uint8Array>(
  options?: ClientOptions<V, Buffer>,
): Promise<MemcacheClient<V, Buffer>>;
export async function createClient<V, R>(options: ClientOptions<V, R> = {}): Promise<MemcacheClient<V, R | Buffer>> {
  const { runtime, managedRuntime } = await runPromiseOrThrow(buildResources(options));
  return new MemcachePromiseClient(runtime, managedRuntime);
}
