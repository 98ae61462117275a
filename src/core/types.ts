import type { Duration, Effect } from 'effect';
import type { Duplex } from 'node:stream';
import type { MemcacheError } from '@core/errors';
import type { Operation } from '@core/operations';

/** Error context for client failures. */
export type MemcacheErrorContext = {
  operation: Operation;
  key?: string;
};

/** Error tag codes for client failures. */
export type MemcacheErrorCode = MemcacheError['_tag'];

/** Bytes plus the opaque flags word produced by a serializer. */
export type SerializedValue = readonly [bytes: Uint8Array | string, flags: number];

/** Turns a caller value into wire bytes and flags. */
export type Serializer<V> = (key: string, value: V) => SerializedValue;

/** Turns wire bytes and flags back into a caller value. */
export type Deserializer<R> = (key: string, bytes: Buffer, flags: number) => R;

/** Host and port of the single memcached server. */
export type Endpoint = {
  host: string;
  port: number;
};

/** Opens the byte stream to the server; the signal aborts when the connect attempt is abandoned. */
export type Connector = (endpoint: Endpoint & { noDelay: boolean }, signal: AbortSignal) => Promise<Duplex>;

/** Connection lifecycle state. */
export type ConnectionState = 'Disconnected' | 'Connected' | 'Faulted';

/** Options for retrieval calls. */
export type RetrievalOptions = {
  ignoreExc?: boolean;
};

/** Options for storage calls. */
export type StoreOptions = {
  /** Seconds until expiry, or a unix timestamp past 30 days; 0 never expires. */
  expire?: number;
  noreply?: boolean;
};

/** Options for calls that only carry the noreply bit. */
export type NoreplyOptions = {
  noreply?: boolean;
};

/** Options for flush_all. */
export type FlushAllOptions = {
  delay?: number;
  noreply?: boolean;
};

/** Value fetched with its cas token. */
export type CasValue<R> = {
  value: R;
  cas: string;
};

/** Cas token accepted by `cas`; tokens from `gets` are decimal strings. */
export type CasToken = string | number | bigint;

/** Counter delta for incr/decr. */
export type CounterDelta = number | bigint;

/** Converted stat value. */
export type StatValue = string | number | boolean;

/** Global client options. */
export type ClientOptions<V, R> = {
  server?: string;
  host?: string;
  port?: number;
  connectTimeout?: Duration.DurationInput;
  timeout?: Duration.DurationInput;
  noDelay?: boolean;
  ignoreExc?: boolean;
  keyPrefix?: string;
  serializer?: Serializer<V>;
  deserializer?: Deserializer<R>;
  connector?: Connector;
  validateOptions?: boolean;
};

/** Settings the connection manager runs with. */
export type ConnectionSettings = {
  endpoint: Endpoint;
  connectTimeout: Duration.Duration;
  timeout: Duration.Duration;
  noDelay: boolean;
  connector: Connector;
};

/** Call policies shared by every operation. */
export type ClientPolicy = {
  ignoreExc: boolean;
  keyPrefix: string;
};

/** Serializer pair resolved from options. */
export type ValueCodec<V, R> = {
  serializer: Serializer<V>;
  deserializer: Deserializer<R>;
};

/** Options after validation and defaulting. */
export type ResolvedClientOptions<V, R> = {
  connection: ConnectionSettings;
  policy: ClientPolicy;
  codec: ValueCodec<V, R>;
};

/** Effect-based client surface with typed errors. */
export type MemcacheClientEffect<V, R> = {
  get(key: string, options?: RetrievalOptions): Effect.Effect<R | null, MemcacheError>;
  gets(key: string, options?: RetrievalOptions): Effect.Effect<CasValue<R> | null, MemcacheError>;
  getMany(keys: ReadonlyArray<string>, options?: RetrievalOptions): Effect.Effect<Map<string, R>, MemcacheError>;
  getsMany(
    keys: ReadonlyArray<string>,
    options?: RetrievalOptions,
  ): Effect.Effect<Map<string, CasValue<R>>, MemcacheError>;
  set(key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError>;
  setMany(
    values: Iterable<readonly [string, V]>,
    options?: StoreOptions,
  ): Effect.Effect<Map<string, boolean>, MemcacheError>;
  add(key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError>;
  replace(key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError>;
  append(key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError>;
  prepend(key: string, value: V, options?: StoreOptions): Effect.Effect<boolean, MemcacheError>;
  cas(key: string, value: V, cas: CasToken, options?: StoreOptions): Effect.Effect<boolean | null, MemcacheError>;
  delete(key: string, options?: NoreplyOptions): Effect.Effect<boolean, MemcacheError>;
  deleteMany(keys: ReadonlyArray<string>, options?: NoreplyOptions): Effect.Effect<Map<string, boolean>, MemcacheError>;
  incr(key: string, delta: CounterDelta, options?: NoreplyOptions): Effect.Effect<bigint | null, MemcacheError>;
  decr(key: string, delta: CounterDelta, options?: NoreplyOptions): Effect.Effect<bigint | null, MemcacheError>;
  touch(key: string, options?: StoreOptions): Effect.Effect<boolean, MemcacheError>;
  stats(...args: string[]): Effect.Effect<Record<string, StatValue>, MemcacheError>;
  flushAll(options?: FlushAllOptions): Effect.Effect<boolean, MemcacheError>;
  quit(): Effect.Effect<void, MemcacheError>;
  state(): Effect.Effect<ConnectionState>;
  close(): Effect.Effect<void>;
};

/** Promise-based client surface; rejections carry the tagged error. */
export type MemcacheClient<V, R> = {
  get(key: string, options?: RetrievalOptions): Promise<R | null>;
  gets(key: string, options?: RetrievalOptions): Promise<CasValue<R> | null>;
  getMany(keys: ReadonlyArray<string>, options?: RetrievalOptions): Promise<Map<string, R>>;
  getsMany(keys: ReadonlyArray<string>, options?: RetrievalOptions): Promise<Map<string, CasValue<R>>>;
  set(key: string, value: V, options?: StoreOptions): Promise<boolean>;
  setMany(values: Iterable<readonly [string, V]>, options?: StoreOptions): Promise<Map<string, boolean>>;
  add(key: string, value: V, options?: StoreOptions): Promise<boolean>;
  replace(key: string, value: V, options?: StoreOptions): Promise<boolean>;
  append(key: string, value: V, options?: StoreOptions): Promise<boolean>;
  prepend(key: string, value: V, options?: StoreOptions): Promise<boolean>;
  cas(key: string, value: V, cas: CasToken, options?: StoreOptions): Promise<boolean | null>;
  delete(key: string, options?: NoreplyOptions): Promise<boolean>;
  deleteMany(keys: ReadonlyArray<string>, options?: NoreplyOptions): Promise<Map<string, boolean>>;
  incr(key: string, delta: CounterDelta, options?: NoreplyOptions): Promise<bigint | null>;
  decr(key: string, delta: CounterDelta, options?: NoreplyOptions): Promise<bigint | null>;
  touch(key: string, options?: StoreOptions): Promise<boolean>;
  stats(...args: string[]): Promise<Record<string, StatValue>>;
  flushAll(options?: FlushAllOptions): Promise<boolean>;
  quit(): Promise<void>;
  state(): Promise<ConnectionState>;
  close(): Promise<void>;
};
