import { Duration, Effect } from 'effect';
import type { Duplex } from 'node:stream';
import type { StreamError } from '@core/errors';
import { TimeoutError, TransportError, UnexpectedCloseError } from '@core/errors';
import type { ConnectionSettings, ConnectionState, MemcacheErrorContext } from '@core/types';
import type { ReplySource } from '@protocol/reader';

const CRLF = Buffer.from('\r\n');
const EMPTY = Buffer.alloc(0);

const describe = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

/**
 * The single socket a client owns. Reads come from an inbound buffer fed by
 * `data` events; every read and write runs under the configured timeout.
 * Exchanges hold the one-permit lock so replies are read in request order.
 */
export class Connection {
  private socket: Duplex | undefined;
  private inbound: Buffer = EMPTY;
  private ended = false;
  private failure: Error | undefined;
  private notify: (() => void) | undefined;
  private current: ConnectionState = 'Disconnected';
  private readonly lock = Effect.unsafeMakeSemaphore(1);

  constructor(private readonly settings: ConnectionSettings) {}

  get state(): ConnectionState {
    return this.current;
  }

  /** Run an effect while holding the connection exclusively. */
  exclusive<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
    return this.lock.withPermits(1)(effect);
  }

  /** Open a transport unless a live one is already connected. */
  ensureConnected(context: MemcacheErrorContext): Effect.Effect<void, TimeoutError | TransportError> {
    return Effect.suspend(() => (this.usable() ? Effect.void : this.open(context)));
  }

  /** Byte source bound to one operation's error context. */
  reader(context: MemcacheErrorContext): ReplySource {
    return {
      readLine: () => this.awaitInbound(context, 'a reply line', () => this.takeLine()),
      readExactly: (length) => this.awaitInbound(context, `${length} data bytes`, () => this.takeBytes(length)),
    };
  }

  write(data: Buffer, context: MemcacheErrorContext): Effect.Effect<void, StreamError> {
    const { timeout } = this.settings;
    return Effect.async<void, StreamError>((resume) => {
      const socket = this.socket;
      if (!socket || this.ended || socket.destroyed) {
        resume(Effect.fail(new UnexpectedCloseError('connection closed before the command was written', context)));
        return;
      }
      socket.write(data, (error) => {
        resume(
          error ? Effect.fail(new TransportError(`write failed: ${error.message}`, context, error)) : Effect.void,
        );
      });
    }).pipe(
      Effect.timeoutFail({
        duration: timeout,
        onTimeout: () => new TimeoutError(`write timed out after ${Duration.format(timeout)}`, context),
      }),
    );
  }

  /** Discard the socket after a failed exchange; a no-op when nothing is attached. */
  fault(context: MemcacheErrorContext, reason: string): Effect.Effect<void> {
    return Effect.suspend(() => {
      if (!this.socket) {
        return Effect.void;
      }
      this.release();
      this.current = 'Faulted';
      return Effect.logWarning(`memcached connection faulted: ${reason}`).pipe(
        Effect.annotateLogs({ operation: context.operation, key: context.key ?? '' }),
      );
    });
  }

  /** Release the socket unconditionally. */
  close(): Effect.Effect<void> {
    return Effect.suspend(() => {
      const wasOpen = this.socket !== undefined;
      this.release();
      this.current = 'Disconnected';
      return wasOpen ? Effect.logDebug('memcached connection closed') : Effect.void;
    });
  }

  private usable(): boolean {
    const socket = this.socket;
    return this.current === 'Connected' && socket !== undefined && !socket.destroyed && !this.ended && !this.failure;
  }

  private open(context: MemcacheErrorContext): Effect.Effect<void, TimeoutError | TransportError> {
    const { endpoint, connectTimeout, connector, noDelay } = this.settings;
    const address = `${endpoint.host}:${endpoint.port}`;
    return Effect.gen(this, function* () {
      this.release();
      this.current = 'Disconnected';
      const socket = yield* Effect.tryPromise({
        try: (signal) => connector({ ...endpoint, noDelay }, signal),
        catch: (cause) => new TransportError(`connect to ${address} failed: ${describe(cause)}`, context, cause),
      }).pipe(
        Effect.timeoutFail({
          duration: connectTimeout,
          onTimeout: () =>
            new TimeoutError(`connect to ${address} timed out after ${Duration.format(connectTimeout)}`, context),
        }),
      );
      this.attach(socket);
      this.current = 'Connected';
      yield* Effect.logDebug('memcached connection opened').pipe(Effect.annotateLogs({ server: address }));
    });
  }

  private attach(socket: Duplex): void {
    this.socket = socket;
    this.inbound = EMPTY;
    this.ended = false;
    this.failure = undefined;
    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('close', this.onEnd);
    socket.on('error', this.onError);
  }

  private release(): void {
    const socket = this.socket;
    this.socket = undefined;
    this.inbound = EMPTY;
    this.ended = false;
    this.failure = undefined;
    this.notify = undefined;
    if (!socket) {
      return;
    }
    socket.off('data', this.onData);
    socket.off('end', this.onEnd);
    socket.off('close', this.onEnd);
    socket.off('error', this.onError);
    // Errors emitted while the socket tears down belong to no exchange.
    socket.on('error', ignoreLateError);
    socket.destroy();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.inbound = this.inbound.length === 0 ? bytes : Buffer.concat([this.inbound, bytes]);
    this.notify?.();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.settle();
  };

  private readonly onError = (error: Error): void => {
    this.failure = error;
    this.settle();
  };

  // A pending read reports the loss itself; an idle socket is marked for reopening.
  private settle(): void {
    if (this.notify) {
      this.notify();
      return;
    }
    this.current = 'Faulted';
  }

  private takeLine(): string | undefined {
    const index = this.inbound.indexOf(CRLF);
    if (index < 0) {
      return undefined;
    }
    const line = this.inbound.subarray(0, index).toString('utf8');
    this.inbound = this.inbound.subarray(index + CRLF.length);
    return line;
  }

  private takeBytes(length: number): Buffer | undefined {
    if (this.inbound.length < length) {
      return undefined;
    }
    const bytes = Buffer.from(this.inbound.subarray(0, length));
    this.inbound = this.inbound.subarray(length);
    return bytes;
  }

  private awaitInbound<A>(
    context: MemcacheErrorContext,
    expecting: string,
    take: () => A | undefined,
  ): Effect.Effect<A, StreamError> {
    const { timeout } = this.settings;
    return Effect.async<A, StreamError>((resume) => {
      const attempt = (): boolean => {
        const value = take();
        if (value !== undefined) {
          resume(Effect.succeed(value));
          return true;
        }
        if (this.failure) {
          resume(Effect.fail(new TransportError(`read failed: ${this.failure.message}`, context, this.failure)));
          return true;
        }
        if (this.ended || !this.socket) {
          resume(Effect.fail(new UnexpectedCloseError(`connection closed while waiting for ${expecting}`, context)));
          return true;
        }
        return false;
      };
      if (attempt()) {
        return;
      }
      this.notify = () => {
        if (attempt()) {
          this.notify = undefined;
        }
      };
      return Effect.sync(() => {
        this.notify = undefined;
      });
    }).pipe(
      Effect.timeoutFail({
        duration: timeout,
        onTimeout: () =>
          new TimeoutError(`read timed out after ${Duration.format(timeout)} waiting for ${expecting}`, context),
      }),
    );
  }
}

const ignoreLateError = (): void => undefined;
