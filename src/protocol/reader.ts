import { Effect, Either } from 'effect';
import type { ReplyError, StreamError } from '@core/errors';
import { UnknownError } from '@core/errors';
import type { MemcacheErrorContext } from '@core/types';
import { decodeLine, type Reply, replyError, unexpectedReply } from '@protocol/decoder';

/** Ordered byte source a reply is read from. */
export interface ReplySource {
  /** Next line, without its CRLF. */
  readLine(): Effect.Effect<string, StreamError>;
  /** Exactly `length` bytes. */
  readExactly(length: number): Effect.Effect<Buffer, StreamError>;
}

export type ReadError = StreamError | ReplyError;

/** One `VALUE` block from a retrieval reply. */
export type ValueBlock = {
  readonly key: string;
  readonly flags: number;
  readonly data: Buffer;
  readonly cas?: string;
};

const CRLF = Buffer.from('\r\n');

const fromEither = <A>(result: Either.Either<A, UnknownError>): Effect.Effect<A, UnknownError> =>
  Either.isRight(result) ? Effect.succeed(result.right) : Effect.fail(result.left);

const readClassified = (
  source: ReplySource,
  context: MemcacheErrorContext,
): Effect.Effect<{ line: string; reply: Reply }, ReadError> =>
  Effect.gen(function* () {
    const line = yield* source.readLine();
    const reply = yield* fromEither(decodeLine(line, context));
    const error = replyError(reply, context);
    if (error) {
      return yield* Effect.fail(error);
    }
    return { line, reply };
  });

/** Read one reply line and map it through `accept`; anything unmapped is an `UnknownError`. */
export const readExpected = <A>(
  source: ReplySource,
  context: MemcacheErrorContext,
  accept: (reply: Reply) => A | undefined,
): Effect.Effect<A, ReadError> =>
  Effect.gen(function* () {
    const { line, reply } = yield* readClassified(source, context);
    const value = accept(reply);
    if (value === undefined) {
      return yield* Effect.fail(unexpectedReply(line, context));
    }
    return value;
  });

/** Read `VALUE` blocks until `END`. */
export const readValues = (
  source: ReplySource,
  context: MemcacheErrorContext,
): Effect.Effect<ReadonlyArray<ValueBlock>, ReadError> =>
  Effect.gen(function* () {
    const blocks: ValueBlock[] = [];
    for (;;) {
      const { line, reply } = yield* readClassified(source, context);
      if (reply.type === 'END') {
        return blocks;
      }
      if (reply.type !== 'VALUE') {
        return yield* Effect.fail(unexpectedReply(line, context));
      }
      const block = yield* source.readExactly(reply.length + CRLF.length);
      if (!block.subarray(reply.length).equals(CRLF)) {
        return yield* Effect.fail(new UnknownError(`data block for ${reply.key} is not CRLF terminated`, context));
      }
      blocks.push({ key: reply.key, flags: reply.flags, data: block.subarray(0, reply.length), cas: reply.cas });
    }
  });

/** Read `STAT` lines until `END`. */
export const readStats = (
  source: ReplySource,
  context: MemcacheErrorContext,
): Effect.Effect<ReadonlyArray<readonly [string, string]>, ReadError> =>
  Effect.gen(function* () {
    const stats: Array<readonly [string, string]> = [];
    for (;;) {
      const { line, reply } = yield* readClassified(source, context);
      if (reply.type === 'END') {
        return stats;
      }
      if (reply.type !== 'STAT') {
        return yield* Effect.fail(unexpectedReply(line, context));
      }
      stats.push([reply.name, reply.value]);
    }
  });
