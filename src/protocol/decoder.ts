import { Either } from 'effect';
import type { ReplyError } from '@core/errors';
import { ClientError, ServerError, UnknownCommandError, UnknownError } from '@core/errors';
import type { MemcacheErrorContext } from '@core/types';
import { MAX_COUNTER } from '@core/validation';

/** A classified reply line. */
export type Reply =
  | { readonly type: 'STORED' }
  | { readonly type: 'NOT_STORED' }
  | { readonly type: 'EXISTS' }
  | { readonly type: 'NOT_FOUND' }
  | { readonly type: 'DELETED' }
  | { readonly type: 'TOUCHED' }
  | { readonly type: 'OK' }
  | { readonly type: 'END' }
  | { readonly type: 'ERROR'; readonly message: string }
  | { readonly type: 'CLIENT_ERROR'; readonly message: string }
  | { readonly type: 'SERVER_ERROR'; readonly message: string }
  | {
      readonly type: 'VALUE';
      readonly key: string;
      readonly flags: number;
      readonly length: number;
      readonly cas?: string;
    }
  | { readonly type: 'STAT'; readonly name: string; readonly value: string }
  | { readonly type: 'NUMBER'; readonly value: bigint };

export type ReplyType = Reply['type'];

const BARE = new Set<string>(['STORED', 'NOT_STORED', 'EXISTS', 'NOT_FOUND', 'DELETED', 'TOUCHED', 'OK', 'END']);
const NUMBER = /^\d+ *$/;
const UINT = /^\d+$/;
const PREVIEW_LENGTH = 32;

/** Build the error for a reply an operation does not accept. */
export const unexpectedReply = (line: string, context: MemcacheErrorContext): UnknownError =>
  new UnknownError(`unexpected reply: ${line.slice(0, PREVIEW_LENGTH)}`, context);

const isBare = (
  line: string,
): line is 'STORED' | 'NOT_STORED' | 'EXISTS' | 'NOT_FOUND' | 'DELETED' | 'TOUCHED' | 'OK' | 'END' => BARE.has(line);

const afterSpace = (line: string, prefix: string): string => line.slice(prefix.length).trim();

const decodeValueHeader = (line: string, context: MemcacheErrorContext): Either.Either<Reply, UnknownError> => {
  const parts = line.split(' ');
  if (parts.length !== 4 && parts.length !== 5) {
    return Either.left(unexpectedReply(line, context));
  }
  const [, key, flags, length, cas] = parts;
  if (
    key === undefined ||
    key.length === 0 ||
    flags === undefined ||
    !UINT.test(flags) ||
    length === undefined ||
    !UINT.test(length) ||
    (cas !== undefined && !UINT.test(cas))
  ) {
    return Either.left(unexpectedReply(line, context));
  }
  return Either.right({ type: 'VALUE', key, flags: Number(flags), length: Number(length), cas });
};

const decodeStat = (line: string, context: MemcacheErrorContext): Either.Either<Reply, UnknownError> => {
  const [, name, ...rest] = line.split(' ');
  if (name === undefined || name.length === 0 || rest.length === 0) {
    return Either.left(unexpectedReply(line, context));
  }
  return Either.right({ type: 'STAT', name, value: rest.join(' ') });
};

const decodeNumber = (line: string, context: MemcacheErrorContext): Either.Either<Reply, UnknownError> => {
  const value = BigInt(line.trimEnd());
  return value > MAX_COUNTER ? Either.left(unexpectedReply(line, context)) : Either.right({ type: 'NUMBER', value });
};

/** Classify one reply line, given without its trailing CRLF. */
export const decodeLine = (line: string, context: MemcacheErrorContext): Either.Either<Reply, UnknownError> => {
  if (isBare(line)) {
    return Either.right({ type: line });
  }
  if (line === 'ERROR' || line.startsWith('ERROR ')) {
    return Either.right({ type: 'ERROR', message: afterSpace(line, 'ERROR') });
  }
  if (line === 'CLIENT_ERROR' || line.startsWith('CLIENT_ERROR ')) {
    return Either.right({ type: 'CLIENT_ERROR', message: afterSpace(line, 'CLIENT_ERROR') });
  }
  if (line === 'SERVER_ERROR' || line.startsWith('SERVER_ERROR ')) {
    return Either.right({ type: 'SERVER_ERROR', message: afterSpace(line, 'SERVER_ERROR') });
  }
  if (line.startsWith('VALUE ')) {
    return decodeValueHeader(line, context);
  }
  if (line.startsWith('STAT ')) {
    return decodeStat(line, context);
  }
  if (NUMBER.test(line)) {
    return decodeNumber(line, context);
  }
  return Either.left(unexpectedReply(line, context));
};

/** The error an `ERROR`, `CLIENT_ERROR` or `SERVER_ERROR` reply stands for. */
export const replyError = (reply: Reply, context: MemcacheErrorContext): ReplyError | undefined => {
  switch (reply.type) {
    case 'ERROR':
      return new UnknownCommandError(context, reply.message);
    case 'CLIENT_ERROR':
      return new ClientError(context, reply.message);
    case 'SERVER_ERROR':
      return new ServerError(context, reply.message);
    default:
      return undefined;
  }
};
