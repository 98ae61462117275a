import { Schema } from 'effect';
import { Operation } from '@core/operations';
import type { MemcacheErrorContext } from '@core/types';

const OperationSchema = Schema.Union(
  Schema.Literal(Operation.Options),
  Schema.Literal(Operation.Get),
  Schema.Literal(Operation.Gets),
  Schema.Literal(Operation.GetMany),
  Schema.Literal(Operation.GetsMany),
  Schema.Literal(Operation.Set),
  Schema.Literal(Operation.SetMany),
  Schema.Literal(Operation.Add),
  Schema.Literal(Operation.Replace),
  Schema.Literal(Operation.Append),
  Schema.Literal(Operation.Prepend),
  Schema.Literal(Operation.Cas),
  Schema.Literal(Operation.Delete),
  Schema.Literal(Operation.DeleteMany),
  Schema.Literal(Operation.Incr),
  Schema.Literal(Operation.Decr),
  Schema.Literal(Operation.Touch),
  Schema.Literal(Operation.Stats),
  Schema.Literal(Operation.FlushAll),
  Schema.Literal(Operation.Quit),
);

const MemcacheErrorContextSchema = Schema.Struct({
  operation: OperationSchema,
  key: Schema.optional(Schema.String),
});

const MemcacheErrorFieldsSchema = Schema.Struct({
  message: Schema.String,
  context: MemcacheErrorContextSchema,
  cause: Schema.optional(Schema.Unknown),
});

const IllegalInputErrorFieldsSchema = Schema.Struct({
  message: Schema.String,
  context: MemcacheErrorContextSchema,
  issues: Schema.optional(Schema.Array(Schema.String)),
  cause: Schema.optional(Schema.Unknown),
});

const ServerReplyErrorFieldsSchema = Schema.Struct({
  message: Schema.String,
  context: MemcacheErrorContextSchema,
  reply: Schema.String,
  cause: Schema.optional(Schema.Unknown),
});

/** Key, value or option rejected before any I/O. */
export class IllegalInputError extends Schema.TaggedError<IllegalInputError>()(
  'ILLEGAL_INPUT',
  IllegalInputErrorFieldsSchema,
) {
  constructor(message: string, context: MemcacheErrorContext, issues?: ReadonlyArray<string>, cause?: unknown) {
    super({ message, context, issues, cause });
  }
}

/** Server answered `ERROR`: it does not know the command name. */
export class UnknownCommandError extends Schema.TaggedError<UnknownCommandError>()(
  'UNKNOWN_COMMAND',
  ServerReplyErrorFieldsSchema,
) {
  constructor(context: MemcacheErrorContext, reply: string) {
    super({ message: `${context.operation} rejected as an unknown command`, context, reply });
  }
}

/** Server answered `CLIENT_ERROR <msg>`. */
export class ClientError extends Schema.TaggedError<ClientError>()('CLIENT_ERROR', ServerReplyErrorFieldsSchema) {
  constructor(context: MemcacheErrorContext, reply: string) {
    super({ message: `${context.operation} failed with client error: ${reply}`, context, reply });
  }
}

/** Server answered `SERVER_ERROR <msg>`. */
export class ServerError extends Schema.TaggedError<ServerError>()('SERVER_ERROR', ServerReplyErrorFieldsSchema) {
  constructor(context: MemcacheErrorContext, reply: string) {
    super({ message: `${context.operation} failed with server error: ${reply}`, context, reply });
  }
}

/** Reply that matches no grammar the operation accepts. */
export class UnknownError extends Schema.TaggedError<UnknownError>()('UNKNOWN_ERROR', MemcacheErrorFieldsSchema) {
  constructor(message: string, context: MemcacheErrorContext, cause?: unknown) {
    super({ message, context, cause });
  }
}

/** Stream ended while a reply or value block was still expected. */
export class UnexpectedCloseError extends Schema.TaggedError<UnexpectedCloseError>()(
  'UNEXPECTED_CLOSE',
  MemcacheErrorFieldsSchema,
) {
  constructor(message: string, context: MemcacheErrorContext, cause?: unknown) {
    super({ message, context, cause });
  }
}

/** Connect, read or write exceeded its configured timeout. */
export class TimeoutError extends Schema.TaggedError<TimeoutError>()('TIMEOUT', MemcacheErrorFieldsSchema) {
  constructor(message: string, context: MemcacheErrorContext, cause?: unknown) {
    super({ message, context, cause });
  }
}

/** OS-level socket failure. */
export class TransportError extends Schema.TaggedError<TransportError>()('TRANSPORT_ERROR', MemcacheErrorFieldsSchema) {
  constructor(message: string, context: MemcacheErrorContext, cause?: unknown) {
    super({ message, context, cause });
  }
}

/** Union of all client error types. */
export type MemcacheError =
  | IllegalInputError
  | UnknownCommandError
  | ClientError
  | ServerError
  | UnknownError
  | UnexpectedCloseError
  | TimeoutError
  | TransportError;

/** Errors a read or write on the socket can produce. */
export type StreamError = UnexpectedCloseError | TimeoutError | TransportError;

/** Errors that a server reply line can signal. */
export type ReplyError = UnknownCommandError | ClientError | ServerError | UnknownError;

const errorTags = new Set<string>([
  'ILLEGAL_INPUT',
  'UNKNOWN_COMMAND',
  'CLIENT_ERROR',
  'SERVER_ERROR',
  'UNKNOWN_ERROR',
  'UNEXPECTED_CLOSE',
  'TIMEOUT',
  'TRANSPORT_ERROR',
]);

const readTag = (error: unknown): unknown =>
  error && typeof error === 'object' && '_tag' in error ? error._tag : undefined;

/** Type guard for client errors. */
export const isMemcacheError = (error: unknown): error is MemcacheError => {
  const tag = readTag(error);
  return typeof tag === 'string' && errorTags.has(tag);
};

/** Type guard for input validation errors. */
export const isIllegalInputError = (error: unknown): error is IllegalInputError =>
  readTag(error) === 'ILLEGAL_INPUT';

/** Memcache or network failure, i.e. anything but rejected input. */
export const isCacheFailure = (error: MemcacheError): error is Exclude<MemcacheError, IllegalInputError> =>
  error._tag !== 'ILLEGAL_INPUT';

/** Matcher for client errors with a default case. */
export type MemcacheErrorMatcher<A> = {
  ILLEGAL_INPUT?: (error: IllegalInputError) => A;
  UNKNOWN_COMMAND?: (error: UnknownCommandError) => A;
  CLIENT_ERROR?: (error: ClientError) => A;
  SERVER_ERROR?: (error: ServerError) => A;
  UNKNOWN_ERROR?: (error: UnknownError) => A;
  UNEXPECTED_CLOSE?: (error: UnexpectedCloseError) => A;
  TIMEOUT?: (error: TimeoutError) => A;
  TRANSPORT_ERROR?: (error: TransportError) => A;
  _: (error: MemcacheError) => A;
};

/** Pattern match on client errors by tag. */
export const matchMemcacheError = <A>(error: MemcacheError, matcher: MemcacheErrorMatcher<A>): A => {
  switch (error._tag) {
    case 'ILLEGAL_INPUT':
      return matcher.ILLEGAL_INPUT ? matcher.ILLEGAL_INPUT(error) : matcher._(error);
    case 'UNKNOWN_COMMAND':
      return matcher.UNKNOWN_COMMAND ? matcher.UNKNOWN_COMMAND(error) : matcher._(error);
    case 'CLIENT_ERROR':
      return matcher.CLIENT_ERROR ? matcher.CLIENT_ERROR(error) : matcher._(error);
    case 'SERVER_ERROR':
      return matcher.SERVER_ERROR ? matcher.SERVER_ERROR(error) : matcher._(error);
    case 'UNKNOWN_ERROR':
      return matcher.UNKNOWN_ERROR ? matcher.UNKNOWN_ERROR(error) : matcher._(error);
    case 'UNEXPECTED_CLOSE':
      return matcher.UNEXPECTED_CLOSE ? matcher.UNEXPECTED_CLOSE(error) : matcher._(error);
    case 'TIMEOUT':
      return matcher.TIMEOUT ? matcher.TIMEOUT(error) : matcher._(error);
    case 'TRANSPORT_ERROR':
      return matcher.TRANSPORT_ERROR ? matcher.TRANSPORT_ERROR(error) : matcher._(error);
    default: {
      const _exhaustive: never = error;
      return matcher._(error ?? _exhaustive);
    }
  }
};

/** Format a client error into a concise string. */
export const formatMemcacheError = (error: MemcacheError): string => {
  const parts = [error._tag, error.message, `operation=${error.context.operation}`];
  if (error.context.key) {
    parts.push(`key=${error.context.key}`);
  }
  if (error.cause instanceof Error) {
    parts.push(`cause=${error.cause.message}`);
  } else if (error.cause !== undefined) {
    parts.push(`cause=${String(error.cause)}`);
  }
  return parts.join(' | ');
};
