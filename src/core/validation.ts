import { Duration, Effect, Either, Option, ParseResult, Schema } from 'effect';
import { IllegalInputError } from '@core/errors';
import { Operation } from '@core/operations';
import type { CasToken, CounterDelta, MemcacheErrorContext } from '@core/types';

/** Longest key memcached accepts, in bytes. */
export const MAX_KEY_LENGTH = 250;
/** Largest flags word the serializer may return. */
export const MAX_FLAGS = 0xffff;
/** Largest value an unsigned 64-bit counter holds. */
export const MAX_COUNTER = 2n ** 64n - 1n;

const message =
  (text: string): (() => string) =>
  () =>
    text;

const DIGITS = /^\d+$/;

/** Reason a key is unusable on the wire, if any. */
export const keyIssue = (key: string): string | undefined => {
  if (key.length === 0) {
    return 'key must not be empty';
  }
  const size = Buffer.byteLength(key, 'utf8');
  if (size > MAX_KEY_LENGTH) {
    return `key must be at most ${MAX_KEY_LENGTH} bytes, got ${size}`;
  }
  for (let index = 0; index < key.length; index += 1) {
    const code = key.charCodeAt(index);
    if (code <= 0x20 || code === 0x7f) {
      return `key must not contain whitespace or control characters (0x${code.toString(16).padStart(2, '0')} at ${index})`;
    }
  }
  return undefined;
};

const functionSchema = (label: string): Schema.Schema<(...args: never[]) => unknown, unknown, never> =>
  Schema.Unknown.pipe(
    Schema.filter((value): value is (...args: never[]) => unknown => typeof value === 'function', {
      message: message(`${label} must be a function`),
    }),
  );

const durationSchema = (label: string): Schema.Schema<unknown, unknown, never> =>
  Schema.Unknown.pipe(
    Schema.filter(
      (value) =>
        Option.match(Duration.decodeUnknown(value), {
          onNone: () => false,
          onSome: (duration) => Duration.isFinite(duration) && Duration.greaterThan(duration, Duration.zero),
        }),
      { message: message(`${label} must be a positive finite duration`) },
    ),
  );

const portSchema = Schema.Int.pipe(
  Schema.between(1, 65535, { message: message('port must be an integer between 1 and 65535') }),
);

export const keySchema = Schema.String.pipe(Schema.filter((key) => keyIssue(key) ?? true));

export const flagsSchema = Schema.Int.pipe(
  Schema.between(0, MAX_FLAGS, { message: message(`flags must be an integer between 0 and ${MAX_FLAGS}`) }),
);

export const expireSchema = Schema.Int.annotations({ message: message('expire must be an integer') });

export const delaySchema = Schema.NonNegativeInt.annotations({ message: message('delay must be a non-negative integer') });

const digitStringSchema = (label: string): Schema.Schema<string, string, never> =>
  Schema.String.pipe(Schema.filter((value) => DIGITS.test(value), { message: message(`${label} must be digits only`) }));

const nonNegativeBigIntSchema = (label: string, max: bigint): Schema.Schema<bigint, bigint, never> =>
  Schema.BigIntFromSelf.pipe(
    Schema.filter((value) => value >= 0n && value <= max, { message: message(`${label} is out of range`) }),
  );

export const casTokenSchema = Schema.Union(
  digitStringSchema('cas'),
  Schema.NonNegativeInt,
  nonNegativeBigIntSchema('cas', MAX_COUNTER),
);

export const deltaSchema = Schema.Union(Schema.NonNegativeInt, nonNegativeBigIntSchema('delta', MAX_COUNTER)).pipe(
  Schema.filter((value) => BigInt(value) <= MAX_COUNTER, { message: message('delta is out of range') }),
);

export const serializedValueSchema = Schema.Tuple(
  Schema.Union(Schema.String, Schema.Uint8ArrayFromSelf).annotations({
    message: message('serialized data must be a string or Uint8Array'),
  }),
  Schema.Number,
);

export const clientOptionsSchema = Schema.Struct({
  server: Schema.optional(Schema.String),
  host: Schema.optional(Schema.String),
  port: Schema.optional(portSchema),
  connectTimeout: Schema.optional(durationSchema('connectTimeout')),
  timeout: Schema.optional(durationSchema('timeout')),
  noDelay: Schema.optional(Schema.Boolean),
  ignoreExc: Schema.optional(Schema.Boolean),
  keyPrefix: Schema.optional(Schema.String),
  serializer: Schema.optional(functionSchema('serializer')),
  deserializer: Schema.optional(functionSchema('deserializer')),
  connector: Schema.optional(functionSchema('connector')),
  validateOptions: Schema.optional(Schema.Boolean),
});

export const formatParseIssues = (error: ParseResult.ParseError): ReadonlyArray<string> =>
  ParseResult.ArrayFormatter.formatErrorSync(error).map(
    (issue) => `${issue.path.length > 0 ? issue.path.map(String).join('.') : 'value'}: ${issue.message}`,
  );

/** Decode a value synchronously, for callers that must not run effects. */
export const validateWith = <T, I>(
  schema: Schema.Schema<T, I, never>,
  value: unknown,
  label: string,
  context: MemcacheErrorContext,
): Either.Either<T, IllegalInputError> => {
  const result = Schema.decodeUnknownEither(schema, { errors: 'all', onExcessProperty: 'preserve' })(value);
  if (Either.isRight(result)) {
    return Either.right(result.right);
  }
  const issues = formatParseIssues(result.left);
  return Either.left(new IllegalInputError(`${label} validation failed: ${issues.join('; ')}`, context, issues, result.left));
};

export const decodeWith = <T, I>(
  schema: Schema.Schema<T, I, never>,
  value: unknown,
  label: string,
  context: MemcacheErrorContext,
): Effect.Effect<T, IllegalInputError> => {
  const result = validateWith(schema, value, label, context);
  return Either.isRight(result) ? Effect.succeed(result.right) : Effect.fail(result.left);
};

export const decodeCasToken = (
  token: CasToken,
  context: MemcacheErrorContext,
): Effect.Effect<string, IllegalInputError> =>
  decodeWith(casTokenSchema, token, 'cas', context).pipe(Effect.map((value) => value.toString()));

export const decodeDelta = (
  delta: CounterDelta,
  context: MemcacheErrorContext,
): Effect.Effect<bigint, IllegalInputError> =>
  decodeWith(deltaSchema, delta, 'delta', context).pipe(Effect.map((value) => BigInt(value)));

export const optionsContext = { operation: Operation.Options } as const;
