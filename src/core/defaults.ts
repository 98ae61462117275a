import { Duration, Option } from 'effect';
import { Operation } from '@core/operations';
import type { Deserializer, Serializer, SerializedValue } from '@core/types';

/** Default server host. */
export const DEFAULT_HOST = 'localhost';
/** Default memcached port. */
export const DEFAULT_PORT = 11211;
/** Default connect timeout duration. */
export const DEFAULT_CONNECT_TIMEOUT = Duration.seconds(5);
/** Default read/write timeout duration. */
export const DEFAULT_TIMEOUT = Duration.seconds(1);

/** Operations whose acknowledgement is skipped unless the caller asks for it. */
export const DEFAULT_NOREPLY = {
  [Operation.Set]: true,
  [Operation.SetMany]: true,
  [Operation.Add]: true,
  [Operation.Replace]: true,
  [Operation.Append]: true,
  [Operation.Prepend]: true,
  [Operation.Delete]: true,
  [Operation.DeleteMany]: true,
  [Operation.Touch]: true,
  [Operation.FlushAll]: true,
  [Operation.Cas]: false,
  [Operation.Incr]: false,
  [Operation.Decr]: false,
} as const satisfies Partial<Record<Operation, boolean>>;

export type NoreplyOperation = keyof typeof DEFAULT_NOREPLY;

/** Resolve the noreply bit for a call. */
export const resolveNoreply = (operation: NoreplyOperation, noreply: boolean | undefined): boolean =>
  noreply ?? DEFAULT_NOREPLY[operation];

/** Default serializer: strings and byte arrays pass through with flags 0. */
export const defaultSerializer: Serializer<unknown> = (key, value): SerializedValue => {
  if (typeof value === 'string' || value instanceof Uint8Array) {
    return [value, 0];
  }
  throw new TypeError(`value for ${key} must be a string or Uint8Array without a serializer`);
};

/** Default deserializer: returns the raw bytes and ignores flags. */
export const defaultDeserializer: Deserializer<Buffer> = (_key, bytes) => bytes;

/** Resolve a duration input with a fallback. */
export const resolveDuration = (
  value: Duration.DurationInput | undefined,
  fallback: Duration.Duration,
): Duration.Duration => {
  if (value === undefined) {
    return fallback;
  }
  return Option.getOrElse(Duration.decodeUnknown(value), () => fallback);
};
