import { Either } from 'effect';
import type { IllegalInputError } from '@core/errors';
import type { Operation } from '@core/operations';
import type { MemcacheErrorContext } from '@core/types';
import {
  casTokenSchema,
  delaySchema,
  deltaSchema,
  expireSchema,
  flagsSchema,
  keySchema,
  validateWith,
} from '@core/validation';

const CRLF = '\r\n';

export type StorageVerb = 'set' | 'add' | 'replace' | 'append' | 'prepend';

/** One request, before it is rendered to protocol bytes. */
export type Command =
  | { readonly name: 'get' | 'gets'; readonly keys: ReadonlyArray<string> }
  | {
      readonly name: StorageVerb;
      readonly key: string;
      readonly flags: number;
      readonly expire: number;
      readonly data: Uint8Array | string;
      readonly noreply: boolean;
    }
  | {
      readonly name: 'cas';
      readonly key: string;
      readonly flags: number;
      readonly expire: number;
      readonly data: Uint8Array | string;
      readonly cas: string;
      readonly noreply: boolean;
    }
  | { readonly name: 'delete'; readonly key: string; readonly noreply: boolean }
  | { readonly name: 'incr' | 'decr'; readonly key: string; readonly delta: bigint; readonly noreply: boolean }
  | { readonly name: 'touch'; readonly key: string; readonly expire: number; readonly noreply: boolean }
  | { readonly name: 'stats'; readonly args: ReadonlyArray<string> }
  | { readonly name: 'flush_all'; readonly delay: number; readonly noreply: boolean }
  | { readonly name: 'quit' };

const toBytes = (data: Uint8Array | string): Buffer =>
  typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data.buffer, data.byteOffset, data.byteLength);

const suffix = (noreply: boolean): string => (noreply ? ' noreply' : '');

type Check = Either.Either<unknown, IllegalInputError>;

const firstFailure = (checks: ReadonlyArray<Check>): IllegalInputError | undefined => {
  for (const check of checks) {
    if (Either.isLeft(check)) {
      return check.left;
    }
  }
  return undefined;
};

const checksFor = (command: Command, operation: Operation): ReadonlyArray<Check> => {
  const keyed = (key: string): MemcacheErrorContext => ({ operation, key });
  switch (command.name) {
    case 'get':
    case 'gets':
      if (command.keys.length === 0) {
        return [validateWith(keySchema, '', 'key', { operation })];
      }
      return command.keys.map((key) => validateWith(keySchema, key, 'key', keyed(key)));
    case 'set':
    case 'add':
    case 'replace':
    case 'append':
    case 'prepend':
      return [
        validateWith(keySchema, command.key, 'key', keyed(command.key)),
        validateWith(flagsSchema, command.flags, 'flags', keyed(command.key)),
        validateWith(expireSchema, command.expire, 'expire', keyed(command.key)),
      ];
    case 'cas':
      return [
        validateWith(keySchema, command.key, 'key', keyed(command.key)),
        validateWith(flagsSchema, command.flags, 'flags', keyed(command.key)),
        validateWith(expireSchema, command.expire, 'expire', keyed(command.key)),
        validateWith(casTokenSchema, command.cas, 'cas', keyed(command.key)),
      ];
    case 'delete':
      return [validateWith(keySchema, command.key, 'key', keyed(command.key))];
    case 'incr':
    case 'decr':
      return [
        validateWith(keySchema, command.key, 'key', keyed(command.key)),
        validateWith(deltaSchema, command.delta, 'delta', keyed(command.key)),
      ];
    case 'touch':
      return [
        validateWith(keySchema, command.key, 'key', keyed(command.key)),
        validateWith(expireSchema, command.expire, 'expire', keyed(command.key)),
      ];
    case 'stats':
      // Stat arguments share the key grammar: one token, no whitespace.
      return command.args.map((arg) => validateWith(keySchema, arg, 'stats argument', { operation }));
    case 'flush_all':
      return [validateWith(delaySchema, command.delay, 'delay', { operation })];
    case 'quit':
      return [];
    default: {
      const _exhaustive: never = command;
      return _exhaustive;
    }
  }
};

const render = (command: Command): Buffer => {
  switch (command.name) {
    case 'get':
    case 'gets':
      return Buffer.from(`${command.name} ${command.keys.join(' ')}${CRLF}`, 'utf8');
    case 'set':
    case 'add':
    case 'replace':
    case 'append':
    case 'prepend':
    case 'cas': {
      const data = toBytes(command.data);
      const token = command.name === 'cas' ? ` ${command.cas}` : '';
      const header = `${command.name} ${command.key} ${command.flags} ${command.expire} ${data.length}${token}${suffix(command.noreply)}${CRLF}`;
      return Buffer.concat([Buffer.from(header, 'utf8'), data, Buffer.from(CRLF)]);
    }
    case 'delete':
      return Buffer.from(`delete ${command.key}${suffix(command.noreply)}${CRLF}`, 'utf8');
    case 'incr':
    case 'decr':
      return Buffer.from(`${command.name} ${command.key} ${command.delta}${suffix(command.noreply)}${CRLF}`, 'utf8');
    case 'touch':
      return Buffer.from(`touch ${command.key} ${command.expire}${suffix(command.noreply)}${CRLF}`, 'utf8');
    case 'stats':
      return Buffer.from(['stats', ...command.args].join(' ') + CRLF, 'utf8');
    case 'flush_all':
      return Buffer.from(`flush_all ${command.delay}${suffix(command.noreply)}${CRLF}`, 'utf8');
    case 'quit':
      return Buffer.from(`quit${CRLF}`, 'utf8');
    default: {
      const _exhaustive: never = command;
      return _exhaustive;
    }
  }
};

/**
 * Render a command to protocol bytes. Every key and numeric field is checked
 * first; nothing is rendered when any of them is rejected.
 */
export const encode = (
  command: Command,
  operation: Operation = command.name,
): Either.Either<Buffer, IllegalInputError> => {
  const failure = firstFailure(checksFor(command, operation));
  return failure ? Either.left(failure) : Either.right(render(command));
};
