import { describe, expect, it } from 'vitest';
import { Effect, Either } from 'effect';
import { UnexpectedCloseError } from '@core/errors';
import { Operation } from '@core/operations';
import type { MemcacheErrorContext } from '@core/types';
import { decodeLine, replyError } from '@protocol/decoder';
import { encode } from '@protocol/encoder';
import { readExpected, readStats, readValues, type ReplySource } from '@protocol/reader';

const context: MemcacheErrorContext = { operation: Operation.GetMany };

const encoded = (result: ReturnType<typeof encode>): string => {
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right.toString('utf8');
};

const rejected = (result: ReturnType<typeof encode>) => {
  if (Either.isRight(result)) {
    throw new Error(`expected rejection, got ${JSON.stringify(result.right.toString('utf8'))}`);
  }
  return result.left;
};

const sourceOf = (raw: string | Buffer): ReplySource => {
  let buffer = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw;
  return {
    readLine: () =>
      Effect.suspend(() => {
        const index = buffer.indexOf('\r\n');
        if (index < 0) {
          return Effect.fail(new UnexpectedCloseError('closed', context));
        }
        const line = buffer.subarray(0, index).toString('utf8');
        buffer = buffer.subarray(index + 2);
        return Effect.succeed(line);
      }),
    readExactly: (length) =>
      Effect.suspend(() => {
        if (buffer.length < length) {
          return Effect.fail(new UnexpectedCloseError('closed', context));
        }
        const bytes = buffer.subarray(0, length);
        buffer = buffer.subarray(length);
        return Effect.succeed(bytes);
      }),
  };
};

describe('encode', () => {
  it('renders storage commands with a data block', () => {
    const command = encode({ name: 'set', key: 'user:1', flags: 3, expire: 60, data: 'hello', noreply: false });

    expect(encoded(command)).toBe('set user:1 3 60 5\r\nhello\r\n');
  });

  it('appends noreply after the byte count and the cas token', () => {
    expect(encoded(encode({ name: 'add', key: 'k', flags: 0, expire: 0, data: 'hi', noreply: true }))).toBe(
      'add k 0 0 2 noreply\r\nhi\r\n',
    );
    expect(
      encoded(encode({ name: 'cas', key: 'k', flags: 0, expire: 0, data: 'x', cas: '42', noreply: true })),
    ).toBe('cas k 0 0 1 42 noreply\r\nx\r\n');
  });

  it('counts bytes rather than characters in the data block', () => {
    const command = encode({ name: 'set', key: 'k', flags: 0, expire: 0, data: 'héllo', noreply: false });

    expect(encoded(command)).toBe('set k 0 0 6\r\nhéllo\r\n');
  });

  it('passes binary data through unchanged', () => {
    const data = new Uint8Array([0, 13, 10, 255]);
    const result = encode({ name: 'set', key: 'bin', flags: 0, expire: 0, data, noreply: false });

    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect([...result.right]).toEqual([...Buffer.from('set bin 0 0 4\r\n'), 0, 13, 10, 255, 13, 10]);
    }
  });

  it('renders one line for a multi-key get', () => {
    expect(encoded(encode({ name: 'get', keys: ['a', 'b', 'c'] }))).toBe('get a b c\r\n');
    expect(encoded(encode({ name: 'gets', keys: ['a'] }))).toBe('gets a\r\n');
  });

  it('renders the remaining commands', () => {
    expect(encoded(encode({ name: 'delete', key: 'k', noreply: false }))).toBe('delete k\r\n');
    expect(encoded(encode({ name: 'incr', key: 'n', delta: 18446744073709551615n, noreply: false }))).toBe(
      'incr n 18446744073709551615\r\n',
    );
    expect(encoded(encode({ name: 'decr', key: 'n', delta: 2n, noreply: true }))).toBe('decr n 2 noreply\r\n');
    expect(encoded(encode({ name: 'touch', key: 'k', expire: 10, noreply: true }))).toBe('touch k 10 noreply\r\n');
    expect(encoded(encode({ name: 'stats', args: [] }))).toBe('stats\r\n');
    expect(encoded(encode({ name: 'stats', args: ['slabs'] }))).toBe('stats slabs\r\n');
    expect(encoded(encode({ name: 'flush_all', delay: 0, noreply: false }))).toBe('flush_all 0\r\n');
    expect(encoded(encode({ name: 'quit' }))).toBe('quit\r\n');
  });

  it('rejects keys with whitespace or control characters', () => {
    for (const key of ['bad key', 'tab\tkey', 'line\nkey', 'nul\u0000', 'del\u007f']) {
      const error = rejected(encode({ name: 'delete', key, noreply: false }));

      expect(error._tag).toBe('ILLEGAL_INPUT');
      expect(error.context).toEqual({ operation: 'delete', key });
      expect(error.message).toContain('whitespace or control characters');
    }
  });

  it('enforces the 250 byte key limit on encoded bytes', () => {
    expect(Either.isRight(encode({ name: 'get', keys: ['a'.repeat(250)] }))).toBe(true);
    expect(rejected(encode({ name: 'get', keys: ['a'.repeat(251)] })).message).toContain('at most 250 bytes');
    expect(rejected(encode({ name: 'get', keys: ['é'.repeat(126)] })).message).toContain('got 252');
  });

  it('rejects the whole multi-key get when one key is invalid', () => {
    const error = rejected(encode({ name: 'get', keys: ['ok', 'not ok', 'fine'] }, Operation.GetMany));

    expect(error.context).toEqual({ operation: 'get_many', key: 'not ok' });
  });

  it('rejects empty key lists and empty keys', () => {
    expect(rejected(encode({ name: 'get', keys: [] })).message).toContain('must not be empty');
    expect(rejected(encode({ name: 'delete', key: '', noreply: false })).message).toContain('must not be empty');
  });

  it('rejects flags outside 16 bits and fractional expiry', () => {
    const base = { name: 'set', key: 'k', expire: 0, data: 'v', noreply: false } as const;

    expect(rejected(encode({ ...base, flags: 65536 })).message).toContain('flags must be an integer between 0 and 65535');
    expect(rejected(encode({ ...base, flags: -1 })).message).toContain('flags must be an integer');
    expect(Either.isRight(encode({ ...base, flags: 65535 }))).toBe(true);
    expect(rejected(encode({ ...base, flags: 0, expire: 1.5 })).message).toContain('expire must be an integer');
  });
});

describe('decodeLine', () => {
  const decoded = (line: string) => {
    const result = decodeLine(line, context);
    if (Either.isLeft(result)) {
      throw result.left;
    }
    return result.right;
  };

  it('classifies bare status replies', () => {
    for (const line of ['STORED', 'NOT_STORED', 'EXISTS', 'NOT_FOUND', 'DELETED', 'TOUCHED', 'OK', 'END']) {
      expect(decoded(line)).toEqual({ type: line });
    }
  });

  it('parses value headers with and without a cas token', () => {
    expect(decoded('VALUE user:1 5 10')).toEqual({ type: 'VALUE', key: 'user:1', flags: 5, length: 10 });
    expect(decoded('VALUE user:1 5 10 99')).toEqual({
      type: 'VALUE',
      key: 'user:1',
      flags: 5,
      length: 10,
      cas: '99',
    });
  });

  it('parses error replies with their message', () => {
    expect(decoded('ERROR')).toEqual({ type: 'ERROR', message: '' });
    expect(decoded('CLIENT_ERROR bad data chunk')).toEqual({ type: 'CLIENT_ERROR', message: 'bad data chunk' });
    expect(decoded('SERVER_ERROR out of memory storing object')).toEqual({
      type: 'SERVER_ERROR',
      message: 'out of memory storing object',
    });
  });

  it('parses counter results, ignoring trailing padding', () => {
    expect(decoded('42')).toEqual({ type: 'NUMBER', value: 42n });
    expect(decoded('7   ')).toEqual({ type: 'NUMBER', value: 7n });
    expect(decoded('18446744073709551615')).toEqual({ type: 'NUMBER', value: 18446744073709551615n });
  });

  it('parses stat lines', () => {
    expect(decoded('STAT version 1.6.21')).toEqual({ type: 'STAT', name: 'version', value: '1.6.21' });
  });

  it('fails with an unknown error on malformed or unrecognized lines', () => {
    for (const line of ['VALUE k x 1', 'VALUE k 1', 'VALUE k 0 1 abc', '18446744073709551616', 'HELLO there', '']) {
      const result = decodeLine(line, context);

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe('UNKNOWN_ERROR');
        expect(result.left.message).toBe(`unexpected reply: ${line}`);
      }
    }
  });

  it('truncates long lines in the error message', () => {
    const result = decodeLine('X'.repeat(100), context);

    expect(Either.isLeft(result) && result.left.message).toBe(`unexpected reply: ${'X'.repeat(32)}`);
  });

  it('maps error replies to the error taxonomy', () => {
    expect(replyError({ type: 'ERROR', message: '' }, context)?._tag).toBe('UNKNOWN_COMMAND');
    expect(replyError({ type: 'CLIENT_ERROR', message: 'bad' }, context)).toMatchObject({
      _tag: 'CLIENT_ERROR',
      reply: 'bad',
      message: 'get_many failed with client error: bad',
    });
    expect(replyError({ type: 'SERVER_ERROR', message: 'oom' }, context)?._tag).toBe('SERVER_ERROR');
    expect(replyError({ type: 'STORED' }, context)).toBeUndefined();
  });
});

describe('reader', () => {
  it('collects value blocks until END, including data that contains CRLF', async () => {
    const source = sourceOf('VALUE a 0 3\r\nfoo\r\nVALUE b 7 4 12\r\nx\r\ny\r\nEND\r\n');

    const blocks = await Effect.runPromise(readValues(source, context));

    expect(blocks.map((block) => ({ ...block, data: block.data.toString('utf8') }))).toEqual([
      { key: 'a', flags: 0, data: 'foo', cas: undefined },
      { key: 'b', flags: 7, data: 'x\r\ny', cas: '12' },
    ]);
  });

  it('returns no blocks for an immediate END', async () => {
    expect(await Effect.runPromise(readValues(sourceOf('END\r\n'), context))).toEqual([]);
  });

  it('fails when a data block is not CRLF terminated', async () => {
    const error = await Effect.runPromise(Effect.flip(readValues(sourceOf('VALUE a 0 3\r\nfooXYEND\r\n'), context)));

    expect(error).toMatchObject({
      _tag: 'UNKNOWN_ERROR',
      message: 'data block for a is not CRLF terminated',
    });
  });

  it('fails with the server error reported mid-stream', async () => {
    const source = sourceOf('VALUE a 0 1\r\nx\r\nSERVER_ERROR object too large for cache\r\n');

    const error = await Effect.runPromise(Effect.flip(readValues(source, context)));

    expect(error).toMatchObject({ _tag: 'SERVER_ERROR', reply: 'object too large for cache' });
  });

  it('surfaces a stream that ends inside a value', async () => {
    const error = await Effect.runPromise(Effect.flip(readValues(sourceOf('VALUE a 0 10\r\nabc'), context)));

    expect(error._tag).toBe('UNEXPECTED_CLOSE');
  });

  it('rejects replies that do not belong in a retrieval', async () => {
    const error = await Effect.runPromise(Effect.flip(readValues(sourceOf('STORED\r\n'), context)));

    expect(error).toMatchObject({ _tag: 'UNKNOWN_ERROR', message: 'unexpected reply: STORED' });
  });

  it('collects stat pairs until END', async () => {
    const stats = await Effect.runPromise(readStats(sourceOf('STAT pid 1\r\nSTAT version 1.6.21\r\nEND\r\n'), context));

    expect(stats).toEqual([
      ['pid', '1'],
      ['version', '1.6.21'],
    ]);
  });

  it('maps a single reply through the accepted grammar', async () => {
    const accept = (reply: { type: string }) => (reply.type === 'DELETED' ? true : undefined);

    expect(await Effect.runPromise(readExpected(sourceOf('DELETED\r\n'), context, accept))).toBe(true);
    const error = await Effect.runPromise(Effect.flip(readExpected(sourceOf('STORED\r\n'), context, accept)));
    expect(error).toMatchObject({ _tag: 'UNKNOWN_ERROR', message: 'unexpected reply: STORED' });
  });
});
