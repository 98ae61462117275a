import { describe, expect, it } from 'vitest';
import { KeyBuilder } from '@core/key-builder';

describe('KeyBuilder', () => {
  it('qualifies wire keys by prepending the prefix verbatim', () => {
    expect(new KeyBuilder({ prefix: 'tenant-7.' }).qualify('session')).toBe('tenant-7.session');
    expect(new KeyBuilder({ prefix: 'app:' }).qualify('')).toBe('app:');
  });

  it('leaves keys untouched without a prefix', () => {
    expect(new KeyBuilder().qualify('session')).toBe('session');
    expect(new KeyBuilder({ prefix: '' }).qualify('a:b')).toBe('a:b');
  });
});
