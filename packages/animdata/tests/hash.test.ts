import { describe, test, expect } from 'vitest';
import { BUCKET_COUNT, hashIdentifier } from '../src/parser/structure/hash.ts';

describe('hashIdentifier', () => {
  test('sums upper-cased character codes modulo the bucket count', () => {
    expect(hashIdentifier('AAAAAAA')).toBe(199);
    expect(hashIdentifier('AAAAAAB')).toBe(200);
    expect(hashIdentifier('BBBBBBB')).toBe(206);
  });

  test('ignores case', () => {
    expect(hashIdentifier('aaaaaab')).toBe(hashIdentifier('AAAAAAB'));
    expect(hashIdentifier('AbCdEfG')).toBe(hashIdentifier('ABCDEFG'));
  });

  test('hashes the empty string to bucket 0', () => {
    expect(hashIdentifier('')).toBe(0);
  });

  test('stays within the bucket range', () => {
    expect(hashIdentifier('ZZZZZZZ')).toBe((90 * 7) % BUCKET_COUNT);
  });
});
