import { describe, it, expect } from 'vitest';
import { computeContentHash, generatePublicId, isWellFormedPublicId } from '@/server/identity';

describe('content identity', () => {
  it('hashes bytes to lowercase hex SHA-256', () => {
    expect(computeContentHash(Buffer.from('abc')))
      .toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('is sensitive to every byte', () => {
    expect(computeContentHash(Buffer.from('{"a":1}'))).not.toBe(computeContentHash(Buffer.from('{"a":1} ')));
  });

  it('generates distinct URL-safe public ids', () => {
    const ids = new Set(Array.from({ length: 200 }, () => generatePublicId()));

    expect(ids.size).toBe(200);
    for (const id of ids) {
      expect(isWellFormedPublicId(id)).toBe(true);
    }
  });

  it('rejects ids of the wrong shape', () => {
    expect(isWellFormedPublicId('short')).toBe(false);
    expect(isWellFormedPublicId('A'.repeat(21) + '/')).toBe(false);
  });
});
