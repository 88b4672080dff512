import { describe, it, expect } from 'vitest';
import { crc32 } from '@utils/crc32';

const ascii = (s: string) => Uint8Array.from(s, (c) => c.charCodeAt(0));

describe('crc32', () => {
  it('matches the IEEE check value', () => {
    expect(crc32(ascii('123456789'))).toBe(0xCBF43926);
  });

  it('is zero for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('continues from a previous value', () => {
    const head = crc32(ascii('12345'));
    expect(crc32(ascii('6789'), head)).toBe(0xCBF43926);
  });
});
