import { describe, it, expect } from 'vitest';
import { computeSha256, parseChecksumFile } from '../checksums.js';

const HASH_A = 'a'.repeat(64);
const HASH_B = 'B'.repeat(64);

describe('computeSha256', () => {
  it('hashes strings and buffers alike', () => {
    expect(computeSha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(computeSha256(Buffer.from('abc'))).toBe(computeSha256('abc'));
  });
});

describe('parseChecksumFile', () => {
  it('accepts a bare hash', () => {
    expect(parseChecksumFile(`${HASH_A}\n`, 'kubectl')).toBe(HASH_A);
  });

  it('selects the line for the file name', () => {
    const text = `${HASH_A}  tool-linux-amd64\n${HASH_B} *tool-linux-arm64\n`;

    expect(parseChecksumFile(text, 'tool-linux-arm64')).toBe('b'.repeat(64));
  });

  it('matches names with a leading path', () => {
    expect(parseChecksumFile(`${HASH_A}  dist/tool-linux-amd64\n${HASH_B}  other\n`, 'tool-linux-amd64')).toBe(HASH_A);
  });

  it('returns null when the file is not listed', () => {
    expect(parseChecksumFile(`${HASH_A}  other\n${HASH_B}  another\n`, 'tool')).toBeNull();
  });
});
