import { describe, it, expect } from 'vitest';
import { CommandValidationError } from '../exceptions';
import { bytesToHex, concatBytes, hexToBytes } from './hex';

describe('hexToBytes', () => {
  it('accepts spaces and colons', () => {
    expect(hexToBytes('01 02:0A ff')).toEqual(Uint8Array.of(0x01, 0x02, 0x0a, 0xff));
  });

  it.each(['abc', '0g', '0x01'])('rejects %j', (value) => {
    expect(() => hexToBytes(value)).toThrow(CommandValidationError);
  });
});

describe('bytesToHex', () => {
  it('writes lowercase pairs', () => {
    expect(bytesToHex(Uint8Array.of(0x00, 0xab, 0x0f))).toBe('00ab0f');
  });
});

describe('concatBytes', () => {
  it('joins parts in order', () => {
    expect(concatBytes([Uint8Array.of(1), new Uint8Array(0), Uint8Array.of(2, 3)])).toEqual(Uint8Array.of(1, 2, 3));
  });
});
