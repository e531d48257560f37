import { describe, it, expect } from 'vitest';
import { ImageEncodingError } from '../exceptions';
import { channelBit, parseColor, toHex } from './colors';

describe('parseColor', () => {
  it.each([
    ['red', { r: 255, g: 0, b: 0 }],
    ['#0f0', { r: 0, g: 255, b: 0 }],
    ['#123456', { r: 0x12, g: 0x34, b: 0x56 }],
    ['rgb(1, 2, 3)', { r: 1, g: 2, b: 3 }],
    [' white ', { r: 255, g: 255, b: 255 }],
  ])('parses %s', (spec, expected) => {
    expect(parseColor(spec)).toEqual(expected);
  });

  it('rejects unknown names', () => {
    expect(() => parseColor('notacolor')).toThrow(new ImageEncodingError('Unknown color "notacolor"'));
  });
});

describe('toHex', () => {
  it('zero-pads each channel', () => {
    expect(toHex({ r: 1, g: 0xab, b: 0 })).toBe('#01ab00');
  });
});

describe('channelBit', () => {
  it('switches on at 128', () => {
    expect([0, 127, 128, 255].map(channelBit)).toEqual([0, 0, 1, 1]);
  });
});
