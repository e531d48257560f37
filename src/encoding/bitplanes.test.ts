import { describe, it, expect } from 'vitest';
import { ImageEncodingError } from '../exceptions';
import { HorizontalAlignment, VerticalAlignment } from '../models/enums';
import { BLACK, WHITE, hex, makeRaster, solidRaster } from '../test-support/rasters';
import { encodeBitplanes } from './bitplanes';

describe('encodeBitplanes', () => {
  it('rejects heights that are not a multiple of 8', () => {
    expect(() => encodeBitplanes(solidRaster(1, 12, WHITE), 1, 12, BLACK)).toThrow(
      new ImageEncodingError('Target height needs to be divisible by 8, got 12')
    );
  });

  it('puts the top row in the most significant bit', () => {
    const top = makeRaster(1, 8, (_x, y) => (y === 0 ? WHITE : BLACK));
    const bottom = makeRaster(1, 8, (_x, y) => (y === 7 ? WHITE : BLACK));

    expect(hex(encodeBitplanes(top, 1, 8, BLACK)[0])).toBe('80');
    expect(hex(encodeBitplanes(bottom, 1, 8, BLACK)[0])).toBe('01');
  });

  it('walks columns before rows', () => {
    const raster = makeRaster(2, 16, (x, y) => (x === 1 && y === 8 ? WHITE : BLACK));
    expect(hex(encodeBitplanes(raster, 2, 16, BLACK)[0])).toBe('00000080');
  });

  it('lights a channel from 128 upwards', () => {
    const raster = solidRaster(1, 8, { r: 127, g: 128, b: 0 });
    const [red, green, blue] = encodeBitplanes(raster, 1, 8, BLACK);

    expect([hex(red), hex(green), hex(blue)]).toEqual(['00', 'ff', '00']);
  });

  it.each([
    [VerticalAlignment.CENTER, 'c3'],
    [VerticalAlignment.BOTTOM, 'f0'],
    [VerticalAlignment.TOP, '0f'],
  ])('fills around short content aligned %s with the background', (alignment, expected) => {
    const raster = solidRaster(1, 4, BLACK);
    expect(hex(encodeBitplanes(raster, 1, 8, WHITE, HorizontalAlignment.NONE, alignment)[0])).toBe(expected);
  });

  describe('horizontal crop', () => {
    // Columns: lit, dark, dark, lit
    const raster = makeRaster(4, 8, (x) => (x === 0 || x === 3 ? WHITE : BLACK));

    it.each([
      [HorizontalAlignment.NONE, 'ff00'],
      [HorizontalAlignment.LEFT, 'ff00'],
      [HorizontalAlignment.CENTER, '0000'],
      [HorizontalAlignment.RIGHT, '00ff'],
    ])('keeps the %s columns', (alignment, expected) => {
      expect(hex(encodeBitplanes(raster, 2, 8, BLACK, alignment)[0])).toBe(expected);
    });

    it('rounds an odd centre crop down', () => {
      const wide = makeRaster(5, 8, (x) => (x === 1 ? WHITE : BLACK));
      expect(hex(encodeBitplanes(wide, 2, 8, BLACK, HorizontalAlignment.CENTER)[0])).toBe('ff00');
    });
  });

  it('pads narrow content with the background', () => {
    const raster = solidRaster(2, 8, BLACK);
    const [red] = encodeBitplanes(raster, 4, 8, WHITE, HorizontalAlignment.CENTER);
    expect(hex(red)).toBe('ff0000ff');
  });

  it('yields empty planes for zero columns', () => {
    const planes = encodeBitplanes(solidRaster(0, 2, BLACK), 0, 16, BLACK);
    expect(planes.map((p) => p.length)).toEqual([0, 0, 0]);
  });
});
