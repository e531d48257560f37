/**
 * Raster builders for encoder tests.
 */

import type { Rgb } from '../encoding/colors';
import type { RgbaRaster } from '../encoding/raster';

export const BLACK: Rgb = { r: 0, g: 0, b: 0 };
export const WHITE: Rgb = { r: 255, g: 255, b: 255 };
export const RED: Rgb = { r: 255, g: 0, b: 0 };
export const GREEN: Rgb = { r: 0, g: 255, b: 0 };

/**
 * Build a raster from a per-pixel function. Pixels are opaque unless the
 * function returns null (fully transparent black).
 */
export function makeRaster(width: number, height: number, pixel: (x: number, y: number) => Rgb | null): RgbaRaster {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const color = pixel(x, y);
      if (color === null) continue;
      const offset = (y * width + x) * 4;
      data[offset] = color.r;
      data[offset + 1] = color.g;
      data[offset + 2] = color.b;
      data[offset + 3] = 255;
    }
  }
  return { width, height, data };
}

export function solidRaster(width: number, height: number, color: Rgb): RgbaRaster {
  return makeRaster(width, height, () => color);
}

export function hex(data: Uint8Array): string {
  return Buffer.from(data).toString('hex');
}

/**
 * A 4x8 GIF with two frames: solid red, then solid green.
 *
 * Each frame is 32 pixels of one palette index, LZW coded at a minimum code
 * size of 2: clear, k, 6, 7, 8, 9, 10, 11, 8, end.
 */
export function redGreenGif(): Buffer {
  const frame = (firstByte: number): number[] => [
    // Graphic control: no disposal, 10/100 s delay
    0x21, 0xf9, 0x04, 0x00, 0x0a, 0x00, 0x00, 0x00,
    // Image descriptor at 0,0 sized 4x8, no local palette
    0x2c, 0x00, 0x00, 0x00, 0x00, 0x04, 0x00, 0x08, 0x00, 0x00,
    0x02, 0x05, firstByte, 0x8f, 0xa9, 0x8b, 0x05, 0x00,
  ];

  return Buffer.from([
    ...Buffer.from('GIF89a', 'ascii'),
    // 4x8 screen, 4-entry global palette
    0x04, 0x00, 0x08, 0x00, 0x91, 0x00, 0x00,
    0xff, 0x00, 0x00, 0x00, 0xff, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    // Loop forever
    0x21, 0xff, 0x0b, ...Buffer.from('NETSCAPE2.0', 'ascii'), 0x03, 0x01, 0x00, 0x00, 0x00,
    ...frame(0x84),
    ...frame(0x8c),
    0x3b,
  ]);
}
