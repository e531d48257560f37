/**
 * Bit-plane packing for the sign's three colour channels.
 */

import { ImageEncodingError } from '../exceptions';
import { HorizontalAlignment, VerticalAlignment } from '../models/enums';
import { channelBit, type Rgb } from './colors';
import { placeHorizontal, placeVertical } from './fitting';
import type { RgbaRaster } from './raster';

const PIXELS_PER_BYTE = 8;

/** Packed [red, green, blue] planes */
export type Bitplanes = [Uint8Array, Uint8Array, Uint8Array];

/**
 * Pack a raster into red, green and blue bit-planes.
 *
 * Pixels are walked column by column, top to bottom; each byte holds eight
 * vertically adjacent pixels with the top one in the most significant bit.
 * A channel is lit when its value is at least 128. Output pixels not
 * covered by the (aligned) source take the background colour. Source alpha
 * is ignored.
 *
 * @param raster - Source pixels, already resampled
 * @param outputWidth - Columns to emit
 * @param outputHeight - Rows to emit, a multiple of 8
 * @param background - Fill colour outside the source footprint
 * @returns Planes of outputWidth * outputHeight / 8 bytes each
 * @throws {ImageEncodingError} If outputHeight is not a multiple of 8
 */
export function encodeBitplanes(
  raster: RgbaRaster,
  outputWidth: number,
  outputHeight: number,
  background: Rgb,
  horizontalAlignment: HorizontalAlignment = HorizontalAlignment.NONE,
  verticalAlignment: VerticalAlignment = VerticalAlignment.CENTER
): Bitplanes {
  if (outputHeight % PIXELS_PER_BYTE !== 0) {
    throw new ImageEncodingError(
      `Target height needs to be divisible by 8, got ${outputHeight}`
    );
  }

  const horizontal = placeHorizontal(raster.width, outputWidth, horizontalAlignment);
  const vertical = placeVertical(raster.height, outputHeight, verticalAlignment);

  const planeSize = (outputWidth * outputHeight) / PIXELS_PER_BYTE;
  const red = new Uint8Array(planeSize);
  const green = new Uint8Array(planeSize);
  const blue = new Uint8Array(planeSize);

  const bgRed = channelBit(background.r);
  const bgGreen = channelBit(background.g);
  const bgBlue = channelBit(background.b);

  let byteIndex = 0;
  let r = 0;
  let g = 0;
  let b = 0;

  for (let x = 0; x < outputWidth; x++) {
    for (let y = 0; y < outputHeight; y++) {
      const sx = x - horizontal.pad + horizontal.crop;
      const sy = y - vertical.pad + vertical.crop;

      if (sx < horizontal.crop || sy < vertical.crop || sx >= raster.width || sy >= raster.height) {
        r = (r << 1) | bgRed;
        g = (g << 1) | bgGreen;
        b = (b << 1) | bgBlue;
      } else {
        const offset = (sy * raster.width + sx) * 4;
        r = (r << 1) | channelBit(raster.data[offset]);
        g = (g << 1) | channelBit(raster.data[offset + 1]);
        b = (b << 1) | channelBit(raster.data[offset + 2]);
      }

      if (y % PIXELS_PER_BYTE === PIXELS_PER_BYTE - 1) {
        red[byteIndex] = r;
        green[byteIndex] = g;
        blue[byteIndex] = b;
        byteIndex++;
        r = g = b = 0;
      }
    }
  }

  return [red, green, blue];
}
