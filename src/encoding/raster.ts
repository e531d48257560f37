/**
 * RGBA rasters and the pixel operations the encoders need.
 *
 * Decoding and resampling go through sharp; everything else works on the
 * raw row-major RGBA buffer.
 */

import sharp from 'sharp';
import { ImageEncodingError } from '../exceptions';
import type { Rgb } from './colors';

/**
 * Row-major 8-bit RGBA pixels.
 */
export interface RgbaRaster {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Create a raster filled with one colour.
 */
export function createRaster(width: number, height: number, fill: Rgb, alpha: number = 255): RgbaRaster {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill.r;
    data[i + 1] = fill.g;
    data[i + 2] = fill.b;
    data[i + 3] = alpha;
  }
  return { width, height, data };
}

/**
 * Convert raw 1-4 channel pixels into RGBA.
 *
 * @throws {ImageEncodingError} If the channel count is unsupported
 */
export function rasterFromRaw(
  pixels: Uint8Array,
  width: number,
  height: number,
  channels: number
): RgbaRaster {
  if (channels === 4) {
    return { width, height, data: Uint8Array.from(pixels.subarray(0, width * height * 4)) };
  }
  if (channels < 1 || channels > 4) {
    throw new ImageEncodingError(`Unsupported channel count: ${channels}`);
  }

  const data = new Uint8Array(width * height * 4);
  for (let p = 0; p < width * height; p++) {
    const src = p * channels;
    const dst = p * 4;
    if (channels <= 2) {
      // Grey, optionally with alpha
      data[dst] = data[dst + 1] = data[dst + 2] = pixels[src];
      data[dst + 3] = channels === 2 ? pixels[src + 1] : 255;
    } else {
      data[dst] = pixels[src];
      data[dst + 1] = pixels[src + 1];
      data[dst + 2] = pixels[src + 2];
      data[dst + 3] = 255;
    }
  }
  return { width, height, data };
}

/**
 * Copy a rectangle out of a raster. Areas outside the source are transparent.
 */
export function cropRaster(
  raster: RgbaRaster,
  left: number,
  top: number,
  width: number,
  height: number
): RgbaRaster {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    const sy = y + top;
    if (sy < 0 || sy >= raster.height) continue;
    for (let x = 0; x < width; x++) {
      const sx = x + left;
      if (sx < 0 || sx >= raster.width) continue;
      const src = (sy * raster.width + sx) * 4;
      data.set(raster.data.subarray(src, src + 4), (y * width + x) * 4);
    }
  }
  return { width, height, data };
}

/**
 * Composite `top` over `bottom` at the given offset (source-over).
 *
 * @returns A new raster the size of `bottom`
 */
export function compositeOver(
  bottom: RgbaRaster,
  top: RgbaRaster,
  left: number = 0,
  offsetTop: number = 0
): RgbaRaster {
  const data = Uint8Array.from(bottom.data);

  for (let y = 0; y < top.height; y++) {
    const dy = y + offsetTop;
    if (dy < 0 || dy >= bottom.height) continue;
    for (let x = 0; x < top.width; x++) {
      const dx = x + left;
      if (dx < 0 || dx >= bottom.width) continue;

      const s = (y * top.width + x) * 4;
      const d = (dy * bottom.width + dx) * 4;
      const sa = top.data[s + 3] / 255;
      if (sa === 0) continue;
      const da = data[d + 3] / 255;
      const outA = sa + da * (1 - sa);

      for (let c = 0; c < 3; c++) {
        const blended = (top.data[s + c] * sa + data[d + c] * da * (1 - sa)) / outA;
        data[d + c] = Math.round(blended);
      }
      data[d + 3] = Math.round(outA * 255);
    }
  }

  return { width: bottom.width, height: bottom.height, data };
}

/**
 * Resample to exactly `width` x `height` (bicubic, aspect ratio not kept).
 *
 * @throws {ImageEncodingError} If a target dimension is below one pixel
 */
export async function resizeRaster(raster: RgbaRaster, width: number, height: number): Promise<RgbaRaster> {
  if (width === raster.width && height === raster.height) {
    return raster;
  }
  if (width < 1 || height < 1) {
    throw new ImageEncodingError(`Cannot resize ${raster.width}x${raster.height} image to ${width}x${height}`);
  }

  const { data, info } = await sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: 4 },
  })
    .resize(width, height, { kernel: 'cubic', fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return rasterFromRaw(new Uint8Array(data), info.width, info.height, info.channels);
}

/**
 * Decode a still image (file path or encoded bytes). Alpha is dropped, as
 * the sign has no notion of transparency.
 *
 * @throws {ImageEncodingError} If sharp cannot read the input
 */
export async function decodeImage(source: string | Buffer): Promise<RgbaRaster> {
  try {
    const { data, info } = await sharp(source)
      .toColourspace('srgb')
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    return rasterFromRaw(new Uint8Array(data), info.width, info.height, info.channels);
  } catch (error) {
    throw new ImageEncodingError(`Failed to decode image: ${describeError(error)}`);
  }
}

/**
 * Decode every frame of an animated image (GIF, WebP).
 *
 * @throws {ImageEncodingError} If the input cannot be read or has one frame
 */
export async function decodeAnimationFrames(source: string | Buffer): Promise<RgbaRaster[]> {
  let pages: number;
  let pageHeight: number;
  let decoded: { data: Buffer; info: sharp.OutputInfo };

  try {
    const image = sharp(source, { pages: -1 });
    const metadata = await image.metadata();
    pages = metadata.pages ?? 1;
    pageHeight = metadata.pageHeight ?? metadata.height ?? 0;
    decoded = await image.toColourspace('srgb').ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageEncodingError(`Failed to decode animation: ${describeError(error)}`);
  }

  if (pages < 2) {
    const label = typeof source === 'string' ? source : 'input';
    throw new ImageEncodingError(`Image ${label} is not animated`);
  }

  const { data, info } = decoded;
  const sheet = rasterFromRaw(new Uint8Array(data), info.width, info.height, info.channels);
  const frames: RgbaRaster[] = [];
  for (let page = 0; page < pages; page++) {
    frames.push(cropRaster(sheet, 0, page * pageHeight, sheet.width, pageHeight));
  }
  return frames;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
