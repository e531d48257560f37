/**
 * Text and still-image payloads.
 */

import { ImageEncodingError } from '../exceptions';
import { HeightTreatment, HorizontalAlignment, VerticalAlignment, WidthTreatment } from '../models/enums';
import type { PanelDimensions } from '../models/panel';
import {
  DEFAULT_BACKGROUND_COLOR,
  MAX_PAYLOAD_LENGTH,
  MAX_SHORT_TEXT_LENGTH,
  PAYLOAD_RESERVED_BYTES,
  PLACEHOLDER_CHAR,
  TEXT_PLACEHOLDER_LENGTH,
} from '../protocol/constants';
import { concatBytes } from '../protocol/hex';
import { encodeBitplanes } from './bitplanes';
import { parseColor } from './colors';
import { computeFit } from './fitting';
import { decodeImage, resizeRaster, type RgbaRaster } from './raster';
import { renderTextToRaster, type TextRenderOptions } from './text';

/**
 * How a source is fitted to the panel.
 */
export interface FitOptions {
  backgroundColor?: string;
  widthTreatment?: WidthTreatment;
  heightTreatment?: HeightTreatment;
  horizontalAlignment?: HorizontalAlignment;
  verticalAlignment?: VerticalAlignment;
}

export interface TextPayloadOptions extends TextRenderOptions, FitOptions {
  /**
   * Embed the text placeholder block (sent with the text command). When
   * false the rendering is sent as a plain image.
   */
  renderAsText?: boolean;
}

/** Defaults for text and still images: keep the width, crop/pad the height */
export const STILL_FIT_DEFAULTS: Readonly<Required<FitOptions>> = Object.freeze({
  backgroundColor: DEFAULT_BACKGROUND_COLOR,
  widthTreatment: WidthTreatment.AS_IS,
  heightTreatment: HeightTreatment.CROP_PAD,
  horizontalAlignment: HorizontalAlignment.NONE,
  verticalAlignment: VerticalAlignment.CENTER,
});

export function resolveFitOptions(
  options: FitOptions,
  defaults: Readonly<Required<FitOptions>> = STILL_FIT_DEFAULTS
): Required<FitOptions> {
  return {
    backgroundColor: options.backgroundColor ?? defaults.backgroundColor,
    widthTreatment: options.widthTreatment ?? defaults.widthTreatment,
    heightTreatment: options.heightTreatment ?? defaults.heightTreatment,
    horizontalAlignment: options.horizontalAlignment ?? defaults.horizontalAlignment,
    verticalAlignment: options.verticalAlignment ?? defaults.verticalAlignment,
  };
}

/**
 * Placeholder block sent ahead of the pixels of a text message.
 *
 * Format: [length:1][80 bytes] or, past 255 characters, [length:2BE][79 bytes].
 * The buffer holds 0x30 for each character (up to its size) and zeros after.
 * The sign draws the pixels, so only the length matters.
 */
export function encodeTextBlock(text: string): Uint8Array {
  const length = Array.from(text).length;
  let header: Uint8Array;
  let bufferLength = TEXT_PLACEHOLDER_LENGTH;

  if (length > MAX_SHORT_TEXT_LENGTH) {
    console.warn(`Text message length exceeds ${MAX_SHORT_TEXT_LENGTH} characters; may not work on all signs`);
    header = Uint8Array.of((length >> 8) & 0xff, length & 0xff);
    bufferLength = TEXT_PLACEHOLDER_LENGTH - 1;
  } else {
    header = Uint8Array.of(length);
  }

  const buffer = new Uint8Array(bufferLength);
  buffer.fill(PLACEHOLDER_CHAR, 0, Math.min(length, bufferLength));
  return concatBytes([header, buffer]);
}

/**
 * Fit a raster to the panel and assemble the payload.
 *
 * Format: [24 x 0x00][text block, when text is given][bitsLength:2BE][R][G][B]
 *
 * @param raster - Source pixels
 * @param panel - Target panel
 * @param options - Fitting policy (still-image defaults apply)
 * @param text - Text the raster was rendered from, for the placeholder block
 * @throws {ImageEncodingError} If the raster cannot be fitted or packed
 */
export async function createImageOutput(
  raster: RgbaRaster,
  panel: PanelDimensions,
  options: FitOptions = {},
  text?: string
): Promise<Uint8Array> {
  const fit = resolveFitOptions(options);
  const { scaledWidth, scaledHeight, outputWidth } = computeFit(
    raster.width,
    raster.height,
    panel,
    fit.widthTreatment,
    fit.heightTreatment
  );

  const resized = await resizeRaster(raster, scaledWidth, scaledHeight);
  const planes = encodeBitplanes(
    resized,
    outputWidth,
    panel.height,
    parseColor(fit.backgroundColor),
    fit.horizontalAlignment,
    fit.verticalAlignment
  );

  const bits = concatBytes(planes);
  if (bits.length > MAX_PAYLOAD_LENGTH) {
    throw new ImageEncodingError(
      `Packed image of ${outputWidth}x${panel.height} needs ${bits.length} bytes, more than ${MAX_PAYLOAD_LENGTH}`
    );
  }
  const bitsLength = Uint8Array.of((bits.length >> 8) & 0xff, bits.length & 0xff);

  const parts: Uint8Array[] = [new Uint8Array(PAYLOAD_RESERVED_BYTES)];
  if (text !== undefined) {
    parts.push(encodeTextBlock(text));
  }
  parts.push(bitsLength, bits);
  return concatBytes(parts);
}

/**
 * Render text and build its payload.
 */
export async function createTextPayload(
  text: string,
  panel: PanelDimensions,
  options: TextPayloadOptions = {}
): Promise<Uint8Array> {
  const raster = await renderTextToRaster(text, options);
  const renderAsText = options.renderAsText ?? true;
  return createImageOutput(raster, panel, options, renderAsText ? text : undefined);
}

/**
 * Decode an image (path or encoded bytes) and build its payload.
 */
export async function createImagePayload(
  source: string | Buffer,
  panel: PanelDimensions,
  options: FitOptions = {}
): Promise<Uint8Array> {
  const raster = await decodeImage(source);
  return createImageOutput(raster, panel, options);
}
