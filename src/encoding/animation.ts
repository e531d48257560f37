/**
 * Animation payloads.
 */

import { ImageEncodingError } from '../exceptions';
import { HeightTreatment, HorizontalAlignment, VerticalAlignment, WidthTreatment } from '../models/enums';
import type { PanelDimensions } from '../models/panel';
import {
  DEFAULT_ANIMATION_SPEED,
  DEFAULT_BACKGROUND_COLOR,
  MAX_ANIMATION_FRAMES,
  PAYLOAD_RESERVED_BYTES,
} from '../protocol/constants';
import { concatBytes } from '../protocol/hex';
import { encodeBitplanes, type Bitplanes } from './bitplanes';
import { parseColor } from './colors';
import { computeFit } from './fitting';
import { resolveFitOptions, type FitOptions } from './images';
import { compositeOver, decodeAnimationFrames, resizeRaster, type RgbaRaster } from './raster';

export interface AnimationOptions extends FitOptions {
  /** Frame delay value sent to the sign (0-65535) */
  speed?: number;
}

/** Animations always fill the panel exactly */
export const ANIMATION_FIT_DEFAULTS: Readonly<Required<FitOptions>> = Object.freeze({
  backgroundColor: DEFAULT_BACKGROUND_COLOR,
  widthTreatment: WidthTreatment.SCALE,
  heightTreatment: HeightTreatment.SCALE,
  horizontalAlignment: HorizontalAlignment.CENTER,
  verticalAlignment: VerticalAlignment.CENTER,
});

/**
 * Pack decoded frames.
 *
 * Each frame is composited over the frames before it, since the sign does
 * not clear between frames. Every frame is then fitted to exactly the panel
 * size.
 *
 * @returns Planes holding all frames back to back
 * @throws {ImageEncodingError} For AS_IS width, no frames, or more than 255
 */
export async function encodeAnimationFrames(
  frames: RgbaRaster[],
  panel: PanelDimensions,
  options: FitOptions = {}
): Promise<Bitplanes> {
  const fit = resolveFitOptions(options, ANIMATION_FIT_DEFAULTS);
  if (fit.widthTreatment === WidthTreatment.AS_IS) {
    throw new ImageEncodingError('Animations must fit the panel width; AS_IS is not supported');
  }
  if (frames.length === 0) {
    throw new ImageEncodingError('Animation has no frames');
  }
  if (frames.length > MAX_ANIMATION_FRAMES) {
    throw new ImageEncodingError(
      `Animation has ${frames.length} frames, the sign accepts at most ${MAX_ANIMATION_FRAMES}`
    );
  }

  const background = parseColor(fit.backgroundColor);
  const red: Uint8Array[] = [];
  const green: Uint8Array[] = [];
  const blue: Uint8Array[] = [];

  let combined: RgbaRaster | null = null;
  for (const frame of frames) {
    combined = combined === null ? frame : compositeOver(combined, frame);

    const { scaledWidth, scaledHeight } = computeFit(
      combined.width,
      combined.height,
      panel,
      fit.widthTreatment,
      fit.heightTreatment
    );
    const resized = await resizeRaster(combined, scaledWidth, scaledHeight);
    const [r, g, b] = encodeBitplanes(
      resized,
      panel.width,
      panel.height,
      background,
      fit.horizontalAlignment,
      fit.verticalAlignment
    );
    red.push(r);
    green.push(g);
    blue.push(b);
  }

  return [concatBytes(red), concatBytes(green), concatBytes(blue)];
}

/**
 * Build an animation payload from decoded frames.
 *
 * Format: [24 x 0x00][frames:1][speed:2BE][R of all frames][G ...][B ...]
 */
export async function createAnimationOutput(
  frames: RgbaRaster[],
  panel: PanelDimensions,
  options: AnimationOptions = {}
): Promise<Uint8Array> {
  const speed = options.speed ?? DEFAULT_ANIMATION_SPEED;
  const planes = await encodeAnimationFrames(frames, panel, options);

  const header = new Uint8Array(PAYLOAD_RESERVED_BYTES + 3);
  const view = new DataView(header.buffer);
  view.setUint8(PAYLOAD_RESERVED_BYTES, frames.length);
  view.setUint16(PAYLOAD_RESERVED_BYTES + 1, speed, false);

  return concatBytes([header, ...planes]);
}

/**
 * Decode an animated GIF/WebP (path or encoded bytes) and build its payload.
 *
 * @throws {ImageEncodingError} If the source is not animated
 */
export async function createAnimationPayload(
  source: string | Buffer,
  panel: PanelDimensions,
  options: AnimationOptions = {}
): Promise<Uint8Array> {
  const frames = await decodeAnimationFrames(source);
  console.debug(`Decoded animation with ${frames.length} frames`);
  return createAnimationOutput(frames, panel, options);
}
