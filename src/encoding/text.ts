/**
 * Text rendering with inline colour markers.
 *
 * Text such as `Hi <red>there<#00ff00>!` is split into coloured runs and
 * drawn run by run onto a 2D canvas, laid out by the font's advance widths
 * and line metrics.
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { createCanvas, GlobalFonts, type SKRSContext2D } from '@napi-rs/canvas';
import { ImageEncodingError } from '../exceptions';
import {
  DEFAULT_BACKGROUND_COLOR,
  DEFAULT_COLOR,
  DEFAULT_END_COLOR_MARKER,
  DEFAULT_FONT,
  DEFAULT_FONT_SIZE,
  DEFAULT_START_COLOR_MARKER,
} from '../protocol/constants';
import { parseColor, toHex, type Rgb } from './colors';
import { createRaster, rasterFromRaw, type RgbaRaster } from './raster';

/** Opening and closing colour marker, e.g. ['<', '>'] */
export type ColorMarkers = readonly [string, string];

export const DEFAULT_COLOR_MARKERS: ColorMarkers = [DEFAULT_START_COLOR_MARKER, DEFAULT_END_COLOR_MARKER];

export interface ColorRun {
  text: string;
  color: Rgb;
}

export interface TextRenderOptions {
  color?: string;
  backgroundColor?: string;
  /** Font family name, or a path to a .ttf/.otf/.ttc file */
  font?: string;
  /** Font size in pixels */
  fontHeight?: number;
  /** null draws the text verbatim */
  colorMarkers?: ColorMarkers | null;
}

/** Horizontal and vertical extent of a line of runs */
export interface TextLayout {
  /** Left edge of each run */
  offsets: number[];
  width: number;
  height: number;
  baseline: number;
}

// Rows left free above the glyphs
const TOP_MARGIN = 1;
const FALLBACK_FAMILY = 'sans-serif';
const FONT_FILE_PATTERN = /\.(ttf|otf|ttc)$/i;

/**
 * Split marked-up text into coloured runs.
 *
 * The text is split on the closing marker, then each segment on the opening
 * marker. A colour applies to the text that follows its marker, so the
 * colour named in a segment takes effect after that segment's text.
 *
 * @example
 * parseColorRuns('a<red>b', ['<', '>'], 'white');
 * // [{ text: 'a', color: white }, { text: 'b', color: red }]
 *
 * @throws {ImageEncodingError} If a marker names an unknown colour
 */
export function parseColorRuns(
  text: string,
  markers: ColorMarkers | null,
  defaultColor: string
): ColorRun[] {
  let color = parseColor(defaultColor);
  if (markers === null) {
    return text.length > 0 ? [{ text, color }] : [];
  }

  const [open, close] = markers;
  const runs: ColorRun[] = [];

  for (const segment of text.split(close)) {
    const pieces = segment.split(open);
    const segmentText = pieces.length === 1 ? pieces[0] : pieces.slice(0, -1).join('');

    if (segmentText.length > 0) {
      runs.push({ text: segmentText, color });
    }
    if (pieces.length > 1) {
      color = parseColor(pieces[pieces.length - 1]);
    }
  }

  return runs;
}

/**
 * Map a font option onto a canvas font shorthand.
 *
 * Font files are registered under their base name. Family names fall back
 * to the system sans-serif face when they are not installed.
 */
export function resolveFont(font: string, fontHeight: number): string {
  if (!FONT_FILE_PATTERN.test(font)) {
    return `${fontHeight}px "${font}", ${FALLBACK_FAMILY}`;
  }

  const family = path.basename(font).replace(FONT_FILE_PATTERN, '');
  if (!existsSync(font) || !GlobalFonts.registerFromPath(path.resolve(font), family)) {
    console.warn(`Could not load font ${font}, falling back to the default font`);
    return `${fontHeight}px ${FALLBACK_FAMILY}`;
  }
  return `${fontHeight}px "${family}", ${FALLBACK_FAMILY}`;
}

/**
 * Lay runs out left to right by their advance widths.
 *
 * The height covers the font's ascent and descent plus the top margin, so
 * it does not depend on which glyphs the text contains.
 */
export function layoutRuns(ctx: SKRSContext2D, runs: ColorRun[]): TextLayout {
  // Font-level metrics, the same for any sample text
  const line = ctx.measureText('M');
  const ascent = Math.ceil(line.fontBoundingBoxAscent);
  const descent = Math.ceil(line.fontBoundingBoxDescent);

  const offsets: number[] = [];
  let x = 0;
  for (const run of runs) {
    offsets.push(x);
    x += ctx.measureText(run.text).width;
  }

  return {
    offsets,
    width: Math.ceil(x),
    height: TOP_MARGIN + ascent + descent,
    baseline: TOP_MARGIN + ascent,
  };
}

/**
 * Render marked-up text onto an opaque canvas.
 *
 * The result is as wide as the text's advance, leading and trailing
 * whitespace included, and as tall as the font's line plus one row above it.
 *
 * @throws {ImageEncodingError} For unknown colours or a failed render
 */
export async function renderTextToRaster(text: string, options: TextRenderOptions = {}): Promise<RgbaRaster> {
  const fontHeight = options.fontHeight ?? DEFAULT_FONT_SIZE;
  const background = parseColor(options.backgroundColor ?? DEFAULT_BACKGROUND_COLOR);
  const markers = options.colorMarkers === undefined ? DEFAULT_COLOR_MARKERS : options.colorMarkers;
  const runs = parseColorRuns(text, markers, options.color ?? DEFAULT_COLOR);
  const font = resolveFont(options.font ?? DEFAULT_FONT, fontHeight);

  try {
    const measure = createCanvas(1, 1).getContext('2d');
    measure.font = font;
    const layout = layoutRuns(measure, runs);
    if (layout.width === 0) {
      return createRaster(0, layout.height, background);
    }

    const canvas = createCanvas(layout.width, layout.height);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = toHex(background);
    ctx.fillRect(0, 0, layout.width, layout.height);
    ctx.font = font;
    ctx.textBaseline = 'alphabetic';
    runs.forEach((run, index) => {
      ctx.fillStyle = toHex(run.color);
      ctx.fillText(run.text, layout.offsets[index], layout.baseline);
    });

    const image = ctx.getImageData(0, 0, layout.width, layout.height);
    return rasterFromRaw(new Uint8Array(image.data), image.width, image.height, 4);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageEncodingError(`Failed to render text: ${message}`);
  }
}
