/**
 * Colour parsing for text, backgrounds and music bars.
 */

import colorString from 'color-string';
import { ImageEncodingError } from '../exceptions';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Parse a CSS colour name, `#rgb`, `#rrggbb` or `rgb()` string.
 *
 * @throws {ImageEncodingError} If the colour is not recognised
 */
export function parseColor(spec: string): Rgb {
  const parsed = colorString.get.rgb(spec.trim());
  if (parsed === null) {
    throw new ImageEncodingError(`Unknown color "${spec}"`);
  }
  const [r, g, b] = parsed;
  return { r, g, b };
}

/**
 * `#rrggbb` form, as taken by canvas fill styles.
 */
export function toHex(color: Rgb): string {
  return '#' + [color.r, color.g, color.b].map((c) => c.toString(16).padStart(2, '0')).join('');
}

/**
 * On/off state of one channel on the sign (each LED colour is binary).
 */
export function channelBit(value: number): number {
  return value >= 128 ? 1 : 0;
}
