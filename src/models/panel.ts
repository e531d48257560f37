/**
 * LED panel dimensions.
 */

/**
 * Physical size of the LED matrix in pixels.
 *
 * Height is always a multiple of 8 (one packed byte per 8 rows).
 */
export interface PanelDimensions {
  width: number;
  height: number;
}

/**
 * Used when no dimensions have been read from the sign's advertisement.
 */
export const DEFAULT_PANEL: Readonly<PanelDimensions> = Object.freeze({
  width: 96,
  height: 16,
});

/**
 * Check that dimensions are usable for bit-plane packing.
 */
export function isValidPanel(panel: PanelDimensions): boolean {
  return (
    Number.isInteger(panel.width) &&
    Number.isInteger(panel.height) &&
    panel.width > 0 &&
    panel.width <= 0xffff &&
    panel.height > 0 &&
    panel.height <= 0xffff &&
    panel.height % 8 === 0
  );
}

export function formatPanel(panel: PanelDimensions): string {
  return `${panel.width}x${panel.height}`;
}
