/**
 * BLE advertisement data structures.
 */

import type { PanelDimensions } from './panel';

/** Manufacturer data must reach the width byte at offset 8 */
export const MIN_MANUFACTURER_DATA_LENGTH = 9;

/**
 * Parsed vendor-specific manufacturer data.
 *
 * Advertisement format (manufacturer ID already stripped):
 *
 * - [0-5]: Sign MAC address
 * - [6]: Panel height in pixels
 * - [7]: Unknown (observed 0)
 * - [8]: Panel width in pixels
 * - [9-10]: Unknown (observed 1, 0)
 */
export interface AdvertisementData {
  /** MAC address embedded in the payload, colon separated */
  macAddress: string;

  /** Panel dimensions announced by the sign */
  panel: PanelDimensions;
}

/**
 * Parse BLE advertisement manufacturer data.
 *
 * @param data - Raw manufacturer data, without the 2-byte company identifier
 * @returns AdvertisementData, or null if the payload is too short to describe a sign
 */
export function parseAdvertisement(data: Uint8Array): AdvertisementData | null {
  if (data.length < MIN_MANUFACTURER_DATA_LENGTH) {
    return null;
  }

  const macAddress = Array.from(data.subarray(0, 6), (b) =>
    b.toString(16).padStart(2, '0').toUpperCase()
  ).join(':');

  return {
    macAddress,
    panel: {
      height: data[6],
      width: data[8],
    },
  };
}
