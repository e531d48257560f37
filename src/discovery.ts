/**
 * Matching and listing of advertising signs.
 */

import { parseAdvertisement } from './models/advertisement';
import { DeviceGeneration } from './models/hardware';
import type { PanelDimensions } from './models/panel';
import type { ScanResult, ScanTarget, Transport } from './transport/types';

/**
 * A sign seen during a scan.
 */
export interface DiscoveredSign {
  id: string;
  name: string;
  /** Address reported by the BLE stack */
  address: string;
  /** MAC address embedded in the advertisement */
  macAddress: string;
  panel: PanelDimensions;
  rssi?: number;
}

const KNOWN_NAMES = new Set<string>(Object.values(DeviceGeneration));

/**
 * Whether a scanned peripheral is the sign the caller asked for.
 *
 * Peripherals whose manufacturer data is too short to carry panel
 * dimensions are never matched. An address matches either the BLE address
 * or the MAC inside the advertisement, since some platforms hide the former.
 */
export function matchesScanTarget(result: ScanResult, target: ScanTarget): boolean {
  if (result.manufacturerData === null) {
    return false;
  }
  const advertisement = parseAdvertisement(result.manufacturerData);
  if (advertisement === null) {
    return false;
  }

  if (target.address !== undefined) {
    const wanted = target.address.toLowerCase();
    return result.address.toLowerCase() === wanted || advertisement.macAddress.toLowerCase() === wanted;
  }
  return result.name === target.deviceName;
}

/**
 * Turn a scan result into a sign description.
 *
 * @returns null for peripherals that are not CoolLED signs
 */
export function toDiscoveredSign(result: ScanResult): DiscoveredSign | null {
  if (result.name === undefined || !KNOWN_NAMES.has(result.name) || result.manufacturerData === null) {
    return null;
  }
  const advertisement = parseAdvertisement(result.manufacturerData);
  if (advertisement === null) {
    return null;
  }

  return {
    id: result.id,
    name: result.name,
    address: result.address,
    macAddress: advertisement.macAddress,
    panel: advertisement.panel,
    rssi: result.rssi,
  };
}

/**
 * Scan for the given time and list every sign seen, strongest signal first.
 */
export async function discoverSigns(transport: Transport, timeoutMs: number): Promise<DiscoveredSign[]> {
  const results = await transport.scanAll(timeoutMs);
  const signs = results
    .map(toDiscoveredSign)
    .filter((sign): sign is DiscoveredSign => sign !== null);

  signs.sort((a, b) => (b.rssi ?? -Infinity) - (a.rssi ?? -Infinity));
  console.log(`Found ${signs.length} sign(s) among ${results.length} peripheral(s)`);
  return signs;
}
