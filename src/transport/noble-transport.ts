/**
 * Transport backed by @abandonware/noble (Linux, macOS, Windows).
 */

import noble = require('@abandonware/noble');
import { matchesScanTarget } from '../discovery';
import { BLEConnectionError } from '../exceptions';
import { CHARACTERISTIC_UUID, SERVICE_UUID } from '../protocol/constants';
import { withTimeout } from './timeout';
import type { NotificationListener, ScanResult, ScanTarget, Transport } from './types';

// Bytes of the Bluetooth SIG company identifier at the start of manufacturer data
const COMPANY_ID_LENGTH = 2;

/**
 * noble wants 16-bit UUIDs in short lowercase form ("fff0").
 */
export function toNobleUuid(uuid: string): string {
  const match = /^0000([0-9a-f]{4})-0000-1000-8000-00805f9b34fb$/i.exec(uuid);
  return (match ? match[1] : uuid.replace(/-/g, '')).toLowerCase();
}

export class NobleTransport implements Transport {
  private readonly peripherals = new Map<string, noble.Peripheral>();
  private peripheral: noble.Peripheral | null = null;
  private characteristic: noble.Characteristic | null = null;
  private disconnectHandler: (() => void) | null = null;
  private dataHandler: ((data: Buffer) => void) | null = null;

  async scan(target: ScanTarget, timeoutMs: number): Promise<ScanResult | null> {
    const seen = await this.runScan(timeoutMs, (result) => matchesScanTarget(result, target));
    return seen.find((result) => matchesScanTarget(result, target)) ?? null;
  }

  async scanAll(timeoutMs: number): Promise<ScanResult[]> {
    return this.runScan(timeoutMs, () => false);
  }

  async connect(id: string, timeoutMs: number, onDisconnect: () => void): Promise<void> {
    const peripheral = this.peripherals.get(id);
    if (!peripheral) {
      throw new BLEConnectionError(`Unknown peripheral ${id}; scan first`);
    }

    // A timed-out connect can still complete later
    const abandon = (): Promise<void> => peripheral.disconnectAsync();

    await withTimeout(peripheral.connectAsync(), timeoutMs, `Connection timed out after ${timeoutMs}ms`, abandon);

    const { characteristics } = await withTimeout(
      peripheral.discoverSomeServicesAndCharacteristicsAsync(
        [toNobleUuid(SERVICE_UUID)],
        [toNobleUuid(CHARACTERISTIC_UUID)]
      ),
      timeoutMs,
      `Service discovery timed out after ${timeoutMs}ms`,
      abandon
    );

    if (characteristics.length === 0) {
      await peripheral.disconnectAsync();
      throw new BLEConnectionError('No characteristics found in sign service');
    }

    this.peripheral = peripheral;
    this.characteristic = characteristics[0];
    this.disconnectHandler = () => {
      this.release();
      onDisconnect();
    };
    peripheral.once('disconnect', this.disconnectHandler);
  }

  async write(data: Uint8Array, expectResponse: boolean): Promise<void> {
    const characteristic = this.requireCharacteristic();
    await characteristic.writeAsync(Buffer.from(data), !expectResponse);
  }

  async subscribe(listener: NotificationListener): Promise<void> {
    const characteristic = this.requireCharacteristic();
    this.dataHandler = (data: Buffer) => listener(new Uint8Array(data));
    characteristic.on('data', this.dataHandler);
    await characteristic.subscribeAsync();
  }

  async unsubscribe(): Promise<void> {
    const characteristic = this.requireCharacteristic();
    if (this.dataHandler) {
      characteristic.removeListener('data', this.dataHandler);
      this.dataHandler = null;
    }
    await characteristic.unsubscribeAsync();
  }

  async disconnect(): Promise<void> {
    const peripheral = this.peripheral;
    if (peripheral === null) {
      return;
    }
    if (this.disconnectHandler) {
      peripheral.removeListener('disconnect', this.disconnectHandler);
    }
    this.release();
    await peripheral.disconnectAsync();
  }

  private requireCharacteristic(): noble.Characteristic {
    if (this.characteristic === null) {
      throw new BLEConnectionError('Not connected to device');
    }
    return this.characteristic;
  }

  private release(): void {
    this.peripheral = null;
    this.characteristic = null;
    this.disconnectHandler = null;
    this.dataHandler = null;
  }

  private toScanResult(peripheral: noble.Peripheral): ScanResult {
    const raw: Buffer | undefined = peripheral.advertisement.manufacturerData;
    return {
      id: peripheral.id,
      name: peripheral.advertisement.localName,
      address: peripheral.address,
      manufacturerData:
        raw !== undefined && raw.length > COMPANY_ID_LENGTH ? new Uint8Array(raw.subarray(COMPANY_ID_LENGTH)) : null,
      rssi: peripheral.rssi,
    };
  }

  /**
   * Scan until `stopWhen` accepts a result or the timeout passes.
   *
   * @returns The accepted result alone, or everything seen on timeout
   */
  private async runScan(timeoutMs: number, stopWhen: (result: ScanResult) => boolean): Promise<ScanResult[]> {
    await this.waitForPoweredOn(timeoutMs);

    // Only peripherals from the latest scan can be connected
    this.peripherals.clear();
    const seen = new Map<string, ScanResult>();

    return new Promise<ScanResult[]>((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const finish = (results: ScanResult[]): void => {
        clearTimeout(timeoutId);
        noble.removeListener('discover', onDiscover);
        noble.stopScanningAsync().then(
          () => resolve(results),
          (error: unknown) => reject(error)
        );
      };

      const onDiscover = (peripheral: noble.Peripheral): void => {
        const result = this.toScanResult(peripheral);
        this.peripherals.set(result.id, peripheral);
        seen.set(result.id, result);
        if (stopWhen(result)) {
          console.debug(`Found target device: ${result.name ?? '?'} (${result.address})`);
          finish([result]);
        }
      };

      timeoutId = setTimeout(() => finish([...seen.values()]), timeoutMs);
      noble.on('discover', onDiscover);
      noble.startScanningAsync([], true).catch((error: unknown) => {
        clearTimeout(timeoutId);
        noble.removeListener('discover', onDiscover);
        reject(error);
      });
    });
  }

  private async waitForPoweredOn(timeoutMs: number): Promise<void> {
    if (noble.state === 'poweredOn') {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onStateChange = (state: string): void => {
        if (state === 'poweredOn') {
          clearTimeout(timeoutId);
          noble.removeListener('stateChange', onStateChange);
          resolve();
        }
      };
      const timeoutId = setTimeout(() => {
        noble.removeListener('stateChange', onStateChange);
        reject(new BLEConnectionError(`Bluetooth adapter not ready (state: ${noble.state})`));
      }, timeoutMs);
      noble.on('stateChange', onStateChange);
    });
  }
}
