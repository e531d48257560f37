/**
 * Connection to one sign through a Transport.
 *
 * Handles:
 * - Scanning for the configured name or address
 * - Panel dimensions from the advertisement
 * - Hardware profile selection from the device name
 * - Retrying the scan/connect/subscribe sequence
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { matchesScanTarget } from '../discovery';
import { BLEConnectionError } from '../exceptions';
import { parseAdvertisement } from '../models/advertisement';
import { DEFAULT_HARDWARE_PROFILE, resolveHardwareProfile, type HardwareProfile } from '../models/hardware';
import { DEFAULT_PANEL, formatPanel, isValidPanel, type PanelDimensions } from '../models/panel';
import { DEFAULT_DEVICE_NAME } from '../protocol/constants';
import type { NotificationListener, ScanResult, ScanTarget, Transport } from './types';

/**
 * Connection options for a sign.
 */
export interface DeviceLinkOptions {
  /** Connect to this address instead of matching by name */
  address?: string;

  /** Advertised name to look for (default: "CoolLEDX") */
  deviceName?: string;

  /** Timeout for the scan and for the connection itself */
  connectionTimeoutMs?: number;

  /** Total connection attempts before giving up */
  connectionRetries?: number;

  /** Pause between attempts */
  retryDelayMs?: number;
}

export class DeviceLink {
  static readonly DEFAULT_CONNECTION_TIMEOUT = 10000;
  static readonly DEFAULT_CONNECTION_RETRIES = 5; // Four attempts usually suffice
  static readonly DEFAULT_RETRY_DELAY = 1000;

  private readonly target: ScanTarget;
  private readonly connectionTimeoutMs: number;
  private readonly connectionRetries: number;
  private readonly retryDelayMs: number;

  private connected = false;
  private peer: ScanResult | null = null;
  private _panel: PanelDimensions = DEFAULT_PANEL;
  private _hardware: HardwareProfile = DEFAULT_HARDWARE_PROFILE;
  private notificationListener: NotificationListener | null = null;
  private disconnectListener: (() => void) | null = null;

  constructor(
    private readonly transport: Transport,
    options: DeviceLinkOptions = {}
  ) {
    this.target = {
      address: options.address,
      deviceName: options.deviceName ?? DEFAULT_DEVICE_NAME,
    };
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? DeviceLink.DEFAULT_CONNECTION_TIMEOUT;
    this.connectionRetries = Math.max(1, options.connectionRetries ?? DeviceLink.DEFAULT_CONNECTION_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DeviceLink.DEFAULT_RETRY_DELAY;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Panel dimensions announced by the connected sign (96x16 until connected).
   */
  get panel(): PanelDimensions {
    return this._panel;
  }

  get hardware(): HardwareProfile {
    return this._hardware;
  }

  /**
   * Name and address of the last sign connected to.
   */
  get peripheral(): ScanResult | null {
    return this.peer;
  }

  /**
   * Register the receiver of notifications (one at a time).
   */
  onNotification(listener: NotificationListener | null): void {
    this.notificationListener = listener;
  }

  /**
   * Register a callback for disconnects initiated by the sign or the stack.
   */
  onDisconnect(listener: (() => void) | null): void {
    this.disconnectListener = listener;
  }

  /**
   * Scan, connect and subscribe, retrying failed attempts.
   *
   * @throws {BLEConnectionError} When every attempt failed
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    for (let attempt = 1; ; attempt++) {
      try {
        await this.attemptConnect();
        return;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (attempt >= this.connectionRetries) {
          throw new BLEConnectionError(
            `Failed to connect to ${this.describeTarget()} after ${attempt} attempt(s): ${message}`
          );
        }
        console.warn(
          `Connection attempt ${attempt}/${this.connectionRetries} failed (${message}), ` +
            `retrying in ${this.retryDelayMs}ms`
        );
        await sleep(this.retryDelayMs);
      }
    }
  }

  /**
   * Write bytes to the sign characteristic.
   *
   * @throws {BLEConnectionError} If not connected or the write fails
   */
  async write(data: Uint8Array, expectResponse: boolean): Promise<void> {
    if (!this.connected) {
      throw new BLEConnectionError('Not connected to device');
    }

    try {
      await this.transport.write(data, expectResponse);
    } catch (error) {
      if (error instanceof Error) {
        throw new BLEConnectionError(`Failed to write command: ${error.message}`);
      }
      throw new BLEConnectionError('Failed to write command');
    }
  }

  /**
   * Unsubscribe and release the connection.
   */
  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;

    try {
      await this.transport.unsubscribe();
    } catch (error) {
      console.debug(`Ignoring unsubscribe failure during disconnect: ${String(error)}`);
    } finally {
      await this.transport.disconnect();
    }
    console.log(`Disconnected from ${this.describeTarget()}`);
  }

  private async attemptConnect(): Promise<void> {
    console.debug(`Scanning for ${this.describeTarget()}`);
    const found = await this.transport.scan(this.target, this.connectionTimeoutMs);
    if (found === null) {
      throw new BLEConnectionError(`${this.describeTarget()} not found`);
    }

    const panel = this.panelFrom(found);
    const hardware = resolveHardwareProfile(found.name ?? this.target.deviceName);

    await this.transport.connect(found.id, this.connectionTimeoutMs, () => this.handleDisconnect());
    try {
      await this.transport.subscribe((data) => this.handleNotification(data));
    } catch (error) {
      await this.transport.disconnect();
      throw error;
    }

    this.peer = found;
    this._panel = panel;
    this._hardware = hardware;
    this.connected = true;

    console.log(
      `Connected to ${found.name ?? 'sign'} (${found.address || 'unknown address'}), ` +
        `panel ${formatPanel(panel)}, ${hardware.generation} command set`
    );
  }

  private panelFrom(found: ScanResult): PanelDimensions {
    const advertisement = found.manufacturerData === null ? null : parseAdvertisement(found.manufacturerData);
    if (advertisement === null || !isValidPanel(advertisement.panel)) {
      console.warn(`Unusable panel size in advertisement, assuming ${formatPanel(DEFAULT_PANEL)}`);
      return DEFAULT_PANEL;
    }
    return advertisement.panel;
  }

  private handleNotification(data: Uint8Array): void {
    if (this.notificationListener) {
      this.notificationListener(data);
    }
  }

  private handleDisconnect(): void {
    if (!this.connected) {
      return;
    }
    console.log('Device disconnected');
    this.connected = false;
    if (this.disconnectListener) {
      this.disconnectListener();
    }
  }

  private describeTarget(): string {
    return this.target.address !== undefined
      ? `device at ${this.target.address}`
      : `device named "${this.target.deviceName}"`;
  }
}
