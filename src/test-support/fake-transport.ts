/**
 * In-process Transport for tests.
 */

import { matchesScanTarget } from '../discovery';
import type { NotificationListener, ScanResult, ScanTarget, Transport } from '../transport/types';

export interface WrittenChunk {
  data: Uint8Array;
  expectResponse: boolean;
}

/** Reply to a write with a notification, or null for silence */
export type Responder = (data: Uint8Array, expectResponse: boolean) => Uint8Array | null;

/**
 * Manufacturer data as a sign advertises it (company identifier stripped).
 */
export function signAdvertisement(
  width: number,
  height: number,
  mac: number[] = [0xaa, 0xbb, 0xcc, 0xdd, 0xee, 0xff]
): Uint8Array {
  return Uint8Array.from([...mac, height, 0x00, width, 0x01, 0x00]);
}

export function scanResult(overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    id: 'sign-1',
    name: 'CoolLEDX',
    address: 'AA:BB:CC:DD:EE:FF',
    manufacturerData: signAdvertisement(96, 16),
    rssi: -60,
    ...overrides,
  };
}

export class FakeTransport implements Transport {
  readonly writes: WrittenChunk[] = [];
  scanCalls = 0;
  connectCalls = 0;
  connected = false;
  subscribed = false;

  /** Number of upcoming connect() calls that fail */
  failConnects = 0;
  failWrites = false;
  responder: Responder | null = null;

  private listener: NotificationListener | null = null;
  private disconnectCallback: (() => void) | null = null;

  constructor(public results: ScanResult[] = [scanResult()]) {}

  async scan(target: ScanTarget, _timeoutMs: number): Promise<ScanResult | null> {
    this.scanCalls++;
    return this.results.find((result) => matchesScanTarget(result, target)) ?? null;
  }

  async scanAll(_timeoutMs: number): Promise<ScanResult[]> {
    this.scanCalls++;
    return this.results;
  }

  async connect(_id: string, _timeoutMs: number, onDisconnect: () => void): Promise<void> {
    this.connectCalls++;
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new Error('simulated connect failure');
    }
    this.connected = true;
    this.disconnectCallback = onDisconnect;
  }

  async write(data: Uint8Array, expectResponse: boolean): Promise<void> {
    if (!this.connected) {
      throw new Error('not connected');
    }
    if (this.failWrites) {
      throw new Error('simulated write failure');
    }
    this.writes.push({ data: Uint8Array.from(data), expectResponse });

    // Replies arrive before the write resolves, as fast signs do
    const reply = this.responder ? this.responder(data, expectResponse) : null;
    if (reply !== null) {
      this.notify(reply);
    }
  }

  async subscribe(listener: NotificationListener): Promise<void> {
    this.listener = listener;
    this.subscribed = true;
  }

  async unsubscribe(): Promise<void> {
    this.listener = null;
    this.subscribed = false;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.disconnectCallback = null;
  }

  /** Deliver a notification as the sign would */
  notify(data: Uint8Array): void {
    if (this.listener) {
      this.listener(data);
    }
  }

  /** Simulate the sign dropping the connection */
  dropConnection(): void {
    this.connected = false;
    const callback = this.disconnectCallback;
    this.disconnectCallback = null;
    if (callback) {
      callback();
    }
  }
}
