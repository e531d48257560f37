/**
 * Boundary between the sign session and the BLE stack.
 */

/**
 * What to look for while scanning.
 */
export interface ScanTarget {
  /** Match this address (case-insensitive); takes precedence over the name */
  address?: string;
  /** Match this advertised local name exactly */
  deviceName: string;
}

/**
 * A peripheral seen during a scan.
 */
export interface ScanResult {
  /** Transport-specific identifier passed back to connect() */
  id: string;
  name?: string;
  /** Address reported by the BLE stack (may be empty on some platforms) */
  address: string;
  /** Vendor manufacturer data without the 2-byte company identifier */
  manufacturerData: Uint8Array | null;
  rssi?: number;
}

export type NotificationListener = (data: Uint8Array) => void;

/**
 * Minimal BLE operations the driver needs. One transport instance holds at
 * most one connection.
 */
export interface Transport {
  /**
   * Scan until a peripheral matching the target shows up.
   *
   * @returns The first match, or null when the timeout passes without one
   */
  scan(target: ScanTarget, timeoutMs: number): Promise<ScanResult | null>;

  /**
   * Scan for the whole timeout and report every peripheral offering the
   * sign service.
   */
  scanAll(timeoutMs: number): Promise<ScanResult[]>;

  /**
   * Connect and locate the sign characteristic.
   *
   * @param onDisconnect - Called when the peripheral drops the connection
   */
  connect(id: string, timeoutMs: number, onDisconnect: () => void): Promise<void>;

  write(data: Uint8Array, expectResponse: boolean): Promise<void>;

  subscribe(listener: NotificationListener): Promise<void>;

  unsubscribe(): Promise<void>;

  disconnect(): Promise<void>;
}
