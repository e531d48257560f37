/**
 * CoolLED sign session.
 */

import { DeviceError, ProtocolError } from './exceptions';
import { CommandStatus, ErrorCode } from './models/enums';
import type { HardwareProfile } from './models/hardware';
import type { PanelDimensions } from './models/panel';
import { expectsAcknowledgment, getCommandChunks, type Command } from './protocol/commands';
import { bytesToHex } from './protocol/hex';
import { isSuccess, parseNotification } from './protocol/responses';
import { AckSlot } from './transport/ack-slot';
import { DeviceLink, type DeviceLinkOptions } from './transport/connection';
import type { Transport } from './transport/types';

export interface CoolLedDeviceOptions extends DeviceLinkOptions {
  /** Time to wait for each chunk's acknowledgment */
  commandTimeoutMs?: number;
}

/**
 * CoolLED LED matrix sign.
 *
 * Sends one command at a time. Each command is encoded for the connected
 * sign's panel size and command set, written chunk by chunk, and (for
 * commands the sign answers) every chunk waits for its notification before
 * the next one goes out.
 *
 * @example
 * ```typescript
 * const device = new CoolLedDevice(new NobleTransport(), { deviceName: 'CoolLEDM' });
 * await device.connect();
 * await device.sendCommand(setText('Hello <red>world'));
 * await device.sendCommand(setBrightness(128));
 * await device.disconnect();
 * ```
 */
export class CoolLedDevice {
  static readonly TIMEOUT_COMMAND = 1000;

  private readonly link: DeviceLink;
  private readonly ackSlot = new AckSlot();
  private readonly commandTimeoutMs: number;

  private current: Command | null = null;
  private _status: CommandStatus = CommandStatus.NOT_STARTED;
  private _lastErrorCode: ErrorCode | number | null = null;

  constructor(transport: Transport, options: CoolLedDeviceOptions = {}) {
    this.link = new DeviceLink(transport, options);
    this.commandTimeoutMs = options.commandTimeoutMs ?? CoolLedDevice.TIMEOUT_COMMAND;

    this.link.onNotification((data) => this.handleNotification(data));
    this.link.onDisconnect(() => {
      this.ackSlot.cancel('Device disconnected while waiting for acknowledgment');
    });
  }

  /**
   * Status of the last (or current) command.
   */
  get status(): CommandStatus {
    return this._status;
  }

  /**
   * Error code from the last notification received, if any.
   */
  get lastErrorCode(): ErrorCode | number | null {
    return this._lastErrorCode;
  }

  get panel(): PanelDimensions {
    return this.link.panel;
  }

  get hardware(): HardwareProfile {
    return this.link.hardware;
  }

  get isConnected(): boolean {
    return this.link.isConnected;
  }

  /**
   * Connect to the sign (scan, connect, subscribe, with retries).
   *
   * @throws {BLEConnectionError} If every attempt fails
   */
  async connect(): Promise<void> {
    await this.link.connect();
  }

  async disconnect(): Promise<void> {
    this.ackSlot.cancel('Disconnecting');
    await this.link.disconnect();
  }

  /**
   * Send one command, connecting first if needed.
   *
   * @throws {ProtocolError} If another command is still in flight
   * @throws {DeviceError} If the sign reports an error for a chunk
   * @throws {AckTimeoutError} If a chunk is not acknowledged in time
   * @throws {BLEConnectionError} If connecting or writing fails
   */
  async sendCommand(command: Command): Promise<void> {
    if (this.current !== null) {
      throw new ProtocolError(
        `Cannot send ${command.kind}: command already in flight (${this.current.kind})`
      );
    }

    this.current = command;
    this._status = CommandStatus.NOT_STARTED;
    this._lastErrorCode = null;

    try {
      if (!this.link.isConnected) {
        await this.link.connect();
      }

      const chunks = await getCommandChunks(command, this.link.panel, this.link.hardware);
      const needsAck = expectsAcknowledgment(command);
      console.debug(`Sending ${command.kind} in ${chunks.length} chunk(s)`);

      for (let i = 0; i < chunks.length; i++) {
        await this.sendChunk(command, chunks[i], i, chunks.length, needsAck);
      }
    } catch (error) {
      this.ackSlot.cancel(`${command.kind} aborted`);
      this._status = CommandStatus.ERROR;
      throw error;
    } finally {
      this.current = null;
    }
  }

  /**
   * Send commands one after another, stopping at the first failure.
   */
  async sendCommands(commands: Command[]): Promise<void> {
    for (const command of commands) {
      await this.sendCommand(command);
    }
  }

  private async sendChunk(
    command: Command,
    chunk: Uint8Array,
    index: number,
    total: number,
    needsAck: boolean
  ): Promise<void> {
    console.debug(`Sending chunk ${index + 1}/${total}: ${bytesToHex(chunk)}`);
    this._status = CommandStatus.TRANSMITTED;

    if (!needsAck) {
      await this.link.write(chunk, false);
      return;
    }

    // Armed before writing: the sign may answer before write() resolves
    const ack = this.ackSlot.arm(this.commandTimeoutMs);
    const [, notification] = await Promise.all([this.link.write(chunk, true), ack]);

    const { errorCode } = parseNotification(notification);
    this._lastErrorCode = errorCode;

    if (!isSuccess(errorCode)) {
      throw new DeviceError(errorCode, `${command.kind} chunk ${index + 1}/${total}`);
    }
    this._status = CommandStatus.ACKNOWLEDGED;
  }

  private handleNotification(data: Uint8Array): void {
    console.debug(`Received notification: ${bytesToHex(data)}`);
    if (!this.ackSlot.offer(data) && this.current === null) {
      console.warn(`Dropping notification received without a pending command: ${bytesToHex(data)}`);
    }
  }
}
