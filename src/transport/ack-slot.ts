/**
 * Single-waiter acknowledgment slot.
 *
 * The sign answers chunks one at a time, so at most one chunk is ever
 * waiting for its notification. Arm the slot before writing the chunk so an
 * early notification is not lost.
 */

import { AckTimeoutError, BLEConnectionError, ProtocolError } from '../exceptions';

interface PendingAck {
  resolve: (data: Uint8Array) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

export class AckSlot {
  private pending: PendingAck | null = null;

  /**
   * Whether a wait is outstanding.
   */
  get isArmed(): boolean {
    return this.pending !== null;
  }

  /**
   * Start waiting for the next notification.
   *
   * @param timeoutMs - Maximum time to wait in milliseconds
   * @returns Promise that resolves with the notification bytes
   * @throws {ProtocolError} If a wait is already outstanding
   * @throws {AckTimeoutError} (via the promise) If nothing arrives in time
   */
  arm(timeoutMs: number): Promise<Uint8Array> {
    if (this.pending !== null) {
      throw new ProtocolError('Acknowledgment slot is already armed');
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        if (this.pending?.timeoutId === timeoutId) {
          this.pending = null;
          reject(new AckTimeoutError(`No acknowledgment received within ${timeoutMs}ms timeout`));
        }
      }, timeoutMs);

      this.pending = { resolve, reject, timeoutId };
    });
  }

  /**
   * Hand a notification to the outstanding wait.
   *
   * @returns false when nothing was waiting
   */
  offer(data: Uint8Array): boolean {
    const pending = this.pending;
    if (pending === null) {
      return false;
    }

    this.pending = null;
    clearTimeout(pending.timeoutId);
    pending.resolve(data);
    return true;
  }

  /**
   * Abandon the outstanding wait, if any.
   *
   * @param reason - Message of the BLEConnectionError the waiter receives
   * @returns Whether a wait was cancelled
   */
  cancel(reason: string = 'Connection closed'): boolean {
    const pending = this.pending;
    if (pending === null) {
      return false;
    }

    this.pending = null;
    clearTimeout(pending.timeoutId);
    pending.reject(new BLEConnectionError(reason));
    return true;
  }
}
