import { BLETimeoutError } from '../exceptions';

/**
 * Race a BLE operation against a timer.
 *
 * On timeout the returned promise rejects with {@link BLETimeoutError} and
 * `onTimeout` runs to abandon the operation. A failing cleanup is logged;
 * the timeout is still what the caller sees.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message: string,
  onTimeout?: () => Promise<void>
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new BLETimeoutError(message));
      onTimeout?.().catch((error: unknown) => {
        console.debug(`Cleanup after timeout failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timeoutId);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      }
    );
  });
}
