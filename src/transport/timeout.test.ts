import { afterEach, describe, it, expect, vi } from 'vitest';
import { BLETimeoutError } from '../exceptions';
import { withTimeout } from './timeout';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('withTimeout', () => {
  it('passes the result through', async () => {
    const onTimeout = vi.fn(async () => undefined);

    await expect(withTimeout(Promise.resolve(7), 1000, 'slow', onTimeout)).resolves.toBe(7);
    expect(onTimeout).not.toHaveBeenCalled();
  });

  it('passes failures through', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 1000, 'slow')).rejects.toThrow('refused');
  });

  it('rejects and cleans up when the timer fires first', async () => {
    const onTimeout = vi.fn(async () => undefined);
    const never = new Promise<void>(() => undefined);

    await expect(withTimeout(never, 10, 'Connection timed out after 10ms', onTimeout)).rejects.toThrow(
      new BLETimeoutError('Connection timed out after 10ms')
    );
    expect(onTimeout).toHaveBeenCalledOnce();
  });

  it('logs a failed cleanup and still reports the timeout', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const never = new Promise<void>(() => undefined);

    await expect(
      withTimeout(never, 10, 'slow', async () => {
        throw new Error('already gone');
      })
    ).rejects.toBeInstanceOf(BLETimeoutError);
    await vi.waitFor(() => expect(debug).toHaveBeenCalledWith('Cleanup after timeout failed: already gone'));
  });
});
