import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';
import { BLEConnectionError } from '../exceptions';
import { DeviceGeneration } from '../models/hardware';
import { FakeTransport, scanResult, signAdvertisement } from '../test-support/fake-transport';
import { DeviceLink } from './connection';

describe('DeviceLink', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads panel size and command set from the advertisement', async () => {
    const transport = new FakeTransport([
      scanResult({ name: 'CoolLEDM', manufacturerData: signAdvertisement(64, 32) }),
    ]);
    const link = new DeviceLink(transport, { deviceName: 'CoolLEDM' });

    await link.connect();

    expect(link.isConnected).toBe(true);
    expect(transport.subscribed).toBe(true);
    expect(link.panel).toEqual({ width: 64, height: 32 });
    expect(link.hardware.generation).toBe(DeviceGeneration.COOLLEDM);
    expect(link.peripheral?.id).toBe('sign-1');
  });

  it('matches an address against the MAC in the advertisement', async () => {
    const transport = new FakeTransport([scanResult({ address: '' })]);
    const link = new DeviceLink(transport, { address: 'aa:bb:cc:dd:ee:ff' });

    await link.connect();
    expect(link.isConnected).toBe(true);
  });

  it('falls back to the default panel for an unusable advertisement', async () => {
    const transport = new FakeTransport([scanResult({ manufacturerData: signAdvertisement(96, 12) })]);
    const link = new DeviceLink(transport);

    await link.connect();

    expect(link.panel).toEqual({ width: 96, height: 16 });
    expect(warn).toHaveBeenCalledWith('Unusable panel size in advertisement, assuming 96x16');
  });

  it('retries failed attempts', async () => {
    const transport = new FakeTransport();
    transport.failConnects = 2;
    const link = new DeviceLink(transport, { connectionRetries: 3, retryDelayMs: 0 });

    await link.connect();

    expect(transport.connectCalls).toBe(3);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts', async () => {
    const transport = new FakeTransport();
    transport.failConnects = 5;
    const link = new DeviceLink(transport, { connectionRetries: 2, retryDelayMs: 0 });

    await expect(link.connect()).rejects.toThrow(
      new BLEConnectionError(
        'Failed to connect to device named "CoolLEDX" after 2 attempt(s): simulated connect failure'
      )
    );
    expect(link.isConnected).toBe(false);
  });

  it('reports a sign that is not advertising', async () => {
    const link = new DeviceLink(new FakeTransport([]), { connectionRetries: 1 });

    await expect(link.connect()).rejects.toThrow(
      'Failed to connect to device named "CoolLEDX" after 1 attempt(s): device named "CoolLEDX" not found'
    );
  });

  it('ignores peripherals without usable manufacturer data', async () => {
    const transport = new FakeTransport([scanResult({ manufacturerData: Uint8Array.of(1, 2, 3) })]);
    const link = new DeviceLink(transport, { connectionRetries: 1 });

    await expect(link.connect()).rejects.toBeInstanceOf(BLEConnectionError);
  });

  it('refuses writes before connecting', async () => {
    const link = new DeviceLink(new FakeTransport());
    await expect(link.write(Uint8Array.of(0x01), false)).rejects.toThrow('Not connected to device');
  });

  it('wraps transport write failures', async () => {
    const transport = new FakeTransport();
    const link = new DeviceLink(transport);
    await link.connect();
    transport.failWrites = true;

    await expect(link.write(Uint8Array.of(0x01), true)).rejects.toThrow(
      new BLEConnectionError('Failed to write command: simulated write failure')
    );
  });

  it('forwards notifications to the listener', async () => {
    const transport = new FakeTransport();
    const link = new DeviceLink(transport);
    const received: Uint8Array[] = [];
    link.onNotification((data) => received.push(data));
    await link.connect();

    transport.notify(Uint8Array.of(0x05));
    expect(received).toEqual([Uint8Array.of(0x05)]);
  });

  it('notices when the sign drops the connection', async () => {
    const transport = new FakeTransport();
    const link = new DeviceLink(transport);
    const onDisconnect = vi.fn();
    link.onDisconnect(onDisconnect);
    await link.connect();

    transport.dropConnection();

    expect(link.isConnected).toBe(false);
    expect(onDisconnect).toHaveBeenCalledOnce();
  });

  it('unsubscribes and disconnects', async () => {
    const transport = new FakeTransport();
    const link = new DeviceLink(transport);
    await link.connect();

    await link.disconnect();

    expect(transport.subscribed).toBe(false);
    expect(transport.connected).toBe(false);
    expect(link.isConnected).toBe(false);
  });
});
