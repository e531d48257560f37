import { afterEach, describe, it, expect, vi } from 'vitest';
import { discoverSigns, matchesScanTarget, toDiscoveredSign } from './discovery';
import { FakeTransport, scanResult, signAdvertisement } from './test-support/fake-transport';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('matchesScanTarget', () => {
  it('matches by exact name', () => {
    expect(matchesScanTarget(scanResult(), { deviceName: 'CoolLEDX' })).toBe(true);
    expect(matchesScanTarget(scanResult(), { deviceName: 'coolledx' })).toBe(false);
  });

  it('matches an address against either address, ignoring case', () => {
    const result = scanResult({ address: '11:22:33:44:55:66' });

    expect(matchesScanTarget(result, { deviceName: 'x', address: '11:22:33:44:55:66' })).toBe(true);
    expect(matchesScanTarget(result, { deviceName: 'x', address: 'aa:bb:cc:dd:ee:ff' })).toBe(true);
    expect(matchesScanTarget(result, { deviceName: 'CoolLEDX', address: '00:00:00:00:00:00' })).toBe(false);
  });

  it('skips peripherals without sign manufacturer data', () => {
    expect(matchesScanTarget(scanResult({ manufacturerData: null }), { deviceName: 'CoolLEDX' })).toBe(false);
    expect(matchesScanTarget(scanResult({ manufacturerData: new Uint8Array(4) }), { deviceName: 'CoolLEDX' })).toBe(
      false
    );
  });
});

describe('toDiscoveredSign', () => {
  it('describes a sign', () => {
    expect(toDiscoveredSign(scanResult({ manufacturerData: signAdvertisement(64, 32) }))).toEqual({
      id: 'sign-1',
      name: 'CoolLEDX',
      address: 'AA:BB:CC:DD:EE:FF',
      macAddress: 'AA:BB:CC:DD:EE:FF',
      panel: { width: 64, height: 32 },
      rssi: -60,
    });
  });

  it('ignores other peripherals', () => {
    expect(toDiscoveredSign(scanResult({ name: 'Headphones' }))).toBeNull();
    expect(toDiscoveredSign(scanResult({ name: undefined }))).toBeNull();
  });
});

describe('discoverSigns', () => {
  it('lists signs strongest first', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const transport = new FakeTransport([
      scanResult({ id: 'far', rssi: -90 }),
      scanResult({ id: 'other', name: 'Headphones', rssi: -30 }),
      scanResult({ id: 'near', name: 'CoolLEDM', rssi: -40 }),
      scanResult({ id: 'silent', rssi: undefined }),
    ]);

    const signs = await discoverSigns(transport, 100);

    expect(signs.map((s) => s.id)).toEqual(['near', 'far', 'silent']);
    expect(console.log).toHaveBeenCalledWith('Found 3 sign(s) among 4 peripheral(s)');
  });
});
