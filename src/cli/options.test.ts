import { InvalidArgumentError } from 'commander';
import { afterEach, describe, it, expect } from 'vitest';
import { CommandValidationError } from '../exceptions';
import { Mode, WidthTreatment } from '../models/enums';
import {
  buildCommands,
  configureLogging,
  deviceOptionsFrom,
  enumParser,
  parseAutoInt,
  parseFunky,
  parseLogLevel,
  parseMode,
  parseOnOff,
  parsePanel,
  parseSeconds,
  type ContentOptions,
} from './options';

function contentOptions(overrides: Partial<ContentOptions> = {}): ContentOptions {
  return {
    color: 'white',
    backgroundColor: 'black',
    startColorMarker: '<',
    endColorMarker: '>',
    font: 'arial',
    fontHeight: 13,
    animationSpeed: 512,
    ...overrides,
  };
}

describe('value parsers', () => {
  it.each([
    ['12', 12],
    ['0x10', 16],
    ['0b101', 5],
    ['-3', -3],
    [' 7 ', 7],
  ])('parses %j as an integer', (value, expected) => {
    expect(parseAutoInt(value)).toBe(expected);
  });

  it.each(['abc', '1.5', ''])('rejects %j as an integer', (value) => {
    expect(() => parseAutoInt(value)).toThrow(InvalidArgumentError);
  });

  it('parses seconds', () => {
    expect(parseSeconds('2.5')).toBe(2.5);
    expect(() => parseSeconds('0')).toThrow(InvalidArgumentError);
  });

  it('parses modes by name or number', () => {
    expect(parseMode('left')).toBe(Mode.LEFT);
    expect(parseMode('LASER')).toBe(Mode.LASER);
    expect(parseMode('3')).toBe(Mode.RIGHT);
    expect(() => parseMode('9')).toThrow(InvalidArgumentError);
  });

  it('parses on/off', () => {
    expect(parseOnOff('on')).toBe(true);
    expect(parseOnOff('0')).toBe(false);
    expect(() => parseOnOff('maybe')).toThrow('Expected on/off, got "maybe"');
  });

  it('parses panel sizes', () => {
    expect(parsePanel('64x32')).toEqual({ width: 64, height: 32 });
    expect(() => parsePanel('64x12')).toThrow(InvalidArgumentError);
    expect(() => parsePanel('wide')).toThrow(InvalidArgumentError);
  });

  it('parses enum values in any case', () => {
    const parse = enumParser(WidthTreatment, 'width treatment');

    expect(parse('CROP-PAD')).toBe(WidthTreatment.CROP_PAD);
    expect(() => parse('stretch')).toThrow(
      'Unknown width treatment "stretch" (expected scale/crop-pad/as-is)'
    );
  });

  it('parses funky commands and log levels', () => {
    expect(parseFunky('PowerDown')).toBe('powerdown');
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(() => parseLogLevel('trace')).toThrow(InvalidArgumentError);
  });
});

describe('buildCommands', () => {
  it('orders raw, funky, content, then settings', () => {
    const built = buildCommands(
      contentOptions({
        raw: '01',
        funky: 'invert',
        text: 'hi',
        jt: 'clip.jt',
        speed: 3,
        brightness: 4,
        mode: Mode.LEFT,
        onoff: true,
      })
    );

    expect(built.map((c) => c.kind)).toEqual([
      'SendRawData',
      'InvertDisplay',
      'SetText',
      'SetJT',
      'SetSpeed',
      'SetBrightness',
      'SetMode',
      'TurnOnOffApp',
    ]);
  });

  it('builds nothing without options', () => {
    expect(buildCommands(contentOptions())).toEqual([]);
  });

  it('passes text styling through', () => {
    const [command] = buildCommands(contentOptions({ text: 'x', startColorMarker: '[', endColorMarker: ']' }));

    expect(command).toEqual({
      kind: 'SetText',
      text: 'x',
      options: expect.objectContaining({ color: 'white', fontHeight: 13, colorMarkers: ['[', ']'] }),
    });
  });

  it('announces a battery level on startup', () => {
    expect(buildCommands(contentOptions({ funky: 'startup' }))).toEqual([
      { kind: 'StartupWithBatteryLevel', batteryLevel: 15 },
    ]);
  });

  it('validates values', () => {
    expect(() => buildCommands(contentOptions({ speed: 300 }))).toThrow(CommandValidationError);
  });
});

describe('deviceOptionsFrom', () => {
  it('converts seconds to milliseconds', () => {
    expect(
      deviceOptionsFrom({
        deviceName: 'CoolLEDM',
        connectionTimeout: 2.5,
        connectionRetries: 3,
        commandTimeout: 0.5,
      })
    ).toEqual({
      address: undefined,
      deviceName: 'CoolLEDM',
      connectionTimeoutMs: 2500,
      connectionRetries: 3,
      commandTimeoutMs: 500,
    });
  });
});

describe('configureLogging', () => {
  const original = {
    debug: console.debug,
    log: console.log,
    info: console.info,
    warn: console.warn,
  };

  afterEach(() => {
    Object.assign(console, original);
  });

  it('silences levels below the chosen one', () => {
    configureLogging('warn');

    expect(console.debug).not.toBe(original.debug);
    expect(console.log).not.toBe(original.log);
    expect(console.warn).toBe(original.warn);
  });

  it('leaves everything on at debug', () => {
    configureLogging('debug');
    expect(console.debug).toBe(original.debug);
  });
});
