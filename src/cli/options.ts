/**
 * CLI option parsing and command building, kept apart from commander's
 * program wiring so it can be tested without Bluetooth.
 */

import { InvalidArgumentError, type Command as CliCommand } from 'commander';
import type { CoolLedDeviceOptions } from '../device';
import {
  HeightTreatment,
  HorizontalAlignment,
  Mode,
  VerticalAlignment,
  WidthTreatment,
  parseEnumValue,
} from '../models/enums';
import type { PanelDimensions } from '../models/panel';
import { isValidPanel } from '../models/panel';
import * as commands from '../protocol/commands';
import type { Command } from '../protocol/commands';
import {
  DEFAULT_ANIMATION_SPEED,
  DEFAULT_BACKGROUND_COLOR,
  DEFAULT_COLOR,
  DEFAULT_DEVICE_NAME,
  DEFAULT_END_COLOR_MARKER,
  DEFAULT_FONT,
  DEFAULT_FONT_SIZE,
  DEFAULT_START_COLOR_MARKER,
} from '../protocol/constants';

export const FUNKY_COMMANDS = [
  'initialize',
  'invert',
  'revert',
  'charging',
  'startup',
  'powerdown',
  'invertorsomething',
] as const;

export type FunkyCommand = (typeof FUNKY_COMMANDS)[number];

// Battery level announced by the "startup" funky command
const STARTUP_BATTERY_LEVEL = 15;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Content and setting options shared by `send` and `hex`.
 */
export interface ContentOptions {
  text?: string;
  color: string;
  backgroundColor: string;
  startColorMarker: string;
  endColorMarker: string;
  font: string;
  fontHeight: number;
  image?: string;
  animation?: string;
  animationSpeed: number;
  jt?: string;
  widthTreatment?: WidthTreatment;
  heightTreatment?: HeightTreatment;
  horizontalAlignment?: HorizontalAlignment;
  verticalAlignment?: VerticalAlignment;
  speed?: number;
  brightness?: number;
  mode?: Mode;
  onoff?: boolean;
  funky?: FunkyCommand;
  raw?: string;
}

export interface ConnectionOptions {
  address?: string;
  deviceName: string;
  /** Seconds */
  connectionTimeout: number;
  connectionRetries: number;
  /** Seconds */
  commandTimeout: number;
}

// Value parsers (commander calls these with the raw string)

/**
 * Integer in decimal, 0x hex, 0o octal or 0b binary.
 */
export function parseAutoInt(value: string): number {
  const trimmed = value.trim();
  const parsed = /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Not a positive number of seconds: ${value}`);
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseAutoInt(value);
  if (parsed < 1) {
    throw new InvalidArgumentError(`Must be at least 1: ${value}`);
  }
  return parsed;
}

/**
 * Build a parser for a string enum, accepting any letter case.
 */
export function enumParser<T extends string>(enumObject: Record<string, T>, label: string): (value: string) => T {
  return (value: string) => {
    const parsed = parseEnumValue(enumObject, value);
    if (parsed === undefined) {
      throw new InvalidArgumentError(
        `Unknown ${label} "${value}" (expected ${Object.values(enumObject).join('/')})`
      );
    }
    return parsed;
  };
}

/**
 * Mode as a number (1-8) or a name such as "left".
 */
export function parseMode(value: string): Mode {
  const byName = Object.values(Mode).find(
    (member): member is Mode => typeof member === 'number' && Mode[member].toLowerCase() === value.toLowerCase()
  );
  if (byName !== undefined) {
    return byName;
  }

  const number = parseAutoInt(value);
  const byNumber = Object.values(Mode).find((member): member is Mode => member === number);
  if (byNumber === undefined) {
    throw new InvalidArgumentError(`Unknown mode "${value}" (expected 1-8 or a mode name)`);
  }
  return byNumber;
}

/**
 * 1/on/true or 0/off/false.
 */
export function parseOnOff(value: string): boolean {
  const lowered = value.trim().toLowerCase();
  if (['1', 'on', 'true'].includes(lowered)) return true;
  if (['0', 'off', 'false'].includes(lowered)) return false;
  throw new InvalidArgumentError(`Expected on/off, got "${value}"`);
}

export function parseFunky(value: string): FunkyCommand {
  const lowered = value.toLowerCase();
  const funky = FUNKY_COMMANDS.find((name) => name === lowered);
  if (funky === undefined) {
    throw new InvalidArgumentError(`Unknown funky command "${value}" (expected ${FUNKY_COMMANDS.join('/')})`);
  }
  return funky;
}

/**
 * Panel size written as WIDTHxHEIGHT, e.g. "96x16".
 */
export function parsePanel(value: string): PanelDimensions {
  const match = /^(\d+)x(\d+)$/i.exec(value.trim());
  const panel = match ? { width: Number(match[1]), height: Number(match[2]) } : null;
  if (panel === null || !isValidPanel(panel)) {
    throw new InvalidArgumentError(`Invalid panel "${value}" (expected WIDTHxHEIGHT, height a multiple of 8)`);
  }
  return panel;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((name) => name === value.toLowerCase());
  if (level === undefined) {
    throw new InvalidArgumentError(`Unknown log level "${value}" (expected ${LOG_LEVELS.join('/')})`);
  }
  return level;
}

// Program wiring helpers

export function addContentOptions(command: CliCommand): CliCommand {
  return command
    .option('-t, --text <text>', 'text to display; colours go between the markers, e.g. "a<red>b"')
    .option('-c, --color <color>', 'text colour as #rrggbb or a colour name', DEFAULT_COLOR)
    .option('-C, --background-color <color>', 'background colour', DEFAULT_BACKGROUND_COLOR)
    .option('-j, --start-color-marker <marker>', 'opening colour marker', DEFAULT_START_COLOR_MARKER)
    .option('-k, --end-color-marker <marker>', 'closing colour marker', DEFAULT_END_COLOR_MARKER)
    .option('-f, --font <font>', 'font family or .ttf/.otf file', DEFAULT_FONT)
    .option('-H, --font-height <pixels>', 'font height', parsePositiveInt, DEFAULT_FONT_SIZE)
    .option('-i, --image <file>', 'image file to display')
    .option('-n, --animation <file>', 'animated GIF/WebP to display')
    .option('-N, --animation-speed <n>', 'animation speed (0-65535)', parseAutoInt, DEFAULT_ANIMATION_SPEED)
    .option('--jt <file>', 'JT file to display')
    .option('-w, --width-treatment <treatment>', 'scale/crop-pad/as-is', enumParser(WidthTreatment, 'width treatment'))
    .option('-g, --height-treatment <treatment>', 'scale/crop-pad', enumParser(HeightTreatment, 'height treatment'))
    .option(
      '-z, --horizontal-alignment <alignment>',
      'left/center/right/none',
      enumParser(HorizontalAlignment, 'horizontal alignment')
    )
    .option(
      '-y, --vertical-alignment <alignment>',
      'top/center/bottom',
      enumParser(VerticalAlignment, 'vertical alignment')
    )
    .option('-s, --speed <n>', 'scroll speed (0-255)', parseAutoInt)
    .option('-b, --brightness <n>', 'brightness (0-255)', parseAutoInt)
    .option('-m, --mode <mode>', 'movement mode (1-8 or name)', parseMode)
    .option('-o, --onoff <state>', 'turn the display on or off', parseOnOff)
    .option('-u, --funky <command>', FUNKY_COMMANDS.join('/'), parseFunky)
    .option('-r, --raw <hex>', 'raw bytes to write unframed, e.g. "01 02 03"');
}

export function addConnectionOptions(command: CliCommand): CliCommand {
  return command
    .option('-a, --address <address>', 'address of the sign')
    .option('-d, --device-name <name>', 'advertised name of the sign', DEFAULT_DEVICE_NAME)
    .option('--connection-timeout <seconds>', 'scan and connect timeout', parseSeconds, 10)
    .option('--connection-retries <n>', 'connection attempts', parsePositiveInt, 5)
    .option('--command-timeout <seconds>', 'acknowledgment timeout per chunk', parseSeconds, 1);
}

// Building

function funkyCommand(funky: FunkyCommand): Command {
  switch (funky) {
    case 'initialize':
      return commands.initialize();
    case 'invert':
      return commands.invertDisplay(true);
    case 'revert':
      return commands.invertDisplay(false);
    case 'charging':
      return commands.showChargingAnimation();
    case 'startup':
      return commands.startupWithBatteryLevel(STARTUP_BATTERY_LEVEL);
    case 'powerdown':
      return commands.powerDown();
    case 'invertorsomething':
      return commands.invertOrSomething();
  }
}

/**
 * Commands for the given options, in sending order:
 * raw, funky, content (text, image, animation, JT), then settings.
 *
 * @throws {CommandValidationError} For out-of-range values
 */
export function buildCommands(options: ContentOptions): Command[] {
  const result: Command[] = [];
  const fit = {
    backgroundColor: options.backgroundColor,
    widthTreatment: options.widthTreatment,
    heightTreatment: options.heightTreatment,
    horizontalAlignment: options.horizontalAlignment,
    verticalAlignment: options.verticalAlignment,
  };

  if (options.raw !== undefined) {
    result.push(commands.sendRawData(options.raw));
  }
  if (options.funky !== undefined) {
    result.push(funkyCommand(options.funky));
  }

  if (options.text !== undefined) {
    result.push(
      commands.setText(options.text, {
        ...fit,
        color: options.color,
        font: options.font,
        fontHeight: options.fontHeight,
        colorMarkers: [options.startColorMarker, options.endColorMarker],
      })
    );
  }
  if (options.image !== undefined) {
    result.push(commands.setImage(options.image, fit));
  }
  if (options.animation !== undefined) {
    result.push(commands.setAnimation(options.animation, { ...fit, speed: options.animationSpeed }));
  }
  if (options.jt !== undefined) {
    result.push(commands.setJT(options.jt));
  }

  if (options.speed !== undefined) {
    result.push(commands.setSpeed(options.speed));
  }
  if (options.brightness !== undefined) {
    result.push(commands.setBrightness(options.brightness));
  }
  if (options.mode !== undefined) {
    result.push(commands.setMode(options.mode));
  }
  if (options.onoff !== undefined) {
    result.push(commands.turnOnOffApp(options.onoff));
  }

  return result;
}

export function deviceOptionsFrom(options: ConnectionOptions): CoolLedDeviceOptions {
  return {
    address: options.address,
    deviceName: options.deviceName,
    connectionTimeoutMs: Math.round(options.connectionTimeout * 1000),
    connectionRetries: options.connectionRetries,
    commandTimeoutMs: Math.round(options.commandTimeout * 1000),
  };
}

const noop = (): void => undefined;

/**
 * Silence console output below the given level.
 */
export function configureLogging(level: LogLevel): void {
  const rank = LOG_LEVELS.indexOf(level);
  if (rank > 0) {
    console.debug = noop;
  }
  if (rank > 1) {
    console.log = noop;
    console.info = noop;
  }
  if (rank > 2) {
    console.warn = noop;
  }
}
