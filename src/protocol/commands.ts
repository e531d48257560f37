/**
 * Commands understood by CoolLED signs.
 *
 * Commands are immutable values built through the validating constructors
 * below. Panel size and hardware profile are supplied when a command is
 * encoded, since both come from the connected sign.
 */

import { CommandValidationError, CoolLedError } from '../exceptions';
import { createAnimationPayload, type AnimationOptions } from '../encoding/animation';
import { createImagePayload, createTextPayload, type FitOptions, type TextPayloadOptions } from '../encoding/images';
import { createJtPayload } from '../encoding/jt';
import { parseColor } from '../encoding/colors';
import { parseColorRuns, DEFAULT_COLOR_MARKERS } from '../encoding/text';
import { Mode, WidthTreatment } from '../models/enums';
import type { HardwareProfile } from '../models/hardware';
import type { PanelDimensions } from '../models/panel';
import { DEFAULT_COLOR, MUSIC_BAR_COUNT } from './constants';
import { chunkPayload, encodeFrame } from './frame';
import { bytesToHex, hexToBytes } from './hex';

const MAX_TRUNCATED_LENGTH = 32;

export interface SetTextCommand {
  readonly kind: 'SetText';
  readonly text: string;
  readonly options: Readonly<TextPayloadOptions>;
}

export interface SetImageCommand {
  readonly kind: 'SetImage';
  /** File path or encoded image bytes */
  readonly source: string | Buffer;
  readonly options: Readonly<FitOptions>;
}

export interface SetAnimationCommand {
  readonly kind: 'SetAnimation';
  readonly source: string | Buffer;
  readonly options: Readonly<AnimationOptions>;
}

export interface SetJTCommand {
  readonly kind: 'SetJT';
  readonly filename: string;
}

export interface SetSpeedCommand {
  readonly kind: 'SetSpeed';
  readonly speed: number;
}

export interface SetBrightnessCommand {
  readonly kind: 'SetBrightness';
  readonly brightness: number;
}

export interface SetModeCommand {
  readonly kind: 'SetMode';
  readonly mode: Mode;
}

export interface SetMusicBarsCommand {
  readonly kind: 'SetMusicBars';
  readonly heights: readonly number[];
  readonly colors: readonly number[];
}

export interface TurnOnOffAppCommand {
  readonly kind: 'TurnOnOffApp';
  readonly on: boolean;
}

export interface TurnOnOffButtonCommand {
  readonly kind: 'TurnOnOffButton';
  readonly on: boolean;
}

export interface InitializeCommand {
  readonly kind: 'Initialize';
}

export interface ShowChargingAnimationCommand {
  readonly kind: 'ShowChargingAnimation';
}

export interface InvertDisplayCommand {
  readonly kind: 'InvertDisplay';
  readonly inverted: boolean;
}

export interface InvertOrSomethingCommand {
  readonly kind: 'InvertOrSomething';
}

export interface StartupWithBatteryLevelCommand {
  readonly kind: 'StartupWithBatteryLevel';
  readonly batteryLevel: number;
}

export interface PowerDownCommand {
  readonly kind: 'PowerDown';
}

export interface SendRawDataCommand {
  readonly kind: 'SendRawData';
  readonly data: Uint8Array;
}

export type Command =
  | SetTextCommand
  | SetImageCommand
  | SetAnimationCommand
  | SetJTCommand
  | SetSpeedCommand
  | SetBrightnessCommand
  | SetModeCommand
  | SetMusicBarsCommand
  | TurnOnOffAppCommand
  | TurnOnOffButtonCommand
  | InitializeCommand
  | ShowChargingAnimationCommand
  | InvertDisplayCommand
  | InvertOrSomethingCommand
  | StartupWithBatteryLevelCommand
  | PowerDownCommand
  | SendRawDataCommand;

export type CommandKind = Command['kind'];

function requireByte(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0x00 || value > 0xff) {
    throw new CommandValidationError(`${name} must be between 0x00 and 0xFF, not ${value}`);
  }
  return value;
}

function requireColor(name: string, value: string | undefined): void {
  if (value === undefined) return;
  try {
    parseColor(value);
  } catch (error) {
    if (error instanceof CoolLedError) {
      throw new CommandValidationError(`${name}: ${error.message}`);
    }
    throw error;
  }
}

function validateFitOptions(options: FitOptions): void {
  requireColor('Background color', options.backgroundColor);
}

// Construction

// Commands own a copy of the caller's bytes
function copySource(source: string | Buffer): string | Buffer {
  return typeof source === 'string' ? source : Buffer.from(source);
}

/**
 * Render text (with optional inline colour markers) on the sign.
 *
 * @throws {CommandValidationError} For bad markers, font height or colours
 */
export function setText(text: string, options: TextPayloadOptions = {}): SetTextCommand {
  const markers = options.colorMarkers === undefined ? DEFAULT_COLOR_MARKERS : options.colorMarkers;
  if (markers !== null && (markers.length !== 2 || markers.some((m) => m.length === 0))) {
    throw new CommandValidationError('Color markers must be two non-empty strings');
  }
  if (options.fontHeight !== undefined && !(Number.isInteger(options.fontHeight) && options.fontHeight > 0)) {
    throw new CommandValidationError(`Font height must be a positive integer, not ${options.fontHeight}`);
  }
  validateFitOptions(options);
  requireColor('Color', options.color);

  try {
    parseColorRuns(text, markers, options.color ?? DEFAULT_COLOR);
  } catch (error) {
    if (error instanceof CoolLedError) {
      throw new CommandValidationError(`Text color marker: ${error.message}`);
    }
    throw error;
  }

  return Object.freeze({ kind: 'SetText', text, options: Object.freeze({ ...options }) });
}

export function setImage(source: string | Buffer, options: FitOptions = {}): SetImageCommand {
  validateFitOptions(options);
  return Object.freeze({ kind: 'SetImage', source: copySource(source), options: Object.freeze({ ...options }) });
}

/**
 * @throws {CommandValidationError} For AS_IS width or a speed outside 0..65535
 */
export function setAnimation(source: string | Buffer, options: AnimationOptions = {}): SetAnimationCommand {
  if (options.widthTreatment === WidthTreatment.AS_IS) {
    throw new CommandValidationError('Animations must fit the panel width; AS_IS is not supported');
  }
  if (options.speed !== undefined && !(Number.isInteger(options.speed) && options.speed >= 0 && options.speed <= 0xffff)) {
    throw new CommandValidationError(`Animation speed must be between 0 and 65535, not ${options.speed}`);
  }
  validateFitOptions(options);
  return Object.freeze({ kind: 'SetAnimation', source: copySource(source), options: Object.freeze({ ...options }) });
}

export function setJT(filename: string): SetJTCommand {
  return Object.freeze({ kind: 'SetJT', filename });
}

export function setSpeed(speed: number): SetSpeedCommand {
  return Object.freeze({ kind: 'SetSpeed', speed: requireByte('Speed', speed) });
}

export function setBrightness(brightness: number): SetBrightnessCommand {
  return Object.freeze({ kind: 'SetBrightness', brightness: requireByte('Brightness', brightness) });
}

export function setMode(mode: Mode): SetModeCommand {
  if (!Object.values(Mode).includes(mode)) {
    throw new CommandValidationError(`Unknown mode ${mode}`);
  }
  return Object.freeze({ kind: 'SetMode', mode });
}

/**
 * Eight bars, each with a height byte and a colour byte (1-7 on known signs).
 */
export function setMusicBars(heights: readonly number[], colors: readonly number[]): SetMusicBarsCommand {
  if (heights.length !== MUSIC_BAR_COUNT) {
    throw new CommandValidationError(`Heights must be ${MUSIC_BAR_COUNT} bytes, not ${heights.length}`);
  }
  if (colors.length !== MUSIC_BAR_COUNT) {
    throw new CommandValidationError(`Colors must be ${MUSIC_BAR_COUNT} bytes, not ${colors.length}`);
  }
  heights.forEach((h) => requireByte('Bar height', h));
  colors.forEach((c) => requireByte('Bar color', c));
  return Object.freeze({
    kind: 'SetMusicBars',
    heights: Object.freeze([...heights]),
    colors: Object.freeze([...colors]),
  });
}

export function turnOnOffApp(on: boolean): TurnOnOffAppCommand {
  return Object.freeze({ kind: 'TurnOnOffApp', on });
}

export function turnOnOffButton(on: boolean): TurnOnOffButtonCommand {
  return Object.freeze({ kind: 'TurnOnOffButton', on });
}

export function initialize(): InitializeCommand {
  return Object.freeze({ kind: 'Initialize' });
}

export function showChargingAnimation(): ShowChargingAnimationCommand {
  return Object.freeze({ kind: 'ShowChargingAnimation' });
}

export function invertDisplay(inverted: boolean = false): InvertDisplayCommand {
  return Object.freeze({ kind: 'InvertDisplay', inverted });
}

export function invertOrSomething(): InvertOrSomethingCommand {
  return Object.freeze({ kind: 'InvertOrSomething' });
}

export function startupWithBatteryLevel(batteryLevel: number): StartupWithBatteryLevelCommand {
  return Object.freeze({
    kind: 'StartupWithBatteryLevel',
    batteryLevel: requireByte('Battery level', batteryLevel),
  });
}

export function powerDown(): PowerDownCommand {
  return Object.freeze({ kind: 'PowerDown' });
}

/**
 * Bytes sent to the characteristic exactly as given (no framing).
 *
 * @throws {CommandValidationError} If the hex is malformed or empty
 */
export function sendRawData(hex: string): SendRawDataCommand {
  const data = hexToBytes(hex);
  if (data.length === 0) {
    throw new CommandValidationError('Raw data must not be empty');
  }
  return Object.freeze({ kind: 'SendRawData', data });
}

// Encoding

/**
 * Unframed chunks for a command.
 *
 * Content commands return their payload cut into command-prefixed chunks;
 * settings return a single `[command byte, value...]` buffer.
 */
export async function getRawDataChunks(
  command: Command,
  panel: PanelDimensions,
  profile: HardwareProfile
): Promise<Uint8Array[]> {
  const cmd = profile.commands;

  switch (command.kind) {
    case 'SetText': {
      const payload = await createTextPayload(command.text, panel, command.options);
      const renderAsText = command.options.renderAsText ?? true;
      return chunkPayload(payload, renderAsText ? cmd.text : cmd.image);
    }
    case 'SetImage':
      return chunkPayload(await createImagePayload(command.source, panel, command.options), cmd.image);
    case 'SetAnimation':
      return chunkPayload(await createAnimationPayload(command.source, panel, command.options), cmd.animation);
    case 'SetJT': {
      const { payload, isStaticImage } = await createJtPayload(command.filename);
      return chunkPayload(payload, isStaticImage ? cmd.image : cmd.animation);
    }
    case 'SetSpeed':
      return [Uint8Array.of(cmd.speed, command.speed)];
    case 'SetBrightness':
      return [Uint8Array.of(cmd.brightness, command.brightness)];
    case 'SetMode':
      return [Uint8Array.of(cmd.mode, command.mode)];
    case 'SetMusicBars':
      return [Uint8Array.of(cmd.music, ...command.heights, ...command.colors)];
    case 'TurnOnOffApp':
      return [Uint8Array.of(cmd.switch, command.on ? 0x01 : 0x00)];
    case 'TurnOnOffButton':
      return [command.on ? Uint8Array.of(cmd.buttonOn, 0x01) : Uint8Array.of(cmd.buttonOff, 0x00)];
    case 'Initialize':
      return [Uint8Array.of(cmd.initialize, 0x01)];
    case 'ShowChargingAnimation':
      return [Uint8Array.of(cmd.showIcon)];
    case 'InvertDisplay':
      return [Uint8Array.of(cmd.invertDisplay, command.inverted ? 0x01 : 0x00)];
    case 'InvertOrSomething':
      return [Uint8Array.of(cmd.invertOrSomething)];
    case 'StartupWithBatteryLevel':
      return [Uint8Array.of(cmd.initialize, command.batteryLevel)];
    case 'PowerDown':
      return [Uint8Array.of(cmd.powerDown)];
    case 'SendRawData':
      return [Uint8Array.from(command.data)];
    default: {
      const unreachable: never = command;
      throw new CommandValidationError(`Unknown command ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Chunks as written to the characteristic: framed, except raw data.
 */
export async function getCommandChunks(
  command: Command,
  panel: PanelDimensions,
  profile: HardwareProfile
): Promise<Uint8Array[]> {
  const chunks = await getRawDataChunks(command, panel, profile);
  if (isRawPassthrough(command)) {
    return chunks;
  }
  return chunks.map(encodeFrame);
}

/**
 * Hex of every chunk, one per line.
 */
export async function getCommandHex(
  command: Command,
  panel: PanelDimensions,
  profile: HardwareProfile,
  appendNewline: boolean = true
): Promise<string> {
  const chunks = await getCommandChunks(command, panel, profile);
  return chunks.map((chunk) => bytesToHex(chunk) + (appendNewline ? '\n' : '')).join('');
}

/**
 * Short description for logs, e.g. `SetSpeed[0100020607020503]`.
 */
export async function describeCommand(
  command: Command,
  panel: PanelDimensions,
  profile: HardwareProfile
): Promise<string> {
  let hex = await getCommandHex(command, panel, profile, false);
  if (hex.length > MAX_TRUNCATED_LENGTH) {
    hex = `${hex.substring(0, MAX_TRUNCATED_LENGTH)}...`;
  }
  return `${command.kind}[${hex}]`;
}

const UNACKNOWLEDGED: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'SetMode',
  'SetMusicBars',
  'ShowChargingAnimation',
  'InvertDisplay',
  'InvertOrSomething',
  'PowerDown',
  'TurnOnOffButton',
]);

/**
 * Whether the sign answers each chunk of this command with a notification.
 */
export function expectsAcknowledgment(command: Command): boolean {
  return !UNACKNOWLEDGED.has(command.kind);
}

/**
 * Raw data is written unframed.
 */
export function isRawPassthrough(command: Command): boolean {
  return command.kind === 'SendRawData';
}
