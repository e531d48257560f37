/**
 * Traffic decoder for captured BLE writes and notifications.
 *
 * Turns the hex of a captured frame into the command it carries, labelled
 * with its action, so captures of the vendor app can be compared with what
 * this library sends.
 */

import { DEFAULT_HARDWARE_PROFILE, actionForCommandByte } from '../models/hardware';
import type { CommandAction, HardwareProfile } from '../models/hardware';
import { decodeFrame } from './frame';
import { hexToBytes } from './hex';

const ACTION_LABELS: Readonly<Record<CommandAction, string>> = {
  music: 'Music',
  text: 'Text',
  image: 'Image',
  animation: 'Animation',
  icon: 'Icon',
  buttonOff: 'Power Off',
  mode: 'Mode',
  speed: 'Speed',
  brightness: 'Brightness',
  switch: 'Switch',
  transfer: 'Transfer',
  invertDisplay: 'Invert Display',
  clearMaybe: 'Clear Maybe',
  showIcon: 'Show Icon',
  powerDown: 'Power Down',
  buttonOn: 'Power On',
  invertOrSomething: 'Invert Or Something',
  requestSomething: 'Request Something',
  initialize: 'Initialize',
};

export type Direction = 'send' | 'receive';

/**
 * A decoded frame with its capture metadata.
 */
export interface CapturedCommand {
  direction: Direction;
  /** Peer label, e.g. "Sign" or a MAC address */
  peer: string;
  /** Unescaped payload (command byte first) */
  command: Uint8Array;
  /** Action label, "NA" when empty */
  action: string;
  /** Length declared in the frame header */
  declaredLength: number;
  lengthMatches: boolean;
}

/**
 * Label for a command byte.
 *
 * @example
 * describeAction(0x02); // 'Text'
 * describeAction(0x42); // 'Unknown 0x42'
 */
export function describeAction(
  commandByte: number,
  profile: HardwareProfile = DEFAULT_HARDWARE_PROFILE
): string {
  const action = actionForCommandByte(profile, commandByte);
  if (action === undefined) {
    return `Unknown 0x${commandByte.toString(16).padStart(2, '0').toUpperCase()}`;
  }
  return ACTION_LABELS[action];
}

/**
 * Decode one captured frame given as hex.
 *
 * @throws {CommandValidationError} If the hex is malformed
 * @throws {FrameDecodeError} If the bytes are not a frame
 */
export function decodeCapturedFrame(
  hex: string,
  direction: Direction = 'send',
  peer: string = 'Sign',
  profile: HardwareProfile = DEFAULT_HARDWARE_PROFILE
): CapturedCommand {
  const decoded = decodeFrame(hexToBytes(hex));
  const command = decoded.payload;

  return {
    direction,
    peer,
    command,
    action: command.length > 0 ? describeAction(command[0], profile) : 'NA',
    declaredLength: decoded.declaredLength,
    lengthMatches: decoded.lengthMatches,
  };
}

/**
 * Uppercase hex dump, 16 space-separated bytes per line.
 */
export function hexDump(data: Uint8Array, bytesPerLine: number = 16): string[] {
  const lines: string[] = [];
  for (let offset = 0; offset < data.length; offset += bytesPerLine) {
    const slice = data.subarray(offset, offset + bytesPerLine);
    lines.push(
      Array.from(slice, (b) => b.toString(16).padStart(2, '0').toUpperCase()).join(' ')
    );
  }
  return lines;
}

/**
 * Render a captured command for the terminal.
 *
 * @example
 * formatCapturedCommand(decodeCapturedFrame('0100020607020503'));
 * // "-> Sign (Speed) [2]\n  07 01"
 */
export function formatCapturedCommand(captured: CapturedCommand): string {
  const arrow = captured.direction === 'send' ? '->' : '<-';
  let header = `${arrow} ${captured.peer} (${captured.action}) [${captured.command.length}]`;
  if (!captured.lengthMatches) {
    header += ` (declared ${captured.declaredLength})`;
  }
  return [header, ...hexDump(captured.command).map((line) => `  ${line}`)].join('\n');
}
