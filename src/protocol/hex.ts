/**
 * Hex helpers for logs, fixtures and raw command input.
 */

import { CommandValidationError } from '../exceptions';

/**
 * Lowercase hex without separators, e.g. "0100020607020503".
 */
export function bytesToHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Parse hex written as "01 02 03", "01:02:03" or "010203".
 *
 * @throws {CommandValidationError} If the string is not whole bytes of hex
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleaned = hex.replace(/[\s:]/g, '');
  if (cleaned.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(cleaned)) {
    throw new CommandValidationError(`Invalid hex string: "${hex}"`);
  }

  const bytes = new Uint8Array(cleaned.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(cleaned.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Concatenate byte arrays.
 */
export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
