/**
 * Notification parsing.
 *
 * The sign answers each acknowledged chunk with a short notification. When
 * that notification is itself an STX/ETX frame, the last byte of its payload
 * carries the status; anything else is treated as a plain acknowledgment.
 */

import { FrameDecodeError } from '../exceptions';
import { ErrorCode } from '../models/enums';
import { ETX, STX } from './constants';
import { decodeFrame } from './frame';

/**
 * Decoded notification from the sign.
 */
export interface NotificationResult {
  /** Status reported by the sign (unknown codes keep their raw value) */
  errorCode: ErrorCode | number;

  /** Command byte the notification refers to, when framed */
  commandByte?: number;

  /** Unescaped frame payload, or the raw bytes for unframed notifications */
  payload: Uint8Array;
}

/**
 * Check whether notification bytes look like an STX...ETX frame.
 */
export function isFramed(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === STX && data[data.length - 1] === ETX;
}

/**
 * Parse a notification into an error code.
 *
 * @param data - Raw notification bytes
 * @returns Parsed result; unframed or too-short notifications mean success
 */
export function parseNotification(data: Uint8Array): NotificationResult {
  if (!isFramed(data)) {
    return { errorCode: ErrorCode.SUCCESS, payload: data };
  }

  let payload: Uint8Array;
  try {
    payload = decodeFrame(data).payload;
  } catch (error) {
    if (error instanceof FrameDecodeError) {
      console.warn(`Unparseable notification treated as acknowledgment: ${error.message}`);
      return { errorCode: ErrorCode.SUCCESS, payload: data };
    }
    throw error;
  }

  if (payload.length < 2) {
    return { errorCode: ErrorCode.SUCCESS, payload };
  }

  return {
    errorCode: payload[payload.length - 1],
    commandByte: payload[0],
    payload,
  };
}

/**
 * Whether an error code means success.
 */
export function isSuccess(errorCode: ErrorCode | number): boolean {
  return errorCode === ErrorCode.SUCCESS;
}
