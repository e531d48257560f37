/**
 * Exception classes for the CoolLED sign driver.
 */

import { ErrorCode, errorCodeName } from './models/enums';

export class CoolLedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoolLedError';
  }
}

/**
 * Raised by command constructors for out-of-range or malformed parameters.
 * Always thrown before anything reaches the transport.
 */
export class CommandValidationError extends CoolLedError {
  constructor(message: string) {
    super(message);
    this.name = 'CommandValidationError';
  }
}

export class BLEConnectionError extends CoolLedError {
  constructor(message: string) {
    super(message);
    this.name = 'BLEConnectionError';
  }
}

export class BLETimeoutError extends CoolLedError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

/**
 * The sign did not acknowledge a chunk within the command timeout.
 */
export class AckTimeoutError extends BLETimeoutError {
  constructor(message: string) {
    super(message);
    this.name = 'AckTimeoutError';
  }
}

export class ProtocolError extends CoolLedError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * A captured frame could not be decoded (missing STX/ETX, dangling escape).
 */
export class FrameDecodeError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

/**
 * The sign answered a chunk with a non-success error code.
 */
export class DeviceError extends ProtocolError {
  readonly errorCode: ErrorCode | number;

  constructor(errorCode: ErrorCode | number, context?: string) {
    const name = errorCodeName(errorCode);
    super(context ? `${context}: ${name}` : `Device reported ${name}`);
    this.name = 'DeviceError';
    this.errorCode = errorCode;
  }

  get errorName(): string {
    return errorCodeName(this.errorCode);
  }
}

export class ImageEncodingError extends CoolLedError {
  constructor(message: string) {
    super(message);
    this.name = 'ImageEncodingError';
  }
}
