/**
 * Enums for CoolLED sign rendering and protocol state.
 */

/**
 * Text movement modes understood by the sign.
 */
export enum Mode {
  STATIC = 0x01,
  LEFT = 0x02,
  RIGHT = 0x03,
  UP = 0x04,
  DOWN = 0x05,
  SNOWFLAKE = 0x06,
  PICTURE = 0x07,
  LASER = 0x08,
}

/**
 * How the source width is fitted to the panel.
 */
export enum WidthTreatment {
  SCALE = 'scale',
  CROP_PAD = 'crop-pad',
  AS_IS = 'as-is',
}

/**
 * How the source height is fitted to the panel. The output height is always
 * the panel height (a multiple of 8).
 */
export enum HeightTreatment {
  SCALE = 'scale',
  CROP_PAD = 'crop-pad',
}

export enum HorizontalAlignment {
  LEFT = 'left',
  CENTER = 'center',
  RIGHT = 'right',
  NONE = 'none',
}

export enum VerticalAlignment {
  TOP = 'top',
  CENTER = 'center',
  BOTTOM = 'bottom',
}

/**
 * Lifecycle of the command currently being sent.
 */
export enum CommandStatus {
  NOT_STARTED = 0,
  TRANSMITTED = 1,
  ACKNOWLEDGED = 2,
  ERROR = 3,
}

/**
 * Error codes reported by the sign in its notifications.
 */
export enum ErrorCode {
  SUCCESS = 0x00,
  TRANSMISSION_FAILED = 0x01,
  DEVICE_ABNORMALITY = 0x02,
  DATA_ERROR = 0x03,
  DATA_LENGTH_ERROR = 0x04,
  DATA_ID_ERROR = 0x05,
  DATA_CHECKSUM_ERROR = 0x06,
}

/**
 * Human-readable name for an error code.
 *
 * @example
 * errorCodeName(ErrorCode.DATA_ERROR); // 'DATA_ERROR'
 * errorCodeName(0x42); // 'Unknown error code: 0x42'
 */
export function errorCodeName(code: ErrorCode | number): string {
  const name: string | undefined = ErrorCode[code];
  if (name !== undefined) {
    return name;
  }
  return `Unknown error code: 0x${code.toString(16).padStart(2, '0').toUpperCase()}`;
}

/**
 * Parse a string into a member of a string enum (case-insensitive).
 *
 * @returns The matching member, or undefined
 */
export function parseEnumValue<T extends string>(
  enumObject: Record<string, T>,
  value: string
): T | undefined {
  const lowered = value.toLowerCase();
  return Object.values(enumObject).find((member) => member === lowered);
}
