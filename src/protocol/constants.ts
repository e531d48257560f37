/**
 * BLE protocol constants for CoolLED signs.
 */

export const SERVICE_UUID = '0000fff0-0000-1000-8000-00805f9b34fb';
export const CHARACTERISTIC_UUID = '0000fff1-0000-1000-8000-00805f9b34fb';
export const DEFAULT_DEVICE_NAME = 'CoolLEDX';

// Framing bytes
export const STX = 0x01;
export const ETX = 0x03;
export const ESCAPE_PREFIX = 0x02;
export const ESCAPE_OFFSET = 0x04;

// Chunking constants
export const CHUNK_SIZE = 128; // Maximum data bytes per chunk
export const CHUNK_HEADER_SIZE = 6; // reserved + total length + index + size
export const MAX_PAYLOAD_LENGTH = 0xffff; // 16-bit length fields

// Content payload layout
export const PAYLOAD_RESERVED_BYTES = 24; // Leading zero block, purpose unknown
export const TEXT_PLACEHOLDER_LENGTH = 80;
export const MAX_SHORT_TEXT_LENGTH = 255;
export const PLACEHOLDER_CHAR = 0x30;
export const MAX_ANIMATION_FRAMES = 0xff;
export const MUSIC_BAR_COUNT = 8;

// Rendering defaults
export const DEFAULT_COLOR = 'white';
export const DEFAULT_BACKGROUND_COLOR = 'black';
export const DEFAULT_START_COLOR_MARKER = '<';
export const DEFAULT_END_COLOR_MARKER = '>';
export const DEFAULT_FONT = 'arial';
export const DEFAULT_FONT_SIZE = 13;
export const DEFAULT_ANIMATION_SPEED = 512;
