/**
 * Frame codec: byte escaping, STX/ETX framing, chunk headers and checksums.
 *
 * On the wire every chunk is sent as
 *   0x01 | escape(len:u16BE | payload) | 0x03
 * where escape() replaces 0x01, 0x02 and 0x03 with 0x02 followed by the
 * byte plus 4, so STX and ETX never appear inside a frame.
 */

import { FrameDecodeError, ProtocolError } from '../exceptions';
import {
  CHUNK_HEADER_SIZE,
  CHUNK_SIZE,
  ESCAPE_OFFSET,
  ESCAPE_PREFIX,
  ETX,
  MAX_PAYLOAD_LENGTH,
  STX,
} from './constants';

/**
 * Result of decoding a captured frame.
 */
export interface DecodedFrame {
  /** Unescaped bytes between the length field and ETX */
  payload: Uint8Array;

  /** Length announced by the frame's 16-bit header */
  declaredLength: number;

  /** Whether the declared length equals the payload length */
  lengthMatches: boolean;
}

/**
 * Escape 0x01/0x02/0x03 for transmission.
 *
 * Equivalent to substituting 0x02 first, then 0x01, then 0x03, so bytes
 * introduced by one substitution are never escaped again.
 */
export function escapeBytes(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  for (const byte of data) {
    if (byte === 0x01 || byte === 0x02 || byte === 0x03) {
      out.push(ESCAPE_PREFIX, byte + ESCAPE_OFFSET);
    } else {
      out.push(byte);
    }
  }
  return Uint8Array.from(out);
}

/**
 * Reverse escapeBytes(): 0x02 means "next byte minus 4".
 *
 * @throws {FrameDecodeError} If the data ends with a dangling escape byte
 */
export function unescapeBytes(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < data.length; i++) {
    if (data[i] === ESCAPE_PREFIX) {
      if (i + 1 >= data.length) {
        throw new FrameDecodeError(`Dangling escape byte at offset ${i}`);
      }
      out.push((data[i + 1] - ESCAPE_OFFSET) & 0xff);
      i++;
    } else {
      out.push(data[i]);
    }
  }
  return Uint8Array.from(out);
}

/**
 * Wrap a raw payload into an escaped STX...ETX frame.
 *
 * @example
 * bytesToHex(encodeFrame(Uint8Array.of(0x07, 0x01))); // '0100020607020503'
 */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new ProtocolError(
      `Frame payload of ${payload.length} bytes exceeds ${MAX_PAYLOAD_LENGTH}`
    );
  }

  const extended = new Uint8Array(2 + payload.length);
  const view = new DataView(extended.buffer);
  view.setUint16(0, payload.length, false); // big-endian
  extended.set(payload, 2);

  const escaped = escapeBytes(extended);
  const frame = new Uint8Array(escaped.length + 2);
  frame[0] = STX;
  frame.set(escaped, 1);
  frame[frame.length - 1] = ETX;
  return frame;
}

/**
 * Decode a captured frame back into its payload.
 *
 * The declared length is reported but not enforced; devices and the vendor
 * app have been seen sending frames where it disagrees with the payload.
 *
 * @throws {FrameDecodeError} If STX/ETX are missing or the frame is truncated
 */
export function decodeFrame(frame: Uint8Array): DecodedFrame {
  const raw = unescapeBytes(frame);

  if (raw.length < 4) {
    throw new FrameDecodeError(`Frame too short: ${raw.length} bytes (need at least 4)`);
  }
  if (raw[0] !== STX) {
    throw new FrameDecodeError(
      `Invalid packet structure (opening byte != 0x01): 0x${hexByte(raw[0])}`
    );
  }
  if (raw[raw.length - 1] !== ETX) {
    throw new FrameDecodeError(
      `Invalid packet structure (closing byte != 0x03): 0x${hexByte(raw[raw.length - 1])}`
    );
  }

  const declaredLength = (raw[1] << 8) | raw[2];
  const payload = raw.slice(3, -1);

  return {
    payload,
    declaredLength,
    lengthMatches: declaredLength === payload.length,
  };
}

/**
 * XOR of every byte.
 */
export function xorChecksum(data: Uint8Array): number {
  let checksum = 0;
  for (const byte of data) {
    checksum ^= byte;
  }
  return checksum;
}

/**
 * Split data into pieces of at most `size` bytes. Empty input yields one
 * empty piece so that empty content still produces a chunk.
 */
export function splitPayload(data: Uint8Array, size: number = CHUNK_SIZE): Uint8Array[] {
  if (data.length === 0) {
    return [data];
  }

  const pieces: Uint8Array[] = [];
  for (let offset = 0; offset < data.length; offset += size) {
    pieces.push(data.subarray(offset, Math.min(offset + size, data.length)));
  }
  return pieces;
}

/**
 * Cut a content payload into command-prefixed chunks.
 *
 * Format of each chunk:
 *   [cmd:1][0x00][total:2BE][index:2BE][size:1][data:size][xor:1]
 *   - xor covers everything after the command byte
 *
 * @param payload - Complete rasterized payload
 * @param commandByte - Hardware command code prepended to every chunk
 * @returns Unframed chunks, in order
 * @throws {ProtocolError} If the payload does not fit the 16-bit length field
 */
export function chunkPayload(payload: Uint8Array, commandByte: number): Uint8Array[] {
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new ProtocolError(
      `Payload of ${payload.length} bytes exceeds the ${MAX_PAYLOAD_LENGTH}-byte protocol limit`
    );
  }

  return splitPayload(payload, CHUNK_SIZE).map((piece, index) => {
    const chunk = new Uint8Array(1 + CHUNK_HEADER_SIZE + piece.length + 1);
    const view = new DataView(chunk.buffer);

    chunk[0] = commandByte;
    chunk[1] = 0x00; // reserved
    view.setUint16(2, payload.length, false);
    view.setUint16(4, index, false);
    view.setUint8(6, piece.length);
    chunk.set(piece, 7);
    chunk[chunk.length - 1] = xorChecksum(chunk.subarray(1, chunk.length - 1));

    return chunk;
  });
}

/**
 * Fields of a chunk header, read back from an unframed chunk.
 */
export interface ChunkHeader {
  commandByte: number;
  totalLength: number;
  index: number;
  size: number;
  checksum: number;
  checksumValid: boolean;
}

/**
 * Parse the header of an unframed chunk (as produced by chunkPayload()).
 *
 * @throws {FrameDecodeError} If the chunk is shorter than its header
 */
export function parseChunkHeader(chunk: Uint8Array): ChunkHeader {
  if (chunk.length < 1 + CHUNK_HEADER_SIZE + 1) {
    throw new FrameDecodeError(`Chunk too short: ${chunk.length} bytes`);
  }

  const view = new DataView(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  const checksum = chunk[chunk.length - 1];

  return {
    commandByte: chunk[0],
    totalLength: view.getUint16(2, false),
    index: view.getUint16(4, false),
    size: view.getUint8(6),
    checksum,
    checksumValid: xorChecksum(chunk.subarray(1, chunk.length - 1)) === checksum,
  };
}

function hexByte(byte: number): string {
  return byte.toString(16).padStart(2, '0').toUpperCase();
}
