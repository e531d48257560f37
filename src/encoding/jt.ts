/**
 * Vendor "JT" files: pre-rendered bit-streams exported by the CoolLED app.
 *
 * A JT file is a JSON array; its first element has a `data` object with
 * `pixelWidth`, `pixelHeight` and either `aniData` (with `frameNum` and
 * `delays`) or `graffitiData`. The bit-stream is sent as-is.
 */

import { readFile } from 'node:fs/promises';
import { ImageEncodingError } from '../exceptions';
import { PAYLOAD_RESERVED_BYTES } from '../protocol/constants';
import { concatBytes } from '../protocol/hex';

export type JtDocument =
  | {
      kind: 'animation';
      pixelWidth: number;
      pixelHeight: number;
      frames: number;
      speed: number;
      bits: Uint8Array;
    }
  | {
      kind: 'graffiti';
      pixelWidth: number;
      pixelHeight: number;
      bits: Uint8Array;
    };

export interface JtPayload {
  payload: Uint8Array;
  /** Static images go out with the image command, animations with the animation command */
  isStaticImage: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isByteArray(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((v) => typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= 0xff)
  );
}

function readInteger(data: Record<string, unknown>, key: string, fallback: number, max: number): number {
  const value = data[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    throw new ImageEncodingError(`JT field "${key}" must be an integer in 0..${max}, got ${String(value)}`);
  }
  return value;
}

/**
 * Validate a parsed JT document.
 *
 * When both data fields are present the graffiti (static) one wins.
 *
 * @throws {ImageEncodingError} If the structure is not a JT document
 */
export function parseJtDocument(json: unknown): JtDocument {
  if (!Array.isArray(json) || json.length === 0) {
    throw new ImageEncodingError('JT document must be a non-empty JSON array');
  }
  const first: unknown = json[0];
  const data: unknown = isRecord(first) ? first.data : undefined;
  if (!isRecord(data)) {
    throw new ImageEncodingError('JT document has no "data" object');
  }

  const pixelWidth = readInteger(data, 'pixelWidth', 0, 0xffff);
  const pixelHeight = readInteger(data, 'pixelHeight', 0, 0xffff);

  for (const key of ['graffitiData', 'aniData']) {
    if (data[key] !== undefined && !isByteArray(data[key])) {
      throw new ImageEncodingError(`JT field "${key}" must be an array of bytes`);
    }
  }

  const graffiti = data.graffitiData;
  if (isByteArray(graffiti)) {
    return { kind: 'graffiti', pixelWidth, pixelHeight, bits: Uint8Array.from(graffiti) };
  }

  const animation = data.aniData;
  if (isByteArray(animation)) {
    return {
      kind: 'animation',
      pixelWidth,
      pixelHeight,
      frames: readInteger(data, 'frameNum', 1, 0xff),
      speed: readInteger(data, 'delays', 0, 0xffff),
      bits: Uint8Array.from(animation),
    };
  }

  throw new ImageEncodingError('JT document has neither "aniData" nor "graffitiData"');
}

/**
 * Build the payload for a parsed JT document.
 *
 * Format: [24 x 0x00][frames:1][speed:2BE] (animations only)[bitsLength:2BE][bits]
 */
export function createJtOutput(document: JtDocument): JtPayload {
  if (document.bits.length > 0xffff) {
    throw new ImageEncodingError(`JT bit-stream of ${document.bits.length} bytes is too long`);
  }

  const parts: Uint8Array[] = [new Uint8Array(PAYLOAD_RESERVED_BYTES)];
  if (document.kind === 'animation') {
    parts.push(Uint8Array.of(document.frames, (document.speed >> 8) & 0xff, document.speed & 0xff));
  }
  parts.push(Uint8Array.of((document.bits.length >> 8) & 0xff, document.bits.length & 0xff), document.bits);

  return { payload: concatBytes(parts), isStaticImage: document.kind === 'graffiti' };
}

/**
 * Read a JT file and build its payload.
 *
 * @throws {ImageEncodingError} If the file is not valid JSON or not a JT document
 */
export async function createJtPayload(filename: string): Promise<JtPayload> {
  const text = await readFile(filename, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ImageEncodingError(`JT file ${filename} is not valid JSON: ${message}`);
  }

  const document = parseJtDocument(json);
  console.debug(
    `Loaded JT ${document.kind} ${document.pixelWidth}x${document.pixelHeight}, ${document.bits.length} bytes`
  );
  return createJtOutput(document);
}
