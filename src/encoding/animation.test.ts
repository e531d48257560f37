import sharp from 'sharp';
import { describe, it, expect } from 'vitest';
import { ImageEncodingError } from '../exceptions';
import { HeightTreatment, WidthTreatment } from '../models/enums';
import { GREEN, RED, hex, makeRaster, redGreenGif, solidRaster } from '../test-support/rasters';
import { createAnimationOutput, createAnimationPayload, encodeAnimationFrames } from './animation';

const PANEL = { width: 4, height: 8 };
const RESERVED = '00'.repeat(24);

// Second frame only draws column 0; the rest shows through from the first
const frames = [solidRaster(4, 8, RED), makeRaster(4, 8, (x) => (x === 0 ? GREEN : null))];

describe('encodeAnimationFrames', () => {
  it('composites each frame over the previous ones', async () => {
    const [red, green, blue] = await encodeAnimationFrames(frames, PANEL);

    expect(hex(red)).toBe('ffffffff' + '00ffffff');
    expect(hex(green)).toBe('00000000' + 'ff000000');
    expect(hex(blue)).toBe('00'.repeat(8));
  });

  it('rejects as-is width', async () => {
    await expect(encodeAnimationFrames(frames, PANEL, { widthTreatment: WidthTreatment.AS_IS })).rejects.toThrow(
      ImageEncodingError
    );
  });

  it('rejects an empty frame list', async () => {
    await expect(encodeAnimationFrames([], PANEL)).rejects.toThrow('Animation has no frames');
  });

  it('rejects more than 255 frames', async () => {
    const many = Array.from({ length: 256 }, () => solidRaster(4, 8, RED));
    await expect(encodeAnimationFrames(many, PANEL)).rejects.toThrow(
      'Animation has 256 frames, the sign accepts at most 255'
    );
  });
});

describe('encodeAnimationFrames with frames smaller than the panel', () => {
  const panel = { width: 96, height: 16 };
  const small = [solidRaster(40, 10, RED), solidRaster(40, 10, GREEN)];

  it('scales each frame to the full panel', async () => {
    const [red, green, blue] = await encodeAnimationFrames(small, panel);

    // 96 columns of 2 bytes per frame
    expect(red).toHaveLength(2 * 192);
    expect(hex(red)).toBe('ff'.repeat(192) + '00'.repeat(192));
    expect(hex(green)).toBe('00'.repeat(192) + 'ff'.repeat(192));
    expect(hex(blue)).toBe('00'.repeat(384));
  });

  it('pads unscaled frames to the panel, centred', async () => {
    const [red, green] = await encodeAnimationFrames(small.slice(0, 1), panel, {
      widthTreatment: WidthTreatment.CROP_PAD,
      heightTreatment: HeightTreatment.CROP_PAD,
    });

    // 28 blank columns each side; rows 3-12 lit
    expect(hex(red)).toBe('0000'.repeat(28) + '1ff8'.repeat(40) + '0000'.repeat(28));
    expect(hex(green)).toBe('00'.repeat(192));
  });
});

describe('createAnimationOutput', () => {
  it('writes frame count and speed ahead of the planes', async () => {
    const payload = await createAnimationOutput(frames, PANEL, { speed: 300 });

    expect(hex(payload)).toBe(
      RESERVED + '02' + '012c' + 'ffffffff00ffffff' + '00000000ff000000' + '00'.repeat(8)
    );
  });

  it('defaults the speed to 512', async () => {
    const payload = await createAnimationOutput(frames.slice(0, 1), PANEL);
    expect(hex(payload.subarray(24, 27))).toBe('010200');
  });
});

describe('createAnimationPayload', () => {
  it('decodes every GIF frame', async () => {
    const payload = await createAnimationPayload(redGreenGif(), PANEL);

    expect(hex(payload)).toBe(
      RESERVED + '02' + '0200' + 'ffffffff00000000' + '00000000ffffffff' + '00'.repeat(8)
    );
  });

  it('rejects still images', async () => {
    const png = await sharp({
      create: { width: 4, height: 8, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .png()
      .toBuffer();

    await expect(createAnimationPayload(png, PANEL)).rejects.toThrow('Image input is not animated');
  });
});
