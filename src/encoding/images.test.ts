import sharp from 'sharp';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { HeightTreatment, HorizontalAlignment, WidthTreatment } from '../models/enums';
import { RED, WHITE, hex, solidRaster } from '../test-support/rasters';
import { createImageOutput, createImagePayload, createTextPayload, encodeTextBlock, resolveFitOptions } from './images';

const RESERVED = '00'.repeat(24);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('encodeTextBlock', () => {
  it('writes a length byte and one placeholder per character', () => {
    const block = encodeTextBlock('abc');

    expect(block).toHaveLength(81);
    expect(hex(block)).toBe('03' + '30'.repeat(3) + '00'.repeat(77));
  });

  it('counts characters, not UTF-16 units', () => {
    expect(encodeTextBlock('a\u{1F600}')[0]).toBe(2);
  });

  it('caps the placeholder run at the buffer size', () => {
    expect(hex(encodeTextBlock('x'.repeat(100)))).toBe('64' + '30'.repeat(80));
  });

  it('switches to a two-byte length past 255 characters', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const block = encodeTextBlock('x'.repeat(300));

    expect(block).toHaveLength(81);
    expect(hex(block)).toBe('012c' + '30'.repeat(79));
    expect(warn).toHaveBeenCalledOnce();
  });
});

describe('resolveFitOptions', () => {
  it('fills unset options from the still-image defaults', () => {
    expect(resolveFitOptions({ widthTreatment: WidthTreatment.SCALE })).toEqual({
      backgroundColor: 'black',
      widthTreatment: WidthTreatment.SCALE,
      heightTreatment: HeightTreatment.CROP_PAD,
      horizontalAlignment: HorizontalAlignment.NONE,
      verticalAlignment: 'center',
    });
  });
});

describe('createImageOutput', () => {
  const panel = { width: 4, height: 8 };
  const centred = { widthTreatment: WidthTreatment.CROP_PAD, horizontalAlignment: HorizontalAlignment.CENTER };

  it('lays out reserved bytes, length and planes', async () => {
    const payload = await createImageOutput(solidRaster(2, 8, RED), panel, centred);

    expect(hex(payload)).toBe(RESERVED + '000c' + '00ffff00' + '00000000' + '00000000');
  });

  it('inserts the text block ahead of the planes', async () => {
    const payload = await createImageOutput(solidRaster(2, 8, RED), panel, centred, 'hi');

    expect(payload).toHaveLength(24 + 81 + 2 + 12);
    expect(Array.from(payload.subarray(24, 27))).toEqual([0x02, 0x30, 0x30]);
    expect(hex(payload.subarray(105, 107))).toBe('000c');
  });

  it('resamples when scaling', async () => {
    const payload = await createImageOutput(solidRaster(4, 4, WHITE), { width: 8, height: 8 }, {
      widthTreatment: WidthTreatment.SCALE,
      heightTreatment: HeightTreatment.SCALE,
    });

    expect(hex(payload)).toBe(RESERVED + '0018' + 'ff'.repeat(24));
  });
});

describe('createTextPayload', () => {
  it('sends empty text as a bare text block', async () => {
    const payload = await createTextPayload('', { width: 96, height: 16 });
    expect(hex(payload)).toBe(RESERVED + '00' + '00'.repeat(80) + '0000');
  });

  it('sends whitespace-only text as blank columns', async () => {
    const payload = await createTextPayload('   ', { width: 96, height: 16 });
    const bitsLength = (payload[105] << 8) | payload[106];

    expect(hex(payload.subarray(24, 28))).toBe('03303030');
    expect(bitsLength).toBe(payload.length - 107);
    expect(bitsLength).toBeGreaterThan(0);
    expect(payload.subarray(107).every((byte) => byte === 0)).toBe(true);
  });

  it('omits the text block when rendered as an image', async () => {
    const payload = await createTextPayload('', { width: 96, height: 16 }, { renderAsText: false });
    expect(hex(payload)).toBe(RESERVED + '0000');
  });
});

describe('createImagePayload', () => {
  it('decodes encoded image bytes', async () => {
    const png = await sharp({
      create: { width: 2, height: 8, channels: 3, background: { r: 0, g: 255, b: 0 } },
    })
      .png()
      .toBuffer();

    const payload = await createImagePayload(png, { width: 96, height: 8 });
    expect(hex(payload)).toBe(RESERVED + '0006' + '0000' + 'ffff' + '0000');
  });
});
