import { afterEach, describe, it, expect, vi } from 'vitest';
import { ErrorCode } from '../models/enums';
import { encodeFrame } from './frame';
import { isFramed, isSuccess, parseNotification } from './responses';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseNotification', () => {
  it('reads the status from the last payload byte', () => {
    expect(parseNotification(encodeFrame(Uint8Array.of(0x03, ErrorCode.DATA_CHECKSUM_ERROR)))).toEqual({
      errorCode: ErrorCode.DATA_CHECKSUM_ERROR,
      commandByte: 0x03,
      payload: Uint8Array.of(0x03, 0x06),
    });
  });

  it('reports success from a framed acknowledgment', () => {
    const result = parseNotification(encodeFrame(Uint8Array.of(0x02, 0x00)));
    expect(result.errorCode).toBe(ErrorCode.SUCCESS);
    expect(result.commandByte).toBe(0x02);
  });

  it('treats unframed notifications as success', () => {
    const data = Uint8Array.of(0x01, 0xff, 0x00, 0x01, 0x00);
    expect(parseNotification(data)).toEqual({ errorCode: ErrorCode.SUCCESS, payload: data });
  });

  it('treats a one-byte payload as success', () => {
    expect(parseNotification(encodeFrame(Uint8Array.of(0x05))).errorCode).toBe(ErrorCode.SUCCESS);
  });

  it('treats an undecodable frame as success with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(parseNotification(Uint8Array.of(0x01, 0x00, 0x02, 0x03)).errorCode).toBe(ErrorCode.SUCCESS);
    expect(warn).toHaveBeenCalledOnce();
  });
});

describe('isFramed', () => {
  it('needs STX, ETX and room for a length', () => {
    expect(isFramed(Uint8Array.of(0x01, 0x00, 0x00, 0x03))).toBe(true);
    expect(isFramed(Uint8Array.of(0x01, 0x00, 0x03))).toBe(false);
    expect(isFramed(Uint8Array.of(0x01, 0x00, 0x00, 0x00))).toBe(false);
  });
});

describe('isSuccess', () => {
  it('only accepts code zero', () => {
    expect(isSuccess(ErrorCode.SUCCESS)).toBe(true);
    expect(isSuccess(ErrorCode.DATA_ERROR)).toBe(false);
    expect(isSuccess(0x42)).toBe(false);
  });
});
