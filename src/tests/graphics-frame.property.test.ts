/**
 * Property-Based Tests for Graphics Frames
 *
 * Frames are ESC ( L pL pH m fn payload, with the 16-bit length counting
 * m, fn and the payload.
 */

import * as fc from 'fast-check';
import './propertyTestConfig';
import { GraphicsFrameProtocol, GRAPHIC_SUBHEADER } from '../printer/services/escpos/GraphicsFrameProtocol';
import { WarningCode } from '../printer/types';
import { createEncoder, writesOf } from './helpers/encoder-fixtures';

function createFrames() {
  const fixture = createEncoder();
  return { ...fixture, frames: new GraphicsFrameProtocol(fixture.encoder, fixture.warnings) };
}

describe('Graphics Frame Property Tests', () => {
  it('prefixes the payload with its length plus two, little-endian', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 2048 }), fc.integer({ min: 0, max: 255 }), (payload, fn) => {
        const { sink, frames } = createFrames();
        expect(frames.sendFrame('0', fn, payload)).toBe(true);

        const writes = writesOf(sink);
        expect(writes).toHaveLength(1);
        const frame = writes[0];
        expect(frame.slice(0, 3)).toEqual([0x1b, 0x28, 0x4c]);
        expect(frame[3] | (frame[4] << 8)).toBe(payload.length + 2);
        expect(frame[5]).toBe(0x30);
        expect(frame[6]).toBe(fn);
        expect(frame.slice(7)).toEqual(Array.from(payload));
      })
    );
  });

  it('printGraphic sends an empty print frame', () => {
    const { sink, frames } = createFrames();
    frames.printGraphic();
    expect(writesOf(sink)).toEqual([[0x1b, 0x28, 0x4c, 0x02, 0x00, 0x30, 0x32]]);
  });

  it('transferGraphic puts the sub-header before the bitmap', () => {
    const { sink, frames } = createFrames();
    frames.transferGraphic(Buffer.from([0xde, 0xad]));
    expect(writesOf(sink)).toEqual([[0x1b, 0x28, 0x4c, 0x08, 0x00, 0x30, 0x70, ...GRAPHIC_SUBHEADER, 0xde, 0xad]]);
  });

  it('rejects mode and function fields that are not a single byte', () => {
    const { sink, frames, warnings } = createFrames();
    expect(frames.sendFrame('ab', 'p')).toBe(false);
    expect(frames.sendFrame('0', 256)).toBe(false);
    expect(sink.length).toBe(0);
    expect(warnings.getAll().map((w) => w.code)).toEqual([
      WarningCode.INVALID_FRAME_FIELD,
      WarningCode.INVALID_FRAME_FIELD,
    ]);
  });

  it('rejects payloads whose length does not fit 16 bits', () => {
    const { sink, frames, warnings } = createFrames();
    expect(frames.sendFrame('0', 'p', new Uint8Array(0xffff - 2))).toBe(true);
    sink.clear();

    expect(frames.sendFrame('0', 'p', new Uint8Array(0xffff - 1))).toBe(false);
    expect(sink.length).toBe(0);
    expect(warnings.getAll()[0].message).toBe('Graphics frame of 65536 bytes exceeds 65535');
  });
});
