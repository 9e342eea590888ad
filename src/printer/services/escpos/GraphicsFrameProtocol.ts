/**
 * Graphics Frame Protocol
 *
 * Length-prefixed graphics frames (ESC ( L pL pH m fn [payload]) used to
 * download a bitmap into printer memory and to print it afterwards.
 *
 * @module printer/services/escpos/GraphicsFrameProtocol
 */

import { RawWriter, WarningCode, validationWarning } from '../../types';
import { WarningCollector } from './WarningCollector';
import { ESC, littleEndian16 } from './commands';

/** ESC ( L */
export const FRAME_START: readonly number[] = [ESC, 0x28, 0x4c];

/**
 * Sub-header placed before the bitmap of a transfer frame:
 * tile id '0', horizontal and vertical density flags, tile count '1'
 */
export const GRAPHIC_SUBHEADER: readonly number[] = [0x30, 0x01, 0x01, 0x31];

export const MAX_FRAME_LENGTH = 0xffff;

/** Mode and function bytes may be given as a single character or a byte */
export type FrameField = string | number;

export class GraphicsFrameProtocol {
  constructor(
    private readonly writer: RawWriter,
    private readonly warnings: WarningCollector
  ) {}

  private toFieldByte(field: FrameField, label: string): number | null {
    if (typeof field === 'string') {
      if (field.length === 1 && field.charCodeAt(0) <= 0xff) {
        return field.charCodeAt(0);
      }
    } else if (Number.isInteger(field) && field >= 0 && field <= 0xff) {
      return field;
    }
    this.warnings.report(
      validationWarning(WarningCode.INVALID_FRAME_FIELD, `Invalid graphics frame ${label}: ${String(field)}`, {
        value: field,
      })
    );
    return null;
  }

  /**
   * Assemble a frame. The length field counts the mode and function bytes
   * plus the payload.
   *
   * @returns the frame, or null when a field is invalid or the payload
   *          does not fit the 16-bit length
   */
  buildFrame(mode: FrameField, fn: FrameField, payload: Uint8Array): Buffer | null {
    const m = this.toFieldByte(mode, 'mode');
    const f = this.toFieldByte(fn, 'function');
    if (m === null || f === null) {
      return null;
    }

    const frameLength = payload.length + 2;
    if (frameLength > MAX_FRAME_LENGTH) {
      this.warnings.report(
        validationWarning(
          WarningCode.FRAME_TOO_LARGE,
          `Graphics frame of ${frameLength} bytes exceeds ${MAX_FRAME_LENGTH}`,
          { value: frameLength }
        )
      );
      return null;
    }

    return Buffer.concat([Buffer.from([...FRAME_START, ...littleEndian16(frameLength), m, f]), payload]);
  }

  /**
   * Build a frame and send it as one raw write
   */
  sendFrame(mode: FrameField, fn: FrameField, payload: Uint8Array = new Uint8Array(0)): boolean {
    const frame = this.buildFrame(mode, fn, payload);
    if (frame === null) {
      return false;
    }
    this.writer.writeRaw(frame);
    return true;
  }

  /**
   * Store a raster bitmap in printer memory (fn 'p')
   */
  transferGraphic(bitmap: Uint8Array): boolean {
    return this.sendFrame('0', 'p', Buffer.concat([Buffer.from(GRAPHIC_SUBHEADER), bitmap]));
  }

  /**
   * Print the graphic stored by transferGraphic (fn '2')
   */
  printGraphic(): boolean {
    return this.sendFrame('0', '2');
  }
}
