/**
 * Raster Image Encoder
 *
 * Converts a pixel grid to 1-bit bands of 24 dot rows and prints them with
 * the bit image command (ESC * 33 nL nH d1...dk). Each column of a band is a
 * 3-byte vertical strip, most significant bit at the top.
 *
 * @module printer/services/escpos/RasterImageEncoder
 */

import { PixelGrid, RawWriter, Rgba, WarningCode, validationWarning } from '../../types';
import { WarningCollector } from './WarningCollector';
import { CMD, ESC, littleEndian16 } from './commands';

export const BAND_HEIGHT = 24;

/** 24-dot double-density column mode */
export const RASTER_MODE = 33;

export const INK_THRESHOLD = 128;

const MAX_RASTER_DIMENSION = 0xffff;

/**
 * What the raster path needs from the encoder: raw output plus the two
 * layout commands around the bands. No text path.
 */
export interface RasterWriter extends RawWriter {
  setLineSpacing(...spacing: number[]): boolean;
  linefeed(): number;
}

/**
 * Luminance with channels widened to 16 bits and alpha-premultiplied,
 * averaged, then divided by 255. Fully transparent pixels read as black.
 */
export function luminance(pixel: Rgba): number {
  const widen = (channel: number) => Math.floor((channel * 0x101 * pixel.a * 0x101) / 0xffff);
  const sum = widen(pixel.r) + widen(pixel.g) + widen(pixel.b);
  return Math.floor(Math.floor(sum / 3) / 255);
}

export function isInk(pixel: Rgba): boolean {
  return luminance(pixel) < INK_THRESHOLD;
}

/**
 * Bands needed to cover `height` rows. A height that is a multiple of 24
 * gets no trailing empty band.
 */
export function bandCount(height: number): number {
  return Math.ceil(height / BAND_HEIGHT);
}

/**
 * Encode one band: header followed by one strip per column.
 * The header carries the image's total height, repeated in every band.
 */
export function encodeBand(image: PixelGrid, band: number): Buffer {
  const { width, height } = image;
  const out = Buffer.alloc(5 + width * 3);
  out.set([ESC, CMD.BIT_IMAGE, RASTER_MODE, ...littleEndian16(height)], 0);

  const top = band * BAND_HEIGHT;
  for (let x = 0; x < width; x++) {
    const offset = 5 + x * 3;
    for (let k = 0; k < BAND_HEIGHT; k++) {
      const y = top + k;
      if (y >= height) break;
      if (isInk(image.getPixel(x, y))) {
        out[offset + (k >> 3)] |= 0x80 >> (k & 7);
      }
    }
  }
  return out;
}

export class RasterImageEncoder {
  constructor(
    private readonly writer: RasterWriter,
    private readonly warnings: WarningCollector
  ) {}

  /**
   * Print an image band by band at the tightest line spacing, then set the
   * spacing back to 0.
   */
  print(image: PixelGrid): boolean {
    if (image.width > MAX_RASTER_DIMENSION || image.height > MAX_RASTER_DIMENSION) {
      this.warnings.report(
        validationWarning(WarningCode.IMAGE_TOO_LARGE, `Image ${image.width}x${image.height} is too large to print`, {
          value: `${image.width}x${image.height}`,
        })
      );
      return false;
    }

    this.writer.setLineSpacing(1);
    const bands = bandCount(image.height);
    for (let band = 0; band < bands; band++) {
      this.writer.writeRaw(encodeBand(image, band));
      this.writer.linefeed();
    }
    this.writer.setLineSpacing(0);
    return true;
  }
}
