/**
 * Image Decoding
 *
 * @module printer/codec/image-decoder
 */

import { PNG } from 'pngjs';
import { EscPosError, EscPosErrorCode, PixelGrid, Rgba, getErrorMessage } from '../types';

/**
 * Pixel grid over a row-major RGBA byte buffer
 */
export class RgbaPixelGrid implements PixelGrid {
  constructor(
    readonly width: number,
    readonly height: number,
    private readonly data: Uint8Array
  ) {
    if (data.length < width * height * 4) {
      throw new RangeError(`RGBA buffer holds ${data.length} bytes, ${width}x${height} needs ${width * height * 4}`);
    }
  }

  getPixel(x: number, y: number): Rgba {
    const i = (y * this.width + x) * 4;
    return { r: this.data[i], g: this.data[i + 1], b: this.data[i + 2], a: this.data[i + 3] };
  }
}

/**
 * Decode a PNG file into a pixel grid
 */
export function decodePng(bytes: Buffer): PixelGrid {
  let png: PNG;
  try {
    png = PNG.sync.read(bytes);
  } catch (error) {
    throw new EscPosError(EscPosErrorCode.IMAGE_DECODE_FAILED, `Image must be PNG format: ${getErrorMessage(error)}`, {
      originalError: error,
    });
  }
  return new RgbaPixelGrid(png.width, png.height, png.data);
}
