/**
 * ESC/POS command bytes
 *
 * @module printer/services/escpos/commands
 */

export const ESC = 0x1b; // Escape
export const GS = 0x1d; // Group Separator
export const LF = 0x0a; // Line Feed
export const NUL = 0x00;

/**
 * Second byte of each command, keyed by what it does
 */
export const CMD = {
  INITIALIZE: 0x40, // ESC @
  CUT: 0x56, // GS V
  BAN_FEED_BUTTON: 0x63, // ESC c 5 n
  BEEP: 0x42, // ESC B n t
  FEED_DOTS: 0x4a, // ESC J n
  FONT: 0x4d, // ESC M n
  FONT_SIZE: 0x21, // GS ! n
  UNDERLINE: 0x2d, // ESC - n
  EMPHASIZE: 0x45, // ESC E n
  UPSIDEDOWN: 0x7b, // ESC { n
  ROTATE: 0x56, // ESC V n
  REVERSE: 0x42, // GS B n
  ABSOLUTE_POSITION: 0x24, // ESC $ nL nH / GS $ nL nH
  PULSE: 0x70, // ESC p t
  DEFAULT_LINE_SPACING: 0x32, // ESC 2
  LINE_SPACING: 0x33, // ESC 3 n
  ALIGN: 0x61, // ESC a n
  BARCODE: 0x6b, // GS k m d1...dk NUL
  BARCODE_HRI_POSITION: 0x48, // GS H n
  BARCODE_HRI_FONT: 0x66, // GS f n
  BARCODE_HEIGHT: 0x68, // GS h n
  DEFINE_DOWNLOADED_BIT_IMAGE: 0x2a, // GS * x y d1...dk
  PRINT_DOWNLOADED_BIT_IMAGE: 0x2f, // GS / m
  BIT_IMAGE: 0x2a, // ESC * m nL nH
} as const;

/** GS V 'A' '0' */
export const FULL_CUT_SEQUENCE: readonly number[] = [GS, CMD.CUT, 0x41, 0x30];

/** Beep duration byte sent after the count */
export const BEEP_DURATION = 9;

/** Default drawer pulse time (2 x 2ms) */
export const DEFAULT_PULSE_TIME = 2;

/** Barcode system selected by GS k (CODE39, NUL-terminated form) */
export const BARCODE_SYSTEM_CODE39 = 4;

/** Bytes per 8x8-dot block of a downloaded bit image */
export const BIT_IMAGE_BLOCK_BYTES = 8;

/**
 * Split a 16-bit value into [low, high]
 */
export function littleEndian16(value: number): [number, number] {
  return [value & 0xff, (value >> 8) & 0xff];
}
