/**
 * Printer Argument Validation
 *
 * Domain checks and option coercion for the command encoder and the node
 * interpreter.
 *
 * @module printer/types/validation
 */

import type { ToggleName } from './index';
import { FontFace, TextAlignment } from './enums';

// ============================================================================
// Attribute Domains
// ============================================================================

/**
 * Legal values for each toggle attribute.
 *
 * Only the numeric forms are accepted. The ASCII forms '0'/'1' (0x30/0x31)
 * that ESC -, ESC E and ESC { also take are excluded: the state stores one
 * value per attribute and the feed node re-sends it as-is.
 */
export const TOGGLE_DOMAINS: Record<ToggleName, readonly number[]> = {
  underline: [0, 1, 2],
  emphasize: [0, 1],
  upsidedown: [0, 1],
  rotate: [0, 1, 2],
  reverse: [0, 1],
};

export const MIN_FONT_SCALE = 1;
export const MAX_FONT_SCALE = 8;

/**
 * Heights above this value hang common print heads; requests are clamped to it
 */
export const MAX_FONT_HEIGHT = 5;

export const MAX_POSITION = 0xffff;

export const ALIGNMENT_VALUES: Record<string, TextAlignment> = {
  left: TextAlignment.LEFT,
  center: TextAlignment.CENTER,
  right: TextAlignment.RIGHT,
};

export const FONT_FACE_VALUES: Record<string, FontFace> = {
  A: FontFace.A,
  B: FontFace.B,
  C: FontFace.C,
};

/**
 * Check a toggle value against its domain
 */
export function isValidToggleValue(name: ToggleName, value: number): boolean {
  return TOGGLE_DOMAINS[name].includes(value);
}

/**
 * Validate a font scale multiplier (integer 1-8)
 */
export function isValidFontScale(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_FONT_SCALE && value <= MAX_FONT_SCALE;
}

/**
 * Validate an absolute head position (16-bit unsigned)
 */
export function isValidPosition(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_POSITION;
}

/**
 * Validate a single protocol byte
 */
export function isValidByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}

/**
 * Clamp an integer into the byte range
 */
export function clampByte(value: number): number {
  return Math.max(0, Math.min(0xff, value));
}

/**
 * Look up an alignment keyword (left, center, right)
 */
export function parseAlignment(value: string): TextAlignment | undefined {
  return Object.prototype.hasOwnProperty.call(ALIGNMENT_VALUES, value) ? ALIGNMENT_VALUES[value] : undefined;
}

/**
 * Look up a font face letter (A, B, C)
 */
export function parseFontFace(value: string): FontFace | undefined {
  return Object.prototype.hasOwnProperty.call(FONT_FACE_VALUES, value) ? FONT_FACE_VALUES[value] : undefined;
}

// ============================================================================
// Option Coercion
// ============================================================================

const INTEGER_REGEX = /^[+-]?\d+$/;

/**
 * Parse a decimal integer option. Whitespace, fractions and trailing
 * characters are rejected.
 *
 * @returns the integer, or null when the value is not one
 */
export function parseInteger(value: string): number | null {
  if (!INTEGER_REGEX.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * An option is truthy when its value is exactly "true" or "1"
 */
export function isTruthyOption(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

// ============================================================================
// Base64
// ============================================================================

const BASE64_REGEX = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Validate standard (padded) base64. Line breaks are ignored.
 */
export function isValidBase64(value: string): boolean {
  const compact = value.replace(/[\r\n]/g, '');
  return compact.length % 4 === 0 && BASE64_REGEX.test(compact);
}
