/**
 * Printer Types Module
 *
 * Contains the TypeScript interfaces, types, and enums shared by the
 * ESC/POS encoder, the node interpreter and the image paths.
 *
 * @module printer/types
 */

// Re-export enums
export * from './enums';

// Re-export error and warning types
export * from './errors';

// Re-export validation functions
export * from './validation';

// ============================================================================
// Printer State
// ============================================================================

/**
 * Attributes stored as a single enumerated byte
 */
export type ToggleName = 'underline' | 'emphasize' | 'upsidedown' | 'rotate' | 'reverse';

/**
 * Character scale multipliers (1-8)
 */
export interface FontSize {
  width: number;
  height: number;
}

/**
 * Read-only view of the printer state
 */
export interface PrinterStateSnapshot extends FontSize {
  underline: number;
  emphasize: number;
  upsidedown: number;
  rotate: number;
  reverse: number;
}

// ============================================================================
// Nodes
// ============================================================================

export const NODE_NAMES = ['text', 'feed', 'cut', 'pulse', 'image'] as const;

export type NodeName = (typeof NODE_NAMES)[number];

/**
 * String-keyed options as they arrive from callers
 */
export type NodeOptions = Record<string, string>;

/**
 * An abstract instruction consumed once by the interpreter
 */
export interface PrintNode {
  name: string;
  options?: NodeOptions;
  data?: string;
}

/**
 * Type guard for recognized node names
 */
export function isNodeName(name: string): name is NodeName {
  return NODE_NAMES.some((known) => known === name);
}

// ============================================================================
// Output
// ============================================================================

/**
 * Binary write path. Raster and graphics frame code only ever see this
 * interface, so their payloads never pass through text escaping.
 */
export interface RawWriter {
  writeRaw(data: Uint8Array): number;
}

// ============================================================================
// Images
// ============================================================================

/**
 * One pixel with 8-bit, non-premultiplied channels
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Decoded image with random pixel access
 */
export interface PixelGrid {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): Rgba;
}
