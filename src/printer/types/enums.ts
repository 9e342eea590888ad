/**
 * Printer Enums
 *
 * @module printer/types/enums
 */

/**
 * Text alignment values (ESC a n)
 */
export enum TextAlignment {
  LEFT = 0,
  CENTER = 1,
  RIGHT = 2,
}

/**
 * Character font faces (ESC M n)
 */
export enum FontFace {
  A = 0,
  B = 1,
  C = 2,
}

/**
 * Barcode HRI print positions (GS H n)
 */
export enum HriPosition {
  NONE = 0,
  ABOVE = 1,
  BELOW = 2,
  BOTH = 3,
}
