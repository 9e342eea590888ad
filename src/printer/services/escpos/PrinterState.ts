/**
 * Printer State
 *
 * Attribute toggles and character scales of one printer session. Only the
 * command encoder mutates it, in the same call that emits the matching
 * escape sequence.
 *
 * @module printer/services/escpos/PrinterState
 */

import { FontSize, PrinterStateSnapshot, ToggleName } from '../../types';

export const DEFAULT_PRINTER_STATE: Readonly<PrinterStateSnapshot> = Object.freeze({
  width: 1,
  height: 1,
  underline: 0,
  emphasize: 0,
  upsidedown: 0,
  rotate: 0,
  reverse: 0,
});

export class PrinterState {
  private fontSize: FontSize = { width: 1, height: 1 };
  private toggles: Record<ToggleName, number> = {
    underline: 0,
    emphasize: 0,
    upsidedown: 0,
    rotate: 0,
    reverse: 0,
  };

  constructor() {
    this.reset();
  }

  /**
   * Restore every field to its default
   */
  reset(): void {
    this.fontSize = { width: DEFAULT_PRINTER_STATE.width, height: DEFAULT_PRINTER_STATE.height };
    this.toggles = {
      underline: DEFAULT_PRINTER_STATE.underline,
      emphasize: DEFAULT_PRINTER_STATE.emphasize,
      upsidedown: DEFAULT_PRINTER_STATE.upsidedown,
      rotate: DEFAULT_PRINTER_STATE.rotate,
      reverse: DEFAULT_PRINTER_STATE.reverse,
    };
  }

  get width(): number {
    return this.fontSize.width;
  }

  get height(): number {
    return this.fontSize.height;
  }

  getToggle(name: ToggleName): number {
    return this.toggles[name];
  }

  /**
   * Callers validate before calling; the state does not re-check.
   */
  setFontSize(width: number, height: number): void {
    this.fontSize = { width, height };
  }

  setToggle(name: ToggleName, value: number): void {
    this.toggles[name] = value;
  }

  /**
   * GS ! parameter: width scale in the high nibble, height in the low nibble
   */
  fontSizeByte(): number {
    return ((this.fontSize.width - 1) << 4) | (this.fontSize.height - 1);
  }

  snapshot(): PrinterStateSnapshot {
    return Object.freeze({ ...this.fontSize, ...this.toggles });
  }
}
