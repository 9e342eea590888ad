/**
 * ESC/POS Command Encoder
 *
 * Serializes printer state changes and immediate instructions into ESC/POS
 * byte sequences and writes each one through the sink as soon as it is
 * produced. Every setter validates, updates one PrinterState field and emits
 * the whole new value of that attribute in a single write.
 *
 * @module printer/services/escpos/CommandEncoder
 */

import {
  EscPosWarning,
  PrinterStateSnapshot,
  RawWriter,
  SinkError,
  ToggleName,
  WarningCode,
  MAX_FONT_HEIGHT,
  clampByte,
  getErrorMessage,
  isValidByte,
  isValidFontScale,
  isValidPosition,
  isValidToggleValue,
  parseAlignment,
  parseFontFace,
  validationWarning,
  FontFace,
} from '../../types';
import { ByteSink } from '../../transport/ByteSink';
import { Transcoder, transcode } from '../../codec/transcoder';
import { debugLogger, hexPreview } from '../../../shared/utils/debug-logger';
import { PrinterState } from './PrinterState';
import { WarningCollector } from './WarningCollector';
import { escapeText } from './TextEscaper';
import {
  BARCODE_SYSTEM_CODE39,
  BEEP_DURATION,
  BIT_IMAGE_BLOCK_BYTES,
  CMD,
  DEFAULT_PULSE_TIME,
  ESC,
  FULL_CUT_SEQUENCE,
  GS,
  LF,
  NUL,
  littleEndian16,
} from './commands';

/**
 * Options for the command encoder
 */
export interface CommandEncoderOptions {
  /** Text encoding used by writeText (default: utf8) */
  encoding?: string;
  /** Log every write with a hex preview */
  verbose?: boolean;
  /** Session id attached to log entries */
  sessionId?: string;
  /** Replaces the iconv-lite transcoder */
  transcoder?: Transcoder;
}

const TOGGLE_COMMANDS: Record<ToggleName, readonly [number, number]> = {
  underline: [ESC, CMD.UNDERLINE],
  emphasize: [ESC, CMD.EMPHASIZE],
  upsidedown: [ESC, CMD.UPSIDEDOWN],
  rotate: [ESC, CMD.ROTATE],
  reverse: [GS, CMD.REVERSE],
};

/**
 * Encoder bound to one sink and one PrinterState.
 *
 * Usage:
 * ```typescript
 * const sink = new BufferSink();
 * const encoder = new CommandEncoder(sink, new PrinterState(), new WarningCollector());
 * encoder.initialize();
 * encoder.setAlign('center');
 * encoder.setEmphasize(1);
 * encoder.writeText('RECEIPT\n');
 * encoder.cut();
 * ```
 */
export class CommandEncoder implements RawWriter {
  private encoding: string;
  private readonly verbose: boolean;
  private readonly sessionId?: string;
  private readonly transcoder: Transcoder;

  constructor(
    private readonly sink: ByteSink,
    private readonly state: PrinterState,
    private readonly warnings: WarningCollector,
    options: CommandEncoderOptions = {}
  ) {
    this.encoding = options.encoding ?? 'utf8';
    this.verbose = options.verbose ?? false;
    this.sessionId = options.sessionId;
    this.transcoder = options.transcoder ?? transcode;
  }

  // ==========================================================================
  // State Access
  // ==========================================================================

  getState(): PrinterStateSnapshot {
    return this.state.snapshot();
  }

  getEncoding(): string {
    return this.encoding;
  }

  /**
   * Select the encoding used by subsequent writeText calls
   */
  setEncoding(encoding: string): void {
    this.encoding = encoding;
  }

  /**
   * Restore the default state without emitting anything
   */
  resetState(): void {
    this.state.reset();
  }

  // ==========================================================================
  // Write Primitives
  // ==========================================================================

  /**
   * Write bytes to the sink unmodified. Empty input is not written.
   *
   * @throws SinkError when the sink rejects the write
   */
  writeRaw(data: Uint8Array): number {
    if (this.verbose) {
      debugLogger.byteWrite(data.length, hexPreview(data), 'CommandEncoder', { sessionId: this.sessionId });
    }
    if (data.length === 0) {
      return 0;
    }

    const buffer = Buffer.isBuffer(data) ? data : Buffer.from(data);
    try {
      return this.sink.write(buffer);
    } catch (error) {
      if (error instanceof SinkError) {
        throw error;
      }
      throw new SinkError(`Sink write failed: ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Escape entity tokens, transcode and write text.
   * Transcoding completes before anything is written.
   *
   * @param encoding - overrides the session encoding for this call
   * @throws TranscodingError when the text cannot be encoded
   */
  writeText(text: string, encoding: string = this.encoding): number {
    const escaped = escapeText(text);
    if (escaped.length === 0) {
      return 0;
    }
    return this.writeRaw(this.transcoder(escaped, encoding));
  }

  private emit(bytes: readonly number[]): number {
    return this.writeRaw(Buffer.from(bytes));
  }

  private report(warning: EscPosWarning): void {
    this.warnings.report(warning);
  }

  /**
   * Coerce a byte argument: non-integers are rejected, integers outside
   * 0-255 are clamped. Both cases are reported.
   */
  private toByte(value: number, label: string): number | null {
    if (!Number.isInteger(value)) {
      this.report(validationWarning(WarningCode.INVALID_BYTE_VALUE, `Invalid ${label}: ${value}`, { value }));
      return null;
    }
    if (!isValidByte(value)) {
      const clamped = clampByte(value);
      this.report(
        validationWarning(WarningCode.VALUE_CLAMPED, `${label} ${value} out of range, using ${clamped}`, { value })
      );
      return clamped;
    }
    return value;
  }

  // ==========================================================================
  // Initialization and Paper Handling
  // ==========================================================================

  /**
   * Reset state and initialize the printer (ESC @)
   */
  initialize(): number {
    this.state.reset();
    return this.emit([ESC, CMD.INITIALIZE]);
  }

  /**
   * Full cut (GS V A 0)
   */
  cut(): number {
    return this.emit(FULL_CUT_SEQUENCE);
  }

  linefeed(): number {
    return this.emit([LF]);
  }

  /**
   * Print and feed n dots (ESC J n)
   */
  feedDots(n: number): boolean {
    const value = this.toByte(n, 'dot feed');
    if (value === null) return false;
    this.emit([ESC, CMD.FEED_DOTS, value]);
    return true;
  }

  /**
   * Print and feed n lines.
   * Sends ESC J, the same command as feedDots; devices in the field were
   * driven with this byte and it is kept as-is.
   */
  feedLines(n: number): boolean {
    const value = this.toByte(n, 'line feed');
    if (value === null) return false;
    this.emit([ESC, CMD.FEED_DOTS, value]);
    return true;
  }

  /**
   * Print and feed one line
   */
  formfeed(): boolean {
    return this.feedLines(1);
  }

  /**
   * Enable (1) or disable (0) the panel feed button (ESC c 5 n)
   */
  banFeedButton(n: number): boolean {
    const value = this.toByte(n, 'feed button flag');
    if (value === null) return false;
    this.emit([ESC, CMD.BAN_FEED_BUTTON, 0x35, value]);
    return true;
  }

  // ==========================================================================
  // Peripherals
  // ==========================================================================

  /**
   * Sound the buzzer n times (ESC B n 9)
   */
  beep(n: number): boolean {
    const value = this.toByte(n, 'beep count');
    if (value === null) return false;
    this.emit([ESC, CMD.BEEP, value, BEEP_DURATION]);
    return true;
  }

  /**
   * Pulse the cash drawer pin (ESC p t)
   * @param time - pulse length in 2ms units
   */
  pulse(time: number = DEFAULT_PULSE_TIME): boolean {
    const value = this.toByte(time, 'pulse time');
    if (value === null) return false;
    this.emit([ESC, CMD.PULSE, value]);
    return true;
  }

  // ==========================================================================
  // Character Size and Toggles
  // ==========================================================================

  /**
   * Set character scales (GS ! n)
   *
   * Heights above 5 are clamped to 5. Any other value outside 1-8 is
   * rejected and nothing is sent.
   */
  setFontSize(width: number, height: number): boolean {
    if (!isValidFontScale(width) || !isValidFontScale(height)) {
      this.report(
        validationWarning(WarningCode.INVALID_FONT_SIZE, `Invalid font size passed: ${width} x ${height}`, {
          value: `${width}x${height}`,
        })
      );
      return false;
    }

    let effectiveHeight = height;
    if (height > MAX_FONT_HEIGHT) {
      effectiveHeight = MAX_FONT_HEIGHT;
      this.report(
        validationWarning(
          WarningCode.FONT_HEIGHT_CLAMPED,
          `Font height ${height} clamped to ${MAX_FONT_HEIGHT}`,
          { value: height }
        )
      );
    }

    this.state.setFontSize(width, effectiveHeight);
    this.sendFontSize();
    return true;
  }

  private setToggle(name: ToggleName, value: number): boolean {
    if (!isValidToggleValue(name, value)) {
      this.report(validationWarning(WarningCode.INVALID_TOGGLE_VALUE, `Invalid ${name} value: ${value}`, { value }));
      return false;
    }
    this.state.setToggle(name, value);
    this.sendToggle(name);
    return true;
  }

  /**
   * Underline mode (ESC - n): 0 off, 1 one dot, 2 two dots
   */
  setUnderline(value: number): boolean {
    return this.setToggle('underline', value);
  }

  /**
   * Emphasized mode (ESC E n)
   */
  setEmphasize(value: number): boolean {
    return this.setToggle('emphasize', value);
  }

  /**
   * Upside-down mode (ESC { n)
   */
  setUpsidedown(value: number): boolean {
    return this.setToggle('upsidedown', value);
  }

  /**
   * 90 degree rotation (ESC V n)
   */
  setRotate(value: number): boolean {
    return this.setToggle('rotate', value);
  }

  /**
   * White/black reverse mode (GS B n)
   */
  setReverse(value: number): boolean {
    return this.setToggle('reverse', value);
  }

  // Emit the current value of an attribute without changing it

  sendFontSize(): number {
    return this.emit([GS, CMD.FONT_SIZE, this.state.fontSizeByte()]);
  }

  sendToggle(name: ToggleName): number {
    const [prefix, command] = TOGGLE_COMMANDS[name];
    return this.emit([prefix, command, this.state.getToggle(name)]);
  }

  // ==========================================================================
  // Positioning and Layout
  // ==========================================================================

  /**
   * Absolute horizontal position (ESC $ nL nH)
   */
  moveX(x: number): boolean {
    if (!isValidPosition(x)) {
      this.report(validationWarning(WarningCode.INVALID_POSITION, `Invalid x position: ${x}`, { value: x }));
      return false;
    }
    this.emit([ESC, CMD.ABSOLUTE_POSITION, ...littleEndian16(x)]);
    return true;
  }

  /**
   * Absolute vertical position (GS $ nL nH)
   */
  moveY(y: number): boolean {
    if (!isValidPosition(y)) {
      this.report(validationWarning(WarningCode.INVALID_POSITION, `Invalid y position: ${y}`, { value: y }));
      return false;
    }
    this.emit([GS, CMD.ABSOLUTE_POSITION, ...littleEndian16(y)]);
    return true;
  }

  /**
   * Line spacing: no argument selects the default spacing (ESC 2),
   * one argument sets n dots (ESC 3 n). Extra arguments are reported and
   * ignored.
   */
  setLineSpacing(...spacing: number[]): boolean {
    if (spacing.length === 0) {
      this.emit([ESC, CMD.DEFAULT_LINE_SPACING]);
      return true;
    }
    if (spacing.length > 1) {
      this.report(
        validationWarning(WarningCode.INVALID_PARAM_COUNT, 'Invalid num of params, using first param', {
          value: spacing.length,
        })
      );
    }

    const value = this.toByte(spacing[0], 'line spacing');
    if (value === null) return false;
    this.emit([ESC, CMD.LINE_SPACING, value]);
    return true;
  }

  /**
   * Justification (ESC a n): left, center or right
   */
  setAlign(align: string): boolean {
    const alignment = parseAlignment(align);
    if (alignment === undefined) {
      this.report(validationWarning(WarningCode.INVALID_ALIGNMENT, `Invalid alignment: ${align}`, { value: align }));
      return false;
    }
    this.emit([ESC, CMD.ALIGN, alignment]);
    return true;
  }

  /**
   * Character font (ESC M n). Unknown faces fall back to font A.
   */
  setFont(font: string): boolean {
    let face = parseFontFace(font);
    if (face === undefined) {
      this.report(
        validationWarning(WarningCode.INVALID_FONT, `Invalid font: '${font}', defaulting to 'A'`, { value: font })
      );
      face = FontFace.A;
    }
    this.emit([ESC, CMD.FONT, face]);
    return true;
  }

  // ==========================================================================
  // Barcodes
  // ==========================================================================

  /**
   * Print a CODE39 barcode (GS k 4 data NUL)
   */
  barcode(data: string): boolean {
    const bytes: number[] = [];
    for (let i = 0; i < data.length; i++) {
      const code = data.charCodeAt(i);
      if (code > 0xff || code === NUL) {
        this.report(
          validationWarning(WarningCode.INVALID_BARCODE_DATA, `Barcode data has an unencodable character at ${i}`, {
            value: data,
          })
        );
        return false;
      }
      bytes.push(code);
    }
    this.emit([GS, CMD.BARCODE, BARCODE_SYSTEM_CODE39, ...bytes, NUL]);
    return true;
  }

  /**
   * HRI position (GS H n): 0 none, 1 above, 2 below, 3 both
   */
  setBarcodeHriPosition(n: number): boolean {
    const value = this.toByte(n, 'HRI position');
    if (value === null) return false;
    this.emit([GS, CMD.BARCODE_HRI_POSITION, value]);
    return true;
  }

  /**
   * HRI font (GS f n): 0 font A (12x24), 1 font B (9x17)
   */
  setBarcodeHriFont(n: number): boolean {
    const value = this.toByte(n, 'HRI font');
    if (value === null) return false;
    this.emit([GS, CMD.BARCODE_HRI_FONT, value]);
    return true;
  }

  /**
   * Bar height in dots (GS h n)
   */
  setBarcodeHeight(n: number): boolean {
    const value = this.toByte(n, 'barcode height');
    if (value === null) return false;
    this.emit([GS, CMD.BARCODE_HEIGHT, value]);
    return true;
  }

  // ==========================================================================
  // Stored Graphics
  // ==========================================================================

  /**
   * Define the downloaded bit image (GS * x y d1...dk).
   * The image is x * 8 dots wide and y * 8 dots high; `data` holds
   * x * y * 8 bytes, column by column.
   */
  defineDownloadedBitImage(x: number, y: number, data: Uint8Array): boolean {
    for (const [label, value] of [
      ['width', x],
      ['height', y],
    ] as const) {
      if (!isValidByte(value) || value === 0) {
        this.report(
          validationWarning(WarningCode.INVALID_BYTE_VALUE, `Invalid bit image ${label}: ${value}`, { value })
        );
        return false;
      }
    }

    const expected = x * y * BIT_IMAGE_BLOCK_BYTES;
    if (data.length !== expected) {
      this.report(
        validationWarning(
          WarningCode.INVALID_BIT_IMAGE_DATA,
          `Bit image of ${x}x${y} blocks needs ${expected} bytes, got ${data.length}`,
          { value: data.length }
        )
      );
      return false;
    }

    this.writeRaw(Buffer.concat([Buffer.from([GS, CMD.DEFINE_DOWNLOADED_BIT_IMAGE, x, y]), data]));
    return true;
  }

  /**
   * Print the downloaded bit image (GS / m)
   * @param mode - 0 normal, 1 double width, 2 double height, 3 quadruple
   */
  printDownloadedBitImage(mode: number = 0): boolean {
    const value = this.toByte(mode, 'bit image mode');
    if (value === null) return false;
    this.emit([GS, CMD.PRINT_DOWNLOADED_BIT_IMAGE, value]);
    return true;
  }
}
