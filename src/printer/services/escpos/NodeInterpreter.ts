/**
 * Node Interpreter
 *
 * Maps a node (operation name, string options, payload) onto encoder calls.
 * Options are decoded into a typed struct first; the struct is then applied
 * in a fixed order because every option emits immediately.
 *
 * @module printer/services/escpos/NodeInterpreter
 */

import {
  EscPosWarning,
  NodeName,
  NodeOptions,
  WarningCode,
  isNodeName,
  isTruthyOption,
  parseInteger,
  parseWarning,
  validationWarning,
} from '../../types';
import { decodeBase64 } from '../../codec/base64';
import { debugLogger } from '../../../shared/utils/debug-logger';
import { CommandEncoder } from './CommandEncoder';
import { GraphicsFrameProtocol } from './GraphicsFrameProtocol';
import { WarningCollector } from './WarningCollector';

// ============================================================================
// Typed Options
// ============================================================================

export interface TextNodeOptions {
  align?: string;
  emphasize: boolean;
  underline: boolean;
  reverse: boolean;
  rotate: boolean;
  /** Face letter taken from the 6th character of the `font` option */
  font?: string;
  doubleWidth: boolean;
  doubleHeight: boolean;
  width?: number;
  height?: number;
  x?: number;
  y?: number;
}

export interface FeedNodeOptions {
  lines?: number;
  units?: number;
}

export interface CutNodeOptions {
  feed: boolean;
}

export interface ImageNodeOptions {
  align?: string;
  width: number;
  height: number;
}

export interface NodeResult {
  name: string;
  /** false when the name is not a recognized operation */
  handled: boolean;
  /** Warnings produced while interpreting this node only */
  warnings: EscPosWarning[];
}

type Report = (warning: EscPosWarning) => void;

function integerOption(options: NodeOptions, key: string, report: Report): number | undefined {
  if (!Object.prototype.hasOwnProperty.call(options, key)) {
    return undefined;
  }
  const parsed = parseInteger(options[key]);
  if (parsed === null) {
    report(parseWarning(key, options[key]));
    return undefined;
  }
  return parsed;
}

function stringOption(options: NodeOptions, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(options, key) ? options[key] : undefined;
}

/**
 * "font_b" selects B: the 6th character, upper-cased
 */
export function fontLetter(value: string): string {
  return value.slice(5, 6).toUpperCase();
}

export function decodeTextOptions(options: NodeOptions, report: Report): TextNodeOptions {
  const font = stringOption(options, 'font');
  return {
    align: stringOption(options, 'align'),
    emphasize: isTruthyOption(options.em),
    underline: isTruthyOption(options.ul),
    reverse: isTruthyOption(options.reverse),
    rotate: isTruthyOption(options.rotate),
    font: font === undefined ? undefined : fontLetter(font),
    doubleWidth: isTruthyOption(options.dw),
    doubleHeight: isTruthyOption(options.dh),
    width: integerOption(options, 'width', report),
    height: integerOption(options, 'height', report),
    x: integerOption(options, 'x', report),
    y: integerOption(options, 'y', report),
  };
}

export function decodeFeedOptions(options: NodeOptions, report: Report): FeedNodeOptions {
  return {
    lines: integerOption(options, 'line', report),
    units: integerOption(options, 'unit', report),
  };
}

export function decodeCutOptions(options: NodeOptions): CutNodeOptions {
  return { feed: options.type === 'feed' };
}

/**
 * Width and height are required but only informational; a missing or
 * unparsable value is reported and read as 0.
 */
export function decodeImageOptions(options: NodeOptions, report: Report): ImageNodeOptions {
  const dimension = (key: 'width' | 'height'): number => {
    if (!Object.prototype.hasOwnProperty.call(options, key)) {
      report(validationWarning(WarningCode.MISSING_OPTION, `No ${key} specified on image`, { option: key }));
      return 0;
    }
    return integerOption(options, key, report) ?? 0;
  };

  return {
    align: stringOption(options, 'align'),
    width: dimension('width'),
    height: dimension('height'),
  };
}

function previewData(data: string): string | undefined {
  if (data === '') return undefined;
  return data.length > 40 ? `${data.slice(0, 40)} ...` : data;
}

// ============================================================================
// NodeInterpreter Class
// ============================================================================

export class NodeInterpreter {
  private readonly report: Report;

  constructor(
    private readonly encoder: CommandEncoder,
    private readonly frames: GraphicsFrameProtocol,
    private readonly warnings: WarningCollector,
    private readonly sessionId?: string
  ) {
    this.report = (warning) => this.warnings.report(warning);
  }

  /**
   * Interpret one node. Unrecognized names do nothing.
   *
   * @throws TranscodingError or SinkError from the encoder
   */
  execute(name: string, options: NodeOptions = {}, data: string = ''): NodeResult {
    const start = this.warnings.size;
    debugLogger.nodeOperation(name, { options, data: previewData(data) }, this.sessionId);

    const handled = isNodeName(name);
    if (handled) {
      this.dispatch(name, options, data);
    }

    return { name, handled, warnings: this.warnings.since(start) };
  }

  private dispatch(name: NodeName, options: NodeOptions, data: string): void {
    switch (name) {
      case 'text':
        this.text(decodeTextOptions(options, this.report), data);
        break;
      case 'feed':
        this.feed(decodeFeedOptions(options, this.report));
        break;
      case 'cut':
        this.cut(decodeCutOptions(options));
        break;
      case 'pulse':
        this.encoder.pulse();
        break;
      case 'image':
        this.image(decodeImageOptions(options, this.report), data);
        break;
    }
  }

  text(options: TextNodeOptions, data: string): void {
    const encoder = this.encoder;

    if (options.align !== undefined) encoder.setAlign(options.align);
    if (options.emphasize) encoder.setEmphasize(1);
    if (options.underline) encoder.setUnderline(1);
    if (options.reverse) encoder.setReverse(1);
    if (options.rotate) encoder.setRotate(1);
    if (options.font !== undefined) encoder.setFont(options.font);
    if (options.doubleWidth) encoder.setFontSize(2, encoder.getState().height);
    if (options.doubleHeight) encoder.setFontSize(encoder.getState().width, 2);
    if (options.width !== undefined) encoder.setFontSize(options.width, encoder.getState().height);
    if (options.height !== undefined) encoder.setFontSize(encoder.getState().width, options.height);
    if (options.x !== undefined) encoder.moveX(options.x);
    if (options.y !== undefined) encoder.moveY(options.y);

    encoder.writeText(data);
  }

  /**
   * Feed, then clear every attribute on both sides: the state is reset and
   * each default value is sent again, so the next text node starts clean
   * whatever the device kept.
   */
  feed(options: FeedNodeOptions): void {
    const encoder = this.encoder;

    if (options.lines !== undefined) encoder.feedLines(options.lines);
    if (options.units !== undefined) encoder.moveY(options.units);

    encoder.linefeed();
    encoder.resetState();

    encoder.sendToggle('emphasize');
    encoder.sendToggle('rotate');
    encoder.sendToggle('reverse');
    encoder.sendToggle('underline');
    encoder.sendToggle('upsidedown');
    encoder.sendFontSize();
  }

  cut(options: CutNodeOptions): void {
    if (options.feed) {
      this.encoder.formfeed();
    }
    this.encoder.cut();
  }

  image(options: ImageNodeOptions, payload: string): void {
    if (options.align !== undefined) {
      this.encoder.setAlign(options.align);
    }

    let bitmap = decodeBase64(payload);
    if (bitmap === null) {
      this.report(
        validationWarning(WarningCode.INVALID_BASE64, 'Image payload is not valid base64', {
          value: previewData(payload),
        })
      );
      bitmap = Buffer.alloc(0);
    }

    debugLogger.debug(
      `Image len:${bitmap.length} w: ${options.width} h: ${options.height}`,
      undefined,
      'NodeInterpreter',
      { sessionId: this.sessionId, node: 'image' }
    );

    // A refused transfer must not trigger whatever graphic is already stored
    if (!this.frames.transferGraphic(bitmap)) {
      return;
    }
    this.frames.printGraphic();
  }
}
