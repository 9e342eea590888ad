/**
 * ESC/POS Printer Session
 *
 * One session per physical printer. Owns the printer state and wires the
 * command encoder, node interpreter, raster encoder and graphics frames to
 * a single byte sink. All calls are synchronous; callers sharing a printer
 * must serialize their calls.
 *
 * @module printer/services/EscPosPrinter
 */

import { v4 as uuidv4 } from 'uuid';
import {
  EscPosError,
  EscPosErrorCode,
  EscPosWarning,
  NodeOptions,
  PixelGrid,
  PrinterStateSnapshot,
} from '../types';
import { ByteSink } from '../transport/ByteSink';
import { Transcoder } from '../codec/transcoder';
import { decodePng } from '../codec/image-decoder';
import { environment } from '../../config/environment';
import { debugLogger } from '../../shared/utils/debug-logger';
import { PrintDocumentSchema, safeValidate } from '../../schemas';
import { CommandEncoder } from './escpos/CommandEncoder';
import { GraphicsFrameProtocol } from './escpos/GraphicsFrameProtocol';
import { NodeInterpreter, NodeResult } from './escpos/NodeInterpreter';
import { PrinterState } from './escpos/PrinterState';
import { RasterImageEncoder } from './escpos/RasterImageEncoder';
import { WarningCollector } from './escpos/WarningCollector';

/**
 * Options for a printer session
 */
export interface EscPosPrinterOptions {
  /** Text encoding (default: ESCPOS_ENCODING or utf8) */
  encoding?: string;
  /** Log every write with a hex preview (default: false) */
  verbose?: boolean;
  /** Id attached to log entries (default: random uuid) */
  sessionId?: string;
  /** Replaces the iconv-lite transcoder */
  transcoder?: Transcoder;
}

/**
 * Default session options
 */
export const DEFAULT_PRINTER_OPTIONS: Required<Pick<EscPosPrinterOptions, 'encoding' | 'verbose'>> = {
  encoding: environment.ESCPOS_ENCODING,
  verbose: false,
};

export class EscPosPrinter {
  readonly sessionId: string;
  /** Direct access to every encoder command and setter */
  readonly commands: CommandEncoder;
  readonly interpreter: NodeInterpreter;
  readonly raster: RasterImageEncoder;
  readonly frames: GraphicsFrameProtocol;
  private readonly warnings: WarningCollector;

  constructor(sink: ByteSink, options: EscPosPrinterOptions = {}) {
    const resolved = { ...DEFAULT_PRINTER_OPTIONS, ...options };
    this.sessionId = options.sessionId ?? uuidv4();

    this.warnings = new WarningCollector(this.sessionId);
    this.commands = new CommandEncoder(sink, new PrinterState(), this.warnings, {
      encoding: resolved.encoding,
      verbose: resolved.verbose,
      sessionId: this.sessionId,
      transcoder: options.transcoder,
    });
    this.frames = new GraphicsFrameProtocol(this.commands, this.warnings);
    this.raster = new RasterImageEncoder(this.commands, this.warnings);
    this.interpreter = new NodeInterpreter(this.commands, this.frames, this.warnings, this.sessionId);
  }

  getState(): PrinterStateSnapshot {
    return this.commands.getState();
  }

  /**
   * Every warning reported during this session
   */
  getWarnings(): EscPosWarning[] {
    return this.warnings.getAll();
  }

  clearWarnings(): void {
    this.warnings.clear();
  }

  initialize(): number {
    return this.commands.initialize();
  }

  cut(): number {
    return this.commands.cut();
  }

  /**
   * Write text through escaping and transcoding
   */
  write(text: string, encoding?: string): number {
    return this.commands.writeText(text, encoding);
  }

  writeRaw(data: Uint8Array): number {
    return this.commands.writeRaw(data);
  }

  /**
   * Interpret one node
   */
  writeNode(name: string, options: NodeOptions = {}, data: string = ''): NodeResult {
    return this.interpreter.execute(name, options, data);
  }

  /**
   * Print an image with the bit image command. PNG bytes are decoded first.
   *
   * @returns false when the image was rejected before any byte was sent
   */
  printImage(image: PixelGrid | Buffer): boolean {
    const grid = Buffer.isBuffer(image) ? decodePng(image) : image;
    return this.raster.print(grid);
  }

  /**
   * Validate and print a JSON print document: initialize, then every node
   * in order. Nothing is written when validation fails.
   *
   * @throws EscPosError with INVALID_DOCUMENT when the document is malformed
   */
  printDocument(input: unknown): NodeResult[] {
    const parsed = safeValidate(PrintDocumentSchema, input);
    if (!parsed.success) {
      throw new EscPosError(EscPosErrorCode.INVALID_DOCUMENT, parsed.error, { recoverable: true });
    }

    const document = parsed.data;
    if (document.encoding !== undefined) {
      this.commands.setEncoding(document.encoding);
    }

    debugLogger.info(`Printing document with ${document.nodes.length} nodes`, undefined, 'EscPosPrinter', {
      sessionId: this.sessionId,
    });

    this.initialize();
    return document.nodes.map((node) => this.writeNode(node.name, node.options, node.data));
  }
}
