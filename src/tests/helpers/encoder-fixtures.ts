/**
 * Fixtures shared by the encoder tests
 */

import { BufferSink } from '../../printer/transport/BufferSink';
import { CommandEncoder, CommandEncoderOptions } from '../../printer/services/escpos/CommandEncoder';
import { PrinterState } from '../../printer/services/escpos/PrinterState';
import { WarningCollector } from '../../printer/services/escpos/WarningCollector';
import { GraphicsFrameProtocol } from '../../printer/services/escpos/GraphicsFrameProtocol';
import { NodeInterpreter } from '../../printer/services/escpos/NodeInterpreter';
import { PixelGrid, Rgba } from '../../printer/types';

export const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 255 };
export const WHITE: Rgba = { r: 255, g: 255, b: 255, a: 255 };

export function createEncoder(options?: CommandEncoderOptions) {
  const sink = new BufferSink();
  const warnings = new WarningCollector('test-session');
  const encoder = new CommandEncoder(sink, new PrinterState(), warnings, options);
  return { sink, warnings, encoder };
}

export function createInterpreter() {
  const fixture = createEncoder();
  const frames = new GraphicsFrameProtocol(fixture.encoder, fixture.warnings);
  const interpreter = new NodeInterpreter(fixture.encoder, frames, fixture.warnings, 'test-session');
  return { ...fixture, frames, interpreter };
}

/**
 * Every write as a plain byte array, for toEqual comparisons
 */
export function writesOf(sink: BufferSink): number[][] {
  return sink.getWrites().map((chunk) => Array.from(chunk));
}

export function ascii(text: string): number[] {
  return Array.from(Buffer.from(text, 'latin1'));
}

/**
 * Image whose pixels come from a callback
 */
export class FunctionImage implements PixelGrid {
  constructor(
    readonly width: number,
    readonly height: number,
    private readonly pixel: (x: number, y: number) => Rgba
  ) {}

  getPixel(x: number, y: number): Rgba {
    return this.pixel(x, y);
  }
}

export function solidImage(width: number, height: number, color: Rgba): PixelGrid {
  return new FunctionImage(width, height, () => color);
}
