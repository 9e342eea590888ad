/**
 * In-memory sink
 *
 * Records every write separately, so a job can be inspected write by write
 * or collected into one buffer and handed to another transport.
 *
 * @module printer/transport/BufferSink
 */

import { ByteSink } from './ByteSink';

export class BufferSink implements ByteSink {
  private chunks: Buffer[] = [];

  write(data: Buffer): number {
    this.chunks.push(Buffer.from(data));
    return data.length;
  }

  /**
   * Every write, in order
   */
  getWrites(): Buffer[] {
    return [...this.chunks];
  }

  /**
   * All writes concatenated
   */
  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  get length(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.length, 0);
  }

  clear(): void {
    this.chunks = [];
  }
}
