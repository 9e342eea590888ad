/**
 * Byte Sink Interface
 *
 * The destination every encoded byte is written to. A sink must pass control
 * bytes (0x00-0x1F) through unmodified and throws when a write fails.
 * Buffering, timeouts and reconnection belong to the sink, not to the
 * encoder.
 *
 * @module printer/transport/ByteSink
 */

export interface ByteSink {
  /**
   * Write all of `data` synchronously.
   *
   * @returns number of bytes written
   */
  write(data: Buffer): number;
}
