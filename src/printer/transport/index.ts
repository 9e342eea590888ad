/**
 * Printer Transport Module
 *
 * Byte sinks the encoder writes through:
 * - BufferSink (in memory)
 * - DeviceFileSink (device node or capture file)
 *
 * @module printer/transport
 */

export type { ByteSink } from './ByteSink';

export { BufferSink } from './BufferSink';

export type { DeviceFileSinkOptions } from './DeviceFileSink';
export { DeviceFileSink } from './DeviceFileSink';
