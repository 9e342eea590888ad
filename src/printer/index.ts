/**
 * ESC/POS Printer Module
 *
 * Command encoding, node interpretation and raster transfer for thermal
 * receipt printers, written to any byte sink.
 *
 * @module printer
 */

// Re-export all printer types
export * from './types';

// Re-export codecs
export * from './codec';

// Re-export byte sinks
export * from './transport';

// Re-export services
export * from './services';
