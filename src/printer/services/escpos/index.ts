/**
 * ESC/POS Module
 *
 * Provides ESC/POS command encoding, node interpretation and image transfer.
 *
 * @module printer/services/escpos
 */

export * from './commands';
export * from './TextEscaper';
export * from './PrinterState';
export * from './WarningCollector';
export * from './CommandEncoder';
export * from './GraphicsFrameProtocol';
export * from './RasterImageEncoder';
export * from './NodeInterpreter';
