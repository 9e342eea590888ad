/**
 * Printer Services Module
 *
 * @module printer/services
 */

// ESC/POS encoding
export * from './escpos';

// Printer session
export type { EscPosPrinterOptions } from './EscPosPrinter';
export { EscPosPrinter, DEFAULT_PRINTER_OPTIONS } from './EscPosPrinter';
