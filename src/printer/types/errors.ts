/**
 * Printer Errors and Warnings
 *
 * Fatal failures (transcoding, sink, malformed documents) are thrown as
 * EscPosError subclasses. Recoverable problems with a single option or
 * argument are reported as EscPosWarning values and never thrown.
 *
 * @module printer/types/errors
 */

/**
 * Error codes carried by thrown errors
 */
export enum EscPosErrorCode {
  TRANSCODING_FAILED = 'TRANSCODING_FAILED',
  SINK_WRITE_FAILED = 'SINK_WRITE_FAILED',
  SINK_NOT_OPEN = 'SINK_NOT_OPEN',
  IMAGE_DECODE_FAILED = 'IMAGE_DECODE_FAILED',
  INVALID_DOCUMENT = 'INVALID_DOCUMENT',
}

/**
 * Codes carried by recoverable warnings
 */
export enum WarningCode {
  INVALID_FONT_SIZE = 'INVALID_FONT_SIZE',
  FONT_HEIGHT_CLAMPED = 'FONT_HEIGHT_CLAMPED',
  INVALID_TOGGLE_VALUE = 'INVALID_TOGGLE_VALUE',
  INVALID_POSITION = 'INVALID_POSITION',
  INVALID_PARAM_COUNT = 'INVALID_PARAM_COUNT',
  INVALID_ALIGNMENT = 'INVALID_ALIGNMENT',
  INVALID_FONT = 'INVALID_FONT',
  VALUE_CLAMPED = 'VALUE_CLAMPED',
  INVALID_BYTE_VALUE = 'INVALID_BYTE_VALUE',
  INVALID_BARCODE_DATA = 'INVALID_BARCODE_DATA',
  INVALID_NUMBER = 'INVALID_NUMBER',
  MISSING_OPTION = 'MISSING_OPTION',
  INVALID_BASE64 = 'INVALID_BASE64',
  INVALID_FRAME_FIELD = 'INVALID_FRAME_FIELD',
  FRAME_TOO_LARGE = 'FRAME_TOO_LARGE',
  IMAGE_TOO_LARGE = 'IMAGE_TOO_LARGE',
  INVALID_BIT_IMAGE_DATA = 'INVALID_BIT_IMAGE_DATA',
}

/**
 * validation: a value outside its domain was clamped or skipped.
 * parse: a numeric option could not be converted.
 */
export type WarningKind = 'validation' | 'parse';

export interface EscPosWarning {
  kind: WarningKind;
  code: WarningCode;
  message: string;
  /** Node option that produced the warning, when there is one */
  option?: string;
  value?: string | number;
}

export function validationWarning(
  code: WarningCode,
  message: string,
  details: Pick<EscPosWarning, 'option' | 'value'> = {}
): EscPosWarning {
  return { kind: 'validation', code, message, ...details };
}

export function parseWarning(option: string, value: string, message?: string): EscPosWarning {
  return {
    kind: 'parse',
    code: WarningCode.INVALID_NUMBER,
    message: message ?? `Invalid ${option} number: '${value}'`,
    option,
    value,
  };
}

/**
 * Base class for errors surfaced to the caller
 */
export class EscPosError extends Error {
  readonly code: EscPosErrorCode;
  readonly recoverable: boolean;
  readonly originalError?: Error;

  constructor(code: EscPosErrorCode, message: string, options: { recoverable?: boolean; originalError?: unknown } = {}) {
    super(message);
    this.name = 'EscPosError';
    this.code = code;
    this.recoverable = options.recoverable ?? false;
    if (options.originalError instanceof Error) {
      this.originalError = options.originalError;
    }
  }
}

/**
 * Text could not be converted to the target encoding. Nothing was written.
 */
export class TranscodingError extends EscPosError {
  readonly encoding: string;

  constructor(encoding: string, message: string, originalError?: unknown) {
    super(EscPosErrorCode.TRANSCODING_FAILED, message, { originalError });
    this.name = 'TranscodingError';
    this.encoding = encoding;
  }
}

/**
 * The byte sink rejected a write. Bytes written earlier in the same
 * operation have already reached the device.
 */
export class SinkError extends EscPosError {
  constructor(message: string, originalError?: unknown, code: EscPosErrorCode = EscPosErrorCode.SINK_WRITE_FAILED) {
    super(code, message, { originalError });
    this.name = 'SinkError';
  }
}

/**
 * Normalize any thrown value to a message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
