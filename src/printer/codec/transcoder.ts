/**
 * Text Transcoding
 *
 * Converts JavaScript strings to the byte encoding selected on the printer
 * (code page 437, 850, GBK, ...).
 *
 * @module printer/codec/transcoder
 */

import * as iconv from 'iconv-lite';
import { TranscodingError, getErrorMessage } from '../types';

export type Transcoder = (text: string, encoding: string) => Buffer;

export function isSupportedEncoding(encoding: string): boolean {
  return iconv.encodingExists(encoding);
}

export const transcode: Transcoder = (text, encoding) => {
  if (!isSupportedEncoding(encoding)) {
    throw new TranscodingError(encoding, `Unsupported encoding: ${encoding}`);
  }

  try {
    return iconv.encode(text, encoding);
  } catch (error) {
    throw new TranscodingError(encoding, `Failed to encode text as ${encoding}: ${getErrorMessage(error)}`, error);
  }
};
