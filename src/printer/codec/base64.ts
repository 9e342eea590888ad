/**
 * Base64 payload decoding
 *
 * @module printer/codec/base64
 */

import { isValidBase64 } from '../types';

/**
 * Decode standard base64.
 *
 * @returns the bytes, or null when the input is not valid base64
 */
export function decodeBase64(value: string): Buffer | null {
  if (!isValidBase64(value)) {
    return null;
  }
  return Buffer.from(value.replace(/[\r\n]/g, ''), 'base64');
}
