/**
 * Codec Module
 *
 * Adapters for the external collaborators of the encoder: text transcoding,
 * PNG decoding and base64.
 *
 * @module printer/codec
 */

export type { Transcoder } from './transcoder';
export { transcode, isSupportedEncoding } from './transcoder';
export { RgbaPixelGrid, decodePng } from './image-decoder';
export { decodeBase64 } from './base64';
