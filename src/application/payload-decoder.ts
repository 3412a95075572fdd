import type { Logger } from 'pino';
import type { CompressionFormat } from '../domain/index.js';
import { decompressGzip, decompressZip, isGzip, isZip } from './decompression.js';

export type DetectedCompression = CompressionFormat | 'none';

export interface DecodedPayload {
  readonly format: DetectedCompression;
  readonly bytes: Uint8Array;
}

export interface DecodeOptions {
  readonly log?: Logger;
}

/** Sniffs the container format. Gzip magic is checked before the zip trailer. */
export function detectCompression(bytes: Uint8Array): DetectedCompression {
  if (isGzip(bytes)) return 'gzip';
  if (isZip(bytes)) return 'zip';
  return 'none';
}

/**
 * Decompresses a collected buffer according to its sniffed format.
 * Uncompressed buffers pass through untouched; gate errors propagate as-is.
 */
export function decodePayload(bytes: Uint8Array, options: DecodeOptions = {}): DecodedPayload {
  const format = detectCompression(bytes);

  const decoded =
    format === 'gzip' ? decompressGzip(bytes)
    : format === 'zip' ? decompressZip(bytes)
    : bytes;

  options.log?.debug(
    { format, inputBytes: bytes.length, outputBytes: decoded.length },
    'Payload decoded',
  );

  return { format, bytes: decoded };
}

/** {@link decodePayload} followed by UTF-8 decoding. */
export function decodePayloadText(bytes: Uint8Array, options: DecodeOptions = {}): string {
  return new TextDecoder('utf-8').decode(decodePayload(bytes, options).bytes);
}
