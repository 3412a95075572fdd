/**
 * eventwire: event wire encoding and compressed payload decoding.
 *
 * Collected bytes go through the decompression gate, the caller builds
 * Events from the text, and a formatter turns them into XML stream or
 * HEC JSON payloads ready for the transport.
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
