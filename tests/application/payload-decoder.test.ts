import { describe, it, expect } from 'vitest';
import { gzipSync } from 'node:zlib';
import { strToU8, zipSync } from 'fflate';
import {
  decodePayload,
  decodePayloadText,
  detectCompression,
} from '../../src/application/payload-decoder.js';
import { MultiEntryError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const TEXT = 'event one\nevent two ☃';

describe('detectCompression', () => {
  it('detects gzip, zip and plain buffers', () => {
    expect(detectCompression(gzipSync(TEXT))).toBe('gzip');
    expect(detectCompression(zipSync({ 'f.log': strToU8(TEXT) }))).toBe('zip');
    expect(detectCompression(strToU8(TEXT))).toBe('none');
  });
});

describe('decodePayload', () => {
  it('passes plain buffers through unchanged', () => {
    const bytes = strToU8(TEXT);
    const decoded = decodePayload(bytes);
    expect(decoded.format).toBe('none');
    expect(decoded.bytes).toBe(bytes);
  });

  it('decodes gzip and zip payloads to the same text', () => {
    expect(decodePayloadText(gzipSync(TEXT))).toBe(TEXT);
    expect(decodePayloadText(zipSync({ 'f.log': strToU8(TEXT) }))).toBe(TEXT);
  });

  it('propagates gate errors unchanged', () => {
    const zip = zipSync({ 'a.log': strToU8('a'), 'b.log': strToU8('b') });
    expect(() => decodePayload(zip)).toThrow(MultiEntryError);
  });

  it('logs the detected format at debug level', () => {
    const log = fakeLogger();
    const input = gzipSync('0123456789');
    decodePayload(input, { log });
    expect(log.debug).toHaveBeenCalledWith(
      { format: 'gzip', inputBytes: input.length, outputBytes: 10 },
      'Payload decoded',
    );
  });
});
