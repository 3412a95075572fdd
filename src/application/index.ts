export { eventSchema, createEvent, safeCreateEvent, describeEvent, toValidationIssues } from './event-schema.js';
export type { EventInput, CreateEventResult } from './event-schema.js';
export { formatXmlEvent, formatXmlEvents } from './xml-formatter.js';
export type { XmlFormatOptions } from './xml-formatter.js';
export { formatHecEvents, toHecPayload } from './hec-formatter.js';
export type { HecFormatOptions, HecPayload } from './hec-formatter.js';
export { escapeJsonControlChars } from './control-chars.js';
export { batchLimitSchema } from './batch-limits.js';
export {
  isGzip,
  decompressGzip,
  safeDecompressGzip,
  isZip,
  listZipEntries,
  decompressZip,
  safeDecompressZip,
} from './decompression.js';
export type { ZipEntryInfo } from './decompression.js';
export { detectCompression, decodePayload, decodePayloadText } from './payload-decoder.js';
export type { DetectedCompression, DecodedPayload, DecodeOptions } from './payload-decoder.js';
export { isTrue, isFalse, dateToSeconds } from './conversions.js';
