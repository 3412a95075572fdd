import { crc32, gunzipSync } from 'node:zlib';
import { inflateSync, unzipSync } from 'fflate';
import {
  ExtractionError,
  FormatError,
  MultiEntryError,
  SizeMismatchError,
  fail,
  ok,
} from '../domain/index.js';
import type { GateResult } from '../domain/index.js';

// ── Gzip ─────────────────────────────────────────────────────

/** RFC 1952 member header: ID1, ID2. */
const GZIP_MAGIC = [0x1f, 0x8b] as const;

/** True iff the buffer starts with the gzip magic bytes. */
export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

/**
 * Validates and inflates a gzip buffer.
 *
 * Corrupt or truncated streams are reported as FormatError, same as a
 * missing signature.
 */
export function safeDecompressGzip(bytes: Uint8Array): GateResult<Uint8Array> {
  if (!isGzip(bytes)) {
    return fail(new FormatError('gzip'));
  }

  try {
    return ok(gunzipSync(bytes));
  } catch (err: unknown) {
    return fail(new FormatError('gzip', 'Gzip stream is corrupt.', { cause: err }));
  }
}

/** @throws FormatError */
export function decompressGzip(bytes: Uint8Array): Uint8Array {
  const result = safeDecompressGzip(bytes);
  if (!result.ok) throw result.error;
  return result.value;
}

// ── Zip ──────────────────────────────────────────────────────

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_MARKER = 0xffffffff;
const ZIP64_EXTRA_ID = 0x0001;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const LOCAL_HEADER_SIZE = 30;
const FLAG_ENCRYPTED = 0x1;
const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

/** An entry as recorded in the central directory. */
export interface ZipEntryInfo {
  readonly name: string;
  readonly compressedSize: number;
  /** Uncompressed size recorded by the archive. */
  readonly size: number;
  /** Compression method id (0 stored, 8 deflate). */
  readonly compression: number;
}

/**
 * Offset of a plausible end-of-central-directory record, or -1.
 *
 * Scans backwards over the trailing comment window and requires the
 * recorded central directory to fit before the record.
 */
function findEndOfCentralDirectory(bytes: Uint8Array): number {
  if (bytes.length < EOCD_SIZE) return -1;

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const last = bytes.length - EOCD_SIZE;
  const first = Math.max(0, last - MAX_COMMENT_LENGTH);

  for (let pos = last; pos >= first; pos--) {
    if (view.getUint32(pos, true) !== EOCD_SIGNATURE) continue;

    const commentLength = view.getUint16(pos + 20, true);
    if (pos + EOCD_SIZE + commentLength > bytes.length) continue;

    const directorySize = view.getUint32(pos + 12, true);
    const directoryOffset = view.getUint32(pos + 16, true);

    if (directoryOffset === ZIP64_MARKER || directorySize === ZIP64_MARKER) {
      const locator = pos - ZIP64_LOCATOR_SIZE;
      if (locator >= 0 && view.getUint32(locator, true) === ZIP64_LOCATOR_SIGNATURE) {
        return pos;
      }
      continue;
    }

    if (directoryOffset + directorySize <= pos) return pos;
  }

  return -1;
}

/** True iff the buffer ends with a valid zip end-of-central-directory record. */
export function isZip(bytes: Uint8Array): boolean {
  return findEndOfCentralDirectory(bytes) >= 0;
}

/** Reads the central directory without decompressing anything. */
export function listZipEntries(bytes: Uint8Array): GateResult<ZipEntryInfo[]> {
  if (!isZip(bytes)) {
    return fail(new FormatError('zip'));
  }

  const entries: ZipEntryInfo[] = [];
  try {
    unzipSync(bytes, {
      filter: (file) => {
        entries.push({
          name: file.name,
          compressedSize: file.size,
          size: file.originalSize,
          compression: file.compression,
        });
        return false;
      },
    });
  } catch (err: unknown) {
    return fail(new FormatError('zip', 'Zip central directory is unreadable.', { cause: err }));
  }

  return ok(entries);
}

function checkSingleEntry(
  entries: readonly ZipEntryInfo[],
): GateResult<ZipEntryInfo, FormatError | MultiEntryError> {
  const [entry] = entries;
  if (entry === undefined) {
    return fail(new FormatError('zip', 'Zip archive contains no entries.'));
  }
  if (entries.length > 1) {
    return fail(new MultiEntryError(entries.length));
  }
  return ok(entry);
}

/** Where the single entry's data lives, as recorded by the central directory. */
interface EntryLocation {
  readonly method: number;
  readonly flags: number;
  readonly crc: number;
  readonly compressedSize: number;
  readonly dataStart: number;
}

function centralDirectoryStart(view: DataView, eocd: number): number {
  const offset = view.getUint32(eocd + 16, true);
  if (offset !== ZIP64_MARKER) return offset;

  // zip64 locator points at the zip64 end record, which holds the real offset
  const record = Number(view.getBigUint64(eocd - ZIP64_LOCATOR_SIZE + 8, true));
  return Number(view.getBigUint64(record + 48, true));
}

/**
 * Reads the first central directory header and its local header.
 * Out-of-range reads throw RangeError; the caller reports them as extraction failures.
 */
function locateFirstEntry(bytes: Uint8Array): EntryLocation {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const header = centralDirectoryStart(view, findEndOfCentralDirectory(bytes));

  if (view.getUint32(header, true) !== CENTRAL_HEADER_SIGNATURE) {
    throw new Error(`No central directory header at offset ${header}`);
  }

  const nameLength = view.getUint16(header + 28, true);
  const extraLength = view.getUint16(header + 30, true);
  let compressedSize = view.getUint32(header + 20, true);
  let localOffset = view.getUint32(header + 42, true);

  // zip64 extended information: 8-byte values only for the fields set to the marker
  const uncompressedMarked = view.getUint32(header + 24, true) === ZIP64_MARKER;
  const compressedMarked = compressedSize === ZIP64_MARKER;
  const offsetMarked = localOffset === ZIP64_MARKER;
  if (uncompressedMarked || compressedMarked || offsetMarked) {
    const extraEnd = header + 46 + nameLength + extraLength;
    for (let at = header + 46 + nameLength; at + 4 <= extraEnd; at += 4 + view.getUint16(at + 2, true)) {
      if (view.getUint16(at, true) !== ZIP64_EXTRA_ID) continue;
      let field = at + 4;
      if (uncompressedMarked) field += 8;
      if (compressedMarked) {
        compressedSize = Number(view.getBigUint64(field, true));
        field += 8;
      }
      if (offsetMarked) localOffset = Number(view.getBigUint64(field, true));
      break;
    }
  }

  if (view.getUint32(localOffset, true) !== LOCAL_HEADER_SIGNATURE) {
    throw new Error(`No local file header at offset ${localOffset}`);
  }

  return {
    method: view.getUint16(header + 10, true),
    flags: view.getUint16(header + 8, true),
    crc: view.getUint32(header + 16, true),
    compressedSize,
    dataStart:
      localOffset
      + LOCAL_HEADER_SIZE
      + view.getUint16(localOffset + 26, true)
      + view.getUint16(localOffset + 28, true),
  };
}

/** Stored data is copied; deflate output grows to whatever the stream really holds. */
function inflateEntry(bytes: Uint8Array, location: EntryLocation): Uint8Array {
  if (location.flags & FLAG_ENCRYPTED) {
    throw new Error('Encrypted entries are not supported');
  }

  const end = location.dataStart + location.compressedSize;
  if (end > bytes.length) {
    throw new Error(`Entry data is truncated: needs ${end} bytes, archive has ${bytes.length}`);
  }

  const raw = bytes.subarray(location.dataStart, end);
  if (location.method === METHOD_STORED) return raw.slice();
  if (location.method === METHOD_DEFLATE) return inflateSync(raw);
  throw new Error(`Unsupported compression method ${location.method}`);
}

/**
 * Extracts the only entry and verifies its CRC-32.
 * Any failure on the way (bad headers, truncation, corrupt stream, CRC) is an ExtractionError.
 */
function extractEntry(
  bytes: Uint8Array,
  entry: ZipEntryInfo,
): GateResult<Uint8Array, ExtractionError> {
  let location: EntryLocation;
  let data: Uint8Array;
  try {
    location = locateFirstEntry(bytes);
    data = inflateEntry(bytes, location);
  } catch (err: unknown) {
    return fail(new ExtractionError(entry.name, err));
  }

  const actual = crc32(data);
  if (actual !== location.crc) {
    return fail(new ExtractionError(
      entry.name,
      new Error(`Bad CRC-32: recorded ${location.crc.toString(16)}, computed ${actual.toString(16)}`),
    ));
  }
  return ok(data);
}

function checkExtractedSize(
  entry: ZipEntryInfo,
  data: Uint8Array,
): GateResult<Uint8Array, SizeMismatchError> {
  if (data.length !== entry.size) {
    return fail(new SizeMismatchError(entry.size, data.length));
  }
  return ok(data);
}

/**
 * Validates and extracts a single-file zip archive.
 *
 * Checks run in order and stop at the first failure:
 * 1. End-of-central-directory structure (FormatError)
 * 2. Exactly one entry (FormatError when empty, MultiEntryError when more)
 * 3. Entry extraction and CRC-32 (ExtractionError)
 * 4. Real extracted length against the recorded size (SizeMismatchError)
 */
export function safeDecompressZip(bytes: Uint8Array): GateResult<Uint8Array> {
  const listing = listZipEntries(bytes);
  if (!listing.ok) return listing;

  const entry = checkSingleEntry(listing.value);
  if (!entry.ok) return entry;

  const extracted = extractEntry(bytes, entry.value);
  if (!extracted.ok) return extracted;

  return checkExtractedSize(entry.value, extracted.value);
}

/** @throws FormatError | MultiEntryError | ExtractionError | SizeMismatchError */
export function decompressZip(bytes: Uint8Array): Uint8Array {
  const result = safeDecompressZip(bytes);
  if (!result.ok) throw result.error;
  return result.value;
}
