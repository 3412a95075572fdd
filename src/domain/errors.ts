import type { CompressionFormat } from './event.js';

/** Stable machine-readable codes, one per failure kind. */
export type EventWireErrorCode =
  | 'INVALID_FORMAT'
  | 'EXCESS_FILES'
  | 'EXTRACT_ERROR'
  | 'SIZE_MISMATCH'
  | 'INVALID_EVENT'
  | 'INVALID_CONFIG';

/** A single validation problem, flattened from the schema layer. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class EventWireError extends Error {
  constructor(
    message: string,
    public readonly code: EventWireErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Buffer does not carry the claimed container signature or structure. */
export class FormatError extends EventWireError {
  constructor(
    public readonly format: CompressionFormat,
    message: string = `File is not ${format} format.`,
    options?: { cause?: unknown },
  ) {
    super(message, 'INVALID_FORMAT', options);
  }
}

export class MultiEntryError extends EventWireError {
  constructor(
    public readonly entryCount: number,
    message: string = 'Zip files containing multiple files not supported by this handler.',
  ) {
    super(message, 'EXCESS_FILES');
  }
}

export class ExtractionError extends EventWireError {
  constructor(
    public readonly entryName: string,
    cause: unknown,
    message: string = 'Unknown exception when extracting zip file.',
  ) {
    super(message, 'EXTRACT_ERROR', { cause });
  }
}

export class SizeMismatchError extends EventWireError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    message: string = 'Zip file size does not match actual size.',
  ) {
    super(message, 'SIZE_MISMATCH');
  }
}

export class ConstructionError extends EventWireError {
  constructor(
    public readonly issues: readonly ValidationIssue[],
    message: string = `Invalid event: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
  ) {
    super(message, 'INVALID_EVENT');
  }
}

export class ConfigError extends EventWireError {
  constructor(
    public readonly issues: readonly ValidationIssue[],
    message: string = `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
  ) {
    super(message, 'INVALID_CONFIG');
  }
}
