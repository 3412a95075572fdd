export type { Event, RoutingField, CompressionFormat } from './event.js';
export { ROUTING_FIELDS } from './event.js';
export type { EventWireErrorCode, ValidationIssue } from './errors.js';
export {
  EventWireError,
  FormatError,
  MultiEntryError,
  ExtractionError,
  SizeMismatchError,
  ConstructionError,
  ConfigError,
} from './errors.js';
export type { GateResult } from './result.js';
export { ok, fail } from './result.js';
