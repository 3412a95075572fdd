import type { Logger } from 'pino';
import { ROUTING_FIELDS } from '../domain/index.js';
import type { Event, RoutingField } from '../domain/index.js';
import { parseBatchLimit } from './batch-limits.js';
import { escapeJsonControlChars } from './control-chars.js';

/** One HEC event object as sent on the wire. */
export interface HecPayload {
  time?: number;
  index?: string;
  host?: string;
  source?: string;
  sourcetype?: string;
  event: string;
}

export interface HecFormatOptions {
  readonly maxEventsPerBatch?: number;
  /** UTF-8 byte cap per batch string. An oversized single event still gets its own batch. */
  readonly maxBatchBytes?: number;
  /** Run `escapeJsonControlChars` over `data` once before JSON encoding. */
  readonly escapeControlChars?: boolean;
  readonly log?: Logger;
}

/**
 * Builds the HEC object for one event.
 *
 * `unbroken` and `done` have no HEC counterpart and are not carried.
 */
export function toHecPayload(event: Event, escapeControlChars = false): HecPayload {
  const routing: Partial<Record<RoutingField, string>> = {};

  for (const field of ROUTING_FIELDS) {
    const value = event[field];
    if (value) {
      routing[field] = value;
    }
  }

  return {
    time: event.time,
    ...routing,
    event: escapeControlChars ? escapeJsonControlChars(event.data) : event.data,
  };
}

/**
 * Formats events as newline-delimited JSON batches.
 *
 * Objects keep input order, one per line, joined by a single `\n`.
 * Fragment flags are dropped; a warning is logged once per call when any
 * input event carried them, since the receiver cannot reassemble those
 * fragments from HEC alone.
 */
export function formatHecEvents(
  events: readonly Event[],
  options: HecFormatOptions = {},
): string[] {
  const maxEvents = parseBatchLimit('maxEventsPerBatch', options.maxEventsPerBatch);
  const maxBytes = parseBatchLimit('maxBatchBytes', options.maxBatchBytes);
  const escape = options.escapeControlChars ?? false;

  const batches: string[] = [];
  let lines: string[] = [];
  let bytes = 0;
  let fragments = 0;

  for (const event of events) {
    if (event.unbroken || event.done) fragments++;

    const line = JSON.stringify(toHecPayload(event, escape));
    const lineBytes = Buffer.byteLength(line, 'utf8');
    // +1 for the joining newline
    const nextBytes = lines.length === 0 ? lineBytes : bytes + 1 + lineBytes;

    if (lines.length > 0 && (lines.length >= maxEvents || nextBytes > maxBytes)) {
      batches.push(lines.join('\n'));
      lines = [];
      bytes = lineBytes;
    } else {
      bytes = nextBytes;
    }
    lines.push(line);
  }

  if (lines.length > 0) {
    batches.push(lines.join('\n'));
  }

  if (fragments > 0) {
    options.log?.warn(
      { dropped: fragments, total: events.length },
      'HEC format cannot carry unbroken/done fragment flags; flags dropped',
    );
  }

  return batches;
}
