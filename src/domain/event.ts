/**
 * Core domain types for the eventwire event model.
 *
 * An Event is one unit of collected data plus the routing metadata the
 * receiving system needs. It carries no framework dependencies and is
 * never mutated once built; formatters only read it.
 */

/**
 * Canonical Event entity.
 *
 * `unbroken` and `done` are independent flags: the last fragment of a
 * broken event has both set, a complete single event has neither.
 */
export interface Event {
  readonly data: string;
  /** Seconds since the Unix epoch, fractional part kept as given. */
  readonly time: number;
  readonly index?: string;
  readonly host?: string;
  readonly source?: string;
  readonly sourcetype?: string;
  /** Input configuration that produced the event. */
  readonly stanza?: string;
  readonly unbroken: boolean;
  readonly done: boolean;
}

/** Routing metadata keys shared by both wire formats, in wire order. */
export const ROUTING_FIELDS = ['index', 'host', 'source', 'sourcetype'] as const;

export type RoutingField = (typeof ROUTING_FIELDS)[number];

/** Compressed container formats the decompression gate understands. */
export type CompressionFormat = 'gzip' | 'zip';
