import { ROUTING_FIELDS } from '../domain/index.js';
import type { Event } from '../domain/index.js';
import { parseBatchLimit } from './batch-limits.js';

export interface XmlFormatOptions {
  /** Cap on `<event>` elements per `<stream>` document. Unlimited by default. */
  readonly maxEventsPerStream?: number;
}

function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(value: string): string {
  return escapeText(value)
    .replace(/"/g, '&quot;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#09;');
}

function element(name: string, text: string): string {
  return `<${name}>${escapeText(text)}</${name}>`;
}

/**
 * Renders one `<event>` element.
 *
 * Children appear in the fixed order time, index, host, source,
 * sourcetype, data; empty fields are left out. Newlines inside `data`
 * stay literal.
 */
export function formatXmlEvent(event: Event): string {
  const unbroken = event.unbroken ? ' unbroken="1"' : '';
  let body = element('time', String(event.time));

  for (const field of ROUTING_FIELDS) {
    const value = event[field];
    if (value) {
      body += element(field, value);
    }
  }

  if (event.data) {
    body += element('data', event.data);
  }

  if (event.done) {
    body += '<done />';
  }

  return `<event stanza="${escapeAttribute(event.stanza ?? '')}"${unbroken}>${body}</event>`;
}

/**
 * Formats events into `<stream>` documents, one string per document.
 *
 * A new stream starts whenever the stanza changes between consecutive
 * events or the per-stream cap is reached. Event order is preserved
 * across and within streams so broken events reassemble downstream.
 */
export function formatXmlEvents(
  events: readonly Event[],
  options: XmlFormatOptions = {},
): string[] {
  const maxEvents = parseBatchLimit('maxEventsPerStream', options.maxEventsPerStream);
  const streams: string[] = [];

  let current: string[] = [];
  let currentStanza: string | undefined;

  const flush = (): void => {
    if (current.length > 0) {
      streams.push(`<stream>${current.join('')}</stream>`);
      current = [];
    }
  };

  for (const event of events) {
    if (current.length > 0 && (event.stanza !== currentStanza || current.length >= maxEvents)) {
      flush();
    }
    currentStanza = event.stanza;
    current.push(formatXmlEvent(event));
  }
  flush();

  return streams;
}
