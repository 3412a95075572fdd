import { z } from 'zod';
import { ConstructionError } from '../domain/index.js';
import type { Event, ValidationIssue } from '../domain/index.js';

/**
 * Zod schema for validating a single event as handed over by a collector.
 *
 * - `time` is required; a missing or non-finite timestamp is a construction error.
 * - `data` may be empty, contain control characters or be non-ASCII.
 * - Fragment flags default to false (a complete, single event).
 */
export const eventSchema = z.object({
  data: z.string({ required_error: 'data is required' }),
  time: z.number({ required_error: 'time is required' }).finite(),
  index: z.string().optional(),
  host: z.string().optional(),
  source: z.string().optional(),
  sourcetype: z.string().optional(),
  stanza: z.string().optional(),
  unbroken: z.boolean().default(false),
  done: z.boolean().default(false),
});

/** Raw constructor input: flags may be omitted. */
export type EventInput = z.input<typeof eventSchema>;

export type CreateEventResult =
  | { readonly ok: true; readonly event: Event }
  | { readonly ok: false; readonly error: ConstructionError };

export function toValidationIssues(issues: readonly z.ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Validates an untrusted input and returns a frozen Event.
 * Returns a discriminated result so the caller decides how to surface errors.
 */
export function safeCreateEvent(input: unknown): CreateEventResult {
  const parsed = eventSchema.safeParse(input);

  if (!parsed.success) {
    return { ok: false, error: new ConstructionError(toValidationIssues(parsed.error.issues)) };
  }

  // Zod leaves absent optional keys absent rather than `undefined`
  const event: Event = Object.freeze(parsed.data);

  return { ok: true, event };
}

/** Throwing variant of {@link safeCreateEvent}. */
export function createEvent(input: EventInput): Event {
  const result = safeCreateEvent(input);
  if (!result.ok) {
    throw result.error;
  }
  return result.event;
}

/**
 * Full debug description of an event, every field present.
 * Absent metadata is rendered as `null`.
 */
export function describeEvent(event: Event): string {
  return JSON.stringify({
    data: event.data,
    done: event.done,
    host: event.host ?? null,
    index: event.index ?? null,
    source: event.source ?? null,
    sourcetype: event.sourcetype ?? null,
    stanza: event.stanza ?? null,
    time: event.time,
    unbroken: event.unbroken,
  });
}
