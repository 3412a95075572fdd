import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createEvent } from '../src/application/index.js';
import type { EventInput } from '../src/application/index.js';
import type { Event } from '../src/domain/index.js';

/** Fixed timestamp used across formatter tests. */
export const FIXED_TIME = 1372274622.493;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<EventInput> = {}): Event {
  return createEvent({
    data: 'This is a test data3.',
    time: FIXED_TIME,
    index: 'main',
    host: 'localhost',
    source: 'Splunk',
    sourcetype: 'misc',
    stanza: 'test_scheme://test',
    ...overrides,
  });
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}
