const TRUE_STRINGS = new Set(['1', 'TRUE', 'T', 'Y', 'YES']);
const FALSE_STRINGS = new Set(['0', 'FALSE', 'F', 'N', 'NO', 'NONE', '']);

/** Case-insensitive truthy flag as written in input configuration; surrounding whitespace is ignored. */
export function isTrue(value: string | null | undefined): boolean {
  return value != null && TRUE_STRINGS.has(value.trim().toUpperCase());
}

/** Counterpart of {@link isTrue}; absent values count as false. */
export function isFalse(value: string | null | undefined): boolean {
  return value == null || FALSE_STRINGS.has(value.trim().toUpperCase());
}

/** Seconds since the Unix epoch, suitable for `Event.time`. */
export function dateToSeconds(date: Date): number {
  return date.getTime() / 1000;
}
