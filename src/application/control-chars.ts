const ESCAPED_CONTROL_CHAR = /\\([rn])/g;

/**
 * Doubles the backslash of every literal `\r` / `\n` two-character sequence
 * so a later JSON encoding keeps it as text instead of a control character.
 *
 * Apply at most once per string per formatting pass: a second pass doubles
 * the backslashes again.
 *
 * @example escapeJsonControlChars('hello\\nworld') // 'hello\\\\nworld'
 */
export function escapeJsonControlChars(text: string): string {
  return text.replace(ESCAPED_CONTROL_CHAR, '\\\\$1');
}
