/**
 * Standard error messages for restricted strings.
 * Placeholders in braces are filled in by formatMessage.
 */
export const StringErrorMessages = {
  INVALID_CHARACTER: '{char} is not a valid character for this type of string.',
  INVALID_CONTENT: 'Invalid character ({char}) found at position {position}',
  INDEX_OUT_OF_BOUNDS: 'Index {index} is out of bounds for string of length {length}',
  CHARSET_MISMATCH: 'Cannot combine strings restricted by {expected} and {actual}',
  CHARSET_NOT_ASCII: 'Forbidden character {char} must be a single ASCII character',
  CHARSET_EMPTY: 'A character set needs at least one forbidden character',
  INVALID_CHAR_VALUE: '{char} is not a single byte'
} as const;

export type StringErrorMessageKey = keyof typeof StringErrorMessages;

export function formatMessage(
  key: StringErrorMessageKey,
  values: Record<string, string | number> = {}
): string {
  return StringErrorMessages[key].replace(/\{(\w+)\}/g, (match, name: string) =>
    name in values ? String(values[name]) : match
  );
}
