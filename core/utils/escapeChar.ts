/**
 * Render a single character (or byte) as a quoted, printable literal for
 * error messages. Control characters and bytes outside printable ASCII are
 * shown as \xHH.
 *
 * @example escapeChar('\0') === '"\\x00"'
 */
export function escapeChar(c: string | number): string {
  const code = typeof c === 'number' ? c : c.charCodeAt(0);
  let body: string;
  if (code === 0x5c) {
    body = '\\\\';
  } else if (code === 0x22) {
    body = '\\"';
  } else if (code === 0x27) {
    body = "\\'";
  } else if (code >= 0x20 && code <= 0x7e) {
    body = String.fromCharCode(code);
  } else if (code <= 0xff) {
    body = '\\x' + code.toString(16).toUpperCase().padStart(2, '0');
  } else {
    // Non-byte input only reaches here from a rejected definition
    body = '\\u' + code.toString(16).toUpperCase().padStart(4, '0');
  }
  return `"${body}"`;
}
