import { CharSetDefinitionError, CharValueError } from '@core/errors';
import { escapeChar } from '@core/utils/escapeChar';

/**
 * A single character: a one-character ASCII string or a byte value in 0..255.
 */
export type Char = string | number;

/**
 * A fixed set of forbidden ASCII characters.
 *
 * `C` is the union of the member characters as string literal types, so
 * `CharSet<'\0'>` and `CharSet<'/' | '\0'>` are distinct types and the
 * restricted strings built on them cannot be mixed.
 */
export interface CharSet<C extends string> {
  /** Members in definition order, without duplicates */
  readonly chars: readonly C[];
  has(c: Char): boolean;
  hasByte(byte: number): boolean;
  indexIn(s: string): number;
  describe(): string;
}

class AsciiCharSet<C extends string> implements CharSet<C> {
  readonly chars: readonly C[];
  private readonly table = new Uint8Array(128);

  constructor(chars: readonly C[]) {
    const unique: C[] = [];
    for (const c of chars) {
      if (c.length !== 1 || c.charCodeAt(0) > 0x7f) {
        throw new CharSetDefinitionError(c);
      }
      const code = c.charCodeAt(0);
      if (this.table[code] === 0) {
        this.table[code] = 1;
        unique.push(c);
      }
    }
    this.chars = Object.freeze(unique);
  }

  has(c: Char): boolean {
    return this.hasByte(toByte(c));
  }

  hasByte(byte: number): boolean {
    return byte < 0x80 && this.table[byte] === 1;
  }

  indexIn(s: string): number {
    for (let i = 0; i < s.length; i++) {
      const code = s.charCodeAt(i);
      if (code < 0x80 && this.table[code] === 1) {
        return i;
      }
    }
    return -1;
  }

  describe(): string {
    return `{${this.chars.map(c => escapeChar(c)).join(', ')}}`;
  }
}

/**
 * Define a set of forbidden characters. Members must be single ASCII
 * characters; duplicates are ignored.
 *
 * @example
 * const SEPARATORS = defineCharSet('/', '\0');
 */
export function defineCharSet<C extends string>(...chars: C[]): CharSet<C> {
  if (chars.length === 0) {
    throw new CharSetDefinitionError();
  }
  return Object.freeze(new AsciiCharSet(chars));
}

/**
 * Convert a Char to its byte value.
 * A string must be one ASCII character, so it encodes to the same single
 * byte in UTF-8; other bytes are passed as numbers. Anything else throws
 * CharValueError.
 */
export function toByte(c: Char): number {
  if (typeof c === 'number') {
    if (!Number.isInteger(c) || c < 0 || c > 0xff) {
      throw new CharValueError(c);
    }
    return c;
  }
  if (c.length !== 1 || c.charCodeAt(0) > 0x7f) {
    throw new CharValueError(c);
  }
  return c.charCodeAt(0);
}

/** Two sets are the same when they hold the same members. */
export function sameCharSet(a: CharSet<string>, b: CharSet<string>): boolean {
  if (a === b) return true;
  if (a.chars.length !== b.chars.length) return false;
  return a.chars.every(c => b.has(c));
}

export const NUL_CHARSET: CharSet<'\0'> = defineCharSet('\0');
