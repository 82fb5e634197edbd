import {
  CharSetMismatchError,
  InvalidCharacterError,
  InvalidContentError,
  StringIndexError
} from '@core/errors';
import { escapeChar } from '@core/utils/escapeChar';
import { stringsLogger } from '@core/utils/logger';
import { sameCharSet, toByte, type Char, type CharSet } from './CharSet';

const MIN_CAPACITY = 16;

/**
 * A string that never holds a character from the forbidden set `C`.
 *
 * The value is a byte buffer (the UTF-8 encoding of the text) plus a visible
 * length. Bytes past the visible length are spare capacity and are never
 * observable. Every public mutation either succeeds and keeps the invariant,
 * or throws and leaves content and length as they were.
 *
 * Heavy editing is cheaper on a plain string followed by one checked
 * conversion than through repeated checked mutations here.
 */
export class RestrictedString<in out C extends string> implements Iterable<number> {
  readonly charset: CharSet<C>;
  private buf: Buffer;
  private len: number;

  private constructor(charset: CharSet<C>, buf: Buffer, len: number) {
    this.charset = charset;
    this.buf = buf;
    this.len = len;
  }

  /**
   * Checked conversion from a plain string.
   * Throws InvalidContentError carrying the first forbidden character and
   * its index in `s`.
   *
   * The content is the UTF-8 encoding of `s`. An unpaired surrogate has no
   * encoding and is stored as U+FFFD, so `toString()` only returns `s`
   * unchanged for well-formed strings.
   */
  static from<C extends string>(s: string, charset: CharSet<C>): RestrictedString<C> {
    const position = charset.indexIn(s);
    if (position !== -1) {
      const char = s.charAt(position);
      if (stringsLogger.isDebugEnabled()) {
        stringsLogger.debug('Rejected string with forbidden character', {
          char: escapeChar(char),
          position,
          charset: charset.describe()
        });
      }
      throw new InvalidContentError(char, position);
    }
    const buf = Buffer.from(s, 'utf8');
    return new RestrictedString(charset, buf, buf.length);
  }

  /**
   * Checked conversion from raw bytes. The bytes are copied; `position` in
   * a thrown InvalidContentError is a byte offset.
   */
  static fromBytes<C extends string>(bytes: Uint8Array, charset: CharSet<C>): RestrictedString<C> {
    for (let i = 0; i < bytes.length; i++) {
      if (charset.hasByte(bytes[i])) {
        const char = String.fromCharCode(bytes[i]);
        if (stringsLogger.isDebugEnabled()) {
          stringsLogger.debug('Rejected bytes with forbidden character', {
            char: escapeChar(char),
            position: i,
            charset: charset.describe()
          });
        }
        throw new InvalidContentError(char, i);
      }
    }
    const buf = Buffer.from(bytes);
    return new RestrictedString(charset, buf, buf.length);
  }

  /**
   * Build a restricted string by dropping every forbidden character from `s`.
   * Never throws. One pass, compacting the encoded bytes in place.
   */
  static filter<C extends string>(s: string, charset: CharSet<C>): RestrictedString<C> {
    const buf = Buffer.from(s, 'utf8');
    let write = 0;
    for (let read = 0; read < buf.length; read++) {
      const byte = buf[read];
      if (!charset.hasByte(byte)) {
        buf[write++] = byte;
      }
    }
    return new RestrictedString(charset, buf, write);
  }

  static empty<C extends string>(charset: CharSet<C>): RestrictedString<C> {
    return new RestrictedString(charset, Buffer.alloc(0), 0);
  }

  /** Number of bytes. */
  get length(): number {
    return this.len;
  }

  /**
   * Byte at position `i`. Negative positions count from the end, so `-1`
   * is the last byte.
   */
  at(i: number): number {
    return this.buf[this.resolveIndex(i)];
  }

  /**
   * Overwrite the byte at position `i` with `c`.
   * The character is checked before the position.
   */
  set(i: number, c: Char): void {
    const byte = toByte(c);
    if (this.charset.hasByte(byte)) {
      throw this.rejectChar(byte);
    }
    this.buf[this.resolveIndex(i)] = byte;
  }

  /**
   * Append another restricted string of the same set, or a plain string that
   * is validated while it is copied. A rejected plain string leaves this
   * value unchanged.
   */
  append(value: RestrictedString<C> | string): this {
    if (typeof value === 'string') {
      return this.appendChecked(Buffer.from(value, 'utf8'));
    }

    this.assertSameCharSet(value);
    // Read the source length first: `value` may be this same instance
    const count = value.len;
    this.reserve(this.len + count);
    value.buf.copy(this.buf, this.len, 0, count);
    this.len += count;
    return this;
  }

  /** Append a single character. */
  appendChar(c: Char): this {
    const byte = toByte(c);
    if (this.charset.hasByte(byte)) {
      throw this.rejectChar(byte);
    }
    this.reserve(this.len + 1);
    this.buf[this.len++] = byte;
    return this;
  }

  /**
   * Byte-for-byte comparison. A plain string is compared through its UTF-8
   * encoding without any validation.
   */
  equals(other: RestrictedString<C> | string): boolean {
    if (typeof other === 'string') {
      return this.view().equals(Buffer.from(other, 'utf8'));
    }
    this.assertSameCharSet(other);
    return this.view().equals(other.view());
  }

  /** Independent copy with its own buffer. */
  clone(): RestrictedString<C> {
    const buf = Buffer.from(this.view());
    return new RestrictedString(this.charset, buf, buf.length);
  }

  /** Copy of the visible bytes. */
  toBuffer(): Buffer {
    return Buffer.from(this.view());
  }

  toString(): string {
    return this.buf.toString('utf8', 0, this.len);
  }

  toJSON(): string {
    return this.toString();
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let i = 0; i < this.len; i++) {
      yield this.buf[i];
    }
  }

  /**
   * Validate and copy `bytes` into spare capacity. The visible length only
   * moves once every byte has passed, so a rejection needs no cleanup.
   */
  private appendChecked(bytes: Buffer): this {
    const start = this.len;
    this.reserve(start + bytes.length);
    for (let i = 0; i < bytes.length; i++) {
      const byte = bytes[i];
      if (this.charset.hasByte(byte)) {
        throw this.rejectChar(byte);
      }
      this.buf[start + i] = byte;
    }
    this.len = start + bytes.length;
    return this;
  }

  private reserve(capacity: number): void {
    if (capacity <= this.buf.length) {
      return;
    }
    const grown = Buffer.allocUnsafe(Math.max(capacity, this.buf.length * 2, MIN_CAPACITY));
    this.buf.copy(grown, 0, 0, this.len);
    this.buf = grown;
  }

  private view(): Buffer {
    return this.buf.subarray(0, this.len);
  }

  private resolveIndex(i: number): number {
    const index = i < 0 ? this.len + i : i;
    if (!Number.isInteger(i) || index < 0 || index >= this.len) {
      throw new StringIndexError(i, this.len);
    }
    return index;
  }

  private rejectChar(byte: number): InvalidCharacterError {
    const char = String.fromCharCode(byte);
    if (stringsLogger.isDebugEnabled()) {
      stringsLogger.debug('Rejected forbidden character', {
        char: escapeChar(char),
        charset: this.charset.describe()
      });
    }
    return new InvalidCharacterError(char);
  }

  private assertSameCharSet(other: RestrictedString<C>): void {
    if (!sameCharSet(this.charset, other.charset)) {
      throw new CharSetMismatchError(this.charset.describe(), other.charset.describe());
    }
  }
}

/** Checked conversion to a RestrictedString. */
export function toRestricted<C extends string>(s: string, charset: CharSet<C>): RestrictedString<C> {
  return RestrictedString.from(s, charset);
}

/** Remove the characters of `charset` from `s` and wrap the rest. */
export function filterRestricted<C extends string>(s: string, charset: CharSet<C>): RestrictedString<C> {
  return RestrictedString.filter(s, charset);
}

export function isRestrictedString(value: unknown): value is RestrictedString<string>;
export function isRestrictedString<C extends string>(
  value: unknown,
  charset: CharSet<C>
): value is RestrictedString<C>;
export function isRestrictedString(value: unknown, charset?: CharSet<string>): boolean {
  if (!(value instanceof RestrictedString)) {
    return false;
  }
  return charset === undefined || sameCharSet(value.charset, charset);
}
