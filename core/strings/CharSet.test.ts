import { describe, it, expect } from 'vitest';
import { defineCharSet, sameCharSet, toByte, NUL_CHARSET } from './CharSet';
import { CharSetDefinitionError, CharValueError } from '@core/errors';
import { captureError } from '@tests/utils/captureError';

describe('CharSet', () => {
  const set = defineCharSet('/', '\0', '/');

  it('drops duplicate members', () => {
    expect(set.chars).toEqual(['/', '\0']);
  });

  it('tests membership for characters and bytes', () => {
    expect(set.has('/')).toBe(true);
    expect(set.has(0)).toBe(true);
    expect(set.has('a')).toBe(false);
    expect(set.hasByte(0x2f)).toBe(true);
    expect(set.hasByte(0xaf)).toBe(false);
  });

  it('finds the first member in a string', () => {
    expect(set.indexIn('ab/c\0')).toBe(2);
    expect(set.indexIn('abc')).toBe(-1);
    expect(set.indexIn('')).toBe(-1);
  });

  it('describes its members', () => {
    expect(set.describe()).toBe('{"/", "\\x00"}');
    expect(NUL_CHARSET.describe()).toBe('{"\\x00"}');
  });

  it('rejects non-ASCII and multi-character members', () => {
    const error = captureError(() => defineCharSet('é'));

    expect(error).toBeInstanceOf(CharSetDefinitionError);
    expect(error).toHaveProperty('message', 'Forbidden character "\\xE9" must be a single ASCII character');
    expect(() => defineCharSet('ab')).toThrow('Forbidden character "ab" must be a single ASCII character');
    expect(() => defineCharSet()).toThrow('A character set needs at least one forbidden character');
  });

  it('compares sets by members', () => {
    expect(sameCharSet(defineCharSet('a', 'b'), defineCharSet('b', 'a'))).toBe(true);
    expect(sameCharSet(defineCharSet('a'), defineCharSet('a', 'b'))).toBe(false);
    expect(sameCharSet(defineCharSet('a'), defineCharSet('b'))).toBe(false);
  });

  describe('toByte', () => {
    it('converts one-byte values', () => {
      expect(toByte('A')).toBe(0x41);
      expect(toByte(0)).toBe(0);
      expect(toByte(255)).toBe(255);
    });

    it('rejects everything else', () => {
      expect(() => toByte('AB')).toThrow(CharValueError);
      expect(() => toByte('€')).toThrow(CharValueError);
      expect(() => toByte('é')).toThrow(CharValueError);
      expect(() => toByte(-1)).toThrow(CharValueError);
      expect(() => toByte(1.5)).toThrow(CharValueError);
    });
  });
});
