import { describe, it, expect } from 'vitest';
import {
  OsStringError,
  ErrorSeverity,
  InvalidCharacterError,
  InvalidContentError,
  StringIndexError,
  CharSetMismatchError,
  formatMessage
} from './index';

describe('restricted string errors', () => {
  it('formats invalid characters', () => {
    const error = new InvalidCharacterError('\0');

    expect(error.message).toBe('"\\x00" is not a valid character for this type of string.');
    expect(error.code).toBe('E_INVALID_CHARACTER');
    expect(error.details).toEqual({ char: '\0' });
    expect(error.cause).toBeUndefined();
    expect(error).toBeInstanceOf(OsStringError);
    expect(error).toBeInstanceOf(Error);
  });

  it('formats invalid content with its position', () => {
    const error = new InvalidContentError('/', 7, { entryIndex: 1 });

    expect(error.message).toBe('Invalid character ("/") found at position 7');
    expect(error.details).toEqual({ char: '/', position: 7, entryIndex: 1 });
  });

  it('renders code and severity', () => {
    const error = new StringIndexError(5, 3);

    expect(error.toString()).toBe(
      '[E_INDEX_OUT_OF_BOUNDS] Index 5 is out of bounds for string of length 3 (Severity: recoverable)'
    );
    expect(error.toJSON()).toEqual({
      name: 'StringIndexError',
      message: 'Index 5 is out of bounds for string of length 3',
      code: 'E_INDEX_OUT_OF_BOUNDS',
      severity: ErrorSeverity.Recoverable,
      details: { index: 5, length: 3 }
    });
  });

  it('treats every error as recoverable', () => {
    expect(new CharSetMismatchError('{":"}', '{";"}').canBeWarning()).toBe(true);
    expect(new CharSetMismatchError('{":"}', '{";"}').message).toBe(
      'Cannot combine strings restricted by {":"} and {";"}'
    );
  });

  it('leaves unknown placeholders in messages', () => {
    expect(formatMessage('INDEX_OUT_OF_BOUNDS', { index: 2 })).toBe(
      'Index 2 is out of bounds for string of length {length}'
    );
  });
});
