import { OsStringError, ErrorSeverity } from './OsStringError';
import { formatMessage } from './messages/strings';
import { escapeChar } from '@core/utils/escapeChar';

/**
 * Thrown when two restricted strings with different forbidden sets meet.
 */
export class CharSetMismatchError extends OsStringError {
  constructor(expected: string, actual: string) {
    super(formatMessage('CHARSET_MISMATCH', { expected, actual }), {
      code: 'E_CHARSET_MISMATCH',
      severity: ErrorSeverity.Recoverable,
      details: { expected, actual }
    });

    Object.setPrototypeOf(this, CharSetMismatchError.prototype);
  }
}

/**
 * Thrown when a character set is defined with an empty or non-ASCII member list.
 */
export class CharSetDefinitionError extends OsStringError {
  constructor(member?: string) {
    super(
      member === undefined
        ? formatMessage('CHARSET_EMPTY')
        : formatMessage('CHARSET_NOT_ASCII', { char: member.length === 1 ? escapeChar(member) : JSON.stringify(member) }),
      {
        code: 'E_CHARSET_DEFINITION',
        severity: ErrorSeverity.Recoverable,
        details: member === undefined ? {} : { member }
      }
    );

    Object.setPrototypeOf(this, CharSetDefinitionError.prototype);
  }
}

/**
 * Thrown when a value passed as a single character is not exactly one byte.
 */
export class CharValueError extends OsStringError {
  constructor(value: string | number) {
    super(formatMessage('INVALID_CHAR_VALUE', { char: JSON.stringify(value) }), {
      code: 'E_INVALID_CHAR_VALUE',
      severity: ErrorSeverity.Recoverable,
      details: { value }
    });

    Object.setPrototypeOf(this, CharValueError.prototype);
  }
}
