import { OsStringError, ErrorSeverity, type BaseErrorDetails } from './OsStringError';
import { formatMessage } from './messages/strings';
import { escapeChar } from '@core/utils/escapeChar';

export interface InvalidCharacterErrorDetails extends BaseErrorDetails {
  char: string;
}

/**
 * Thrown when a single forbidden character is written or appended.
 */
export class InvalidCharacterError extends OsStringError {
  public readonly char: string;

  constructor(char: string) {
    super(formatMessage('INVALID_CHARACTER', { char: escapeChar(char) }), {
      code: 'E_INVALID_CHARACTER',
      severity: ErrorSeverity.Recoverable,
      details: { char } satisfies InvalidCharacterErrorDetails
    });
    this.char = char;

    Object.setPrototypeOf(this, InvalidCharacterError.prototype);
  }
}
