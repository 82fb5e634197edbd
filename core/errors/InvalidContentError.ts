import { OsStringError, ErrorSeverity, type BaseErrorDetails } from './OsStringError';
import { formatMessage } from './messages/strings';
import { escapeChar } from '@core/utils/escapeChar';

export interface InvalidContentErrorDetails extends BaseErrorDetails {
  char: string;
  position: number;
  /** Set when the failing string came from a list of entries */
  entryIndex?: number;
}

/**
 * Thrown by checked construction when the input holds a forbidden character.
 * `position` is the zero-based index of the first offending character.
 */
export class InvalidContentError extends OsStringError {
  public readonly char: string;
  public readonly position: number;
  declare readonly details: InvalidContentErrorDetails;

  constructor(
    char: string,
    position: number,
    options: { entryIndex?: number; cause?: unknown } = {}
  ) {
    const details: InvalidContentErrorDetails = { char, position };
    if (options.entryIndex !== undefined) {
      details.entryIndex = options.entryIndex;
    }

    super(formatMessage('INVALID_CONTENT', { char: escapeChar(char), position }), {
      code: 'E_INVALID_CONTENT',
      severity: ErrorSeverity.Recoverable,
      details,
      cause: options.cause
    });
    this.char = char;
    this.position = position;

    Object.setPrototypeOf(this, InvalidContentError.prototype);
  }
}
