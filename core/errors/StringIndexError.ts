import { OsStringError, ErrorSeverity } from './OsStringError';
import { formatMessage } from './messages/strings';

/**
 * Thrown when a read or write position falls outside the string.
 */
export class StringIndexError extends OsStringError {
  public readonly index: number;
  public readonly length: number;

  constructor(index: number, length: number) {
    super(formatMessage('INDEX_OUT_OF_BOUNDS', { index, length }), {
      code: 'E_INDEX_OUT_OF_BOUNDS',
      severity: ErrorSeverity.Recoverable,
      details: { index, length }
    });
    this.index = index;
    this.length = length;

    Object.setPrototypeOf(this, StringIndexError.prototype);
  }
}
