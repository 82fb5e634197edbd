/**
 * os-strings API Entry Point
 *
 * String types that can never hold a forbidden set of characters, for values
 * passed to operating-system APIs.
 */
export {
  defineCharSet,
  sameCharSet,
  toByte,
  NUL_CHARSET,
  RestrictedString,
  toRestricted,
  filterRestricted,
  isRestrictedString,
  toPathString,
  filterPathString,
  isPathString,
  toPathStrings
} from '@core/strings';
export type { Char, CharSet, PathString } from '@core/strings';

export {
  OsStringError,
  ErrorSeverity,
  InvalidCharacterError,
  InvalidContentError,
  StringIndexError,
  CharSetMismatchError,
  CharSetDefinitionError,
  CharValueError
} from '@core/errors';
export type { BaseErrorDetails, InvalidContentErrorDetails } from '@core/errors';

export { escapeChar } from '@core/utils/escapeChar';
