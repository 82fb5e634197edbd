/**
 * Central export point for restricted string error types.
 */

export { OsStringError, ErrorSeverity } from './OsStringError';
export type { BaseErrorDetails, OsStringErrorOptions } from './OsStringError';
export { InvalidCharacterError } from './InvalidCharacterError';
export type { InvalidCharacterErrorDetails } from './InvalidCharacterError';
export { InvalidContentError } from './InvalidContentError';
export type { InvalidContentErrorDetails } from './InvalidContentError';
export { StringIndexError } from './StringIndexError';
export { CharSetMismatchError, CharSetDefinitionError, CharValueError } from './CharSetError';

export * from './messages/strings';
