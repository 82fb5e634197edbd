import { InvalidContentError } from '@core/errors';
import { pathLogger } from '@core/utils/logger';
import { NUL_CHARSET } from './CharSet';
import { RestrictedString, isRestrictedString } from './RestrictedString';

/**
 * A string without NUL, for file paths, command arguments and environment
 * values handed to the operating system.
 */
export type PathString = RestrictedString<'\0'>;

/**
 * Checked conversion to a PathString.
 * Throws InvalidContentError if `s` contains a NUL character.
 */
export function toPathString(s: string): PathString {
  return RestrictedString.from(s, NUL_CHARSET);
}

/** Drop every NUL from `s`. */
export function filterPathString(s: string): PathString {
  return RestrictedString.filter(s, NUL_CHARSET);
}

export function isPathString(value: unknown): value is PathString {
  return isRestrictedString(value, NUL_CHARSET);
}

/**
 * Convert an argv-style list. The first failing entry throws an
 * InvalidContentError whose details carry `entryIndex`.
 */
export function toPathStrings(entries: readonly string[]): PathString[] {
  return entries.map((entry, entryIndex) => {
    try {
      return toPathString(entry);
    } catch (error) {
      if (error instanceof InvalidContentError) {
        pathLogger.debug('Rejected list entry', { entryIndex, position: error.position });
        throw new InvalidContentError(error.char, error.position, { entryIndex, cause: error });
      }
      throw error;
    }
  });
}
