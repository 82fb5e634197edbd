export { defineCharSet, sameCharSet, toByte, NUL_CHARSET } from './CharSet';
export type { Char, CharSet } from './CharSet';
export {
  RestrictedString,
  toRestricted,
  filterRestricted,
  isRestrictedString
} from './RestrictedString';
export { toPathString, filterPathString, isPathString, toPathStrings } from './PathString';
export type { PathString } from './PathString';
