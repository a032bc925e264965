export {
  assertWellFormed,
  checkLine,
  isEquivalent,
  isNormalized,
  normalize,
  normalizeFile,
  toHexCodePoints
} from './normalizer.js';
export { diff } from '../diff/char-diff.js';
export { FileNotFoundError, InvalidInputError, SameFileError } from './errors.js';
export type {
  CharDifference,
  InspectedForm,
  NormalizationIssue,
  NormalizeFileResult,
  NormalizeFileSummary
} from './types.js';
