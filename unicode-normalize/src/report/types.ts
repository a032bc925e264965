import type { NormalizationIssue } from '../normalizer/types.js';

/**
 * One code point of a string, as shown by `compare`
 */
export interface CharacterInfo {
  character: string;
  codePoint: number;

  /** Code point as uppercase hex, at least 4 digits */
  hex: string;
  isNfc: boolean;
  isNfkc: boolean;
}

/**
 * Everything `compare` reports about a pair of strings
 */
export interface ComparisonReport {
  first: string;
  second: string;
  firstCharacters: CharacterInfo[];
  secondCharacters: CharacterInfo[];
  normalizedFirst: string;
  normalizedSecond: string;
  normalizedFirstHex: string;
  normalizedSecondHex: string;
  equivalent: boolean;
}

/**
 * A line `check` could not inspect because it is not valid Unicode
 */
export interface InvalidLine {
  lineNumber: number;
  message: string;
}

/**
 * Result of checking every line of a file
 */
export interface CheckFileResult {
  filePath: string;
  linesChecked: number;
  issues: NormalizationIssue[];
  invalidLines: InvalidLine[];
}
