import type { FileNotFoundError, SameFileError } from './errors.js';

/**
 * One position where a string and its normalized form disagree
 */
export interface CharDifference {
  /** 0-based code unit index into the original string */
  readonly position: number;

  /** Code unit at `position` in the original string */
  readonly original: string;

  /** Code unit at `position` in the normalized string */
  readonly normalized: string;
}

/**
 * A line whose NFKC form differs from the line as read
 */
export interface NormalizationIssue {
  /** 1-based line number */
  readonly lineNumber: number;
  readonly originalLine: string;
  readonly normalizedLine: string;
  readonly differences: readonly CharDifference[];
}

export interface NormalizeFileSummary {
  linesChanged: number;
  linesProcessed: number;

  /** Lines that were not valid Unicode and were copied through unchanged */
  invalidLines: number[];
}

export type NormalizeFileResult =
  | { readonly type: 'ok'; readonly value: NormalizeFileSummary }
  | { readonly type: 'error'; readonly error: FileNotFoundError | SameFileError };

/** Normalization forms reported on in compare mode */
export type InspectedForm = 'NFC' | 'NFKC';
