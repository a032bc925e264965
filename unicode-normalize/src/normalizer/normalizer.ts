import * as fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { diff } from '../diff/char-diff.js';
import { isFile, isSameFile, readLines } from '../utils/line-reader.js';
import { FileNotFoundError, InvalidInputError, SameFileError } from './errors.js';
import type {
  InspectedForm,
  NormalizationIssue,
  NormalizeFileResult,
  NormalizeFileSummary
} from './types.js';

/**
 * Throws InvalidInputError at the first unpaired surrogate in `text`
 */
export function assertWellFormed(text: string): void {
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);

    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      throw new InvalidInputError(i);
    }

    if (unit >= 0xdc00 && unit <= 0xdfff) {
      throw new InvalidInputError(i);
    }
  }
}

/**
 * Applies Unicode compatibility composition (NFKC)
 * @throws InvalidInputError if the text contains an unpaired surrogate
 */
export function normalize(text: string): string {
  assertWellFormed(text);
  return text.normalize('NFKC');
}

/**
 * True when both strings have the same NFKC form, compared code unit for code unit
 */
export function isEquivalent(a: string, b: string): boolean {
  return normalize(a) === normalize(b);
}

/**
 * Whether `text` is left unchanged by the given normalization form
 */
export function isNormalized(text: string, form: InspectedForm): boolean {
  assertWellFormed(text);
  return text.normalize(form) === text;
}

/**
 * Renders each code point as uppercase hex, at least 4 digits, with no separator
 *
 * @example
 * toHexCodePoints('AB') // '00410042'
 */
export function toHexCodePoints(text: string): string {
  let hex = '';
  for (const character of text) {
    const codePoint = character.codePointAt(0) ?? 0;
    hex += codePoint.toString(16).toUpperCase().padStart(4, '0');
  }
  return hex;
}

/**
 * Checks a single line and describes where it departs from its NFKC form.
 *
 * @param lineNumber - 1-based line number recorded on the issue
 * @param line - Line content without its terminator
 * @returns The issue, or undefined when the line is already normalized
 * @throws InvalidInputError if the line is not well-formed Unicode
 */
export function checkLine(
  lineNumber: number,
  line: string
): NormalizationIssue | undefined {
  if (!Number.isInteger(lineNumber) || lineNumber < 1) {
    throw new RangeError(`Line number must be a positive integer, got ${lineNumber}`);
  }

  const normalizedLine = normalize(line);
  if (normalizedLine === line) {
    return undefined;
  }

  return {
    lineNumber,
    originalLine: line,
    normalizedLine,
    differences: diff(line, normalizedLine)
  };
}

/**
 * Writes the NFKC form of every line of `inputPath` to `outputPath`.
 *
 * Each input line produces exactly one `\n`-terminated output line, in
 * order, empty lines included. A line that is not valid Unicode is copied
 * through unchanged and listed in `invalidLines`.
 *
 * The output file is not created when the input does not exist, and the
 * run is refused when both paths name the same file.
 */
export async function normalizeFile(
  inputPath: string,
  outputPath: string
): Promise<NormalizeFileResult> {
  if (!(await isFile(inputPath))) {
    return { type: 'error', error: new FileNotFoundError(inputPath) };
  }

  if (await isSameFile(inputPath, outputPath)) {
    return { type: 'error', error: new SameFileError(inputPath, outputPath) };
  }

  const summary: NormalizeFileSummary = {
    linesChanged: 0,
    linesProcessed: 0,
    invalidLines: []
  };

  async function* normalizedLines(): AsyncGenerator<string> {
    for await (const line of readLines(inputPath)) {
      summary.linesProcessed++;

      let output = line;
      try {
        output = normalize(line);
      } catch (error) {
        if (!(error instanceof InvalidInputError)) throw error;
        summary.invalidLines.push(summary.linesProcessed);
      }

      if (output !== line) {
        summary.linesChanged++;
      }

      yield `${output}\n`;
    }
  }

  await pipeline(
    normalizedLines(),
    fs.createWriteStream(outputPath, { encoding: 'utf-8' })
  );

  return { type: 'ok', value: summary };
}
