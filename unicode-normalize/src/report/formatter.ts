import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { CharDifference, NormalizationIssue, NormalizeFileSummary } from '../normalizer/types.js';
import type { CharacterInfo, CheckFileResult, ComparisonReport } from './types.js';

export interface TextFormatOptions {
  color: boolean;
}

export interface CheckFormatOptions extends TextFormatOptions {
  maxDisplayedIssues: number;
}

function palette(options: TextFormatOptions): ChalkInstance {
  return new Chalk({ level: options.color ? chalk.level : 0 });
}

function codeUnitHex(unit: string): string {
  return unit.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
}

function mark(ok: boolean, c: ChalkInstance): string {
  return ok ? c.green('✓') : c.red('✗');
}

/**
 * Formats one difference as a `Column:` row
 *
 * @example
 * formatDifference({ position: 3, original: 'e', normalized: 'é' }, { color: false })
 * // Returns: "  Column:   3 'e' (U+0065) → 'é' (U+00E9)"
 */
export function formatDifference(difference: CharDifference, options: TextFormatOptions): string {
  const c = palette(options);
  const column = String(difference.position).padStart(3);

  return (
    `  Column: ${column} ` +
    `'${c.red(difference.original)}' (U+${codeUnitHex(difference.original)}) → ` +
    `'${c.green(difference.normalized)}' (U+${codeUnitHex(difference.normalized)})`
  );
}

/**
 * Formats an issue as a `Line` header, its differences and a blank separator
 */
export function formatIssue(issue: NormalizationIssue, options: TextFormatOptions): string[] {
  const c = palette(options);
  const lines = [c.bold(`Line ${String(issue.lineNumber).padStart(4)}:`)];

  for (const difference of issue.differences) {
    lines.push(formatDifference(difference, options));
  }

  // Positional diff stops at the shorter length
  if (issue.originalLine.length !== issue.normalizedLine.length) {
    lines.push(
      c.gray(
        `  Length: ${issue.originalLine.length} → ${issue.normalizedLine.length} code units`
      )
    );
  }

  lines.push('');
  return lines;
}

/**
 * Formats the result of `check` for the console
 */
export function formatCheckReport(result: CheckFileResult, options: CheckFormatOptions): string[] {
  const c = palette(options);
  const lines: string[] = [];
  const { issues, invalidLines } = result;

  if (issues.length === 0) {
    lines.push(c.green('✓ All text is properly normalized (Form KC)'));
  } else {
    lines.push(c.yellow(`⚠ Found ${issues.length} line(s) with normalization issues:`));
    lines.push('');

    for (const issue of issues.slice(0, options.maxDisplayedIssues)) {
      lines.push(...formatIssue(issue, options));
    }

    if (issues.length > options.maxDisplayedIssues) {
      const remaining = issues.length - options.maxDisplayedIssues;
      lines.push(`... and ${remaining} more issue(s)`);
    }
  }

  if (invalidLines.length > 0) {
    lines.push('');
    lines.push(c.red(`✗ ${invalidLines.length} line(s) could not be checked:`));
    for (const invalid of invalidLines) {
      lines.push(`  Line ${String(invalid.lineNumber).padStart(4)}: ${invalid.message}`);
    }
  }

  return lines;
}

function formatCharacter(info: CharacterInfo, c: ChalkInstance): string[] {
  return [
    `  Character: '${info.character}' → U+${info.hex} (decimal: ${info.codePoint})`,
    `    Normalized Form C: ${mark(info.isNfc, c)} | Normalized Form KC: ${mark(info.isNfkc, c)}`
  ];
}

/**
 * Formats the result of `compare` for the console
 */
export function formatComparison(report: ComparisonReport, options: TextFormatOptions): string[] {
  const c = palette(options);
  const lines: string[] = [];

  lines.push(c.bold.cyan('String Comparison:'));
  lines.push(c.bold.cyan('=================='));
  lines.push('');

  lines.push(`String 1: '${report.first}'`);
  for (const info of report.firstCharacters) {
    lines.push(...formatCharacter(info, c));
  }
  lines.push('');

  lines.push(`String 2: '${report.second}'`);
  for (const info of report.secondCharacters) {
    lines.push(...formatCharacter(info, c));
  }
  lines.push('');

  lines.push('After Form KC Normalization:');
  lines.push(`  String 1: '${report.normalizedFirst}' (U+${report.normalizedFirstHex})`);
  lines.push(`  String 2: '${report.normalizedSecond}' (U+${report.normalizedSecondHex})`);
  lines.push('');

  if (report.equivalent) {
    lines.push(c.green('✓ Strings are equivalent after normalization'));
  } else {
    lines.push(c.red('✗ Strings are different even after normalization'));
  }

  return lines;
}

/**
 * Formats the result of `check` as JSON
 */
export function formatCheckJson(result: CheckFileResult): string {
  const output = {
    file: result.filePath,
    linesChecked: result.linesChecked,
    issueCount: result.issues.length,
    issues: result.issues,
    invalidLines: result.invalidLines
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Formats the result of `normalize` as JSON
 */
export function formatNormalizeJson(
  inputPath: string,
  outputPath: string,
  summary: NormalizeFileSummary
): string {
  const output = {
    input: inputPath,
    output: outputPath,
    linesProcessed: summary.linesProcessed,
    linesChanged: summary.linesChanged,
    invalidLines: summary.invalidLines
  };

  return JSON.stringify(output, null, 2);
}

/**
 * Formats the result of `compare` as JSON
 */
export function formatComparisonJson(report: ComparisonReport): string {
  return JSON.stringify(report, null, 2);
}
