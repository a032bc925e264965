import chalk from 'chalk';
import { loadConfig } from './config/config.js';
import type { OutputFormat, UnicodeNormalizeConfig } from './config/types.js';
import { FileNotFoundError, InvalidInputError, checkLine, normalizeFile } from './normalizer/index.js';
import {
  formatCheckJson,
  formatCheckReport,
  formatComparison,
  formatComparisonJson,
  formatNormalizeJson
} from './report/formatter.js';
import { compareStrings } from './report/inspection.js';
import type { CheckFileResult } from './report/types.js';
import { isFile, readLines } from './utils/line-reader.js';
import { logger } from './utils/logger.js';

export interface CommandOptions {
  configPath?: string;
  formatOverride?: OutputFormat;
  debug?: boolean;
}

export interface CheckOptions extends CommandOptions {
  maxIssuesOverride?: number;
  failOnIssues?: boolean;
}

/**
 * Loads configuration and applies command line overrides
 */
async function prepare(options: CommandOptions): Promise<UnicodeNormalizeConfig> {
  if (options.debug) {
    logger.enableDebug();
  }

  const config = await loadConfig(options.configPath);

  if (options.formatOverride) {
    config.output.format = options.formatOverride;
  }
  if (config.debug) {
    logger.enableDebug();
  }
  if (!config.output.color) {
    chalk.level = 0;
  }

  logger.setQuiet(config.output.format === 'json');
  logger.debug(`Config: ${JSON.stringify(config)}`);

  return config;
}

/**
 * Runs checkLine over every line of a file.
 *
 * Lines that are not valid Unicode are collected in `invalidLines` and do not
 * stop the scan.
 *
 * @throws FileNotFoundError if the file does not exist
 */
export async function checkFile(filePath: string): Promise<CheckFileResult> {
  if (!(await isFile(filePath))) {
    throw new FileNotFoundError(filePath);
  }

  const result: CheckFileResult = {
    filePath,
    linesChecked: 0,
    issues: [],
    invalidLines: []
  };

  for await (const line of readLines(filePath)) {
    result.linesChecked++;

    try {
      const issue = checkLine(result.linesChecked, line);
      if (issue) {
        result.issues.push(issue);
      }
    } catch (error) {
      if (!(error instanceof InvalidInputError)) throw error;
      result.invalidLines.push({ lineNumber: result.linesChecked, message: error.message });
    }
  }

  logger.debug(`Checked ${result.linesChecked} lines, ${result.issues.length} with issues`);
  return result;
}

/**
 * `check` command
 * @returns Process exit code
 */
export async function runCheck(filePath: string, options: CheckOptions = {}): Promise<number> {
  const config = await prepare(options);

  if (options.maxIssuesOverride !== undefined) {
    config.check.maxDisplayedIssues = options.maxIssuesOverride;
  }
  if (options.failOnIssues) {
    config.check.failOnIssues = true;
  }

  logger.info(`Checking file: ${filePath}`);
  logger.info('');

  let result: CheckFileResult;
  try {
    result = await checkFile(filePath);
  } catch (error) {
    if (error instanceof FileNotFoundError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  if (config.output.format === 'json') {
    console.log(formatCheckJson(result));
  } else {
    const lines = formatCheckReport(result, {
      color: config.output.color,
      maxDisplayedIssues: config.check.maxDisplayedIssues
    });
    console.log(lines.join('\n'));
  }

  return config.check.failOnIssues && result.issues.length > 0 ? 1 : 0;
}

/**
 * `normalize` command
 * @returns Process exit code
 */
export async function runNormalize(
  inputPath: string,
  outputPath: string,
  options: CommandOptions = {}
): Promise<number> {
  const config = await prepare(options);

  logger.info(`Normalizing: ${inputPath} → ${outputPath}`);

  const result = await normalizeFile(inputPath, outputPath);
  if (result.type === 'error') {
    logger.error(result.error.message);
    return 1;
  }

  const summary = result.value;

  if (config.output.format === 'json') {
    console.log(formatNormalizeJson(inputPath, outputPath, summary));
    return 0;
  }

  if (summary.invalidLines.length > 0) {
    logger.warn(
      `${summary.invalidLines.length} line(s) were not valid Unicode and were copied unchanged: ` +
        summary.invalidLines.join(', ')
    );
  }

  logger.success(
    `Complete: ${summary.linesProcessed} lines processed, ${summary.linesChanged} lines normalized`
  );

  return 0;
}

/**
 * `compare` command
 * @returns Process exit code
 */
export async function runCompare(
  first: string,
  second: string,
  options: CommandOptions = {}
): Promise<number> {
  const config = await prepare(options);

  try {
    const report = compareStrings(first, second);

    if (config.output.format === 'json') {
      console.log(formatComparisonJson(report));
    } else {
      console.log(formatComparison(report, { color: config.output.color }).join('\n'));
    }
  } catch (error) {
    if (error instanceof InvalidInputError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  return 0;
}
