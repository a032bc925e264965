import fs from 'fs/promises';
import path from 'path';
import type { UnicodeNormalizeConfig, UnicodeNormalizeConfigFile } from './types.js';
import { DEFAULT_CONFIG_FILE, defaultConfig } from './defaults.js';
import { logger } from '../utils/logger.js';

/**
 * Merges a configuration file over the defaults
 */
export function mergeConfig(userConfig: UnicodeNormalizeConfigFile = {}): UnicodeNormalizeConfig {
  return {
    output: {
      ...defaultConfig.output,
      ...userConfig.output
    },
    check: {
      ...defaultConfig.check,
      ...userConfig.check
    },
    debug: userConfig.debug ?? defaultConfig.debug
  };
}

/**
 * Loads configuration from a JSON file.
 *
 * An explicit path must exist. Without one, `unicode-normalize.json` in the
 * working directory is used when present, and the defaults otherwise.
 *
 * @param configPath - Optional path provided by user
 * @returns Loaded configuration merged with defaults
 */
export async function loadConfig(configPath?: string): Promise<UnicodeNormalizeConfig> {
  const resolved = resolveConfigPath(configPath);

  let configContent: string;
  try {
    configContent = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      if (configPath) {
        throw new Error(`Configuration file not found: ${resolved}`);
      }
      logger.debug(`No configuration file at ${resolved}, using defaults`);
      return mergeConfig();
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(configContent);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Configuration error: file must contain a JSON object');
  }
  logger.debug(`Loaded config from: ${resolved}`);

  const config = mergeConfig(parsed as UnicodeNormalizeConfigFile);
  validateConfig(config);

  return config;
}

/**
 * Validates the configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: UnicodeNormalizeConfig): void {
  if (config.output.format !== 'text' && config.output.format !== 'json') {
    throw new Error('Configuration error: output format must be "text" or "json"');
  }

  if (typeof config.output.color !== 'boolean') {
    throw new Error('Configuration error: output color must be true or false');
  }

  const max = config.check.maxDisplayedIssues;
  if (!Number.isInteger(max) || max < 0) {
    throw new Error('Configuration error: maxDisplayedIssues must be a non-negative integer');
  }

  if (typeof config.check.failOnIssues !== 'boolean') {
    throw new Error('Configuration error: failOnIssues must be true or false');
  }
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 * @returns Path to configuration file
 */
export function resolveConfigPath(providedPath?: string): string {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  return path.resolve(DEFAULT_CONFIG_FILE);
}
