import type { UnicodeNormalizeConfig } from './types.js';

/** File looked up in the working directory when no --config is given */
export const DEFAULT_CONFIG_FILE = 'unicode-normalize.json';

/**
 * Default configuration values
 */
export const defaultConfig: UnicodeNormalizeConfig = {
  output: {
    format: 'text',
    color: true
  },
  check: {
    maxDisplayedIssues: 10,
    failOnIssues: false
  },
  debug: false
};
