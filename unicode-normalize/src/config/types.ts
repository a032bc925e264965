export type OutputFormat = 'text' | 'json';

/**
 * Configuration for unicode-normalize
 */
export interface UnicodeNormalizeConfig {
  /** Output configuration */
  output: {
    /** Output format: 'text' or 'json' */
    format: OutputFormat;

    /** Whether to colorize text output */
    color: boolean;
  };

  /** Settings for the `check` command */
  check: {
    /** Number of issues printed in detail before summarizing the rest */
    maxDisplayedIssues: number;

    /** Exit with code 1 when any issue is found */
    failOnIssues: boolean;
  };

  /** Enable debug logging */
  debug: boolean;
}

/**
 * Shape of a configuration file, where every section is optional
 */
export interface UnicodeNormalizeConfigFile {
  output?: Partial<UnicodeNormalizeConfig['output']>;
  check?: Partial<UnicodeNormalizeConfig['check']>;
  debug?: boolean;
}
