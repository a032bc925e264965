#!/usr/bin/env node

import { buildApplication, buildCommand, buildRouteMap, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { runCheck, runCompare, runNormalize } from './unicode-normalize.js';
import type { CommandOptions } from './unicode-normalize.js';

interface CommonFlags {
  config?: string;
  format?: 'text' | 'json';
  debug: boolean;
}

interface CheckFlags extends CommonFlags {
  'max-issues'?: number;
  'fail-on-issues': boolean;
}

const commonFlags = {
  config: {
    kind: 'parsed',
    brief: 'Path to configuration file',
    parse: String,
    optional: true
  },
  format: {
    kind: 'enum',
    brief: 'Override output format',
    values: ['text', 'json'],
    optional: true
  },
  debug: {
    kind: 'boolean',
    brief: 'Enable debug logging',
    default: false
  }
} as const;

const commonAliases = {
  c: 'config',
  f: 'format',
  d: 'debug'
} as const;

function parseIssueCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return count;
}

function commandOptions(flags: CommonFlags): CommandOptions {
  return {
    configPath: flags.config,
    formatOverride: flags.format,
    debug: flags.debug
  };
}

async function execute(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

const checkCommand = buildCommand({
  docs: {
    brief: 'Check a text file for lines that are not in NFKC form'
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'Text file to check',
          parse: String,
          placeholder: 'file'
        }
      ]
    },
    flags: {
      ...commonFlags,
      'max-issues': {
        kind: 'parsed',
        brief: 'Number of issues to show in detail (default 10)',
        parse: parseIssueCount,
        optional: true
      },
      'fail-on-issues': {
        kind: 'boolean',
        brief: 'Exit with code 1 when issues are found',
        default: false
      }
    },
    aliases: {
      ...commonAliases,
      m: 'max-issues'
    }
  },
  async func(this: CommandContext, flags: CheckFlags, file: string): Promise<void> {
    await execute(() =>
      runCheck(file, {
        ...commandOptions(flags),
        maxIssuesOverride: flags['max-issues'],
        failOnIssues: flags['fail-on-issues']
      })
    );
  }
});

const normalizeCommand = buildCommand({
  docs: {
    brief: 'Write the NFKC form of every line of a file to another file'
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'Input file',
          parse: String,
          placeholder: 'input'
        },
        {
          brief: 'Output file',
          parse: String,
          placeholder: 'output'
        }
      ]
    },
    flags: commonFlags,
    aliases: commonAliases
  },
  async func(this: CommandContext, flags: CommonFlags, input: string, output: string): Promise<void> {
    await execute(() => runNormalize(input, output, commandOptions(flags)));
  }
});

const compareCommand = buildCommand({
  docs: {
    brief: 'Compare two strings and show their Unicode details'
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'First string',
          parse: String,
          placeholder: 'string1'
        },
        {
          brief: 'Second string',
          parse: String,
          placeholder: 'string2'
        }
      ]
    },
    flags: commonFlags,
    aliases: commonAliases
  },
  async func(this: CommandContext, flags: CommonFlags, first: string, second: string): Promise<void> {
    await execute(() => runCompare(first, second, commandOptions(flags)));
  }
});

const routes = buildRouteMap({
  routes: {
    check: checkCommand,
    normalize: normalizeCommand,
    compare: compareCommand
  },
  docs: {
    brief: 'Detect and fix text that is not in Unicode NFKC form'
  }
});

const app = buildApplication(routes, {
  name: 'unicode-normalize',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

run(app, process.argv.slice(2), { process });
