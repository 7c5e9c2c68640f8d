#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { validateMigration } from './validate-migration.js';
import type { ValidatorConfig } from './config/types.js';
import { errorMessage } from './utils/fs-utils.js';
import { logger } from './utils/logger.js';

interface ValidateFlags {
  config?: string;
  'source-root'?: string;
  'target-root'?: string;
  owner?: string;
  report?: string;
  debug: boolean;
}

/**
 * CLI flags that were actually given, as config overrides
 */
function flagOverrides(flags: ValidateFlags): Partial<ValidatorConfig> {
  const overrides: Partial<ValidatorConfig> = {};

  if (flags['source-root'] !== undefined) overrides.sourceRoot = flags['source-root'];
  if (flags['target-root'] !== undefined) overrides.targetRoot = flags['target-root'];
  if (flags.owner !== undefined) overrides.expectedOwner = flags.owner;
  if (flags.report !== undefined) overrides.reportFile = flags.report;
  // stricli always supplies the default, so only an explicit --debug overrides the config file
  if (flags.debug) overrides.debug = true;

  return overrides;
}

const validateCommand = buildCommand({
  docs: {
    brief: 'Check that SVN repositories were migrated to Git completely'
  },
  parameters: {
    positional: {
      kind: 'array',
      parameter: {
        brief: 'Repository names to validate (default: all)',
        parse: String,
        placeholder: 'repository'
      }
    },
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      'source-root': {
        kind: 'parsed',
        brief: 'Directory containing the SVN repositories',
        parse: String,
        optional: true
      },
      'target-root': {
        kind: 'parsed',
        brief: 'Directory containing the migrated Git repositories',
        parse: String,
        optional: true
      },
      owner: {
        kind: 'parsed',
        brief: 'Account expected to own both repositories',
        parse: String,
        optional: true
      },
      report: {
        kind: 'parsed',
        brief: 'Write a JSON report to this file',
        parse: String,
        optional: true
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      s: 'source-root',
      t: 'target-root',
      u: 'owner',
      r: 'report',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: ValidateFlags, ...repositories: string[]): Promise<void> {
    if (flags.debug) {
      logger.setDebug(true);
    }

    try {
      const outcome = await validateMigration({
        configPath: flags.config,
        overrides: flagOverrides(flags),
        repositories
      });
      process.exitCode = outcome.exitCode;
    } catch (error) {
      logger.error(`Validation aborted: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(validateCommand, {
  name: 'validate-migration',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

await run(app, process.argv.slice(2), { process });
