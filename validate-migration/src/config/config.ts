import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { homedir } from 'os';
import type { ValidatorConfig } from './types.js';
import { REQUIRED_STRING_FIELDS } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger } from '../utils/logger.js';
import { errorMessage, isAccessible } from '../utils/fs-utils.js';

export const LOCAL_CONFIG_FILE = 'validate-migration.json';

export interface LoadConfigOptions {
  /** Explicit config file (must exist) */
  configPath?: string;
  /** Values that take precedence over every file, e.g. from CLI flags */
  overrides?: Partial<ValidatorConfig>;
  /** Directory searched for validate-migration.json (defaults to cwd) */
  cwd?: string;
  /** Home directory searched for .config/validate-migration/config.json */
  homeDir?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks field types of a parsed config file and keeps the known fields
 * @throws Error if a known field has the wrong type
 */
export function parseConfigObject(raw: unknown, source: string): Partial<ValidatorConfig> {
  if (!isRecord(raw)) {
    throw new Error(`Configuration error: ${source} must contain a JSON object`);
  }

  const config: Partial<ValidatorConfig> = {};

  for (const field of REQUIRED_STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      throw new Error(`Configuration error: ${field} in ${source} must be a string`);
    }
    config[field] = value;
  }

  const reportFile = raw.reportFile;
  if (reportFile === null || typeof reportFile === 'string') {
    config.reportFile = reportFile;
  } else if (reportFile !== undefined) {
    throw new Error(`Configuration error: reportFile in ${source} must be a string or null`);
  }

  const debug = raw.debug;
  if (debug !== undefined) {
    if (typeof debug !== 'boolean') {
      throw new Error(`Configuration error: debug in ${source} must be a boolean`);
    }
    config.debug = debug;
  }

  return config;
}

/**
 * Load configuration from file
 * @returns null when the file does not exist
 */
async function loadConfigFile(path: string): Promise<Partial<ValidatorConfig> | null> {
  if (!(await isAccessible(path))) {
    return null;
  }

  const content = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Configuration error: ${path} is not valid JSON (${errorMessage(error)})`);
  }

  logger.debug(`Loaded config from: ${path}`);
  return parseConfigObject(parsed, path);
}

/**
 * Merge configurations with precedence (later wins)
 */
export function mergeConfigs(...configs: Array<Partial<ValidatorConfig> | null>): ValidatorConfig {
  const merged: ValidatorConfig = { ...DEFAULT_CONFIG };

  for (const config of configs) {
    if (!config) continue;

    for (const field of REQUIRED_STRING_FIELDS) {
      const value = config[field];
      if (value !== undefined) merged[field] = value;
    }
    if (config.reportFile !== undefined) merged.reportFile = config.reportFile;
    if (config.debug !== undefined) merged.debug = config.debug;
  }

  return merged;
}

/**
 * Validates the configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: ValidatorConfig): void {
  for (const field of REQUIRED_STRING_FIELDS) {
    if (config[field].trim() === '') {
      throw new Error(`Configuration error: ${field} must be a non-empty string`);
    }
  }
}

/**
 * Load configuration with hierarchy:
 * 1. CLI overrides (highest priority)
 * 2. Explicit config file path
 * 3. ~/.config/validate-migration/config.json
 * 4. ./validate-migration.json
 * 5. Default config (lowest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ValidatorConfig> {
  const configs: Array<Partial<ValidatorConfig> | null> = [];

  configs.push(await loadConfigFile(join(options.cwd ?? process.cwd(), LOCAL_CONFIG_FILE)));

  const userConfigPath = join(options.homeDir ?? homedir(), '.config', 'validate-migration', 'config.json');
  configs.push(await loadConfigFile(userConfigPath));

  if (options.configPath) {
    const explicitPath = resolve(options.configPath);
    const explicitConfig = await loadConfigFile(explicitPath);
    if (!explicitConfig) {
      throw new Error(`Configuration file not found: ${explicitPath}`);
    }
    configs.push(explicitConfig);
  }

  configs.push(options.overrides ?? null);

  const config = mergeConfigs(...configs);
  validateConfig(config);

  return config;
}
