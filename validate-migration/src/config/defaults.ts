import type { ValidatorConfig } from './types.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ValidatorConfig = {
  sourceRoot: '/var/svn',
  targetRoot: '/var/git',
  targetSuffix: '.git',
  trunkPath: 'trunk',
  sampleFile: 'README.md',
  expectedOwner: 'www-data',
  receivePackKey: 'http.receivepack',
  reportFile: null,
  debug: false
};
