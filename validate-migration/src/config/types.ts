/**
 * Configuration for migration validation
 */
export interface ValidatorConfig {
  /** Directory holding one SVN repository per subdirectory */
  sourceRoot: string;

  /** Directory holding the migrated Git repositories */
  targetRoot: string;

  /** Appended to the repository name to form the Git repository directory */
  targetSuffix: string;

  /** Path of the primary line inside each SVN repository */
  trunkPath: string;

  /** File expected at the top of both the clone and the checkout */
  sampleFile: string;

  /** Account expected to own both repositories */
  expectedOwner: string;

  /** Git config key that enables pushes over HTTP */
  receivePackKey: string;

  /** Optional path to write a JSON report to (null = no report) */
  reportFile: string | null;

  debug: boolean;
}

/** Fields that must hold a non-empty string after merging */
export const REQUIRED_STRING_FIELDS = [
  'sourceRoot',
  'targetRoot',
  'targetSuffix',
  'trunkPath',
  'sampleFile',
  'expectedOwner',
  'receivePackKey'
] as const satisfies ReadonlyArray<keyof ValidatorConfig>;
