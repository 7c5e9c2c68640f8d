/**
 * Capabilities the validator needs from the source VCS (Subversion)
 */
export interface SourceVcs {
  /** Runs the repository integrity check; false when it reports problems */
  verify(repoPath: string): Promise<boolean>;
  /** Latest revision number. Rejects when the query fails. */
  youngestRevision(repoPath: string): Promise<number>;
  checkout(url: string, destination: string): Promise<boolean>;
}

/**
 * Capabilities the validator needs from the target VCS (Git)
 */
export interface TargetVcs {
  isRepository(repoPath: string): Promise<boolean>;
  /** Commits reachable from any ref. Rejects when the query fails. */
  countCommits(repoPath: string): Promise<number>;
  clone(repoPath: string, destination: string): Promise<boolean>;
  /** Short names of refs under refs/heads/ */
  listBranches(repoPath: string): Promise<string[]>;
  /** Config value, or null when the key is unset */
  getConfig(repoPath: string, key: string, type?: ConfigValueType): Promise<string | null>;
}

/** Canonicalization applied by the VCS when reading a config value */
export type ConfigValueType = 'bool';

/**
 * Filesystem metadata of the host
 */
export interface HostInspector {
  isDirectory(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  /** Login name of the owning account */
  ownerOf(path: string): Promise<string>;
}

export interface MigrationTools {
  source: SourceVcs;
  target: TargetVcs;
  host: HostInspector;
}
