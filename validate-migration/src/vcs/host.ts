import type { HostInspector, MigrationTools } from './types.js';
import { isDirectory, isFile } from '../utils/fs-utils.js';
import { runCommand } from './exec.js';
import { SvnCli } from './svn.js';
import { GitCli } from './git.js';

/**
 * Host filesystem metadata. Owner names come from stat(1) because
 * Node only exposes numeric uids.
 */
export class LocalHost implements HostInspector {
  isDirectory(path: string): Promise<boolean> {
    return isDirectory(path);
  }

  isFile(path: string): Promise<boolean> {
    return isFile(path);
  }

  async ownerOf(path: string): Promise<string> {
    return runCommand('stat', ['-c', '%U', path]);
  }
}

/**
 * Tools backed by the real svn, git and stat commands
 */
export function createSystemTools(): MigrationTools {
  return {
    source: new SvnCli(),
    target: new GitCli(),
    host: new LocalHost()
  };
}
