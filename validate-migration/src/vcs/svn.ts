import type { SourceVcs } from './types.js';
import { commandSucceeds, parseCount, runCommand } from './exec.js';

/**
 * Subversion access through svnadmin, svnlook and svn
 */
export class SvnCli implements SourceVcs {
  async verify(repoPath: string): Promise<boolean> {
    return commandSucceeds('svnadmin', ['verify', '--quiet', repoPath]);
  }

  async youngestRevision(repoPath: string): Promise<number> {
    const output = await runCommand('svnlook', ['youngest', repoPath]);
    return parseCount(output, 'svnlook youngest');
  }

  async checkout(url: string, destination: string): Promise<boolean> {
    return commandSucceeds('svn', ['checkout', '--non-interactive', '--quiet', url, destination]);
  }
}
