import type { ConfigValueType, TargetVcs } from './types.js';
import { commandSucceeds, exitCodeOf, parseCount, runCommand } from './exec.js';

/** git config exits with 1 when the key is not set */
const CONFIG_KEY_UNSET_EXIT_CODE = 1;

/**
 * Git access through the git command line
 */
export class GitCli implements TargetVcs {
  async isRepository(repoPath: string): Promise<boolean> {
    return commandSucceeds('git', ['rev-parse', '--git-dir'], { cwd: repoPath });
  }

  async countCommits(repoPath: string): Promise<number> {
    const output = await runCommand('git', ['rev-list', '--all', '--count'], { cwd: repoPath });
    return parseCount(output, 'git rev-list --all --count');
  }

  async clone(repoPath: string, destination: string): Promise<boolean> {
    return commandSucceeds('git', ['clone', '--quiet', repoPath, destination]);
  }

  async listBranches(repoPath: string): Promise<string[]> {
    const output = await runCommand(
      'git',
      ['for-each-ref', '--format=%(refname:short)', 'refs/heads/'],
      { cwd: repoPath }
    );
    return output
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  async getConfig(repoPath: string, key: string, type?: ConfigValueType): Promise<string | null> {
    const args = type ? ['config', `--${type}`, key] : ['config', key];
    try {
      return await runCommand('git', args, { cwd: repoPath });
    } catch (error) {
      if (exitCodeOf(error) === CONFIG_KEY_UNSET_EXIT_CODE) {
        return null;
      }
      throw error;
    }
  }
}
