import { readdir } from 'fs/promises';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/fs-utils.js';

/**
 * Lists repository names under the source root: one per visible entry, sorted.
 * @throws Error if the root cannot be read or has no entries
 */
export async function discoverRepositories(sourceRoot: string): Promise<string[]> {
  let entries: string[];

  try {
    entries = await readdir(sourceRoot);
  } catch (error) {
    logger.debug(`Cannot read ${sourceRoot}: ${errorMessage(error)}`);
    throw new Error(`No SVN repositories found in ${sourceRoot}`);
  }

  const names = entries.filter(name => !name.startsWith('.')).sort();
  if (names.length === 0) {
    throw new Error(`No SVN repositories found in ${sourceRoot}`);
  }

  return names;
}

/**
 * Narrows discovered repositories to the requested ones, keeping discovery order
 * @throws Error if a requested repository was not discovered
 */
export function selectRepositories(discovered: string[], requested: string[]): string[] {
  if (requested.length === 0) {
    return discovered;
  }

  const unknown = requested.filter(name => !discovered.includes(name));
  if (unknown.length > 0) {
    throw new Error(`Unknown repositories: ${unknown.join(', ')}`);
  }

  return discovered.filter(name => requested.includes(name));
}
