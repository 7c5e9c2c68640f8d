import path from 'path';
import { pathToFileURL } from 'url';
import type { ValidatorConfig } from '../config/types.js';

/**
 * An SVN repository and the Git repository it was migrated to
 */
export interface RepositoryPair {
  name: string;
  sourcePath: string;
  targetPath: string;
  /** URL of the primary line, used for the checkout */
  checkoutUrl: string;
}

type LayoutConfig = Pick<ValidatorConfig, 'sourceRoot' | 'targetRoot' | 'targetSuffix' | 'trunkPath'>;

/**
 * Paths are made absolute against the working directory so external commands
 * run from any cwd see the same repositories.
 */
export function resolveRepositoryPair(name: string, config: LayoutConfig): RepositoryPair {
  const sourcePath = path.resolve(config.sourceRoot, name);
  const trunk = config.trunkPath.replace(/^\/+|\/+$/g, '');

  return {
    name,
    sourcePath,
    targetPath: path.resolve(config.targetRoot, `${name}${config.targetSuffix}`),
    checkoutUrl: pathToFileURL(path.join(sourcePath, trunk)).href
  };
}
