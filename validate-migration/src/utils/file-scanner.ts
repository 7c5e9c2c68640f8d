import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from './logger.js';
import { hasErrorCode } from './fs-utils.js';

export interface ScanOptions {
  excludeTopLevelDirs?: string[];  // Metadata directories skipped at the tree root only (e.g., ['.git'])
}

/**
 * Recursively scans a directory and returns the relative paths of its regular files
 * @param dirPath - Directory path to scan
 * @param options - Scan options for filtering
 * @returns Relative file paths, sorted
 */
export async function scanFiles(
  dirPath: string,
  options: ScanOptions = {}
): Promise<string[]> {
  const files: string[] = [];
  await scanDirectoryRecursive(dirPath, '', files, options);
  return files.sort();
}

/**
 * Counts regular files below a directory. Symlinks and directories are not counted.
 */
export async function countFiles(
  dirPath: string,
  options: ScanOptions = {}
): Promise<number> {
  const files = await scanFiles(dirPath, options);
  logger.debug(`Counted ${files.length} files in ${dirPath}`);
  return files.length;
}

/**
 * Recursive helper function for scanning directories
 */
async function scanDirectoryRecursive(
  rootPath: string,
  relativePath: string,
  files: string[],
  options: ScanOptions
): Promise<void> {
  const dirPath = relativePath ? path.join(rootPath, relativePath) : rootPath;
  let entries;

  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'EACCES')) {
      logger.warn(`Permission denied: ${dirPath}`);
      return;
    }
    if (hasErrorCode(error, 'ENOENT')) {
      logger.warn(`Directory not found: ${dirPath}`);
      return;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = relativePath ? path.join(relativePath, entry.name) : entry.name;

    if (entry.isDirectory()) {
      if (!relativePath && shouldExcludeDirectory(entry.name, options)) {
        logger.debug(`Excluding directory: ${path.join(rootPath, entryPath)}`);
        continue;
      }
      await scanDirectoryRecursive(rootPath, entryPath, files, options);
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
}

/**
 * Determines if a top-level directory should be excluded
 */
function shouldExcludeDirectory(dirName: string, options: ScanOptions): boolean {
  if (!options.excludeTopLevelDirs || options.excludeTopLevelDirs.length === 0) {
    return false;
  }

  return options.excludeTopLevelDirs.includes(dirName);
}
