import fs from 'node:fs';
import path from 'node:path';

import ignore from 'ignore';

import { FILE_SYSTEM } from '../constants';
import { getRelativePath, isInsideBase } from '../file-ops/path';

import { getErrorMessage } from './error-utils';
import { logger } from './logger';

export interface IgnoreMatcher {
  /** Directory the rules are relative to */
  readonly root: string;
  /**
   * True when the path, or one of its ancestors below the root, is excluded
   * and not re-included by a later `!` rule. The root itself is never ignored.
   * Never throws.
   */
  isIgnored: (entryPath: string, isDirectory: boolean) => boolean;
}

const isRegularFile = (filePath: string): boolean => {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
};

/**
 * Compile `<root>/.gitignore`. Nested, global and system ignore files are not read.
 *
 * Returns null when the file is missing, is not a regular file, or cannot be
 * read or compiled; callers treat null as "ignore nothing".
 */
export const loadIgnoreMatcher = (root: string): IgnoreMatcher | null => {
  const absoluteRoot = path.resolve(root);
  const ignoreFilePath = path.join(absoluteRoot, FILE_SYSTEM.IGNORE_FILE_NAME);

  if (!isRegularFile(ignoreFilePath)) {
    return null;
  }

  try {
    const ig = ignore().add(fs.readFileSync(ignoreFilePath, 'utf8'));

    return {
      root: absoluteRoot,
      isIgnored: (entryPath: string, isDirectory: boolean): boolean => {
        const relativePath = getRelativePath(path.resolve(entryPath), absoluteRoot);
        if (!isInsideBase(relativePath)) return false;
        // Directory-only rules (`build/`) need the trailing slash to apply
        const query = isDirectory ? `${relativePath}/` : relativePath;
        try {
          return ig.ignores(query);
        } catch (error: unknown) {
          // Names such as `...` are not paths `ignore` accepts; no rule can match them
          logger.debug(`Not matching ${query} against ignore rules: ${getErrorMessage(error)}`);
          return false;
        }
      },
    };
  } catch (error: unknown) {
    logger.debug(`Ignoring unusable ${ignoreFilePath}: ${getErrorMessage(error)}`);
    return null;
  }
};

export const isPathIgnored = (
  matcher: IgnoreMatcher | null,
  entryPath: string,
  isDirectory: boolean
): boolean => (matcher ? matcher.isIgnored(entryPath, isDirectory) : false);
