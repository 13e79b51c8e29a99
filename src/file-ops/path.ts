/**
 * Path helpers shared by the filters and the ignore matcher
 */
import * as nodePath from 'node:path';

/**
 * Extract the basename from a path string
 * @param path The path to extract the basename from
 * @returns The basename (last part of the path)
 */
export function basename(path: string): string {
  if (!path) return '';
  return nodePath.basename(path);
}

/**
 * Get the file extension without its leading dot
 * @returns null when the name has no extension (including dotfiles such as `.bashrc`)
 */
export function extensionOf(path: string): string | null {
  const ext = nodePath.extname(basename(path));
  return ext === '' ? null : ext.slice(1);
}

/**
 * Gets a path relative to a base directory, always with forward slashes
 * @param filePath The file path
 * @param baseDir The base directory path
 * @returns Path relative to baseDir ('' for the directory itself)
 */
export function getRelativePath(filePath: string, baseDir: string): string {
  return nodePath.relative(baseDir, filePath).replace(/\\/g, '/');
}

/**
 * Whether a relative path (as returned by getRelativePath) stays below its base
 */
export function isInsideBase(relativePath: string): boolean {
  if (relativePath === '' || nodePath.isAbsolute(relativePath)) return false;
  return relativePath !== '..' && !relativePath.startsWith('../');
}
