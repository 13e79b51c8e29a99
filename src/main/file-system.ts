import fs from 'node:fs';
import type { Stats } from 'node:fs';
import path from 'node:path';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface DirectoryEntry {
  name: string;
  path: string;
  /** From the listing itself; good enough for ignore rules, not for classification */
  isDirectory: boolean;
}

export interface EntryMetadata {
  kind: EntryKind;
  /** Native hidden attribute, independent of the entry name */
  hidden: boolean;
}

/**
 * Filesystem operations the walker consumes
 */
export interface FileSystemAdapter {
  /** Lazy listing; rejects as a whole when the directory cannot be opened or read */
  listDirectory(dirPath: string): AsyncIterable<DirectoryEntry>;
  /** Does not follow symlinks */
  getMetadata(entryPath: string): Promise<EntryMetadata>;
}

const kindOf = (stats: Stats): EntryKind => {
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  if (stats.isSymbolicLink()) return 'symlink';
  return 'other';
};

async function* listDirectory(dirPath: string): AsyncGenerator<DirectoryEntry> {
  // The Dir handle closes itself when iteration finishes, throws or is abandoned
  const dir = await fs.promises.opendir(dirPath);
  for await (const dirent of dir) {
    yield {
      name: dirent.name,
      path: path.join(dirPath, dirent.name),
      isDirectory: dirent.isDirectory(),
    };
  }
}

/**
 * Node implementation. `fs.Stats` carries no hidden attribute bit, so `hidden`
 * is always false here and hidden detection falls back to the name.
 */
export const nodeFileSystem: FileSystemAdapter = {
  listDirectory,
  async getMetadata(entryPath: string): Promise<EntryMetadata> {
    const stats = await fs.promises.lstat(entryPath);
    return { kind: kindOf(stats), hidden: false };
  },
};
