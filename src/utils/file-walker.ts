/**
 * File Walker Utility
 *
 * Deterministic directory traversal used by every search in the resolver.
 * Entries are visited in lexical order, depth-first, with a directory yielded
 * before its contents, so "first match" is reproducible on any file system.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';
import { isJunk } from 'junk';

/**
 * Filter predicate for file walking
 */
export type FileFilter = (path: string, isDirectory: boolean) => boolean;

export interface WalkEntry {
  path: string;
  isDirectory: boolean;
}

/**
 * Options for file walking
 */
export interface WalkOptions {
  /**
   * Prune predicate: returning false skips the entry (and, for a directory, its subtree)
   */
  filter?: FileFilter;
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Async generator that walks a directory tree and yields files and directories
 *
 * Symlinks are never followed and junk files (.DS_Store, Thumbs.db, ...) are skipped.
 *
 * @example
 * for await (const entry of walkEntries('/path/to/project')) {
 *   console.log(entry.path);
 * }
 */
export async function* walkEntries(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<WalkEntry> {
  yield* walkInternal(dir, options.filter);
}

async function* walkInternal(
  dir: string,
  filter: FileFilter | undefined
): AsyncGenerator<WalkEntry> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Ignore unreadable directories and continue
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'EACCES' || code === 'EPERM') {
      return;
    }
    throw error;
  }

  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    if (entry.isSymbolicLink() || isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dir, entry.name);
    const isDirectory = entry.isDirectory();

    if (filter && !filter(fullPath, isDirectory)) {
      continue;
    }

    if (isDirectory) {
      yield { path: fullPath, isDirectory: true };
      yield* walkInternal(fullPath, filter);
    } else if (entry.isFile()) {
      yield { path: fullPath, isDirectory: false };
    }
  }
}

/**
 * Return the first walked entry satisfying the predicate, stopping the walk there
 */
export async function findFirstEntry(
  dir: string,
  predicate: (entry: WalkEntry) => boolean,
  options: WalkOptions = {}
): Promise<WalkEntry | undefined> {
  for await (const entry of walkEntries(dir, options)) {
    if (predicate(entry)) {
      return entry;
    }
  }
  return undefined;
}

/**
 * Walk directory and collect every entry satisfying the predicate
 */
export async function collectEntries(
  dir: string,
  predicate: (entry: WalkEntry) => boolean,
  options: WalkOptions = {}
): Promise<string[]> {
  const paths: string[] = [];

  for await (const entry of walkEntries(dir, options)) {
    if (predicate(entry)) {
      paths.push(entry.path);
    }
  }

  return paths;
}
