/**
 * Indexer Utilities
 *
 * Safe file system helpers, timing helpers and a promise mutex.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EXCLUDED_DIRS } from './config';

/**
 * Safely read a file, returning null on error.
 */
export function safeReadFile(filePath: string, encoding: BufferEncoding = 'utf8'): string | null {
  try {
    return fs.readFileSync(filePath, encoding);
  } catch {
    return null;
  }
}

/**
 * Safely get file stats, returning null on error.
 */
export function safeStat(filePath: string): fs.Stats | null {
  try {
    return fs.statSync(filePath);
  } catch {
    return null;
  }
}

/**
 * Safely read directory entries, returning empty array on error.
 */
export function safeReadDir(dirPath: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }
}

/**
 * Check if a directory name is skipped during scans.
 */
export function isExcludedDir(name: string): boolean {
  return EXCLUDED_DIRS.has(name);
}

/**
 * Recursively list files under `root` whose name ends with one of `extensions`.
 * Directory entries are visited in name order so results are stable.
 */
export function walkFiles(root: string, extensions: string[]): string[] {
  const found: string[] = [];
  const wanted = extensions.map((e) => e.toLowerCase());

  const visit = (dir: string): void => {
    const entries = safeReadDir(dir).sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!isExcludedDir(entry.name)) visit(full);
      } else if (entry.isFile() && wanted.includes(path.extname(entry.name).toLowerCase())) {
        found.push(full);
      }
    }
  };

  visit(root);
  return found;
}

// Non-blocking sleep for async paths
export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Race a promise against a timer. Resolves to `onTimeout` when the timer wins.
 */
export async function withTimeout<T, U>(promise: Promise<T>, ms: number, onTimeout: U): Promise<T | U> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<U>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Promise-based mutex: callers run one at a time in arrival order.
 * A failing task does not poison the chain for the next caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
