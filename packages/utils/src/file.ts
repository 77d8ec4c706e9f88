/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  readFile,
  readdir,
  stat,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * Returns the names in `directory` that copyTree should skip
 */
export type IgnoreFn = (directory: string, names: string[]) => Iterable<string>;

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a leading byte order mark, if any
 */
export function removeBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Recursively copy the contents of `source` into `destination`
 *
 * The source directory itself is not copied, only what it contains.
 * `destination` is created when missing. A file source is copied as a file.
 */
export async function copyTree(
  source: string,
  destination: string,
  ignore?: IgnoreFn
): Promise<void> {
  const sourceStats = await stat(source);

  if (!sourceStats.isDirectory()) {
    await ensureDir(dirname(destination));
    await fsCopyFile(source, destination);
    return;
  }

  await ensureDir(destination);
  const names = await readdir(source);
  const ignored = new Set<string>(ignore ? ignore(source, names) : []);

  for (const name of names) {
    if (!ignored.has(name)) {
      await copyTree(join(source, name), join(destination, name), ignore);
    }
  }
}
