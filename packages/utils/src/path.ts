/**
 * Path Utilities
 */

import { tmpdir } from 'node:os';
import { basename, extname, isAbsolute, join, normalize, sep } from 'node:path';
import { config } from './config.js';

/**
 * Temporary directory used on POSIX hosts
 */
export const TMP_PATH = '/tmp/';

/**
 * Get base filename without its last extension
 *
 * /foo/bar.baz => bar, /foo/bar => bar, null => null
 */
export function fileNameWithoutExtension(path: string | null | undefined): string | null {
  if (path === null || path === undefined) {
    return null;
  }
  const name = basename(path);
  return basename(name, extname(name));
}

/**
 * Join two paths and normalize the result
 *
 * An absolute suffix replaces the prefix. The result carries no trailing
 * separator unless it is the filesystem root.
 */
export function normJoin(prefix: string, suffix: string): string {
  const joined = normalize(isAbsolute(suffix) ? suffix : join(prefix, suffix));
  if (joined.length > 1 && joined.endsWith(sep)) {
    return joined.slice(0, -1);
  }
  return joined;
}

/**
 * Temporary directory for the given platform, or undefined to let the OS decide
 */
export function customTmpDir(platform: NodeJS.Platform = process.platform): string | undefined {
  if (platform === 'linux' || platform === 'darwin') {
    return TMP_PATH;
  }
  return undefined;
}

/**
 * Temporary directory to use: the override (ALIGNER_TMP_DIR by default),
 * then the platform default, then the OS one
 */
export function resolveTmpDir(
  override: string | undefined = config.tmpDir,
  platform: NodeJS.Platform = process.platform
): string {
  return override ?? customTmpDir(platform) ?? tmpdir();
}
