/**
 * Include Resolver - Expand the target of an include directive
 *
 * A target is either a single file, expanded as-is, or a directory whose
 * non-directory entries are all expanded and concatenated in walk order.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import fastGlob from 'fast-glob';
import { logger } from '../base/utils/logger.js';
import { isVerboseDebugEnabled } from '../base/utils/debug.js';
import { DirectoryWalkError, PathNotFoundError } from './errors.js';
import type { ExpansionContext } from './types.js';

export type ExpandFile = (filePath: string, context: ExpansionContext) => Promise<string>;

/**
 * Order two slash-separated relative paths the way a depth-first walk over
 * name-sorted entries visits them: `b/x` sorts before `b-c`.
 */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

/**
 * List every non-directory entry below a directory in walk order
 *
 * Hidden files are included. Symbolic links are listed as entries but never
 * descended into; reading one that points at a directory fails later.
 *
 * @returns Paths joined onto `dirPath`
 */
export async function walkDirectory(dirPath: string): Promise<string[]> {
  let found: fastGlob.Entry[];
  try {
    found = await fastGlob('**/*', {
      cwd: dirPath,
      dot: true,
      onlyFiles: false,
      followSymbolicLinks: false,
      objectMode: true,
      suppressErrors: false,
    });
  } catch (error) {
    throw new DirectoryWalkError(dirPath, error, 'list');
  }

  const entries = found
    .filter((entry) => !entry.dirent.isDirectory())
    .map((entry) => entry.path)
    .sort(compareWalkOrder);

  if (isVerboseDebugEnabled('expander')) {
    logger.debug('Expander', 'Directory listed', { dir: dirPath, files: entries });
  }

  return entries.map((entry) => path.join(dirPath, ...entry.split('/')));
}

/**
 * Expand an include target (file or directory)
 */
export async function resolveInclude(
  targetPath: string,
  context: ExpansionContext,
  expandFile: ExpandFile
): Promise<string> {
  let stat: Stats;
  try {
    stat = await fs.stat(targetPath);
  } catch (error) {
    throw new PathNotFoundError(targetPath, error);
  }

  const nested: ExpansionContext = { ...context, isRoot: false };

  if (!stat.isDirectory()) {
    return expandFile(targetPath, nested);
  }

  logger.debug('Expander', 'Including directory', { dir: targetPath });

  let content = '';
  for (const filePath of await walkDirectory(targetPath)) {
    try {
      content += await expandFile(filePath, nested);
    } catch (error) {
      throw new DirectoryWalkError(filePath, error);
    }
  }
  return content;
}
