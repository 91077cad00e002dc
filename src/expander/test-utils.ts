/**
 * Shared test utilities for expander tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export interface TestTree {
  dir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create an empty temp directory
 */
export async function createTestTree(prefix = 'expander-test-'): Promise<TestTree> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));

  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/**
 * Write files given as relative path -> content, creating parent directories
 *
 * @returns Absolute paths keyed like the input
 */
export async function writeFiles(
  dir: string,
  files: Record<string, string>
): Promise<Record<string, string>> {
  const written: Record<string, string> = {};

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(dir, ...relativePath.split('/'));
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    written[relativePath] = filePath;
  }

  return written;
}
