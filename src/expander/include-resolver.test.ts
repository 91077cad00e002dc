/**
 * Include Resolver Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { compareWalkOrder, resolveInclude, walkDirectory } from './include-resolver.js';
import { DirectoryWalkError, PathNotFoundError } from './errors.js';
import type { ExpansionContext } from './types.js';
import { createTestTree, writeFiles, type TestTree } from './test-utils.js';

describe('compareWalkOrder', () => {
  it('visits a directory before siblings that share its name as a prefix', () => {
    const entries = ['b-c.txt', 'b/x.txt', 'a.txt'];
    expect(entries.sort(compareWalkOrder)).toEqual(['a.txt', 'b/x.txt', 'b-c.txt']);
  });

  it('compares by code unit', () => {
    expect(['a.txt', 'Z.txt', '.env'].sort(compareWalkOrder)).toEqual(['.env', 'Z.txt', 'a.txt']);
  });
});

describe('walkDirectory', () => {
  let tree: TestTree;

  beforeEach(async () => {
    tree = await createTestTree('expander-walk-');
  });

  afterEach(() => tree.cleanup());

  it('lists every file recursively in walk order', async () => {
    await writeFiles(tree.dir, {
      'sub-x.txt': 'x',
      'sub/c.txt': 'c',
      'b.txt': 'b',
      'a.txt': 'a',
      '.hidden': 'h',
    });

    const files = await walkDirectory(tree.dir);

    expect(files).toEqual([
      path.join(tree.dir, '.hidden'),
      path.join(tree.dir, 'a.txt'),
      path.join(tree.dir, 'b.txt'),
      path.join(tree.dir, 'sub', 'c.txt'),
      path.join(tree.dir, 'sub-x.txt'),
    ]);
  });

  it('lists symbolic links in walk order without descending into them', async () => {
    const outside = await writeFiles(tree.dir, { 'shared/s.txt': 's', 'shared/deep/d.txt': 'd' });
    await writeFiles(tree.dir, { 'parts/a.txt': 'a', 'parts/c.txt': 'c' });
    await fs.symlink(outside['shared/s.txt'], path.join(tree.dir, 'parts', 'b-link.txt'));
    await fs.symlink(path.join(tree.dir, 'shared', 'deep'), path.join(tree.dir, 'parts', 'd-dir'));

    const files = await walkDirectory(path.join(tree.dir, 'parts'));

    expect(files).toEqual([
      path.join(tree.dir, 'parts', 'a.txt'),
      path.join(tree.dir, 'parts', 'b-link.txt'),
      path.join(tree.dir, 'parts', 'c.txt'),
      path.join(tree.dir, 'parts', 'd-dir'),
    ]);
  });

  it('skips empty subdirectories', async () => {
    await fs.mkdir(path.join(tree.dir, 'empty'));
    await writeFiles(tree.dir, { 'only.txt': 'o' });

    expect(await walkDirectory(tree.dir)).toEqual([path.join(tree.dir, 'only.txt')]);
  });
});

describe('resolveInclude', () => {
  let tree: TestTree;
  let context: ExpansionContext;

  beforeEach(async () => {
    tree = await createTestTree('expander-resolve-');
    context = { rootDirectory: tree.dir, isRoot: true, ancestry: [] };
  });

  afterEach(() => tree.cleanup());

  it('expands a single file through the callback as non-root', async () => {
    const files = await writeFiles(tree.dir, { 'one.txt': 'one' });
    const calls: Array<[string, boolean]> = [];

    const result = await resolveInclude(files['one.txt'], context, async (file, ctx) => {
      calls.push([file, ctx.isRoot]);
      return `<${path.basename(file)}>`;
    });

    expect(result).toBe('<one.txt>');
    expect(calls).toEqual([[files['one.txt'], false]]);
  });

  it('concatenates directory files in walk order', async () => {
    await writeFiles(tree.dir, { 'parts/b.txt': '', 'parts/a.txt': '', 'parts/z/c.txt': '' });

    const result = await resolveInclude(path.join(tree.dir, 'parts'), context, async (file) => {
      return `${path.relative(tree.dir, file).split(path.sep).join('/')};`;
    });

    expect(result).toBe('parts/a.txt;parts/b.txt;parts/z/c.txt;');
  });

  it('returns an empty string for an empty directory', async () => {
    await fs.mkdir(path.join(tree.dir, 'empty'));

    const result = await resolveInclude(path.join(tree.dir, 'empty'), context, async () => 'never');

    expect(result).toBe('');
  });

  it('fails with PathNotFoundError for a missing target', async () => {
    const missing = path.join(tree.dir, 'missing.txt');

    await expect(resolveInclude(missing, context, async () => '')).rejects.toBeInstanceOf(PathNotFoundError);
    await expect(resolveInclude(missing, context, async () => '')).rejects.toThrow(
      `include path not found ${missing}`
    );
  });

  it('stops at the first failing file in a directory', async () => {
    await writeFiles(tree.dir, { 'parts/a.txt': '', 'parts/b.txt': '', 'parts/c.txt': '' });
    const visited: string[] = [];

    const promise = resolveInclude(path.join(tree.dir, 'parts'), context, async (file) => {
      visited.push(path.basename(file));
      if (path.basename(file) === 'b.txt') {
        throw new Error('boom');
      }
      return '';
    });

    await expect(promise).rejects.toBeInstanceOf(DirectoryWalkError);
    await expect(promise).rejects.toThrow(
      `failed to process file in directory ${path.join(tree.dir, 'parts', 'b.txt')}: boom`
    );
    expect(visited).toEqual(['a.txt', 'b.txt']);
  });
});
