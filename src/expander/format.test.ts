/**
 * Formatting Helper Tests
 */

import * as path from 'path';
import { describe, it, expect } from '@jest/globals';
import { displayPath, indentBlock, trimTrailingNewlines, startMarker, endMarker } from './format.js';

describe('indentBlock', () => {
  it('prefixes every line and drops one trailing newline', () => {
    expect(indentBlock('a\nb\n', '  ')).toBe('  a\n  b\n');
  });

  it('indents content without a trailing newline', () => {
    expect(indentBlock('a\nb', '  ')).toBe('  a\n  b\n');
  });

  it('keeps inner blank lines', () => {
    expect(indentBlock('a\n\nb', '>')).toBe('>a\n>\n>b\n');
  });

  it('returns nothing for empty content', () => {
    expect(indentBlock('', '  ')).toBe('');
    expect(indentBlock('\n', '  ')).toBe('');
  });
});

describe('displayPath', () => {
  it('is relative to the root with forward slashes', () => {
    const root = path.resolve('/srv/templates');
    expect(displayPath(path.join(root, 'parts', 'a.txt'), root)).toBe('parts/a.txt');
  });

  it('climbs out of the root when the file lives elsewhere', () => {
    const root = path.resolve('/srv/templates');
    expect(displayPath(path.resolve('/srv/shared/b.txt'), root)).toBe('../shared/b.txt');
  });
});

describe('markers', () => {
  it('frames a path', () => {
    expect(startMarker('a/b.txt')).toBe('# START a/b.txt\n');
    expect(endMarker('a/b.txt')).toBe('\n# END a/b.txt\n');
  });
});

describe('trimTrailingNewlines', () => {
  it('removes every trailing newline', () => {
    expect(trimTrailingNewlines('x\n\n\n')).toBe('x');
    expect(trimTrailingNewlines('x\ny')).toBe('x\ny');
  });
});
