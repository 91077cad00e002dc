/**
 * Output formatting helpers for markers and indented blocks
 */

import * as path from 'path';

/**
 * Path shown in markers: relative to the root directory, forward slashes
 *
 * Falls back to the path as given when no relative path exists
 * (e.g. a different drive on Windows).
 */
export function displayPath(filePath: string, rootDirectory: string): string {
  const relative = path.relative(rootDirectory, path.resolve(filePath));
  const shown = path.isAbsolute(relative) ? filePath : relative;
  return toSlash(shown);
}

export function toSlash(p: string): string {
  return p.split(path.sep).join('/');
}

export function startMarker(shownPath: string): string {
  return `# START ${shownPath}\n`;
}

export function endMarker(shownPath: string): string {
  return `\n# END ${shownPath}\n`;
}

/**
 * Prefix every line of an expanded include with the directive's indentation
 *
 * Exactly one trailing newline is dropped first so the nested output does
 * not turn into an extra indented blank line. Empty content yields ''.
 */
export function indentBlock(content: string, indentation: string): string {
  const body = content.endsWith('\n') ? content.slice(0, -1) : content;
  if (body === '') {
    return '';
  }

  const lines = body.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.map((line) => `${indentation}${line}\n`).join('');
}

export function trimTrailingNewlines(text: string): string {
  return text.replace(/\n+$/, '');
}
