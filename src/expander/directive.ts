/**
 * Directive Parser - Classify template lines
 *
 * A line is a directive when, after trimming, it starts with the directive
 * prefix. Everything after the prefix, trimmed, is the include target.
 */

import type { ParsedLine } from './types.js';
import { DEFAULT_DIRECTIVE } from './types.js';

/**
 * Parse a single raw line (without its line terminator)
 */
export function parseLine(line: string, directive: string = DEFAULT_DIRECTIVE): ParsedLine {
  const trimmed = line.trim();
  if (!trimmed.startsWith(directive)) {
    return { type: 'text', line };
  }

  const targetPath = trimmed.slice(directive.length).trim();
  if (!targetPath) {
    return { type: 'empty-include', line };
  }

  return {
    type: 'include',
    directive: {
      // The first occurrence sits right after the leading whitespace
      indentation: line.slice(0, line.indexOf(directive)),
      targetPath,
    },
  };
}

/**
 * Check if a line is an include directive with a non-empty target
 */
export function isIncludeDirective(line: string, directive: string = DEFAULT_DIRECTIVE): boolean {
  return parseLine(line, directive).type === 'include';
}
