/**
 * Expander - Recursive `#include:` expansion
 *
 * Output rules:
 * - plain lines are copied with a single `\n`
 * - a directive is replaced by its target's expansion, every line prefixed
 *   with the directive's indentation, followed by one blank separator line
 * - included (non-root) files are framed by `# START <path>` / `# END <path>`
 *
 * Indentation is applied to the finished nested output, so it adds up with
 * nesting depth without the resolver knowing about it.
 */

import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { logger } from '../base/utils/logger.js';
import { parseLine } from './directive.js';
import { CycleDetectedError, FileAccessError, IncludeResolutionError, ReadError } from './errors.js';
import { displayPath, endMarker, indentBlock, startMarker, trimTrailingNewlines } from './format.js';
import { resolveInclude } from './include-resolver.js';
import {
  DEFAULT_DIRECTIVE,
  type DiagnosticsSink,
  type ExpanderOptions,
  type ExpansionContext,
} from './types.js';

/**
 * Default sink: warnings go through the structured logger to stderr
 */
export const loggerDiagnostics: DiagnosticsSink = {
  warn: (message, context) => logger.warn('Expander', message, context),
};

export class Expander {
  private readonly directive: string;
  private readonly cycleDetection: boolean;
  private readonly diagnostics: DiagnosticsSink;

  constructor(options: ExpanderOptions = {}) {
    this.directive = options.directive ?? DEFAULT_DIRECTIVE;
    this.cycleDetection = options.cycleDetection ?? true;
    this.diagnostics = options.diagnostics ?? loggerDiagnostics;
  }

  /**
   * Expand a file and everything it includes
   *
   * @param rootDirectory - Directory marker paths are shown relative to
   * @param isRoot - Root output is not wrapped in START/END markers
   */
  async expand(filePath: string, rootDirectory: string, isRoot = true): Promise<string> {
    return this.expandFile(filePath, {
      rootDirectory: path.resolve(rootDirectory),
      isRoot,
      ancestry: [],
    });
  }

  /**
   * Expand an include target: a single file, or every file below a directory
   */
  async resolveInclude(targetPath: string, rootDirectory: string): Promise<string> {
    return resolveInclude(
      targetPath,
      { rootDirectory: path.resolve(rootDirectory), isRoot: false, ancestry: [] },
      (file, context) => this.expandFile(file, context)
    );
  }

  private async expandFile(filePath: string, context: ExpansionContext): Promise<string> {
    const absolutePath = path.resolve(filePath);

    if (this.cycleDetection && context.ancestry.includes(absolutePath)) {
      throw new CycleDetectedError([...context.ancestry, absolutePath]);
    }

    logger.debug('Expander', 'Expanding file', { file: filePath, depth: context.ancestry.length });

    const lines = await readLines(filePath);
    const shownPath = displayPath(filePath, context.rootDirectory);
    const nested: ExpansionContext = {
      ...context,
      isRoot: false,
      ancestry: [...context.ancestry, absolutePath],
    };

    let output = context.isRoot ? '' : startMarker(shownPath);

    for (const line of lines) {
      const parsed = parseLine(line, this.directive);

      switch (parsed.type) {
        case 'text':
          output += `${parsed.line}\n`;
          break;

        case 'empty-include':
          this.diagnostics.warn(
            `Found empty ${this.directive.replace(/:$/, '')} directive in ${filePath}. Skipping.`,
            { file: filePath }
          );
          break;

        case 'include': {
          const { indentation, targetPath } = parsed.directive;
          const fullPath = path.join(path.dirname(filePath), targetPath);

          let included: string;
          try {
            included = await resolveInclude(fullPath, nested, (file, ctx) =>
              this.expandFile(file, ctx)
            );
          } catch (error) {
            throw new IncludeResolutionError(targetPath, filePath, error);
          }

          output += indentBlock(included, indentation);
          output += '\n';
          break;
        }
      }
    }

    if (!context.isRoot) {
      output = trimTrailingNewlines(output) + endMarker(shownPath);
    }

    return output;
  }
}

/**
 * Read a whole file as lines; `\r\n` and `\n` both end a line
 *
 * The handle is released before the caller combines the lines with anything.
 */
async function readLines(filePath: string): Promise<string[]> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    throw new FileAccessError(filePath, error);
  }

  try {
    return splitDocument(await handle.readFile({ encoding: 'utf-8' }));
  } catch (error) {
    throw new ReadError(filePath, error);
  } finally {
    await handle.close();
  }
}

/**
 * Split file content into lines without terminators
 *
 * A final line terminator does not start another (empty) line.
 */
export function splitDocument(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
