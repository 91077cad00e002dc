/**
 * Expander Types
 */

import type { LogContext } from '../base/utils/logger.js';

/**
 * A parsed `#include:` line
 */
export interface IncludeDirective {
  /** Raw prefix of the line before the directive marker */
  indentation: string;
  /** Path argument, relative to the directory of the including file */
  targetPath: string;
}

/**
 * Classification of a single template line
 */
export type ParsedLine =
  | { type: 'text'; line: string }
  | { type: 'include'; directive: IncludeDirective }
  | { type: 'empty-include'; line: string };

/**
 * Receives the non-fatal warnings raised during expansion
 */
export interface DiagnosticsSink {
  warn(message: string, context?: LogContext): void;
}

/**
 * State threaded through every recursive expansion call
 */
export interface ExpansionContext {
  /** Absolute root used for marker paths; never changes during a run */
  rootDirectory: string;
  isRoot: boolean;
  /** Absolute paths of the files currently being expanded, outermost first */
  ancestry: readonly string[];
}

export interface ExpanderOptions {
  /** Directive prefix recognised at the start of a trimmed line */
  directive?: string;
  /** Fail on a file that includes one of its own ancestors */
  cycleDetection?: boolean;
  diagnostics?: DiagnosticsSink;
}

export const DEFAULT_DIRECTIVE = '#include:';
