/**
 * Expansion errors
 *
 * Each wrapper embeds its cause's message, so the outermost error reads as
 * the whole chain from the root template down to the failing file.
 */

export type ExpansionErrorKind =
  | 'PathNotFoundError'
  | 'FileAccessError'
  | 'ReadError'
  | 'IncludeResolutionError'
  | 'DirectoryWalkError'
  | 'CycleDetectedError';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export abstract class ExpansionError extends Error {
  abstract readonly kind: ExpansionErrorKind;

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = new.target.name;
  }

  /**
   * Walk the cause chain down to the innermost expansion error
   */
  root(): ExpansionError {
    let current: ExpansionError = this;
    while (current.cause instanceof ExpansionError) {
      current = current.cause;
    }
    return current;
  }
}

export class PathNotFoundError extends ExpansionError {
  readonly kind = 'PathNotFoundError';

  constructor(readonly path: string, cause: unknown) {
    super(`include path not found ${path}`, cause);
  }
}

export class FileAccessError extends ExpansionError {
  readonly kind = 'FileAccessError';

  constructor(readonly path: string, cause: unknown) {
    super(`failed to open file ${path}`, cause);
  }
}

export class ReadError extends ExpansionError {
  readonly kind = 'ReadError';

  constructor(readonly path: string, cause: unknown) {
    super(`error reading file ${path}`, cause);
  }
}

export class IncludeResolutionError extends ExpansionError {
  readonly kind = 'IncludeResolutionError';

  constructor(
    readonly target: string,
    readonly filePath: string,
    cause: unknown
  ) {
    super(`error processing include '${target}' in file ${filePath}`, cause);
  }
}

export class DirectoryWalkError extends ExpansionError {
  readonly kind = 'DirectoryWalkError';

  /**
   * @param path - The file whose expansion failed, or the directory that could not be listed
   */
  constructor(
    readonly path: string,
    cause: unknown,
    readonly stage: 'expand' | 'list' = 'expand'
  ) {
    super(
      stage === 'list'
        ? `failed to walk directory ${path}`
        : `failed to process file in directory ${path}`,
      cause
    );
  }
}

export class CycleDetectedError extends ExpansionError {
  readonly kind = 'CycleDetectedError';

  constructor(readonly chain: readonly string[]) {
    super(`include cycle detected: ${chain.join(' -> ')}`);
  }
}

export function isExpansionError(error: unknown): error is ExpansionError {
  return error instanceof ExpansionError;
}
