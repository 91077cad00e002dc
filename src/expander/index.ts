/**
 * Expander - recursive #include: preprocessing
 */

export * from './types.js';
export * from './errors.js';
export { Expander, loggerDiagnostics } from './expander.js';
export { resolveInclude, walkDirectory, compareWalkOrder, type ExpandFile } from './include-resolver.js';
export { parseLine, isIncludeDirective } from './directive.js';
export { displayPath, indentBlock, toSlash } from './format.js';
