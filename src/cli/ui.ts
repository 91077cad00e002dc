/**
 * CLI UI - Terminal formatting for diagnostics
 *
 * Functions return strings; the caller decides which stream they go to.
 */

import chalk from 'chalk';

// ============================================================================
// Colors & Styles
// ============================================================================

export const colors = {
  error: chalk.red,
  warning: chalk.yellow,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

// ============================================================================
// Messages
// ============================================================================

export function formatError(message: string): string {
  return colors.error('Error: ') + message + '\n';
}

export function formatWarning(message: string): string {
  return colors.warning('Warning: ') + message + '\n';
}

export function formatUsage(): string {
  return [
    '',
    `  ${colors.highlight('include-expander')} - Expand #include: directives in a template`,
    '',
    '  Usage: include-expander [options] <directory>',
    '',
    '  Options:',
    '    -t, --template <name>   Root template file name (default: cloud-init.tmpl.yaml)',
    '    --no-cycle-check        Do not fail on cyclic includes',
    '    -v, --version           Print the version',
    '    -h, --help              Show this help',
    '',
    '  Examples:',
    `    include-expander ./cloud-init          ${colors.muted('Expand ./cloud-init/cloud-init.tmpl.yaml')}`,
    `    include-expander -t main.txt ./docs    ${colors.muted('Expand ./docs/main.txt')}`,
    '',
    '',
  ].join('\n');
}
