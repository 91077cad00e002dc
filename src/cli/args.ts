/**
 * Command line parsing
 */

export interface CliArgs {
  help: boolean;
  version: boolean;
  template?: string;
  cycleCheck: boolean;
  positionals: string[];
  /** Problems found while parsing; any entry makes the invocation a usage error */
  errors: string[];
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    help: false,
    version: false,
    cycleCheck: true,
    positionals: [],
    errors: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '-v':
      case '--version':
        args.version = true;
        break;
      case '--no-cycle-check':
        args.cycleCheck = false;
        break;
      case '-t':
      case '--template': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          args.errors.push(`Option ${arg} requires a file name.`);
        } else {
          args.template = value;
          i++;
        }
        break;
      }
      case '--':
        args.positionals.push(...argv.slice(i + 1));
        return args;
      default:
        if (arg.startsWith('--template=')) {
          args.template = arg.slice('--template='.length);
        } else if (arg.startsWith('-') && arg !== '-') {
          args.errors.push(`Unknown option: ${arg}`);
        } else {
          args.positionals.push(arg);
        }
    }
  }

  return args;
}
