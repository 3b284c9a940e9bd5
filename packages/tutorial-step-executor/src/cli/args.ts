/**
 * Command line parsing for the docdrift CLI
 */

import type { Verbosity } from '../logger.js';
import { isIdentifier } from '../variables/store.js';
import { UsageError } from '../errors.js';

export const USAGE = `Usage: docdrift <tutorial.md> [options]

Options:
  --workdir <dir>          Run in this directory instead of a temporary workspace
  --allow-unsafe-paths     Let .file blocks write outside the workspace
  --var NAME=VALUE         Set a variable before the first step (repeatable)
  --create-parent-dirs     Create missing parent directories for .file blocks
  --keep-workspace, -k     Keep the temporary workspace after the run
  --json                   Print the run report as JSON
  --verbose, -v            Show commands, captures and writes
  --quiet, -q              Only print warnings, errors and the summary
  --debug                  Like --verbose, plus stack traces
  --config <file>          Read settings from this file instead of docdrift.yml
  --help, -h               Show this help`;

/**
 * Parsed command line. Boolean settings that can also come from the config
 * file are left undefined when the flag is absent.
 */
export interface CliArgs {
  tutorialFile?: string;
  workdir?: string;
  allowUnsafePaths?: boolean;
  createParentDirs?: boolean;
  keepWorkspace?: boolean;
  verbosity?: Verbosity;
  configPath?: string;
  vars: Record<string, string>;
  json: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Set(['--workdir', '--var', '--config']);

/**
 * Parse `process.argv.slice(2)`
 * @throws UsageError on unknown flags, missing values or a missing tutorial file
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { vars: {}, json: false, help: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    // --flag=value
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    let inlineValue = flag !== arg ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        const value = inlineValue;
        inlineValue = undefined;
        return value;
      }
      const next = argv[i + 1];
      if (next === undefined || (next.startsWith('-') && next !== '-')) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--workdir':
        args.workdir = takeValue();
        break;
      case '--config':
        args.configPath = takeValue();
        break;
      case '--var': {
        const [name, value] = parseVarAssignment(takeValue());
        args.vars[name] = value;
        break;
      }
      case '--allow-unsafe-paths':
        args.allowUnsafePaths = true;
        break;
      case '--create-parent-dirs':
        args.createParentDirs = true;
        break;
      case '--keep-workspace':
      case '-k':
        args.keepWorkspace = true;
        break;
      case '--json':
        args.json = true;
        break;
      case '--verbose':
      case '-v':
        args.verbosity = 'verbose';
        break;
      case '--quiet':
      case '-q':
        args.verbosity = 'quiet';
        break;
      case '--debug':
        args.verbosity = 'debug';
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${flag}`);
    }

    if (inlineValue !== undefined && !VALUE_FLAGS.has(flag)) {
      throw new UsageError(`Option ${flag} does not take a value`);
    }
  }

  if (positionals.length > 1) {
    throw new UsageError(`Expected one tutorial file, got ${positionals.length}: ${positionals.join(' ')}`);
  }
  args.tutorialFile = positionals[0];

  if (!args.tutorialFile && !args.help) {
    throw new UsageError('No tutorial file provided');
  }

  return args;
}

/**
 * Split `NAME=VALUE`; the value may itself contain `=`
 */
export function parseVarAssignment(assignment: string): [string, string] {
  const eq = assignment.indexOf('=');
  if (eq <= 0) {
    throw new UsageError(`--var expects NAME=VALUE, got "${assignment}"`);
  }
  const name = assignment.slice(0, eq);
  if (!isIdentifier(name)) {
    throw new UsageError(`Invalid variable name in --var: "${name}"`);
  }
  return [name, assignment.slice(eq + 1)];
}
