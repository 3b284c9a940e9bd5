/**
 * The docdrift command: parse a tutorial, run it, report
 */

import { basename, extname, resolve } from 'path';
import { parseCliArgs, USAGE } from './args.js';
import type { CliArgs } from './args.js';
import { formatOutcome, formatReport, toJsonReport } from './report.js';
import { loadConfig } from '../config.js';
import type { DocdriftConfig } from '../config.js';
import { parseTutorialFile } from '../parser/index.js';
import type { Tutorial } from '../dsl/index.js';
import { TutorialExecutor } from '../executor/index.js';
import type { RunReport } from '../executor/index.js';
import { LocalSandbox } from '../sandbox/local.js';
import { createConsoleLogger } from '../logger.js';
import type { Verbosity } from '../logger.js';
import { ConfigError, DocumentParseError, UsageError, errnoCode } from '../errors.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

/**
 * Run the CLI and return its exit code
 */
export async function runCli(argv: readonly string[], cwd = process.cwd()): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`[ERROR] ${error.message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help || !args.tutorialFile) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  let config: DocdriftConfig;
  try {
    config = loadConfig({ cwd, configPath: args.configPath });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[ERROR] ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const verbosity: Verbosity = args.verbosity ?? config.verbosity;
  // JSON goes to stdout; keep everything else to warnings on stderr
  const logger = createConsoleLogger(args.json ? 'quiet' : verbosity);

  if (config.configPath) {
    logger.debug(`Config: ${config.configPath}`);
  }

  const tutorialPath = resolve(cwd, args.tutorialFile);
  let tutorial: Tutorial;
  try {
    tutorial = await parseTutorialFile(tutorialPath);
  } catch (error) {
    if (error instanceof DocumentParseError) {
      console.error(`[ERROR] ${tutorialPath}: ${error.message}`);
      return EXIT_USAGE;
    }
    if (errnoCode(error) !== undefined) {
      console.error(`[ERROR] Cannot read tutorial ${tutorialPath}: ${errnoCode(error)}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const actionCount = tutorial.steps.reduce((sum, step) => sum + step.actions.length, 0);
  logger.info(`Tutorial: ${tutorial.title}`);
  logger.info(`Total Steps: ${tutorial.steps.length} (${actionCount} actions)`);

  const sandbox = new LocalSandbox({
    workspaceRoot: args.workdir ? resolve(cwd, args.workdir) : undefined,
    baseDir: config.workspaceRoot ? resolve(cwd, config.workspaceRoot) : undefined,
    tutorialId: basename(tutorialPath, extname(tutorialPath)),
    logger,
  });

  const printOutcomes = !args.json && verbosity !== 'quiet';
  const executor = new TutorialExecutor(tutorial, {
    sandbox,
    allowUnsafePaths: args.allowUnsafePaths ?? config.allowUnsafePaths,
    createParentDirs: args.createParentDirs ?? config.createParentDirs,
    variables: { ...config.vars, ...args.vars },
    logger,
    hooks: {
      onActionEnd: (outcome) => {
        if (printOutcomes) {
          console.log(formatOutcome(outcome));
        }
      },
    },
  });

  const keepWorkspace = args.keepWorkspace ?? config.keepWorkspace;
  let report: RunReport;
  try {
    report = await executor.execute();
  } catch (error) {
    console.error('[ERROR] Fatal error during execution:');
    console.error(error instanceof Error ? error.message : String(error));
    if (verbosity === 'debug' && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    await executor.cleanup(keepWorkspace);
    return EXIT_FAILED;
  }

  await executor.cleanup(keepWorkspace);

  if (args.json) {
    console.log(toJsonReport(report));
  } else {
    console.log(`\n${formatReport(report)}`);
  }

  return report.success ? EXIT_SUCCESS : EXIT_FAILED;
}
