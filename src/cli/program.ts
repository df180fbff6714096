import { join } from 'path';
import { Command, CommanderError } from 'commander';
import { loadSettings, type CLIOptions } from './configLoader.js';
import { logStatus, logSummary } from './progress.js';
import { BuildRunner } from '../core/buildRunner.js';
import { SettingsError, errorMessage } from '../core/errors.js';
import {
  EXIT_CODES,
  exitCodeForError,
  exitCodeForReport,
  exitCodeForReports
} from '../core/exitStatus.js';
import type { BuildReport } from '../core/report.js';
import { discoverExports } from '../export/exportSource.js';
import { logger } from '../util/logger.js';

export const PROGRAM_NAME = 'confluence-md';
export const PROGRAM_VERSION = '0.1.0';

async function handleBuild(source: string | undefined, options: CLIOptions): Promise<number> {
  const { settings } = await loadSettings(options);
  logger.configure(settings.logging);

  const runner = new BuildRunner(settings, {
    force: options.force ?? false,
    dryRun: options.dryRun ?? false
  });
  const outRoot = options.out ?? settings.exportsDir;

  if (source !== undefined) {
    const report = await runner.run(source, outRoot);
    logSummary(report);
    return exitCodeForReport(report);
  }

  const found = await discoverExports(settings.importsDir);
  if (found.length === 0) {
    throw new SettingsError(`No exports found in ${settings.importsDir}; pass a source or add a .zip or folder there`);
  }

  const reports: BuildReport[] = [];
  for (const entry of found) {
    const report = await runner.run(entry.path, join(outRoot, entry.name));
    logSummary(report);
    reports.push(report);
  }
  return exitCodeForReports(reports);
}

async function handleClean(options: CLIOptions): Promise<number> {
  const { settings } = await loadSettings(options);
  logger.configure(settings.logging);
  await new BuildRunner(settings).clean(options.out ?? settings.exportsDir);
  return EXIT_CODES.SUCCESS;
}

async function handleStatus(options: CLIOptions): Promise<number> {
  const { settings } = await loadSettings(options);
  logger.configure(settings.logging);
  logStatus(await new BuildRunner(settings).status(options.out ?? settings.exportsDir));
  return EXIT_CODES.SUCCESS;
}

/**
 * Build the command tree. Each action reports its exit code through
 * `setExitCode`; commander errors are thrown instead of exiting.
 */
export function createProgram(setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Convert Confluence space exports into a Markdown tree')
    .version(PROGRAM_VERSION)
    .exitOverride();

  program
    .command('build')
    .description('Convert an export (ZIP or folder); without a source, every export in importsDir')
    .argument('[source]', 'export .zip file or extracted folder')
    .option('-c, --config <file>', 'settings file (default: ./settings.yaml when present)')
    .option('-o, --out <directory>', 'output directory (default: exportsDir)')
    .option('-f, --force', 'convert every page, ignoring the cache', false)
    .option('--dry-run', 'convert and report without writing files', false)
    .option('--concurrency <number>', 'pages converted in parallel (1-32)')
    .option('--log-level <level>', 'debug, info, warn or error')
    .option('--log-format <format>', 'human or json')
    .action(async (source: string | undefined, options: CLIOptions) => {
      setExitCode(await handleBuild(source, options));
    });

  program
    .command('clean')
    .description('Remove the output directory, cache included')
    .option('-c, --config <file>', 'settings file')
    .option('-o, --out <directory>', 'output directory (default: exportsDir)')
    .option('--log-level <level>', 'debug, info, warn or error')
    .action(async (options: CLIOptions) => {
      setExitCode(await handleClean(options));
    });

  program
    .command('status')
    .description('Show what the cache knows about the last build')
    .option('-c, --config <file>', 'settings file')
    .option('-o, --out <directory>', 'output directory (default: exportsDir)')
    .option('--log-level <level>', 'debug, info, warn or error')
    .action(async (options: CLIOptions) => {
      setExitCode(await handleStatus(options));
    });

  return program;
}

/**
 * Run the CLI with user arguments (without node and script path) and
 * resolve to the process exit code.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  let exitCode: number = EXIT_CODES.SUCCESS;
  const program = createProgram(code => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end here with exit code 0
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_USAGE;
    }
    logger.error('Command failed', { error: errorMessage(error) });
    return exitCodeForError(error);
  }
}
