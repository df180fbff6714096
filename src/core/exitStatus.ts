import { CommanderError } from 'commander';
import type { BuildReport } from './report.js';
import { SettingsError } from './errors.js';

/**
 * Process exit codes. These are stable; scripts depend on them.
 */
export const EXIT_CODES = {
  SUCCESS: 0,          // every page converted or skipped
  PAGE_FAILURES: 1,    // at least one page failed; the others were written
  INVALID_USAGE: 2,    // bad flags or settings
  FATAL_EXPORT: 3      // export missing, unreadable or malformed; nothing written
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export function exitCodeForReport(report: Pick<BuildReport, 'failed'>): ExitCode {
  return report.failed > 0 ? EXIT_CODES.PAGE_FAILURES : EXIT_CODES.SUCCESS;
}

export function exitCodeForReports(reports: readonly Pick<BuildReport, 'failed'>[]): ExitCode {
  return reports.some(report => exitCodeForReport(report) !== EXIT_CODES.SUCCESS)
    ? EXIT_CODES.PAGE_FAILURES
    : EXIT_CODES.SUCCESS;
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof SettingsError || error instanceof CommanderError) {
    return EXIT_CODES.INVALID_USAGE;
  }
  // Export errors and anything unexpected abort the whole run
  return EXIT_CODES.FATAL_EXPORT;
}
