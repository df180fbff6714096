/**
 * End-of-run output for CLI commands
 */

import type { BuildReport } from '../core/report.js';
import type { BuildStatus } from '../core/buildRunner.js';
import { logger } from '../util/logger.js';

export const MAX_LISTED_WARNINGS = 10;

export function summaryFields(report: BuildReport): Record<string, unknown> {
  return {
    converted: report.converted,
    skipped: report.skipped,
    failed: report.failed,
    excluded: report.excluded,
    warnings: report.warnings.length,
    elapsedSeconds: (report.durationMs / 1000).toFixed(1)
  };
}

/**
 * Log the outcome of one build: totals, failed pages, then the first few
 * warnings.
 */
export function logSummary(report: BuildReport): void {
  const title = report.dryRun ? 'Dry run finished (nothing written)' : 'Build finished';
  logger.info(title, { source: report.source, outputDir: report.outputDir, ...summaryFields(report) });

  for (const page of report.pages.filter(p => p.status === 'failed')) {
    logger.error('Page failed', { page: page.title, pageId: page.pageId, error: page.error });
  }

  for (const warning of report.warnings.slice(0, MAX_LISTED_WARNINGS)) {
    logger.warn(warning.message, { code: warning.code, outputPath: warning.outputPath });
  }
  if (report.warnings.length > MAX_LISTED_WARNINGS) {
    logger.warn(`... and ${report.warnings.length - MAX_LISTED_WARNINGS} more warnings`);
  }

  if (report.unknownMacros.length > 0) {
    logger.info('Macros without a Markdown rendering', { macros: report.unknownMacros });
  }
}

export function logStatus(status: BuildStatus): void {
  if (status.entries === 0 && status.updatedAt === undefined) {
    logger.info('No build found', { outputDir: status.outputDir });
    return;
  }
  logger.info('Build status', {
    outputDir: status.outputDir,
    pages: status.entries,
    updatedAt: status.updatedAt,
    settingsChanged: !status.settingsMatch
  });
  for (const warning of status.warnings) {
    logger.warn(warning.message, { code: warning.code });
  }
}
