import type { BuildWarning } from './errors.js';

export type PageStatus = 'converted' | 'skipped' | 'failed';

export interface PageReport {
  pageId: string;
  title: string;
  outputPath: string;
  status: PageStatus;
  error?: string;
  /** Heading paths removed by section exclusion, for converted pages */
  removedSections?: string[];
}

export interface ReportWarning extends BuildWarning {
  /** Output file of the page the warning belongs to */
  outputPath?: string;
}

export interface BuildReport {
  source: string;
  outputDir: string;
  converted: number;
  skipped: number;
  failed: number;
  excluded: number;
  pages: PageReport[];
  warnings: ReportWarning[];
  unknownMacros: string[];
  dryRun: boolean;
  durationMs: number;
}

export interface ReportInput {
  source: string;
  outputDir: string;
  pages: readonly PageReport[];
  warnings: readonly ReportWarning[];
  unknownMacros: Iterable<string>;
  excluded: number;
  dryRun: boolean;
  startedAt: number;
}

/**
 * Assemble the final report. Pages and warnings are ordered by output path
 * so reports compare equal across runs regardless of scheduling; warnings
 * of one page keep the order they were raised in.
 */
export function createBuildReport(input: ReportInput): BuildReport {
  const pages = [...input.pages].sort((a, b) => compareStrings(a.outputPath, b.outputPath));
  const warnings = [...input.warnings].sort((a, b) => compareStrings(a.outputPath ?? '', b.outputPath ?? ''));
  const count = (status: PageStatus) => pages.filter(page => page.status === status).length;

  return {
    source: input.source,
    outputDir: input.outputDir,
    converted: count('converted'),
    skipped: count('skipped'),
    failed: count('failed'),
    excluded: input.excluded,
    pages,
    warnings,
    unknownMacros: [...new Set(input.unknownMacros)].sort(compareStrings),
    dryRun: input.dryRun,
    durationMs: Date.now() - input.startedAt
  };
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
