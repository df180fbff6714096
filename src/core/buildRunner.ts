import { rm } from 'fs/promises';
import { parse, resolve } from 'path';
import pLimit from 'p-limit';
import type { Export, Page, Settings } from '../models/entities.js';
import { parseExport } from '../export/exportParser.js';
import { preOrder } from '../export/pageTree.js';
import { filter } from '../services/pageFilter.js';
import { planOutputPaths } from '../fs/slugCollision.js';
import { BuildCache } from '../fs/buildCache.js';
import { FileSystemWriter, type OutputWriter } from '../fs/outputWriter.js';
import { MarkdownTransformer, type ConversionResult } from '../transform/markdownTransformer.js';
import { settingsDigest } from '../util/config.js';
import { digestParts } from '../util/hash.js';
import { logger } from '../util/logger.js';
import { SettingsError, errorMessage, type BuildWarning } from './errors.js';
import { createBuildReport, type BuildReport, type PageReport, type ReportWarning } from './report.js';

export interface BuildRunnerOptions {
  /** Convert every page regardless of the cache */
  force?: boolean;
  /** Convert and report without writing anything */
  dryRun?: boolean;
  createWriter?: (outputDir: string) => OutputWriter;
}

export type BuildPhase =
  | 'parsing'
  | 'filtering'
  | 'planning'
  | 'loading-cache'
  | 'converting'
  | 'saving-cache'
  | 'completed';

export interface BuildStatus {
  outputDir: string;
  cacheFile: string;
  entries: number;
  updatedAt?: string;
  /** False when the settings changed since the cache was written */
  settingsMatch: boolean;
  warnings: BuildWarning[];
}

/**
 * Digest of everything that can change a page's rendering through another
 * page: titles and output paths drive links, attachment names drive images.
 */
export function structureDigest(exp: Pick<Export, 'pages' | 'rootIds'>, paths: ReadonlyMap<string, string>): string {
  return digestParts(preOrder(exp).map(page => [
    page.id,
    page.title,
    paths.get(page.id) ?? '',
    page.attachments.map(attachment => attachment.fileName)
  ]));
}

export function pageHash(page: Page, outputPath: string, structure: string, settings: string): string {
  return digestParts([page.rawContent, page.title, outputPath, page.parentId ?? null, structure, settings]);
}

interface PageOutcome {
  report: PageReport;
  warnings: ReportWarning[];
  unknownMacros: string[];
}

export class BuildRunner {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly digest: string;

  constructor(
    private readonly settings: Settings,
    private readonly options: BuildRunnerOptions = {}
  ) {
    this.limit = pLimit(settings.concurrency);
    this.digest = settingsDigest(settings);
  }

  /**
   * Build one export into `outputDir`. Export errors abort before anything
   * is written; page errors only fail that page.
   */
  async run(source: string, outputDir: string = this.settings.exportsDir): Promise<BuildReport> {
    const startedAt = Date.now();
    const dryRun = this.options.dryRun ?? false;

    logger.info('Starting build', { source, outputDir, dryRun, force: this.options.force ?? false });

    this.updatePhase('parsing');
    const parsed = await parseExport(source);

    this.updatePhase('filtering');
    const filtered = filter(parsed, this.settings.excludePages, this.settings.excludeSections, {
      caseSensitive: this.settings.caseSensitivePatterns
    });
    const exp = filtered.export;

    this.updatePhase('planning');
    const paths = planOutputPaths(exp, this.settings.output);
    const structure = structureDigest(exp, paths);

    this.updatePhase('loading-cache');
    const cache = new BuildCache(outputDir);
    const warnings: ReportWarning[] = [...(await cache.load())];

    this.updatePhase('converting');
    const writer = this.options.createWriter?.(outputDir) ?? new FileSystemWriter(outputDir);
    const transformer = new MarkdownTransformer(exp, this.settings, paths, filtered);
    const copied = new Set<string>();

    const outcomes = await Promise.all(
      preOrder(exp).map(page => this.limit(() => this.processPage({
        page,
        exp,
        outputPath: paths.get(page.id) ?? '',
        hash: pageHash(page, paths.get(page.id) ?? '', structure, this.digest),
        cache,
        writer,
        transformer,
        copied,
        dryRun
      })))
    );

    const pruned = cache.prune(paths.keys());
    if (pruned.length > 0) {
      logger.debug('Dropped cache entries of pages no longer built', { count: pruned.length });
    }

    if (!dryRun) {
      this.updatePhase('saving-cache');
      await cache.persist(this.digest);
    }

    this.updatePhase('completed');
    const report = createBuildReport({
      source,
      outputDir,
      pages: outcomes.map(outcome => outcome.report),
      warnings: [...warnings, ...outcomes.flatMap(outcome => outcome.warnings)],
      unknownMacros: outcomes.flatMap(outcome => outcome.unknownMacros),
      excluded: filtered.excludedIds.length,
      dryRun,
      startedAt
    });

    logger.info('Build completed', {
      converted: report.converted,
      skipped: report.skipped,
      failed: report.failed,
      excluded: report.excluded,
      warnings: report.warnings.length,
      durationMs: report.durationMs
    });

    return report;
  }

  /**
   * Remove a build's output directory. The filesystem root and the working
   * directory are refused.
   */
  async clean(outputDir: string = this.settings.exportsDir): Promise<void> {
    const target = resolve(outputDir);
    if (target === parse(target).root || target === process.cwd()) {
      throw new SettingsError(`Refusing to remove ${target}`);
    }
    await rm(target, { recursive: true, force: true });
    logger.info('Output removed', { outputDir: target });
  }

  async status(outputDir: string = this.settings.exportsDir): Promise<BuildStatus> {
    const cache = new BuildCache(outputDir);
    const warnings = await cache.load();
    return {
      outputDir,
      cacheFile: cache.filePath,
      entries: cache.size,
      ...(cache.updatedAt !== undefined ? { updatedAt: cache.updatedAt } : {}),
      settingsMatch: cache.settingsDigest === this.digest,
      warnings
    };
  }

  private async processPage(task: {
    page: Page;
    exp: Export;
    outputPath: string;
    hash: string;
    cache: BuildCache;
    writer: OutputWriter;
    transformer: MarkdownTransformer;
    copied: Set<string>;
    dryRun: boolean;
  }): Promise<PageOutcome> {
    const { page, outputPath, hash, cache, writer } = task;
    const base = { pageId: page.id, title: page.title, outputPath };

    if (!this.options.force && !cache.shouldConvert(page.id, hash) && await writer.exists(outputPath)) {
      logger.debug('Page unchanged, skipping', { pageId: page.id, outputPath });
      return { report: { ...base, status: 'skipped' }, warnings: [], unknownMacros: [] };
    }

    let result: ConversionResult;
    try {
      result = task.transformer.convert(page);
      if (!task.dryRun) {
        await writer.writePage(outputPath, result.markdown);
      }
    } catch (error) {
      cache.forget(page.id);
      logger.error('Page failed', { pageId: page.id, title: page.title, error: errorMessage(error) });
      return {
        report: { ...base, status: 'failed', error: errorMessage(error) },
        warnings: [],
        unknownMacros: []
      };
    }

    const warnings: ReportWarning[] = result.warnings.map(warning => ({ ...warning, outputPath }));

    if (!task.dryRun) {
      for (const attachment of result.attachments) {
        if (task.copied.has(attachment.outputPath)) continue;
        task.copied.add(attachment.outputPath);
        try {
          await writer.writeAttachment(attachment.outputPath, await task.exp.source.readBuffer(attachment.sourcePath));
        } catch (error) {
          warnings.push({
            code: 'attachment-copy',
            message: `Could not copy attachment ${attachment.fileName}: ${errorMessage(error)}`,
            pageId: page.id,
            outputPath
          });
        }
      }

      cache.record(page.id, {
        hash,
        outputPath,
        title: page.title,
        convertedAt: new Date().toISOString()
      });
    }

    if (result.removedSections.length > 0) {
      logger.debug('Sections removed', { pageId: page.id, sections: result.removedSections });
    }
    logger.debug('Page converted', { pageId: page.id, outputPath, warnings: warnings.length });
    return {
      report: {
        ...base,
        status: 'converted',
        ...(result.removedSections.length > 0 ? { removedSections: result.removedSections } : {})
      },
      warnings,
      unknownMacros: result.unknownMacros
    };
  }

  private updatePhase(phase: BuildPhase): void {
    logger.debug('Build phase', { phase });
  }
}
