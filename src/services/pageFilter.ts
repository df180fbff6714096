/**
 * Page exclusion by title path.
 */

import type { Export, Page } from '../models/entities.js';
import { titlePath } from '../export/pageTree.js';
import { logger } from '../util/logger.js';
import { compilePatterns, joinPath, type PathMatcher, type PatternOptions } from '../util/patterns.js';

export interface PageFilterStats {
  totalPages: number;
  includedPages: number;
  excludedPages: number;
  matchedPatterns: Record<string, number>;
}

export interface FilteredExport {
  export: Export;
  excludedIds: string[];
  /** Heading-path patterns applied to each surviving page during conversion */
  excludeSections: readonly string[];
  patternOptions: PatternOptions;
}

/**
 * Drops pages whose title path (root → page, slash-joined) matches an
 * exclusion pattern, together with their whole subtree. The source export
 * is never mutated.
 */
export class PageFilter {
  private matcher: PathMatcher;
  private stats: PageFilterStats = {
    totalPages: 0,
    includedPages: 0,
    excludedPages: 0,
    matchedPatterns: {}
  };

  constructor(patterns: readonly string[], options: PatternOptions = {}) {
    this.matcher = compilePatterns(patterns, options);
  }

  /**
   * Pattern that excludes this page on its own, ignoring ancestors
   */
  matchingPattern(exp: Pick<Export, 'pages'>, pageId: string): string | undefined {
    return this.matcher.match(joinPath(titlePath(exp, pageId)));
  }

  apply(exp: Export): { export: Export; excludedIds: string[] } {
    const excludedIds: string[] = [];
    const pages = new Map<string, Page>();
    const matchedPatterns: Record<string, number> = {};

    const visit = (id: string): boolean => {
      const page = exp.pages.get(id);
      if (!page) return false;

      const pattern = this.matchingPattern(exp, id);
      if (pattern !== undefined) {
        matchedPatterns[pattern] = (matchedPatterns[pattern] ?? 0) + 1;
        this.collectSubtree(exp, id, excludedIds);
        logger.debug('Page excluded by pattern', { pageId: id, title: page.title, pattern });
        return false;
      }

      // Insert before children so the map keeps pre-order
      const copy: Page = { ...page, children: [] };
      pages.set(id, copy);
      copy.children = page.children.filter(visit);
      return true;
    };

    const rootIds = exp.rootIds.filter(visit);

    this.stats = {
      totalPages: exp.pages.size,
      includedPages: pages.size,
      excludedPages: excludedIds.length,
      matchedPatterns
    };

    return {
      export: { ...exp, pages, rootIds },
      excludedIds
    };
  }

  logSummary(): void {
    if (this.matcher.patterns.length === 0) return;
    logger.info('Page filter summary', {
      totalPages: this.stats.totalPages,
      includedPages: this.stats.includedPages,
      excludedPages: this.stats.excludedPages,
      patterns: this.stats.matchedPatterns
    });
  }

  private collectSubtree(exp: Export, id: string, into: string[]): void {
    const page = exp.pages.get(id);
    if (!page) return;
    into.push(id);
    for (const childId of page.children) {
      this.collectSubtree(exp, childId, into);
    }
  }
}

export function filterExport(
  exp: Export,
  excludePages: readonly string[],
  options: PatternOptions = {}
): { export: Export; excludedIds: string[] } {
  const pageFilter = new PageFilter(excludePages, options);
  const result = pageFilter.apply(exp);
  pageFilter.logSummary();
  return result;
}

/**
 * Page-level pruning now; section patterns travel with the result and are
 * applied to each page's parsed content by the converter.
 */
export function filter(
  exp: Export,
  excludePages: readonly string[],
  excludeSections: readonly string[],
  options: PatternOptions = {}
): FilteredExport {
  const { export: pruned, excludedIds } = filterExport(exp, excludePages, options);
  return {
    export: pruned,
    excludedIds,
    excludeSections: [...excludeSections],
    patternOptions: options
  };
}
