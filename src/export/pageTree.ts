import type { Export, Page } from '../models/entities.js';
import { ExportFormatError } from '../core/errors.js';
import { logger } from '../util/logger.js';

/** A page as read from the export, before the forest is linked */
export type PageDraft = Omit<Page, 'children' | 'depth'>;

export interface PageForest {
  pages: Map<string, Page>;
  rootIds: string[];
}

/**
 * Link drafts into a forest. Siblings are ordered with `compare`; drafts
 * whose parent is missing become roots. Duplicate ids and parent cycles are
 * rejected.
 */
export function buildPageForest(
  drafts: readonly PageDraft[],
  compare: (a: PageDraft, b: PageDraft) => number
): PageForest {
  const byId = new Map<string, PageDraft>();
  for (const draft of drafts) {
    if (byId.has(draft.id)) {
      throw new ExportFormatError(`Duplicate page id in export: ${draft.id}`);
    }
    byId.set(draft.id, draft);
  }

  const childrenOf = new Map<string, PageDraft[]>();
  const roots: PageDraft[] = [];
  const orphans: string[] = [];

  for (const draft of drafts) {
    const parentId = draft.parentId;
    if (parentId === undefined) {
      roots.push(draft);
      continue;
    }
    if (!byId.has(parentId)) {
      orphans.push(draft.id);
      roots.push({ ...draft, parentId: undefined });
      continue;
    }
    const siblings = childrenOf.get(parentId) ?? [];
    siblings.push(draft);
    childrenOf.set(parentId, siblings);
  }

  if (orphans.length > 0) {
    logger.warn('Pages reference a parent missing from the export, treating them as top level', {
      pageIds: orphans
    });
  }

  roots.sort(compare);
  for (const siblings of childrenOf.values()) {
    siblings.sort(compare);
  }

  const pages = new Map<string, Page>();
  const stack: Array<{ draft: PageDraft; depth: number }> = roots
    .map(draft => ({ draft, depth: 0 }))
    .reverse();

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const { draft, depth } = next;
    const children = childrenOf.get(draft.id) ?? [];
    pages.set(draft.id, {
      ...draft,
      children: children.map(child => child.id),
      depth
    });
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ draft: children[i], depth: depth + 1 });
    }
  }

  if (pages.size !== byId.size) {
    const cyclic = drafts.filter(draft => !pages.has(draft.id)).map(draft => draft.id);
    throw new ExportFormatError(`Page hierarchy contains a cycle involving: ${cyclic.join(', ')}`);
  }

  return { pages, rootIds: roots.map(draft => draft.id) };
}

/**
 * Pages in deterministic pre-order: roots in order, each followed by its
 * subtree.
 */
export function preOrder(exp: Pick<Export, 'pages' | 'rootIds'>): Page[] {
  const ordered: Page[] = [];
  const visit = (id: string) => {
    const page = exp.pages.get(id);
    if (!page) return;
    ordered.push(page);
    page.children.forEach(visit);
  };
  exp.rootIds.forEach(visit);
  return ordered;
}

/**
 * Titles from the root down to the page itself.
 */
export function titlePath(exp: Pick<Export, 'pages'>, pageId: string): string[] {
  const titles: string[] = [];
  const seen = new Set<string>();
  let current = exp.pages.get(pageId);
  while (current && !seen.has(current.id)) {
    seen.add(current.id);
    titles.unshift(current.title);
    current = current.parentId ? exp.pages.get(current.parentId) : undefined;
  }
  return titles;
}
