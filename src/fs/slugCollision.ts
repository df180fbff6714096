import { posix } from 'path';
import { preserveFilename, slugify } from '../util/slugify.js';
import type { Export, FilenameStyle, OutputSettings, Page } from '../models/entities.js';
import { preOrder } from '../export/pageTree.js';
import { logger } from '../util/logger.js';

export const MARKDOWN_EXTENSION = '.md';

export interface SlugResolution {
  originalSlug: string;
  resolvedSlug: string;
  collisionCount: number;
}

export type OutputPathOptions = Pick<OutputSettings, 'filenameStyle' | 'preserveHierarchy'> &
  Partial<Pick<OutputSettings, 'attachmentsDir'>>;

const FILENAME_STYLES: Record<FilenameStyle, (title: string) => string> = {
  slugify: title => slugify(title),
  preserve: title => preserveFilename(title)
};

export function baseFilename(title: string, style: FilenameStyle): string {
  return FILENAME_STYLES[style](title);
}

/**
 * Resolve a collision with a numeric suffix: base, base-1, base-2, ...
 * Names are compared case-insensitively so case-folding filesystems do not
 * merge two pages.
 */
export function resolveSingleSlug(
  page: Pick<Page, 'id' | 'title'>,
  baseSlug: string,
  existingSlugs: Set<string>
): SlugResolution {
  let resolvedSlug = baseSlug;
  let collisionCount = 0;

  while (existingSlugs.has(resolvedSlug.toLowerCase())) {
    collisionCount++;
    resolvedSlug = `${baseSlug}-${collisionCount}`;

    // Safety check to prevent infinite loops
    if (collisionCount > 999) {
      logger.warn('Excessive slug collisions detected', {
        pageId: page.id,
        title: page.title,
        baseSlug,
        collisionCount
      });
      resolvedSlug = `${baseSlug}-${page.id}`;
      break;
    }
  }

  existingSlugs.add(resolvedSlug.toLowerCase());

  if (collisionCount > 0) {
    logger.debug('Slug collision resolved', {
      pageId: page.id,
      title: page.title,
      originalSlug: baseSlug,
      resolvedSlug,
      collisionCount
    });
  }

  return { originalSlug: baseSlug, resolvedSlug, collisionCount };
}

export function removeExtension(filePath: string): string {
  return filePath.endsWith(MARKDOWN_EXTENSION)
    ? filePath.slice(0, -MARKDOWN_EXTENSION.length)
    : filePath;
}

/**
 * Output path (relative, posix) of every page. With hierarchy preserved a
 * child of `a.md` lives under `a/`; otherwise all pages share one
 * directory. Ties are broken in pre-order encounter order.
 */
export function planOutputPaths(
  exp: Pick<Export, 'pages' | 'rootIds'>,
  options: OutputPathOptions
): Map<string, string> {
  const paths = new Map<string, string>();
  const takenByDir = new Map<string, Set<string>>();
  let collisions = 0;

  const taken = (dir: string): Set<string> => {
    let set = takenByDir.get(dir);
    if (!set) {
      set = new Set(dir === '' && options.attachmentsDir ? [options.attachmentsDir.toLowerCase()] : []);
      takenByDir.set(dir, set);
    }
    return set;
  };

  for (const page of preOrder(exp)) {
    const parentPath = options.preserveHierarchy && page.parentId ? paths.get(page.parentId) : undefined;
    const dir = parentPath ? removeExtension(parentPath) : '';
    const resolution = resolveSingleSlug(page, baseFilename(page.title, options.filenameStyle), taken(dir));
    if (resolution.collisionCount > 0) collisions++;
    paths.set(page.id, dir ? posix.join(dir, resolution.resolvedSlug + MARKDOWN_EXTENSION) : resolution.resolvedSlug + MARKDOWN_EXTENSION);
  }

  logger.debug('Output paths planned', {
    totalPages: paths.size,
    collisions
  });

  return paths;
}
