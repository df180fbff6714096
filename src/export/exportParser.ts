import type { Export, ExportFormat, Space } from '../models/entities.js';
import { openExportSource, type ExportSource } from './exportSource.js';
import { buildPageForest, type PageDraft } from './pageTree.js';
import { compareXmlPages, findEntitiesFile, readXmlExport } from './xmlExport.js';
import { compareHtmlPages, isHtmlFile, readHtmlExport, SPACE_INDEX_FILE } from './htmlExport.js';
import { ExportFormatError } from '../core/errors.js';
import { logger } from '../util/logger.js';

/**
 * Parse an export directory or ZIP archive into an immutable page forest.
 *
 * @throws ExportIOError when the source cannot be read
 * @throws ExportFormatError when neither entities.xml nor HTML pages exist,
 *   or the page hierarchy is malformed
 */
export async function parseExport(location: string): Promise<Export> {
  const source = await openExportSource(location);
  return parseExportSource(source);
}

export async function parseExportSource(source: ExportSource): Promise<Export> {
  const startTime = Date.now();
  const entitiesPath = findEntitiesFile(source);

  let format: ExportFormat;
  let space: Space | undefined;
  let drafts: PageDraft[];
  let compare: (a: PageDraft, b: PageDraft) => number;

  if (entitiesPath) {
    format = 'xml';
    ({ space, drafts } = await readXmlExport(source, entitiesPath));
    compare = compareXmlPages;
  } else if (source.list().some(path => isHtmlFile(path) && path !== SPACE_INDEX_FILE)) {
    format = 'html';
    ({ space, drafts } = await readHtmlExport(source));
    compare = compareHtmlPages;
  } else {
    throw new ExportFormatError(
      `No entities.xml or HTML pages found in export: ${source.location}`
    );
  }

  const { pages, rootIds } = buildPageForest(drafts, compare);
  const exp: Export = {
    format,
    space: space ?? { key: source.name, name: source.name },
    pages,
    rootIds,
    source
  };

  logger.info('Export parsed', {
    format,
    space: exp.space.key,
    pages: pages.size,
    roots: rootIds.length,
    durationMs: Date.now() - startTime
  });

  return exp;
}
