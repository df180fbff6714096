import { posix } from 'path';
import { parseDocument, DomUtils } from 'htmlparser2';
import type { Document, Element } from 'domhandler';
import type { PageAttachment, Space } from '../models/entities.js';
import type { ExportSource } from './exportSource.js';
import type { PageDraft } from './pageTree.js';
import { logger } from '../util/logger.js';

export const SPACE_INDEX_FILE = 'index.html';

// Tried in order; the first match holds the page body
const BODY_SELECTORS: ReadonlyArray<(el: Element) => boolean> = [
  el => el.attribs.id === 'main-content',
  el => hasClass(el, 'wiki-content'),
  el => el.attribs.id === 'content',
  el => el.name === 'article',
  el => el.name === 'main',
  el => el.name === 'body'
];

const PAGE_ID_REGEX = /(?:^|[_-])(\d+)\.html?$/i;

export interface HtmlExportContent {
  space: Space;
  drafts: PageDraft[];
}

interface HtmlPageFile {
  path: string;
  title: string;
  body: string;
  breadcrumbs: string[];
  attachments: PageAttachment[];
}

export function isHtmlFile(path: string): boolean {
  return /\.html?$/i.test(path);
}

export function isExternalHref(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith('//');
}

/**
 * Resolve an href found in `fromFile` to a path relative to the export
 * root. Query and fragment are dropped.
 */
export function resolveExportPath(fromFile: string, href: string): string {
  const bare = href.split('#')[0].split('?')[0];
  return posix.normalize(posix.join(posix.dirname(fromFile), safeDecode(bare)));
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function hasClass(el: Element, className: string): boolean {
  return (el.attribs.class ?? '').split(/\s+/).includes(className);
}

function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function stem(path: string): string {
  return posix.basename(path).replace(/\.html?$/i, '');
}

function stripSpacePrefix(title: string, spaceNames: readonly string[]): string {
  for (const name of spaceNames) {
    const prefix = `${name} : `;
    if (name && title.startsWith(prefix) && title.length > prefix.length) {
      return title.slice(prefix.length).trim();
    }
  }
  return title;
}

function documentTitle(document: Document): string | undefined {
  const titleText = DomUtils.getElementById('title-text', document.children);
  if (titleText) {
    const value = cleanText(DomUtils.textContent(titleText));
    if (value) return value;
  }
  const titleTag = DomUtils.findOne(el => el.name === 'title', document.children);
  if (titleTag) {
    const value = cleanText(DomUtils.textContent(titleTag));
    if (value) return value;
  }
  return undefined;
}

function collectAttachments(source: ExportSource, path: string, document: Document): PageAttachment[] {
  const found = new Map<string, PageAttachment>();
  const candidates = DomUtils.findAll(el => el.name === 'img' || el.name === 'a', document.children);

  for (const el of candidates) {
    const ref = el.name === 'img' ? el.attribs.src : el.attribs.href;
    if (!ref || isExternalHref(ref) || ref.startsWith('#')) continue;
    const sourcePath = resolveExportPath(path, ref);
    if (!sourcePath.startsWith('attachments/') || !source.has(sourcePath)) continue;

    const alias = el.attribs['data-linked-resource-default-alias'];
    const linkText = el.name === 'a' ? cleanText(DomUtils.textContent(el)) : '';
    const fileName = alias || linkText || posix.basename(sourcePath);
    if (!found.has(fileName)) {
      found.set(fileName, { fileName, sourcePath });
    }
  }

  return [...found.values()];
}

async function readHtmlPage(source: ExportSource, path: string, spaceNames: readonly string[]): Promise<HtmlPageFile> {
  const document = parseDocument(await source.readText(path));

  let title = documentTitle(document);
  if (title) {
    title = stripSpacePrefix(title, spaceNames);
  } else {
    const h1 = DomUtils.findOne(el => el.name === 'h1', document.children);
    title = (h1 && cleanText(DomUtils.textContent(h1))) || stem(path);
  }

  let bodyElement: Element | null = null;
  for (const selector of BODY_SELECTORS) {
    bodyElement = DomUtils.findOne(selector, document.children);
    if (bodyElement) break;
  }
  const body = bodyElement ? DomUtils.getInnerHTML(bodyElement) : DomUtils.getOuterHTML(document);

  const crumbs = DomUtils.getElementById('breadcrumbs', document.children);
  const breadcrumbs = crumbs
    ? DomUtils.findAll(el => el.name === 'a', crumbs.children)
      .map(el => el.attribs.href)
      .filter((href): href is string => !!href && !isExternalHref(href))
      .map(href => resolveExportPath(path, href))
    : [];

  return {
    path,
    title,
    body,
    breadcrumbs,
    attachments: collectAttachments(source, path, document)
  };
}

/**
 * Parent by folder nesting: `guides/setup.html` belongs to `guides.html`
 * or `guides/index.html`.
 */
function folderParent(path: string, files: ReadonlySet<string>): string | undefined {
  const dir = posix.dirname(path);
  const folder = posix.basename(path).toLowerCase() === SPACE_INDEX_FILE ? posix.dirname(dir) : dir;
  if (folder === '.' || folder === '') return undefined;
  return [`${folder}.html`, `${folder}/${SPACE_INDEX_FILE}`]
    .find(candidate => candidate !== path && files.has(candidate));
}

/**
 * Read an HTML export: one page per HTML file, except the root index.html
 * which only names the space.
 */
export async function readHtmlExport(source: ExportSource): Promise<HtmlExportContent> {
  const htmlFiles = source.list().filter(isHtmlFile);
  const hasSpaceIndex = htmlFiles.includes(SPACE_INDEX_FILE);

  let spaceName = source.name;
  if (hasSpaceIndex) {
    const indexDocument = parseDocument(await source.readText(SPACE_INDEX_FILE));
    spaceName = documentTitle(indexDocument) ?? source.name;
  }
  const spaceNames = [...new Set([spaceName, source.name])];

  const pageFiles: HtmlPageFile[] = [];
  for (const path of htmlFiles) {
    if (path === SPACE_INDEX_FILE) continue;
    pageFiles.push(await readHtmlPage(source, path, spaceNames));
  }

  const idByPath = new Map<string, string>();
  for (const file of pageFiles) {
    const match = PAGE_ID_REGEX.exec(posix.basename(file.path));
    const numericId = match?.[1];
    const id = numericId && ![...idByPath.values()].includes(numericId)
      ? numericId
      : file.path.replace(/\.html?$/i, '');
    idByPath.set(file.path, id);
  }

  const pagePaths = new Set(idByPath.keys());
  const drafts: PageDraft[] = pageFiles.map(file => {
    const crumbParent = [...file.breadcrumbs]
      .reverse()
      .find(crumb => crumb !== file.path && idByPath.has(crumb));
    const parentPath = crumbParent ?? folderParent(file.path, pagePaths);

    return {
      id: idByPath.get(file.path) ?? file.path,
      title: file.title,
      parentId: parentPath ? idByPath.get(parentPath) : undefined,
      rawContent: file.body,
      attachments: file.attachments,
      sourcePath: file.path,
      labels: []
    };
  });

  logger.debug('HTML export read', {
    pages: drafts.length,
    spaceIndex: hasSpaceIndex
  });

  return {
    space: { key: source.name, name: spaceName },
    drafts
  };
}

export function compareHtmlPages(a: PageDraft, b: PageDraft): number {
  const left = a.sourcePath ?? a.id;
  const right = b.sourcePath ?? b.id;
  return left < right ? -1 : left > right ? 1 : 0;
}
