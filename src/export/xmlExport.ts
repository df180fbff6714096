import { parseDocument, DomUtils } from 'htmlparser2';
import { isTag, type Element } from 'domhandler';
import type { PageAttachment, Space } from '../models/entities.js';
import type { ExportSource } from './exportSource.js';
import type { PageDraft } from './pageTree.js';
import { ExportFormatError } from '../core/errors.js';
import { logger } from '../util/logger.js';

export const ENTITIES_FILE = 'entities.xml';

// bodyType 2 is the storage (XHTML) representation
const STORAGE_BODY_TYPE = '2';

interface EntityObject {
  className: string;
  id: string;
  element: Element;
}

export interface XmlExportContent {
  space?: Space;
  drafts: PageDraft[];
}

/**
 * Locate entities.xml, preferring the shallowest one.
 */
export function findEntitiesFile(source: ExportSource): string | undefined {
  return source
    .list()
    .filter(path => path === ENTITIES_FILE || path.endsWith(`/${ENTITIES_FILE}`))
    .sort((a, b) => a.split('/').length - b.split('/').length)[0];
}

function childElements(element: Element, name: string): Element[] {
  return element.children.filter(isTag).filter(child => child.name === name);
}

function propertyElement(object: Element, name: string): Element | undefined {
  return childElements(object, 'property').find(prop => prop.attribs.name === name);
}

function propertyText(object: Element, name: string): string | undefined {
  const prop = propertyElement(object, name);
  if (!prop) return undefined;
  const value = DomUtils.textContent(prop);
  return value.trim() === '' ? undefined : value;
}

/** Id of the object a reference property points to */
function referenceId(object: Element, name: string): string | undefined {
  const prop = propertyElement(object, name);
  if (!prop) return undefined;
  const id = childElements(prop, 'id')[0];
  return id ? DomUtils.textContent(id).trim() || undefined : undefined;
}

function objectId(object: Element): string | undefined {
  const id = childElements(object, 'id')[0];
  return id ? DomUtils.textContent(id).trim() || undefined : undefined;
}

function isCurrent(object: Element): boolean {
  const status = propertyText(object, 'contentStatus')?.trim();
  const historical = referenceId(object, 'originalVersion') !== undefined;
  return !historical && (status === undefined || status === 'current');
}

function pushTo<V>(map: Map<string, V[]>, key: string, value: V): void {
  const list = map.get(key) ?? [];
  list.push(value);
  map.set(key, list);
}

/**
 * Read pages, bodies, attachments and labels from a Confluence XML export.
 */
export async function readXmlExport(source: ExportSource, entitiesPath: string): Promise<XmlExportContent> {
  const xml = await source.readText(entitiesPath);
  const baseDir = entitiesPath.includes('/') ? entitiesPath.slice(0, entitiesPath.lastIndexOf('/') + 1) : '';

  const document = parseDocument(xml, { xmlMode: true });
  const root = DomUtils.findOne(el => el.name === 'hibernate-generic', document.children, false);
  if (!root) {
    throw new ExportFormatError(`${entitiesPath} is not a Confluence entities export (missing <hibernate-generic>)`);
  }

  const objects: EntityObject[] = [];
  for (const element of childElements(root, 'object')) {
    const id = objectId(element);
    const className = element.attribs.class;
    if (!id || !className) {
      throw new ExportFormatError(`Malformed <object> in ${entitiesPath}: missing class or id`);
    }
    objects.push({ className, id, element });
  }

  const bodies = new Map<string, string>();
  const bodyTypes = new Map<string, string | undefined>();
  const attachments = new Map<string, PageAttachment[]>();
  const labelNames = new Map<string, string>();
  const labellings: Array<{ pageId: string; labelId: string }> = [];
  let space: Space | undefined;

  for (const { className, id, element } of objects) {
    switch (className) {
      case 'BodyContent': {
        const pageId = referenceId(element, 'content');
        if (!pageId) break;
        const bodyType = propertyText(element, 'bodyType')?.trim();
        // Keep the storage body when a page has several representations
        if (!bodies.has(pageId) || (bodyType === STORAGE_BODY_TYPE && bodyTypes.get(pageId) !== STORAGE_BODY_TYPE)) {
          bodies.set(pageId, propertyText(element, 'body') ?? '');
          bodyTypes.set(pageId, bodyType);
        }
        break;
      }
      case 'Attachment': {
        if (!isCurrent(element)) break;
        const pageId = referenceId(element, 'containerContent') ?? referenceId(element, 'content');
        const fileName = propertyText(element, 'title')?.trim();
        if (!pageId || !fileName) break;
        const version = propertyText(element, 'version')?.trim() ?? '1';
        const candidates = [
          `${baseDir}attachments/${pageId}/${id}/${version}`,
          `${baseDir}attachments/${pageId}/${id}`
        ];
        const sourcePath = candidates.find(candidate => source.has(candidate));
        if (sourcePath) {
          pushTo(attachments, pageId, { fileName, sourcePath });
        } else {
          logger.debug('Attachment file missing from export', { pageId, fileName });
        }
        break;
      }
      case 'Label': {
        const name = propertyText(element, 'name')?.trim();
        if (name) labelNames.set(id, name);
        break;
      }
      case 'Labelling': {
        const pageId = referenceId(element, 'content');
        const labelId = referenceId(element, 'label');
        if (pageId && labelId) labellings.push({ pageId, labelId });
        break;
      }
      case 'Space': {
        if (!space) {
          const key = propertyText(element, 'key')?.trim();
          if (key) {
            space = { key, name: propertyText(element, 'name')?.trim() ?? key };
          }
        }
        break;
      }
      default:
        break;
    }
  }

  const labels = new Map<string, string[]>();
  for (const { pageId, labelId } of labellings) {
    const name = labelNames.get(labelId);
    if (!name) continue;
    const existing = labels.get(pageId) ?? [];
    if (!existing.includes(name)) pushTo(labels, pageId, name);
  }

  const drafts: PageDraft[] = [];
  for (const { className, id, element } of objects) {
    if (className !== 'Page' || !isCurrent(element)) continue;
    const position = propertyText(element, 'position')?.trim();
    drafts.push({
      id,
      title: propertyText(element, 'title')?.trim() || `Untitled ${id}`,
      parentId: referenceId(element, 'parent'),
      rawContent: bodies.get(id) ?? '',
      attachments: attachments.get(id) ?? [],
      position: position !== undefined && /^-?\d+$/.test(position) ? Number(position) : undefined,
      created: propertyText(element, 'creationDate')?.trim(),
      modified: propertyText(element, 'lastModificationDate')?.trim(),
      labels: labels.get(id) ?? []
    });
  }

  logger.debug('Entities export read', {
    objects: objects.length,
    pages: drafts.length,
    attachments: [...attachments.values()].reduce((sum, list) => sum + list.length, 0)
  });

  return { space, drafts };
}

/**
 * Sibling order for XML exports: explicit position first, then title.
 */
export function compareXmlPages(a: PageDraft, b: PageDraft): number {
  if (a.position !== b.position) {
    if (a.position === undefined) return 1;
    if (b.position === undefined) return -1;
    return a.position - b.position;
  }
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
