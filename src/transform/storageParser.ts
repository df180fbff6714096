/**
 * Parse page bodies into the markup element model.
 *
 * Handles Confluence storage format (`ac:` / `ri:` elements, CDATA bodies,
 * self-closing resource tags) as well as the HTML that Confluence writes
 * into HTML exports (information-macro divs, expand containers,
 * syntaxhighlighter blocks, inline task lists).
 */

import { posix } from 'path';
import { parseDocument, DomUtils } from 'htmlparser2';
import { isCDATA, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type {
  ImageSource,
  LinkTarget,
  ListItem,
  MarkupNode,
  PanelKind
} from '../models/markup.js';
import { isExternalHref } from '../export/htmlExport.js';

const HEADING_TAGS = new Map<string, number>([
  ['h1', 1], ['h2', 2], ['h3', 3], ['h4', 4], ['h5', 5], ['h6', 6]
]);

// Containers whose children are spliced into the surrounding block flow
const TRANSPARENT_BLOCKS = new Set([
  'html', 'body', 'div', 'section', 'article', 'main', 'header', 'footer', 'aside', 'nav',
  'figure', 'center', 'dl', 'dd', 'dt',
  'ac:layout', 'ac:layout-section', 'ac:layout-cell', 'ac:rich-text-body'
]);

const SKIPPED_TAGS = new Set([
  'head', 'title', 'script', 'style', 'meta', 'link', 'colgroup', 'col', 'ac:placeholder', 'ac:parameter'
]);

const PANEL_MACROS = new Map<string, PanelKind>([
  ['info', 'info'],
  ['note', 'note'],
  ['warning', 'warning'],
  ['tip', 'tip'],
  ['panel', 'panel'],
  ['expand', 'expand']
]);

const CODE_MACROS = new Set(['code', 'noformat']);

const FORMAT_TAGS = {
  strong: 'bold', b: 'bold',
  em: 'italic', i: 'italic', cite: 'italic',
  s: 'strike', del: 'strike', strike: 'strike',
  u: 'underline', ins: 'underline',
  sub: 'sub', sup: 'sup',
  code: 'code', tt: 'code', kbd: 'code'
} as const;

type FormatTag = keyof typeof FORMAT_TAGS;

function isFormatTag(name: string): name is FormatTag {
  return Object.prototype.hasOwnProperty.call(FORMAT_TAGS, name);
}

// Information macros as rendered into HTML exports
const HTML_PANEL_CLASSES = new Map<string, PanelKind>([
  ['confluence-information-macro-information', 'info'],
  ['confluence-information-macro-note', 'note'],
  ['confluence-information-macro-warning', 'warning'],
  ['confluence-information-macro-tip', 'tip']
]);

export function parseStorage(raw: string): MarkupNode[] {
  const document = parseDocument(raw, {
    recognizeSelfClosing: true,
    recognizeCDATA: true
  });
  return parseBlocks(document.children);
}

function attr(el: Element, name: string): string | undefined {
  const value = el.attribs[name];
  return value === undefined || value === '' ? undefined : value;
}

function classes(el: Element): string[] {
  return (el.attribs.class ?? '').split(/\s+/).filter(Boolean);
}

function childTags(el: Element, name?: string): Element[] {
  return el.children.filter(isTag).filter(child => name === undefined || child.name === name);
}

function findDescendant(el: Element, test: (candidate: Element) => boolean): Element | null {
  return DomUtils.findOne(test, el.children);
}

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ');
}

function rawText(node: AnyNode | AnyNode[]): string {
  return DomUtils.textContent(node);
}

function macroName(el: Element): string {
  return (attr(el, 'ac:name') ?? 'unknown').toLowerCase();
}

function macroParams(el: Element): Map<string, string> {
  const params = new Map<string, string>();
  for (const param of childTags(el, 'ac:parameter')) {
    const name = attr(param, 'ac:name');
    if (name) params.set(name.toLowerCase(), rawText(param).trim());
  }
  return params;
}

function isBlockMacro(el: Element): boolean {
  const name = macroName(el);
  return CODE_MACROS.has(name) || PANEL_MACROS.has(name);
}

function isBlockElement(el: Element): boolean {
  const name = el.name;
  if (name === 'ac:structured-macro' || name === 'ac:macro') return isBlockMacro(el);
  return name === 'p'
    || HEADING_TAGS.has(name)
    || TRANSPARENT_BLOCKS.has(name)
    || ['ul', 'ol', 'table', 'pre', 'blockquote', 'hr', 'ac:task-list'].includes(name);
}

function hasContent(nodes: readonly MarkupNode[]): boolean {
  return nodes.some(node => {
    if (node.kind === 'text') return node.text.trim() !== '';
    return node.kind !== 'lineBreak';
  });
}

/**
 * Parse a sequence of DOM nodes in block context. Runs of inline content
 * become paragraphs.
 */
export function parseBlocks(nodes: readonly AnyNode[]): MarkupNode[] {
  const blocks: MarkupNode[] = [];
  let inline: MarkupNode[] = [];

  const flush = () => {
    if (hasContent(inline)) {
      blocks.push({ kind: 'paragraph', children: inline });
    }
    inline = [];
  };

  for (const node of nodes) {
    if (isTag(node) && !SKIPPED_TAGS.has(node.name) && isBlockElement(node)) {
      flush();
      blocks.push(...parseBlockElement(node));
    } else {
      inline.push(...parseInline(node));
    }
  }
  flush();

  return blocks;
}

function parseBlockElement(el: Element): MarkupNode[] {
  const name = el.name;

  const level = HEADING_TAGS.get(name);
  if (level !== undefined) {
    return [{ kind: 'heading', level, children: parseInlineList(el.children) }];
  }

  switch (name) {
    case 'p':
      return parseBlocks(el.children);
    case 'ul':
    case 'ol':
      return [parseList(el)];
    case 'ac:task-list':
      return [parseTaskList(el)];
    case 'table':
      return [parseTable(el)];
    case 'pre':
      return [parsePre(el)];
    case 'blockquote':
      return [{ kind: 'blockquote', children: parseBlocks(el.children) }];
    case 'hr':
      return [{ kind: 'rule' }];
    case 'ac:structured-macro':
    case 'ac:macro':
      return [parseMacro(el)];
    default:
      return parseHtmlContainer(el);
  }
}

/**
 * div and friends: recognise the panels Confluence renders into HTML
 * exports, otherwise splice the children.
 */
function parseHtmlContainer(el: Element): MarkupNode[] {
  const cls = classes(el);

  const panelKind = cls.map(c => HTML_PANEL_CLASSES.get(c)).find(kind => kind !== undefined);
  if (panelKind) {
    const titleEl = findDescendant(el, c => classes(c).includes('title'));
    const body = findDescendant(el, c => classes(c).includes('confluence-information-macro-body'));
    const title = titleEl ? collapse(rawText(titleEl)).trim() : '';
    return [{
      kind: 'panel',
      panelKind,
      title: title || undefined,
      children: parseBlocks(body ? body.children : el.children)
    }];
  }

  if (cls.includes('expand-container')) {
    const control = findDescendant(el, c => classes(c).includes('expand-control-text'));
    const content = findDescendant(el, c => classes(c).includes('expand-content'));
    const title = control ? collapse(rawText(control)).trim() : '';
    return [{
      kind: 'panel',
      panelKind: 'expand',
      title: title || undefined,
      children: parseBlocks(content ? content.children : [])
    }];
  }

  if (cls.includes('panel') && !cls.includes('code')) {
    const header = findDescendant(el, c => classes(c).includes('panelHeader'));
    const content = findDescendant(el, c => classes(c).includes('panelContent'));
    if (content) {
      const title = header ? collapse(rawText(header)).trim() : '';
      return [{
        kind: 'panel',
        panelKind: 'panel',
        title: title || undefined,
        children: parseBlocks(content.children)
      }];
    }
  }

  return parseBlocks(el.children);
}

function parseList(el: Element): MarkupNode {
  const isTaskList = classes(el).includes('inline-task-list');
  const items: ListItem[] = childTags(el, 'li').map(li => {
    const item: ListItem = { children: parseBlocks(li.children) };
    if (isTaskList) item.checked = classes(li).includes('checked');
    return item;
  });
  return { kind: 'list', ordered: el.name === 'ol', items };
}

function parseTaskList(el: Element): MarkupNode {
  const items: ListItem[] = childTags(el, 'ac:task').map(task => {
    const status = childTags(task, 'ac:task-status')[0];
    const body = childTags(task, 'ac:task-body')[0];
    return {
      checked: status ? rawText(status).trim() === 'complete' : false,
      children: body ? parseBlocks(body.children) : []
    };
  });
  return { kind: 'list', ordered: false, items };
}

function tableRows(el: Element): Element[] {
  const rows: Element[] = [];
  for (const child of childTags(el)) {
    if (child.name === 'tr') {
      rows.push(child);
    } else if (['thead', 'tbody', 'tfoot'].includes(child.name)) {
      rows.push(...tableRows(child));
    }
  }
  return rows;
}

function parseTable(el: Element): MarkupNode {
  const rows = tableRows(el).map(tr => {
    const cells: MarkupNode[][] = [];
    for (const cell of childTags(tr).filter(c => c.name === 'td' || c.name === 'th')) {
      cells.push(parseBlocks(cell.children));
      const span = Number(attr(cell, 'colspan') ?? '1');
      for (let i = 1; Number.isInteger(span) && i < span; i++) {
        cells.push([]);
      }
    }
    return cells;
  });
  return { kind: 'table', rows };
}

function languageFromHtml(el: Element): string | undefined {
  const params = attr(el, 'data-syntaxhighlighter-params');
  const brush = params ? /brush:\s*([\w#+-]+)/.exec(params)?.[1] : undefined;
  if (brush) return normalizeLanguage(brush);

  const candidates = [el, ...childTags(el, 'code')];
  for (const candidate of candidates) {
    const languageClass = classes(candidate).find(c => c.startsWith('language-'));
    if (languageClass) return normalizeLanguage(languageClass.slice('language-'.length));
  }
  return undefined;
}

function normalizeLanguage(language: string): string | undefined {
  const value = language.trim().toLowerCase();
  return value === '' || value === 'none' || value === 'plain' ? undefined : value;
}

function stripCodeEdges(text: string): string {
  return text.replace(/^\r?\n/, '').replace(/\s+$/, '');
}

function parsePre(el: Element): MarkupNode {
  return {
    kind: 'codeBlock',
    language: languageFromHtml(el),
    text: stripCodeEdges(rawText(el))
  };
}

function macroBody(el: Element): { rich?: Element; plain?: Element } {
  return {
    rich: childTags(el, 'ac:rich-text-body')[0],
    plain: childTags(el, 'ac:plain-text-body')[0]
  };
}

function parseMacro(el: Element): MarkupNode {
  const name = macroName(el);
  const params = macroParams(el);
  const { rich, plain } = macroBody(el);

  if (CODE_MACROS.has(name)) {
    const language = name === 'code' ? params.get('language') : undefined;
    return {
      kind: 'codeBlock',
      language: language ? normalizeLanguage(language) : undefined,
      text: stripCodeEdges(rawText(plain ?? rich ?? []))
    };
  }

  const panelKind = PANEL_MACROS.get(name);
  if (panelKind) {
    return {
      kind: 'panel',
      panelKind,
      title: params.get('title') || undefined,
      children: rich ? parseBlocks(rich.children) : []
    };
  }

  let body = '';
  if (plain) {
    body = stripCodeEdges(rawText(plain));
  } else if (rich) {
    body = collapse(rawText(rich)).trim();
  }
  return { kind: 'macro', name, body };
}

function parseInlineList(nodes: readonly AnyNode[]): MarkupNode[] {
  return nodes.flatMap(node => parseInline(node));
}

/**
 * Parse a node in inline context.
 */
function parseInline(node: AnyNode): MarkupNode[] {
  if (isText(node)) {
    const value = collapse(node.data);
    return value ? [{ kind: 'text', text: value }] : [];
  }
  if (isCDATA(node)) {
    const value = collapse(rawText(node));
    return value ? [{ kind: 'text', text: value }] : [];
  }
  if (!isTag(node) || SKIPPED_TAGS.has(node.name)) {
    return [];
  }

  const el = node;
  const name = el.name;

  if (isFormatTag(name)) {
    const style = FORMAT_TAGS[name];
    if (style === 'code') {
      const value = collapse(rawText(el));
      return value ? [{ kind: 'format', style, children: [{ kind: 'text', text: value }] }] : [];
    }
    return [{ kind: 'format', style, children: parseInlineList(el.children) }];
  }

  switch (name) {
    case 'br':
      return [{ kind: 'lineBreak' }];
    case 'a':
      return parseAnchor(el);
    case 'ac:link':
      return parseConfluenceLink(el);
    case 'img':
      return parseHtmlImage(el);
    case 'ac:image':
      return parseConfluenceImage(el);
    case 'ac:emoticon': {
      const fallback = attr(el, 'ac:emoji-fallback') ?? `:${attr(el, 'ac:name') ?? 'emoticon'}:`;
      return [{ kind: 'text', text: fallback }];
    }
    case 'time': {
      const value = attr(el, 'datetime');
      return value ? [{ kind: 'text', text: value }] : parseInlineList(el.children);
    }
    case 'ac:structured-macro':
    case 'ac:macro':
      return [parseMacro(el)];
    default:
      if (isBlockElement(el)) {
        return parseBlockElement(el);
      }
      return parseInlineList(el.children);
  }
}

function parseAnchor(el: Element): MarkupNode[] {
  const children = parseInlineList(el.children);
  const href = attr(el, 'href');
  if (!href) return children;

  let target: LinkTarget;
  if (href.startsWith('#')) {
    target = { type: 'anchor', anchor: href.slice(1) };
  } else if (isExternalHref(href) || href.startsWith('/')) {
    target = { type: 'url', href };
  } else if (/^(?:\.\/)?attachments\//.test(href) || href.includes('/attachments/')) {
    const alias = attr(el, 'data-linked-resource-default-alias');
    const linkText = collapse(rawText(el)).trim();
    target = {
      type: 'attachment',
      fileName: alias ?? (linkText || posix.basename(href.split('?')[0])),
      file: href
    };
  } else if (/\.html?(?:[#?].*)?$/i.test(href)) {
    const hashIndex = href.indexOf('#');
    target = {
      type: 'page',
      file: href,
      anchor: hashIndex >= 0 ? href.slice(hashIndex + 1) || undefined : undefined
    };
  } else {
    target = { type: 'url', href };
  }

  return [{ kind: 'link', target, children }];
}

function linkBody(el: Element): MarkupNode[] {
  const plain = childTags(el, 'ac:plain-text-link-body')[0];
  if (plain) {
    const value = collapse(rawText(plain)).trim();
    return value ? [{ kind: 'text', text: value }] : [];
  }
  const rich = childTags(el, 'ac:link-body')[0];
  return rich ? parseInlineList(rich.children) : [];
}

function parseConfluenceLink(el: Element): MarkupNode[] {
  const children = linkBody(el);
  const anchor = attr(el, 'ac:anchor');
  const page = childTags(el, 'ri:page')[0] ?? childTags(el, 'ri:blog-post')[0];
  const attachment = childTags(el, 'ri:attachment')[0];
  const user = childTags(el, 'ri:user')[0];
  const space = childTags(el, 'ri:space')[0];
  const url = childTags(el, 'ri:url')[0];

  if (page) {
    return [{
      kind: 'link',
      target: {
        type: 'page',
        title: attr(page, 'ri:content-title'),
        spaceKey: attr(page, 'ri:space-key'),
        anchor
      },
      children
    }];
  }
  if (attachment) {
    const owner = childTags(attachment, 'ri:page')[0];
    return [{
      kind: 'link',
      target: {
        type: 'attachment',
        fileName: attr(attachment, 'ri:filename') ?? '',
        pageTitle: owner ? attr(owner, 'ri:content-title') : undefined
      },
      children
    }];
  }
  if (url) {
    const href = attr(url, 'ri:value');
    return href ? [{ kind: 'link', target: { type: 'url', href }, children }] : children;
  }
  if (user) {
    if (children.length > 0) return children;
    const handle = attr(user, 'ri:username') ?? attr(user, 'ri:userkey') ?? attr(user, 'ri:account-id') ?? 'user';
    return [{ kind: 'text', text: `@${handle}` }];
  }
  if (space) {
    return children.length > 0 ? children : [{ kind: 'text', text: attr(space, 'ri:space-key') ?? '' }];
  }
  if (anchor) {
    return [{ kind: 'link', target: { type: 'anchor', anchor }, children }];
  }
  return children;
}

function parseHtmlImage(el: Element): MarkupNode[] {
  const src = attr(el, 'src');
  // Confluence chrome (emoticons, bullets) is not content
  if (!src || /^(?:\.\/)?images\/icons\//.test(src)) return [];

  const alt = attr(el, 'alt') ?? '';
  let source: ImageSource;
  if (isExternalHref(src) || src.startsWith('/') || src.startsWith('data:')) {
    source = { type: 'url', url: src };
  } else {
    const alias = attr(el, 'data-linked-resource-default-alias');
    source = {
      type: 'attachment',
      fileName: alias ?? posix.basename(src.split('?')[0]),
      file: src
    };
  }
  return [{ kind: 'image', source, alt }];
}

function parseConfluenceImage(el: Element): MarkupNode[] {
  const alt = attr(el, 'ac:alt') ?? attr(el, 'ac:title') ?? '';
  const attachment = childTags(el, 'ri:attachment')[0];
  if (attachment) {
    const owner = childTags(attachment, 'ri:page')[0];
    return [{
      kind: 'image',
      source: {
        type: 'attachment',
        fileName: attr(attachment, 'ri:filename') ?? '',
        pageTitle: owner ? attr(owner, 'ri:content-title') : undefined
      },
      alt
    }];
  }
  const url = childTags(el, 'ri:url')[0];
  const value = url ? attr(url, 'ri:value') : undefined;
  return value ? [{ kind: 'image', source: { type: 'url', url: value }, alt }] : [];
}
