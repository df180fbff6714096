import { stringify } from 'yaml';
import type { Export, FrontmatterField, Page, Settings } from '../models/entities.js';
import type {
  CodeBlockNode,
  FormatStyle,
  ImageNode,
  LinkNode,
  ListNode,
  MacroNode,
  MarkupNode,
  PanelKind,
  PanelNode,
  TableNode
} from '../models/markup.js';
import {
  PageConversionError,
  errorMessage,
  unresolvedReference,
  type BuildWarning
} from '../core/errors.js';
import { parseStorage } from './storageParser.js';
import { LinkResolver, type ResolvedAttachment } from './linkResolver.js';
import { filterSections } from '../services/sectionFilter.js';
import type { FilteredExport } from '../services/pageFilter.js';
import { planOutputPaths } from '../fs/slugCollision.js';

export type { ResolvedAttachment } from './linkResolver.js';

export interface ConversionResult {
  markdown: string;
  warnings: BuildWarning[];
  /** Attachments the Markdown links to, each once */
  attachments: ResolvedAttachment[];
  /** Names of macros with no Markdown rendering, each once */
  unknownMacros: string[];
  removedSections: string[];
}

export type TransformSettings = Pick<Settings, 'content' | 'output' | 'excludeSections' | 'caseSensitivePatterns'>;

/** Heading-path patterns removed from every page, as carried by a filtered export */
export type SectionRules = Pick<FilteredExport, 'excludeSections' | 'patternOptions'>;

const PANEL_LABELS: Record<Exclude<PanelKind, 'expand'>, string> = {
  info: 'Info',
  note: 'Note',
  warning: 'Warning',
  tip: 'Tip',
  panel: 'Panel'
};

const FORMAT_MARKERS: Record<Exclude<FormatStyle, 'code'>, [string, string]> = {
  bold: ['**', '**'],
  italic: ['*', '*'],
  strike: ['~~', '~~'],
  sub: ['<sub>', '</sub>'],
  sup: ['<sup>', '</sup>'],
  underline: ['<u>', '</u>']
};

interface RenderContext {
  /** Inside a table cell, where Markdown has no line breaks */
  inTable: boolean;
  /** Headings and link labels: line breaks become spaces */
  flat?: boolean;
  /** Inline code: text is written as is */
  raw?: boolean;
}

const BLOCK: RenderContext = { inTable: false };
const CELL: RenderContext = { inTable: true };

const HARD_BREAK = '\\\n';

// Line starts that Markdown would read as a heading, list, quote or rule
const LINE_START_MARKUP = /^(?:#{1,6}(?=\s|$)|[-+*](?=\s|$)|>|\d{1,9}[.)](?=\s|$)|[-=*_](?=[-=*_\s]*$))/;

/**
 * Converts the pages of one export. Output paths and link lookups are
 * computed once and shared by every page.
 */
export class MarkdownTransformer {
  private readonly resolver: LinkResolver;
  private readonly paths: ReadonlyMap<string, string>;

  constructor(
    private readonly exp: Export,
    private readonly settings: TransformSettings,
    paths?: ReadonlyMap<string, string>,
    private readonly sections: SectionRules = {
      excludeSections: settings.excludeSections,
      patternOptions: { caseSensitive: settings.caseSensitivePatterns }
    }
  ) {
    this.paths = paths ?? planOutputPaths(exp, settings.output);
    this.resolver = new LinkResolver(exp, this.paths, settings.output.attachmentsDir);
  }

  /**
   * Transform one page to Markdown. Any failure is reported as a
   * PageConversionError for that page.
   */
  convert(page: Page): ConversionResult {
    try {
      const parsed = parseStorage(page.rawContent);
      const { nodes, removedSections } = filterSections(parsed, this.sections.excludeSections, this.sections.patternOptions);

      const renderer = new PageRenderer(page, this.resolver, this.settings);
      const body = renderer.renderBlocks(nodes, BLOCK).trim();
      const frontMatter = this.settings.content.includeFrontmatter ? this.buildFrontMatter(page) : '';

      let markdown = frontMatter;
      if (body) {
        markdown += (frontMatter ? '\n' : '') + body + '\n';
      }

      return {
        markdown,
        warnings: renderer.warnings,
        attachments: [...renderer.attachments.values()],
        unknownMacros: [...renderer.unknownMacros],
        removedSections
      };
    } catch (error) {
      if (error instanceof PageConversionError) throw error;
      throw new PageConversionError(page.id, `Failed to convert page "${page.title}": ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  private buildFrontMatter(page: Page): string {
    const data: Record<string, string | string[]> = {};
    for (const field of this.settings.content.frontmatterFields) {
      const value = this.frontMatterValue(page, field);
      if (value !== undefined) data[field] = value;
    }
    if (Object.keys(data).length === 0) return '';
    return `---\n${stringify(data)}---\n`;
  }

  private frontMatterValue(page: Page, field: FrontmatterField): string | string[] | undefined {
    switch (field) {
      case 'title':
        return page.title;
      case 'id':
        return page.id;
      case 'parent':
        return page.parentId !== undefined ? this.exp.pages.get(page.parentId)?.title : undefined;
      case 'created':
        return page.created;
      case 'modified':
        return page.modified;
      case 'labels':
        return page.labels.length > 0 ? [...page.labels] : undefined;
    }
  }
}

export function convertPage(
  page: Page,
  exp: Export,
  settings: TransformSettings,
  paths?: ReadonlyMap<string, string>
): ConversionResult {
  return new MarkdownTransformer(exp, settings, paths).convert(page);
}

/** Per-page rendering state */
class PageRenderer {
  readonly warnings: BuildWarning[] = [];
  readonly attachments = new Map<string, ResolvedAttachment>();
  readonly unknownMacros = new Set<string>();

  constructor(
    private readonly page: Page,
    private readonly resolver: LinkResolver,
    private readonly settings: TransformSettings
  ) {}

  renderBlocks(nodes: readonly MarkupNode[], ctx: RenderContext): string {
    return nodes
      .map(node => this.renderBlock(node, ctx))
      .filter(block => block !== '')
      .join(ctx.inTable ? '\n' : '\n\n');
  }

  private renderBlock(node: MarkupNode, ctx: RenderContext): string {
    switch (node.kind) {
      case 'heading': {
        const content = singleLine(this.renderInline(node.children, { ...ctx, flat: true }));
        if (!content) return '';
        const level = Math.min(node.level, this.settings.output.maxHeadingLevel);
        return `${'#'.repeat(level)} ${content}`;
      }
      case 'paragraph':
        return this.renderParagraph(node.children, ctx);
      case 'list':
        return this.renderList(node, 0, ctx);
      case 'table':
        return this.renderTable(node);
      case 'codeBlock':
        return renderCode(node);
      case 'panel':
        return this.renderPanel(node, ctx);
      case 'blockquote':
        return quote(this.renderBlocks(node.children, ctx));
      case 'rule':
        return '---';
      case 'lineBreak':
        return '';
      case 'text':
      case 'link':
      case 'image':
      case 'macro':
      case 'format':
        return this.renderParagraph([node], ctx);
    }
  }

  private renderParagraph(children: readonly MarkupNode[], ctx: RenderContext): string {
    return escapeLineStarts(tidyLines(this.renderInline(trimBreaks(children), ctx)));
  }

  private renderInline(nodes: readonly MarkupNode[], ctx: RenderContext): string {
    return nodes.map(node => this.renderNode(node, ctx)).join('');
  }

  private renderNode(node: MarkupNode, ctx: RenderContext): string {
    switch (node.kind) {
      case 'text':
        return ctx.raw ? node.text : escapeText(node.text);
      case 'format':
        return this.renderFormat(node.style, this.renderInline(node.children, node.style === 'code' ? { ...ctx, raw: true } : ctx));
      case 'lineBreak':
        if (ctx.flat) return ' ';
        return ctx.inTable ? '<br>' : HARD_BREAK;
      case 'link':
        return this.renderLink(node, ctx);
      case 'image':
        return this.renderImage(node);
      case 'macro':
        return this.renderMacro(node);
      case 'heading':
      case 'paragraph':
      case 'list':
      case 'table':
      case 'codeBlock':
      case 'panel':
      case 'blockquote':
      case 'rule':
        return this.renderBlock(node, ctx);
    }
  }

  private renderFormat(style: FormatStyle, inner: string): string {
    // Markers must hug the text, so surrounding whitespace moves outside
    const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(inner.replace(/^(?:\\\n)+|(?:\\\n)+$/g, '\n'));
    const lead = match?.[1] ?? '';
    const core = match?.[2] ?? inner;
    const trail = match?.[3] ?? '';
    if (core === '') return lead;

    if (style === 'code') {
      const fence = core.includes('`') ? '``' : '`';
      const padded = fence === '``' ? ` ${core} ` : core;
      return `${lead}${fence}${padded}${fence}${trail}`;
    }

    const [open, close] = FORMAT_MARKERS[style];
    return `${lead}${open}${core}${close}${trail}`;
  }

  private renderLink(node: LinkNode, ctx: RenderContext): string {
    const label = singleLine(this.renderInline(node.children, { ...ctx, flat: true }));
    const target = node.target;

    switch (target.type) {
      case 'url':
        return `[${label || target.href}](${target.href})`;
      case 'anchor':
        return `[${label || target.anchor}](#${encodeURIComponent(target.anchor)})`;
      case 'page': {
        const href = this.resolver.pageHref(this.page, target);
        if (href === undefined) {
          const name = target.title ?? target.file ?? '';
          this.warn(`Unresolved page link "${name}"`);
          return label || name;
        }
        const targetId = this.resolver.resolvePage(this.page, target);
        const fallback = targetId !== undefined ? this.resolver.outputPathOf(targetId) : undefined;
        return `[${label || target.title || fallback || href}](${href})`;
      }
      case 'attachment': {
        const attachment = this.resolver.resolveAttachment(this.page, target);
        if (!attachment) {
          this.warn(`Unresolved attachment link "${target.fileName}"`);
          return label || target.fileName;
        }
        this.attachments.set(attachment.outputPath, attachment);
        return `[${label || attachment.fileName}](${this.resolver.relativeHref(this.page.id, attachment.outputPath)})`;
      }
    }
  }

  private renderImage(node: ImageNode): string {
    const source = node.source;
    if (source.type === 'url') {
      return `![${node.alt}](${source.url})`;
    }

    const attachment = this.resolver.resolveAttachment(this.page, source);
    if (!attachment) {
      this.warn(`Unresolved image "${source.fileName}"`);
      return node.alt || source.fileName;
    }
    this.attachments.set(attachment.outputPath, attachment);
    return `![${node.alt}](${this.resolver.relativeHref(this.page.id, attachment.outputPath)})`;
  }

  private renderMacro(node: MacroNode): string {
    this.unknownMacros.add(node.name);
    switch (this.settings.content.unknownMacroPolicy) {
      case 'comment':
        return `<!-- Unknown macro: ${node.name.replace(/-{2,}/g, '-')} -->`;
      case 'strip':
        return '';
      case 'preserve_text':
        return node.body;
    }
  }

  private renderList(node: ListNode, depth: number, ctx: RenderContext): string {
    const indent = '  '.repeat(depth);
    const childIndent = '  '.repeat(depth + 1);
    const lines: string[] = [];

    node.items.forEach((item, index) => {
      const marker = node.ordered ? `${index + 1}.` : '-';
      const task = item.checked === undefined ? '' : item.checked ? '[x] ' : '[ ] ';

      let rest = item.children;
      let head = '';
      const first = item.children[0];
      if (first !== undefined && first.kind === 'paragraph') {
        head = this.renderParagraph(first.children, ctx).split('\n').join(`\n${childIndent}`);
        rest = item.children.slice(1);
      }
      lines.push(`${indent}${marker} ${task}${head}`.trimEnd());
      let hasContent = head !== '';

      for (const child of rest) {
        if (child.kind === 'list') {
          const nested = this.renderList(child, depth + 1, ctx);
          if (nested) lines.push(nested);
          continue;
        }
        const block = this.renderBlock(child, ctx);
        if (!block) continue;
        // Blank line between block children of one item
        if (hasContent) lines.push('');
        lines.push(indentLines(block, childIndent));
        hasContent = true;
      }
    });

    return lines.join('\n');
  }

  private renderTable(node: TableNode): string {
    const rows = node.rows.map(row => row.map(cell => this.renderCell(cell)));
    const width = Math.max(0, ...rows.map(row => row.length));
    if (width === 0) return '';

    if (rows.some(row => row.length !== width)) {
      this.warnings.push({
        code: 'table-shape',
        message: `Table rows have uneven cell counts; padded to ${width} columns`,
        pageId: this.page.id
      });
    }

    const padded = rows.map(row => [...row, ...Array<string>(width - row.length).fill('')]);
    const formatRow = (cells: readonly string[]) => `| ${cells.join(' | ')} |`;

    return [
      formatRow(padded[0]),
      formatRow(Array<string>(width).fill('---')),
      ...padded.slice(1).map(formatRow)
    ].join('\n');
  }

  private renderCell(cell: readonly MarkupNode[]): string {
    return this.renderBlocks(cell, CELL)
      .split('\n')
      .map(line => line.trim())
      .filter(line => line !== '')
      .join('<br>')
      .replace(/\|/g, '\\|');
  }

  private renderPanel(node: PanelNode, ctx: RenderContext): string {
    const header = node.panelKind === 'expand'
      ? `> ${node.title ?? 'Expand'}`
      : `> **${PANEL_LABELS[node.panelKind]}**${node.title ? `: ${node.title}` : ''}`;
    const body = this.renderBlocks(node.children, ctx);
    return body ? `${header}\n>\n${quote(body)}` : header;
  }

  private warn(message: string): void {
    this.warnings.push(unresolvedReference(`${message} on page "${this.page.title}"`, this.page.id));
  }
}

function renderCode(node: CodeBlockNode): string {
  const longestRun = Math.max(0, ...(node.text.match(/`+/g) ?? []).map(run => run.length));
  const fence = '`'.repeat(Math.max(3, longestRun + 1));
  return `${fence}${node.language ?? ''}\n${node.text}\n${fence}`;
}

function escapeText(value: string): string {
  return value
    .replace(/&(?=#?[A-Za-z0-9]+;)/g, '&amp;')
    .replace(/<(?=[A-Za-z/!?])/g, '&lt;');
}

function escapeLineStarts(value: string): string {
  return value
    .split('\n')
    .map(line => line.replace(LINE_START_MARKUP, marker => (
      /^\d/.test(marker) ? `${marker.slice(0, -1)}\\${marker.slice(-1)}` : `\\${marker}`
    )))
    .join('\n');
}

function isBreakOrBlank(node: MarkupNode): boolean {
  return node.kind === 'lineBreak' || (node.kind === 'text' && node.text.trim() === '');
}

/** Line breaks at the edges of a paragraph render as nothing */
function trimBreaks(nodes: readonly MarkupNode[]): readonly MarkupNode[] {
  let start = 0;
  let end = nodes.length;
  while (start < end && isBreakOrBlank(nodes[start])) start++;
  while (end > start && isBreakOrBlank(nodes[end - 1])) end--;
  return nodes.slice(start, end);
}

function tidyLines(value: string): string {
  return value
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .trim();
}

function singleLine(value: string): string {
  return value.replace(/\s*\n\s*/g, ' ').trim();
}

function quote(value: string): string {
  if (!value) return '';
  return value
    .split('\n')
    .map(line => (line ? `> ${line}` : '>'))
    .join('\n');
}

function indentLines(value: string, indent: string): string {
  return value
    .split('\n')
    .map(line => (line ? indent + line : line))
    .join('\n');
}
