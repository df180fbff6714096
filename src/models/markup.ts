// Markup element model: parsed page content as a strict tree of tagged nodes.

export type PanelKind = 'info' | 'note' | 'warning' | 'tip' | 'panel' | 'expand';

export type FormatStyle = 'bold' | 'italic' | 'strike' | 'sub' | 'sup' | 'underline' | 'code';

export type LinkTarget =
  | { type: 'url'; href: string }
  | { type: 'anchor'; anchor: string }
  | { type: 'page'; title?: string; file?: string; spaceKey?: string; anchor?: string }
  | { type: 'attachment'; fileName: string; pageTitle?: string; file?: string };

export type ImageSource =
  | { type: 'attachment'; fileName: string; pageTitle?: string; file?: string }
  | { type: 'url'; url: string };

export interface ListItem {
  /** undefined for plain items, true/false for task items */
  checked?: boolean;
  children: MarkupNode[];
}

export interface TextNode { kind: 'text'; text: string }
export interface HeadingNode { kind: 'heading'; level: number; children: MarkupNode[] }
export interface ParagraphNode { kind: 'paragraph'; children: MarkupNode[] }
export interface ListNode { kind: 'list'; ordered: boolean; items: ListItem[] }
export interface TableNode { kind: 'table'; rows: MarkupNode[][][] }
export interface CodeBlockNode { kind: 'codeBlock'; language?: string; text: string }
export interface PanelNode { kind: 'panel'; panelKind: PanelKind; title?: string; children: MarkupNode[] }
export interface LinkNode { kind: 'link'; target: LinkTarget; children: MarkupNode[] }
export interface ImageNode { kind: 'image'; source: ImageSource; alt: string }
export interface MacroNode { kind: 'macro'; name: string; body: string }
export interface FormatNode { kind: 'format'; style: FormatStyle; children: MarkupNode[] }
export interface BlockquoteNode { kind: 'blockquote'; children: MarkupNode[] }
export interface LineBreakNode { kind: 'lineBreak' }
export interface RuleNode { kind: 'rule' }

export type MarkupNode =
  | TextNode
  | HeadingNode
  | ParagraphNode
  | ListNode
  | TableNode
  | CodeBlockNode
  | PanelNode
  | LinkNode
  | ImageNode
  | MacroNode
  | FormatNode
  | BlockquoteNode
  | LineBreakNode
  | RuleNode;

export type MarkupKind = MarkupNode['kind'];

/**
 * Concatenated text of a node sequence, without any markup.
 */
export function plainText(nodes: readonly MarkupNode[]): string {
  return nodes.map(nodeText).join('');
}

function nodeText(node: MarkupNode): string {
  switch (node.kind) {
    case 'text':
    case 'codeBlock':
      return node.text;
    case 'macro':
      return node.body;
    case 'image':
      return node.alt;
    case 'lineBreak':
      return '\n';
    case 'rule':
      return '';
    case 'list':
      return node.items.map(item => plainText(item.children)).join('\n');
    case 'table':
      return node.rows.map(row => row.map(cell => plainText(cell)).join(' ')).join('\n');
    case 'heading':
    case 'paragraph':
    case 'panel':
    case 'link':
    case 'format':
    case 'blockquote':
      return plainText(node.children);
  }
}
