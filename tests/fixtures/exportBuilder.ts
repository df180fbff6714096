import type { Export, Page, Settings } from '../../src/models/entities';
import type { ExportSource } from '../../src/export/exportSource';
import { DEFAULT_SETTINGS } from '../../src/util/config';

export type PageSpec = Partial<Page> & Pick<Page, 'id' | 'title'>;

export function makePage(spec: PageSpec): Page {
  return {
    children: [],
    rawContent: '',
    attachments: [],
    depth: 0,
    labels: [],
    ...spec
  };
}

/** In-memory export source over a fixed file map */
export function memorySource(files: Record<string, string | Buffer> = {}): ExportSource {
  const contents = new Map(Object.entries(files));
  const paths = [...contents.keys()].sort();
  const read = async (path: string): Promise<Buffer> => {
    const value = contents.get(path);
    if (value === undefined) throw new Error(`File not found in export: ${path}`);
    return typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
  };
  return {
    kind: 'directory',
    location: 'memory',
    name: 'memory',
    list: () => paths,
    has: path => contents.has(path),
    readText: async path => (await read(path)).toString('utf8'),
    readBuffer: read
  };
}

/**
 * Link page specs into an export. Children follow the order the specs are
 * given in; the page map is filled in pre-order.
 */
export function makeExport(specs: PageSpec[], files: Record<string, string | Buffer> = {}): Export {
  const drafts = specs.map(makePage);
  const byId = new Map(drafts.map(page => [page.id, page]));
  const rootIds: string[] = [];

  for (const page of drafts) {
    const parent = page.parentId !== undefined ? byId.get(page.parentId) : undefined;
    if (parent) {
      parent.children.push(page.id);
    } else {
      rootIds.push(page.id);
    }
  }

  const pages = new Map<string, Page>();
  const visit = (id: string, depth: number) => {
    const page = byId.get(id);
    if (!page) return;
    page.depth = depth;
    pages.set(id, page);
    for (const childId of page.children) visit(childId, depth + 1);
  };
  rootIds.forEach(id => visit(id, 0));

  return {
    format: 'xml',
    space: { key: 'DOC', name: 'Documentation' },
    pages,
    rootIds,
    source: memorySource(files)
  };
}

export function makeSettings(overrides: {
  content?: Partial<Settings['content']>;
  output?: Partial<Settings['output']>;
  excludePages?: string[];
  excludeSections?: string[];
  caseSensitivePatterns?: boolean;
  concurrency?: number;
} = {}): Settings {
  return {
    ...DEFAULT_SETTINGS,
    excludePages: overrides.excludePages ?? [],
    excludeSections: overrides.excludeSections ?? [],
    caseSensitivePatterns: overrides.caseSensitivePatterns ?? true,
    concurrency: overrides.concurrency ?? DEFAULT_SETTINGS.concurrency,
    content: { ...DEFAULT_SETTINGS.content, ...overrides.content },
    output: { ...DEFAULT_SETTINGS.output, ...overrides.output },
    logging: { ...DEFAULT_SETTINGS.logging }
  };
}

export function getPage(exp: Pick<Export, 'pages'>, id: string): Page {
  const page = exp.pages.get(id);
  if (!page) throw new Error(`No page ${id} in fixture export`);
  return page;
}
