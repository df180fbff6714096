import { posix } from 'path';
import type { Export, Page, PageAttachment } from '../models/entities.js';
import type { LinkTarget } from '../models/markup.js';
import { resolveExportPath } from '../export/htmlExport.js';
import { preserveFilename } from '../util/slugify.js';

type PageTarget = Extract<LinkTarget, { type: 'page' }>;
type AttachmentTarget = Extract<LinkTarget, { type: 'attachment' }>;

export interface ResolvedAttachment {
  pageId: string;
  fileName: string;
  sourcePath: string;
  /** Relative to the output root */
  outputPath: string;
}

interface AttachmentOwner {
  pageId: string;
  attachment: PageAttachment;
}

/**
 * Resolves page and attachment references of one export against the
 * planned output paths. Pages without a planned path (excluded ones) never
 * resolve.
 */
export class LinkResolver {
  private byTitle = new Map<string, string>();
  private byFile = new Map<string, string>();
  private bySourcePath = new Map<string, AttachmentOwner>();

  constructor(
    private readonly exp: Pick<Export, 'pages' | 'space'>,
    private readonly paths: ReadonlyMap<string, string>,
    private readonly attachmentsDir: string
  ) {
    // Map iteration is pre-order, so the first page wins a duplicate title
    for (const page of exp.pages.values()) {
      if (!paths.has(page.id)) continue;
      if (!this.byTitle.has(page.title)) this.byTitle.set(page.title, page.id);
      if (page.sourcePath) this.byFile.set(page.sourcePath, page.id);
      for (const attachment of page.attachments) {
        if (!this.bySourcePath.has(attachment.sourcePath)) {
          this.bySourcePath.set(attachment.sourcePath, { pageId: page.id, attachment });
        }
      }
    }
  }

  outputPathOf(pageId: string): string | undefined {
    return this.paths.get(pageId);
  }

  /** Id of the page a link points at; a target without title or file is the current page */
  resolvePage(from: Page, target: PageTarget): string | undefined {
    if (target.file !== undefined) {
      return this.byFile.get(resolveExportPath(from.sourcePath ?? '', target.file));
    }
    if (target.spaceKey !== undefined && target.spaceKey !== this.exp.space.key) {
      return undefined;
    }
    if (target.title === undefined) {
      return this.paths.has(from.id) ? from.id : undefined;
    }
    return this.byTitle.get(target.title);
  }

  /** Relative href from the current page to the target page, anchor kept */
  pageHref(from: Page, target: PageTarget): string | undefined {
    const targetId = this.resolvePage(from, target);
    if (targetId === undefined) return undefined;
    const toPath = this.paths.get(targetId);
    if (toPath === undefined) return undefined;
    if (targetId === from.id && target.anchor) {
      return `#${encodeAnchor(target.anchor)}`;
    }
    const href = this.relativeHref(from.id, toPath);
    return target.anchor ? `${href}#${encodeAnchor(target.anchor)}` : href;
  }

  resolveAttachment(from: Page, target: Omit<AttachmentTarget, 'type'>): ResolvedAttachment | undefined {
    let owner: AttachmentOwner | undefined;

    if (target.file !== undefined) {
      owner = this.bySourcePath.get(resolveExportPath(from.sourcePath ?? '', target.file));
    } else {
      const ownerId = target.pageTitle !== undefined ? this.byTitle.get(target.pageTitle) : from.id;
      const ownerPage = ownerId !== undefined ? this.exp.pages.get(ownerId) : undefined;
      if (ownerPage && this.paths.has(ownerPage.id)) {
        const attachment = findAttachment(ownerPage.attachments, target.fileName);
        if (attachment) owner = { pageId: ownerPage.id, attachment };
      }
    }

    if (!owner) return undefined;
    return {
      pageId: owner.pageId,
      fileName: owner.attachment.fileName,
      sourcePath: owner.attachment.sourcePath,
      outputPath: attachmentOutputPath(this.attachmentsDir, owner.pageId, owner.attachment.fileName)
    };
  }

  /** Relative, URI-encoded href from the page's output file to another output file */
  relativeHref(fromPageId: string, toPath: string): string {
    const fromPath = this.paths.get(fromPageId) ?? '';
    return getRelativePath(getDirectoryPath(fromPath), toPath)
      .split('/')
      .map(segment => (segment === '..' || segment === '.' ? segment : encodeURIComponent(segment)))
      .join('/');
  }
}

/** Page id and file name each become one file-name-safe segment */
export function attachmentOutputPath(attachmentsDir: string, pageId: string, fileName: string): string {
  return posix.join(attachmentsDir, preserveFilename(pageId), preserveFilename(fileName));
}

function findAttachment(attachments: readonly PageAttachment[], fileName: string): PageAttachment | undefined {
  const exact = attachments.find(attachment => attachment.fileName === fileName);
  if (exact) return exact;
  const lower = fileName.toLowerCase();
  return attachments.find(attachment => attachment.fileName.toLowerCase() === lower);
}

function encodeAnchor(anchor: string): string {
  return encodeURIComponent(anchor);
}

export function getDirectoryPath(filePath: string): string {
  const lastSlash = filePath.lastIndexOf('/');
  return lastSlash === -1 ? '' : filePath.substring(0, lastSlash);
}

export function getRelativePath(fromDir: string, toFile: string): string {
  if (!fromDir) {
    return toFile;
  }

  const fromParts = fromDir.split('/').filter(p => p);
  const toParts = toFile.split('/').filter(p => p);

  // Find common base
  let commonLength = 0;
  for (let i = 0; i < Math.min(fromParts.length, toParts.length); i++) {
    if (fromParts[i] === toParts[i]) {
      commonLength++;
    } else {
      break;
    }
  }

  const upSteps = fromParts.length - commonLength;
  const downParts = toParts.slice(commonLength);

  const relativeParts = Array<string>(upSteps).fill('..').concat(downParts);
  return relativeParts.join('/') || './';
}
