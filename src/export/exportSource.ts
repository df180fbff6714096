import type { Dirent } from 'fs';
import { readdir, readFile, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import AdmZip from 'adm-zip';
import { ExportIOError, errorMessage } from '../core/errors.js';
import { logger } from '../util/logger.js';

/**
 * Read-only view over an export, either an extracted directory or a ZIP
 * archive read in memory. Paths are posix-style and relative to the export
 * root. When every file sits under a single top-level folder, that folder
 * is the root.
 */
export interface ExportSource {
  readonly kind: 'directory' | 'zip';
  readonly location: string;
  /** Base name of the source without a .zip extension */
  readonly name: string;
  list(): readonly string[];
  has(path: string): boolean;
  readText(path: string): Promise<string>;
  readBuffer(path: string): Promise<Buffer>;
}

export async function openExportSource(location: string): Promise<ExportSource> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(location)).isDirectory();
  } catch (error) {
    throw new ExportIOError(`Cannot read export source: ${errorMessage(error)}`, location, { cause: error });
  }

  const source = isDirectory
    ? await DirectorySource.open(location)
    : ZipSource.open(location);

  logger.debug('Export source opened', {
    kind: source.kind,
    location,
    files: source.list().length
  });

  return source;
}

function toPosix(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\/+/, '');
}

function hasUnsafeSegment(path: string): boolean {
  return path.split('/').some(segment => segment === '..');
}

/**
 * Drop a top-level folder shared by every file.
 */
function commonRoot(files: readonly string[]): string {
  if (files.length === 0) return '';
  const first = files[0].split('/');
  if (first.length < 2) return '';
  const candidate = `${first[0]}/`;
  return files.every(file => file.startsWith(candidate)) ? candidate : '';
}

abstract class IndexedSource implements ExportSource {
  abstract readonly kind: 'directory' | 'zip';
  protected readonly files: Map<string, string>;

  constructor(readonly location: string, readonly name: string, rawPaths: readonly string[]) {
    const root = commonRoot(rawPaths);
    this.files = new Map(
      [...rawPaths]
        .sort()
        .map(raw => [raw.slice(root.length), raw] as const)
    );
  }

  list(): readonly string[] {
    return [...this.files.keys()];
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  async readText(path: string): Promise<string> {
    return (await this.readBuffer(path)).toString('utf8');
  }

  async readBuffer(path: string): Promise<Buffer> {
    const raw = this.files.get(path);
    if (raw === undefined) {
      throw new ExportIOError(`File not found in export: ${path}`, this.location);
    }
    try {
      return await this.readRaw(raw);
    } catch (error) {
      throw new ExportIOError(`Cannot read ${path}: ${errorMessage(error)}`, this.location, { cause: error });
    }
  }

  protected abstract readRaw(raw: string): Promise<Buffer>;
}

class DirectorySource extends IndexedSource {
  readonly kind = 'directory';

  static async open(location: string): Promise<DirectorySource> {
    try {
      const files = await walk(location, '');
      return new DirectorySource(location, basename(location), files);
    } catch (error) {
      throw new ExportIOError(`Cannot list export directory: ${errorMessage(error)}`, location, { cause: error });
    }
  }

  protected async readRaw(raw: string): Promise<Buffer> {
    return readFile(join(this.location, raw));
  }
}

async function walk(root: string, relative: string): Promise<string[]> {
  const entries = await readdir(join(root, relative), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const child = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...await walk(root, child));
    } else if (entry.isFile()) {
      files.push(child);
    }
  }
  return files;
}

class ZipSource extends IndexedSource {
  readonly kind = 'zip';

  private constructor(location: string, private readonly zip: AdmZip) {
    const paths = zip
      .getEntries()
      .filter(entry => !entry.isDirectory)
      .map(entry => toPosix(entry.entryName))
      .filter(path => !hasUnsafeSegment(path));
    super(location, basename(location, extname(location)), paths);
  }

  static open(location: string): ZipSource {
    let zip: AdmZip;
    try {
      zip = new AdmZip(location);
    } catch (error) {
      throw new ExportIOError(`Cannot open export archive: ${errorMessage(error)}`, location, { cause: error });
    }
    return new ZipSource(location, zip);
  }

  protected async readRaw(raw: string): Promise<Buffer> {
    const entry = this.zip.getEntries().find(candidate => toPosix(candidate.entryName) === raw);
    if (!entry) {
      throw new Error(`Archive entry disappeared: ${raw}`);
    }
    return entry.getData();
  }
}

export interface DiscoveredExport {
  /** Output folder name: the entry name without .zip */
  name: string;
  path: string;
}

/**
 * Exports waiting in an imports folder: every .zip archive and every
 * directory, in name order.
 */
export async function discoverExports(importsDir: string): Promise<DiscoveredExport[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(importsDir, { withFileTypes: true });
  } catch (error) {
    throw new ExportIOError(`Cannot list imports directory: ${errorMessage(error)}`, importsDir, { cause: error });
  }

  return entries
    .filter(entry => !entry.name.startsWith('.'))
    .filter(entry => entry.isDirectory() || (entry.isFile() && extname(entry.name).toLowerCase() === '.zip'))
    .map(entry => ({
      name: entry.isDirectory() ? entry.name : entry.name.slice(0, -'.zip'.length),
      path: join(importsDir, entry.name)
    }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
