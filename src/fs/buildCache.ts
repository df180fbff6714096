import { readFile } from 'fs/promises';
import { join } from 'path';
import { atomicWriteJson } from './atomicWriter.js';
import { HASH_ALGORITHM } from '../util/hash.js';
import { cacheCorruption, errorMessage, hasErrorCode, type BuildWarning } from '../core/errors.js';
import { logger } from '../util/logger.js';

export const CACHE_FILE = '.confluence-md-cache.json';
export const CACHE_VERSION = '1';

export interface CacheEntry {
  hash: string;
  outputPath: string;
  title: string;
  convertedAt: string;
}

/** On-disk shape of the cache file */
export interface CacheRecord {
  version: string;
  algorithm: string;
  settingsDigest: string;
  updatedAt: string;
  entries: Record<string, CacheEntry>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return isRecord(value)
    && typeof value.hash === 'string'
    && typeof value.outputPath === 'string'
    && typeof value.title === 'string'
    && typeof value.convertedAt === 'string';
}

/**
 * Content hash cache of one output directory, keyed by page id. A cache
 * that cannot be read is never fatal: it is reported as a warning and
 * every page is rebuilt.
 */
export class BuildCache {
  private entries = new Map<string, CacheEntry>();
  private storedDigest: string | undefined;
  private storedUpdatedAt: string | undefined;

  constructor(readonly outputDir: string) {}

  get filePath(): string {
    return join(this.outputDir, CACHE_FILE);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Settings digest of the run that wrote the cache, if any */
  get settingsDigest(): string | undefined {
    return this.storedDigest;
  }

  get updatedAt(): string | undefined {
    return this.storedUpdatedAt;
  }

  async load(): Promise<BuildWarning[]> {
    this.entries = new Map();
    this.storedDigest = undefined;
    this.storedUpdatedAt = undefined;

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        logger.debug('No existing cache found', { path: this.filePath });
        return [];
      }
      return [this.corrupt(`Cache file could not be read: ${errorMessage(error)}`)];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return [this.corrupt(`Cache file is not valid JSON: ${errorMessage(error)}`)];
    }

    if (!isRecord(parsed) || !isRecord(parsed.entries)) {
      return [this.corrupt('Cache file has an unexpected shape')];
    }
    if (parsed.version !== CACHE_VERSION || parsed.algorithm !== HASH_ALGORITHM) {
      return [this.corrupt(`Unsupported cache version ${String(parsed.version)} (${String(parsed.algorithm)})`)];
    }

    const warnings: BuildWarning[] = [];
    for (const [pageId, entry] of Object.entries(parsed.entries)) {
      if (isCacheEntry(entry)) {
        this.entries.set(pageId, {
          hash: entry.hash,
          outputPath: entry.outputPath,
          title: entry.title,
          convertedAt: entry.convertedAt
        });
      } else {
        warnings.push(cacheCorruption(`Dropped malformed cache entry for page ${pageId}`));
      }
    }

    this.storedDigest = typeof parsed.settingsDigest === 'string' ? parsed.settingsDigest : undefined;
    this.storedUpdatedAt = typeof parsed.updatedAt === 'string' ? parsed.updatedAt : undefined;

    logger.debug('Cache loaded', {
      path: this.filePath,
      entries: this.entries.size,
      dropped: warnings.length
    });

    return warnings;
  }

  get(pageId: string): CacheEntry | undefined {
    return this.entries.get(pageId);
  }

  /** True unless the stored hash for the page equals `hash` */
  shouldConvert(pageId: string, hash: string): boolean {
    return this.entries.get(pageId)?.hash !== hash;
  }

  record(pageId: string, entry: CacheEntry): void {
    this.entries.set(pageId, entry);
  }

  forget(pageId: string): void {
    this.entries.delete(pageId);
  }

  /** Drop entries of pages no longer in the build; returns their ids */
  prune(liveIds: Iterable<string>): string[] {
    const live = new Set(liveIds);
    const removed = [...this.entries.keys()].filter(id => !live.has(id));
    for (const id of removed) {
      this.entries.delete(id);
    }
    return removed;
  }

  toRecord(settingsDigest: string, updatedAt = new Date().toISOString()): CacheRecord {
    const entries: Record<string, CacheEntry> = {};
    for (const id of [...this.entries.keys()].sort()) {
      const entry = this.entries.get(id);
      if (entry) entries[id] = entry;
    }
    return {
      version: CACHE_VERSION,
      algorithm: HASH_ALGORITHM,
      settingsDigest,
      updatedAt,
      entries
    };
  }

  async persist(settingsDigest: string): Promise<void> {
    const record = this.toRecord(settingsDigest);
    await atomicWriteJson(this.filePath, record);
    this.storedDigest = settingsDigest;
    this.storedUpdatedAt = record.updatedAt;

    logger.debug('Cache saved', {
      path: this.filePath,
      entries: this.entries.size
    });
  }

  private corrupt(message: string): BuildWarning {
    logger.warn('Ignoring unusable cache, all pages will be rebuilt', { path: this.filePath, reason: message });
    return cacheCorruption(message);
  }
}
