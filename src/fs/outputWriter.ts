import { access } from 'fs/promises';
import { isAbsolute, join, relative, sep } from 'path';
import { atomicWriteFile } from './atomicWriter.js';
import { errorMessage } from '../core/errors.js';
import { logger } from '../util/logger.js';

/**
 * Destination of a build. Paths are relative to the output directory and
 * use forward slashes.
 */
export interface OutputWriter {
  readonly root: string;
  writePage(relativePath: string, markdown: string): Promise<void>;
  writeAttachment(relativePath: string, content: Buffer): Promise<void>;
  exists(relativePath: string): Promise<boolean>;
}

export class FileSystemWriter implements OutputWriter {
  constructor(readonly root: string) {}

  /** Absolute path of an output file; paths leaving the output directory are refused */
  resolve(relativePath: string): string {
    const target = join(this.root, ...relativePath.split('/'));
    const inside = relative(this.root, target);
    if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
      throw new Error(`Output path ${relativePath} is outside ${this.root}`);
    }
    return target;
  }

  async writePage(relativePath: string, markdown: string): Promise<void> {
    await atomicWriteFile(this.resolve(relativePath), markdown, { encoding: 'utf8' });
    logger.debug('Page written', { path: relativePath, size: markdown.length });
  }

  async writeAttachment(relativePath: string, content: Buffer): Promise<void> {
    try {
      await atomicWriteFile(this.resolve(relativePath), content);
      logger.debug('Attachment stored', { path: relativePath, size: content.length });
    } catch (error) {
      throw new Error(`Failed to store attachment ${relativePath}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await access(this.resolve(relativePath));
      return true;
    } catch {
      return false;
    }
  }
}
