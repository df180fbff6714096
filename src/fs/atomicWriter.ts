import { writeFile, mkdir, rename, unlink } from 'fs/promises';
import { dirname, join, basename } from 'path';
import { randomBytes } from 'crypto';
import { errorMessage, hasErrorCode } from '../core/errors.js';
import { logger } from '../util/logger.js';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  mode?: number;
  ensureDir?: boolean;
}

/** Write through a temporary sibling file, then rename it over the target */
export async function atomicWriteFile(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const {
    encoding = 'utf8',
    mode,
    ensureDir = true
  } = options;

  const tempPath = generateTempPath(filePath);

  try {
    if (ensureDir) {
      await mkdir(dirname(filePath), { recursive: true });
    }

    if (typeof content === 'string') {
      await writeFile(tempPath, content, { encoding, mode });
    } else {
      await writeFile(tempPath, content, { mode });
    }

    await rename(tempPath, filePath);

    logger.debug('Atomic write completed', {
      path: filePath,
      size: content.length
    });
  } catch (error) {
    await removeTemp(tempPath);

    logger.error('Atomic write failed', {
      path: filePath,
      error: errorMessage(error)
    });

    throw error;
  }
}

export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: Omit<AtomicWriteOptions, 'encoding'> = {}
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2) + '\n', {
    ...options,
    encoding: 'utf8'
  });
}

function generateTempPath(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.tmp-${randomBytes(6).toString('hex')}`);
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (cleanupError) {
    // Nothing to clean when the temp file was never created
    if (hasErrorCode(cleanupError, 'ENOENT')) {
      return;
    }
    logger.warn('Failed to cleanup temp file', {
      tempPath,
      error: errorMessage(cleanupError)
    });
  }
}
