/**
 * Atomic File Writer
 * Writes land in a sibling temp file first and are renamed into place, so a
 * reader never sees a partially written snapshot or document
 */

import { writeFile, rename, unlink, mkdir, stat } from 'fs/promises';
import { join, dirname, basename, extname } from 'path';
import { createHash, randomBytes } from 'crypto';
import { SavedArtifact } from './types.js';
import type { Logger } from '../../utils/logger.js';

export function calculateChecksum(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Unique temp path beside the target (same filesystem, so rename is atomic)
 */
async function generateTempPath(targetPath: string): Promise<string> {
  const ext = extname(targetPath);
  const baseName = basename(targetPath, ext);
  const dirPath = dirname(targetPath);

  await mkdir(dirPath, { recursive: true });

  const randomSuffix = randomBytes(8).toString('hex');
  return join(dirPath, `${baseName}.${randomSuffix}.tmp${ext}`);
}

async function verifyWrite(tempPath: string, expectedSize: number): Promise<void> {
  const stats = await stat(tempPath);
  if (stats.size !== expectedSize) {
    throw new Error(`Write verification failed: expected ${expectedSize} bytes, got ${stats.size}`);
  }
}

export async function writeFileAtomic(
  targetPath: string,
  content: string | Buffer,
  logger?: Logger
): Promise<SavedArtifact> {
  const size = typeof content === 'string' ? Buffer.byteLength(content, 'utf8') : content.length;
  const tempPath = await generateTempPath(targetPath);

  try {
    await writeFile(tempPath, content);
    await verifyWrite(tempPath, size);
    await rename(tempPath, targetPath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger?.('debug', 'Temp file cleanup failed', { tempPath, error: String(cleanupError) });
    });
    throw error;
  }

  const checksum = calculateChecksum(content);
  logger?.('info', 'File written', { filePath: targetPath, size, checksum });
  return { filePath: targetPath, checksum, size };
}
