import { readFile } from 'fs/promises';
import { LessonSnapshot, SavedArtifact } from './types.js';
import { serializeSnapshot, deserializeSnapshot } from './snapshot.js';
import { writeFileAtomic } from './atomic-writer.js';
import { Result, Ok, Err, ModuleError, errorMessage, generateCorrelationId } from '../../utils/result.js';
import type { Logger } from '../../utils/logger.js';

function storeError(code: string, filePath: string, error: unknown): ModuleError {
  return {
    code,
    module: 'SERIALIZER',
    data: { filePath, error: errorMessage(error) },
    correlationId: generateCorrelationId('ser')
  };
}

export async function saveSnapshot(
  snapshot: LessonSnapshot,
  filePath: string,
  logger?: Logger
): Promise<Result<SavedArtifact, ModuleError>> {
  try {
    return Ok(await writeFileAtomic(filePath, serializeSnapshot(snapshot), logger));
  } catch (error) {
    logger?.('error', 'Snapshot save failed', { filePath, error: errorMessage(error) });
    return Err(storeError('E-SERIALIZE-WRITE-FAILED', filePath, error));
  }
}

export async function loadSnapshot(filePath: string, logger?: Logger): Promise<Result<LessonSnapshot, ModuleError>> {
  let json: string;
  try {
    json = await readFile(filePath, 'utf8');
  } catch (error) {
    logger?.('error', 'Snapshot read failed', { filePath, error: errorMessage(error) });
    return Err(storeError('E-SERIALIZE-READ-FAILED', filePath, error));
  }

  const result = deserializeSnapshot(json);
  if (!result.success) {
    logger?.('warn', 'Snapshot rejected', { filePath, code: result.errors.code });
  }
  return result;
}

export async function saveDocument(
  artifact: string | Buffer,
  filePath: string,
  logger?: Logger
): Promise<Result<SavedArtifact, ModuleError>> {
  try {
    return Ok(await writeFileAtomic(filePath, artifact, logger));
  } catch (error) {
    logger?.('error', 'Document save failed', { filePath, error: errorMessage(error) });
    return Err(storeError('E-SERIALIZE-WRITE-FAILED', filePath, error));
  }
}
