import { DocumentSink, LessonSnapshot, RenderOptions, SnapshotTopic } from './types.js';
import { tokenizeMarkdown } from './markdown-converter.js';
import { Result, Ok, Err, ModuleError, errorMessage, generateCorrelationId } from '../../utils/result.js';
import type { Logger } from '../../utils/logger.js';

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  baseOffset: 1
};

const MIN_HEADING_LEVEL = 1;
const MAX_HEADING_LEVEL = 9;

export function clampHeadingLevel(level: number): number {
  return Math.min(MAX_HEADING_LEVEL, Math.max(MIN_HEADING_LEVEL, level));
}

/**
 * Emit generated markdown under a node heading at nodeLevel
 */
export function renderContent<T>(content: string, nodeLevel: number, sink: DocumentSink<T>): void {
  for (const block of tokenizeMarkdown(content)) {
    switch (block.kind) {
      case 'heading':
        sink.addHeading(block.text, clampHeadingLevel(nodeLevel + block.hashes));
        break;
      case 'list-item':
        sink.addListItem(block.spans, block.indent);
        break;
      case 'code':
        sink.addParagraph([{ text: block.text, emphasis: 'plain' }], 'Code');
        break;
      case 'paragraph':
        sink.addParagraph(block.spans, 'Normal');
        break;
    }
  }
}

function renderTopics<T>(topics: readonly SnapshotTopic[], depth: number, sink: DocumentSink<T>, baseOffset: number): void {
  for (const topic of topics) {
    const level = clampHeadingLevel(depth + baseOffset);
    sink.addHeading(`${topic.id}: ${topic.title}`, level);
    if (topic.content) {
      renderContent(topic.content, level, sink);
    }
    renderTopics(topic.subtopics, depth + 1, sink, baseOffset);
  }
}

/**
 * Walk a snapshot in document order into a sink and save it
 */
export async function renderDocument<T>(
  snapshot: LessonSnapshot,
  sink: DocumentSink<T>,
  options: Partial<RenderOptions> = {},
  logger?: Logger
): Promise<Result<T, ModuleError>> {
  const { baseOffset, title } = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const correlationId = generateCorrelationId('render');

  try {
    if (title) {
      sink.addHeading(title, MIN_HEADING_LEVEL);
    }
    renderTopics(snapshot.topics, 1, sink, baseOffset);
  } catch (error) {
    logger?.('error', 'Document rendering failed', { correlationId, error: errorMessage(error) });
    return Err({
      code: 'E-SERIALIZE-SINK-FAILED',
      module: 'SERIALIZER',
      data: { error: errorMessage(error) },
      correlationId
    });
  }

  try {
    const artifact = await sink.save();
    logger?.('info', 'Document rendered', { correlationId, stage: snapshot.stage, topics: snapshot.topics.length });
    return Ok(artifact);
  } catch (error) {
    logger?.('error', 'Document save failed', { correlationId, error: errorMessage(error) });
    return Err({
      code: 'E-SERIALIZE-SAVE-FAILED',
      module: 'SERIALIZER',
      data: { error: errorMessage(error) },
      correlationId
    });
  }
}
