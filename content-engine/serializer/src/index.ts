// Tree Serializer module exports

export {
  toSnapshot,
  snapshotTopics,
  checkTopicPaths,
  validateSnapshot,
  serializeSnapshot,
  deserializeSnapshot
} from './snapshot.js';
export { saveSnapshot, loadSnapshot, saveDocument } from './snapshot-store.js';
export { writeFileAtomic, calculateChecksum } from './atomic-writer.js';
export { parseInline, tokenizeMarkdown } from './markdown-converter.js';
export { renderDocument, renderContent, clampHeadingLevel, DEFAULT_RENDER_OPTIONS } from './document-renderer.js';
export { DocxDocumentSink, DEFAULT_DOCX_SINK_CONFIG } from './docx-sink.js';
export type { DocxSinkConfig } from './docx-sink.js';
export { MarkdownDocumentSink } from './markdown-sink.js';
export { SNAPSHOT_VERSION } from './types.js';
export type {
  SnapshotStage,
  SnapshotTopic,
  LessonSnapshot,
  SnapshotMeta,
  Emphasis,
  InlineSpan,
  ParagraphStyle,
  DocumentSink,
  MarkdownBlock,
  RenderOptions,
  SavedArtifact
} from './types.js';
