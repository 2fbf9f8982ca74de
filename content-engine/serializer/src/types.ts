// Core types for the Tree Serializer module

import type { SequenceType } from '../../outline/src/types.js';

export type SnapshotStage = 'roadmap' | 'lesson-plan' | 'lecture-notes';

export const SNAPSHOT_VERSION = '1.0.0';

export interface SnapshotTopic {
  id: string;
  title: string;
  description: string;
  content?: string;
  subtopics: SnapshotTopic[];
}

export interface LessonSnapshot {
  version: typeof SNAPSHOT_VERSION;
  stage: SnapshotStage;
  subject: string;
  difficulty: string;
  generatedAt: string;
  sequence?: SequenceType;
  topics: SnapshotTopic[];
}

export interface SnapshotMeta {
  stage: SnapshotStage;
  subject: string;
  difficulty: string;
  sequence?: SequenceType;
  generatedAt?: string;
}

export type Emphasis = 'plain' | 'bold' | 'italic';

export interface InlineSpan {
  text: string;
  emphasis: Emphasis;
}

export type ParagraphStyle = 'Normal' | 'Quote' | 'Code';

/**
 * Receives the rendered document one block at a time
 */
export interface DocumentSink<TArtifact> {
  addHeading(text: string, level: number): void;
  addParagraph(spans: readonly InlineSpan[], style?: ParagraphStyle): void;
  addListItem(spans: readonly InlineSpan[], indent: number): void;
  save(): Promise<TArtifact>;
}

export type MarkdownBlock =
  | { kind: 'heading'; text: string; hashes: number }
  | { kind: 'list-item'; spans: InlineSpan[]; indent: number }
  | { kind: 'code'; text: string }
  | { kind: 'paragraph'; spans: InlineSpan[] };

export interface RenderOptions {
  baseOffset: number;         // Heading level = node depth + baseOffset
  title?: string;             // Optional level-1 heading before the tree
}

export interface SavedArtifact {
  filePath: string;
  checksum: string;
  size: number;
}
