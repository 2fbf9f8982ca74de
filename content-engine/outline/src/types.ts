// Core types for the Outline module

/**
 * A node of the topic tree. `id` encodes the path (`T1.2.3`), so the number
 * of id components is the node's level.
 */
export interface TopicNode {
  id: string;
  title: string;
  description: string;
  content?: string;
  children: TopicNode[];
}

export type SequenceType = 'Linear' | 'Spiral' | 'Modular';

export const SEQUENCE_TYPES: readonly SequenceType[] = ['Linear', 'Spiral', 'Modular'];

export type ParseWarningCode =
  | 'E-OUTLINE-UNMATCHED'
  | 'E-OUTLINE-ORPHAN'
  | 'E-OUTLINE-TOO-DEEP'
  | 'E-OUTLINE-DUPLICATE-ID';

export interface ParseWarning {
  code: ParseWarningCode;
  lineNumber: number;
  line: string;
  message: string;
}

export interface OutlineParseResult {
  topics: TopicNode[];
  warnings: ParseWarning[];
  sequence?: SequenceType;
}

/**
 * Deepest level with its own tracked "current node"
 */
export const MAX_OUTLINE_LEVEL = 4;
