import {
  TopicNode,
  OutlineParseResult,
  ParseWarning,
  ParseWarningCode,
  SequenceType,
  SEQUENCE_TYPES,
  MAX_OUTLINE_LEVEL
} from './types.js';
import type { Logger } from '../../utils/logger.js';

const SEGMENT = '([1-9]\\d*)';

function levelPattern(level: number): RegExp {
  const segments = Array.from({ length: level }, () => SEGMENT).join('\\.');
  return new RegExp(`^T${segments}:\\s*(.+)$`);
}

/**
 * Level patterns, most specific first. A looser pattern must never be tried
 * before a deeper one.
 */
const LEVEL_PATTERNS: ReadonlyArray<{ level: number; pattern: RegExp }> = [4, 3, 2, 1].map(level => ({
  level,
  pattern: levelPattern(level)
}));

const DEEP_PATTERN = /^T([1-9]\d*(?:\.[1-9]\d*){4,}):\s*(.+)$/;
const SEQUENCE_PATTERN = /^Sequence:\s*(\w+)\s*$/i;

interface MatchedLine {
  path: number[];
  description: string;
}

/**
 * Parses roadmap text (`T1: ...`, `T1.2: ...`, up to `T1.2.3.4: ...`) into a
 * topic forest. Lines that do not fit are reported as warnings and skipped.
 */
export class OutlineParser {
  constructor(private logger?: Logger) {}

  parse(rawText: string): OutlineParseResult {
    const topics: TopicNode[] = [];
    const warnings: ParseWarning[] = [];
    const seenIds = new Set<string>();
    let sequence: SequenceType | undefined;

    // current[L - 1] is the most recent node at level L
    const current: Array<TopicNode | undefined> = new Array(MAX_OUTLINE_LEVEL).fill(undefined);

    const warn = (code: ParseWarningCode, lineNumber: number, line: string, message: string) => {
      warnings.push({ code, lineNumber, line, message });
      this.logger?.('warn', 'Outline line skipped', { code, lineNumber, line, message });
    };

    const lines = rawText.split(/\r?\n/);

    lines.forEach((rawLine, index) => {
      const lineNumber = index + 1;
      const line = rawLine.trim();
      if (!line) return;

      const sequenceMatch = line.match(SEQUENCE_PATTERN);
      if (sequenceMatch) {
        const hint = this.normalizeSequence(sequenceMatch[1]);
        if (hint) {
          sequence = hint;
          return;
        }
      }

      const matched = this.matchLine(line);
      if (!matched) {
        warn('E-OUTLINE-UNMATCHED', lineNumber, line, 'Line does not follow the T<n>(.<n>)*: <description> grammar');
        return;
      }

      const { path, description } = matched;
      const id = formatTopicId(path);
      const level = path.length;

      if (level > MAX_OUTLINE_LEVEL + 1) {
        warn('E-OUTLINE-TOO-DEEP', lineNumber, line, `Level ${level} exceeds the supported outline depth`);
        return;
      }

      const node: TopicNode = { id, title: description, description, children: [] };

      if (level === 1) {
        topics.push(node);
      } else {
        const parent = current[level - 2];
        if (!parent || parent.id !== parentTopicId(id)) {
          warn(
            'E-OUTLINE-ORPHAN',
            lineNumber,
            line,
            parent
              ? `Expected parent ${parentTopicId(id)} but the current level-${level - 1} topic is ${parent.id}`
              : `No level-${level - 1} topic precedes ${id}`
          );
          return;
        }
        parent.children.push(node);
      }

      if (seenIds.has(id)) {
        warn('E-OUTLINE-DUPLICATE-ID', lineNumber, line, `Topic id ${id} appears more than once`);
      }
      seenIds.add(id);

      // Lines deeper than the tracked levels stay leaves
      if (level <= MAX_OUTLINE_LEVEL) {
        current[level - 1] = node;
        for (let deeper = level; deeper < MAX_OUTLINE_LEVEL; deeper++) {
          current[deeper] = undefined;
        }
      }
    });

    return { topics, warnings, sequence };
  }

  private matchLine(line: string): MatchedLine | null {
    for (const { level, pattern } of LEVEL_PATTERNS) {
      const match = line.match(pattern);
      if (match) {
        return {
          path: match.slice(1, level + 1).map(Number),
          description: match[level + 1].trim()
        };
      }
    }

    const deep = line.match(DEEP_PATTERN);
    if (deep) {
      return {
        path: deep[1].split('.').map(Number),
        description: deep[2].trim()
      };
    }

    return null;
  }

  private normalizeSequence(value: string): SequenceType | undefined {
    const normalized = value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
    return SEQUENCE_TYPES.find(type => type === normalized);
  }
}

/**
 * Parse raw outline text with a throwaway parser
 */
export function parseOutline(rawText: string, logger?: Logger): OutlineParseResult {
  return new OutlineParser(logger).parse(rawText);
}

export function formatTopicId(path: readonly number[]): string {
  return `T${path.join('.')}`;
}

/**
 * Numeric path of a topic id, or null when the id is malformed
 */
export function parseTopicId(id: string): number[] | null {
  const match = id.match(/^T([1-9]\d*(?:\.[1-9]\d*)*)$/);
  return match ? match[1].split('.').map(Number) : null;
}

export function topicDepth(id: string): number {
  return parseTopicId(id)?.length ?? id.split('.').length;
}

export function parentTopicId(id: string): string | null {
  const cut = id.lastIndexOf('.');
  return cut === -1 ? null : id.slice(0, cut);
}

export function countTopics(topics: readonly TopicNode[]): number {
  return topics.reduce((total, topic) => total + 1 + countTopics(topic.children), 0);
}

/**
 * All nodes in document order (pre-order)
 */
export function flattenTopics(topics: readonly TopicNode[]): TopicNode[] {
  const flat: TopicNode[] = [];
  const visit = (nodes: readonly TopicNode[]) => {
    for (const node of nodes) {
      flat.push(node);
      visit(node.children);
    }
  };
  visit(topics);
  return flat;
}

export function findTopic(topics: readonly TopicNode[], id: string): TopicNode | undefined {
  for (const topic of topics) {
    if (topic.id === id) return topic;
    const nested = findTopic(topic.children, id);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * First node per id, in document order
 */
export function indexTopicsById(topics: readonly TopicNode[]): Map<string, TopicNode> {
  const index = new Map<string, TopicNode>();
  for (const node of flattenTopics(topics)) {
    if (!index.has(node.id)) {
      index.set(node.id, node);
    }
  }
  return index;
}

/**
 * Render a forest back to roadmap text, indenting four spaces per level
 */
export function formatOutline(topics: readonly TopicNode[], sequence?: SequenceType): string {
  const lines: string[] = sequence ? [`Sequence: ${sequence}`] : [];
  for (const node of flattenTopics(topics)) {
    lines.push(`${'    '.repeat(topicDepth(node.id) - 1)}${node.id}: ${node.description}`);
  }
  return lines.join('\n');
}
