/**
 * Markdown subset used by generated content:
 * `#`..`####` headings, `- ` / `* ` bullets (two spaces per nesting level),
 * fenced code blocks, and `**bold**` / `*italic*` spans. Anything else is a
 * plain paragraph; unmatched delimiters stay literal.
 */

import { InlineSpan, MarkdownBlock } from './types.js';

const HEADING_PATTERN = /^(#{1,4})\s+(.+)$/;
const LIST_PATTERN = /^([ \t]*)[-*]\s+(.*)$/;
const FENCE = '```';

function isWordEdge(text: string): boolean {
  return text.length > 0 && !/^\s/.test(text) && !/\s$/.test(text);
}

/**
 * Split a line into emphasis spans. Adjacent plain text is merged.
 */
export function parseInline(text: string): InlineSpan[] {
  const spans: InlineSpan[] = [];
  let plain = '';

  const flush = () => {
    if (plain) {
      spans.push({ text: plain, emphasis: 'plain' });
      plain = '';
    }
  };

  let i = 0;
  while (i < text.length) {
    if (text.startsWith('**', i)) {
      const close = text.indexOf('**', i + 2);
      const inner = close === -1 ? '' : text.slice(i + 2, close);
      if (isWordEdge(inner)) {
        flush();
        spans.push({ text: inner, emphasis: 'bold' });
        i = close + 2;
      } else {
        plain += '**';
        i += 2;
      }
      continue;
    }

    if (text[i] === '*') {
      const close = text.indexOf('*', i + 1);
      const inner = close === -1 ? '' : text.slice(i + 1, close);
      if (isWordEdge(inner)) {
        flush();
        spans.push({ text: inner, emphasis: 'italic' });
        i = close + 1;
      } else {
        plain += '*';
        i += 1;
      }
      continue;
    }

    plain += text[i];
    i++;
  }

  flush();
  return spans;
}

function indentWidth(whitespace: string): number {
  return whitespace.replace(/\t/g, '  ').length;
}

export function tokenizeMarkdown(content: string): MarkdownBlock[] {
  const blocks: MarkdownBlock[] = [];
  let inCode = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line.startsWith(FENCE)) {
      inCode = !inCode;
      continue;
    }

    if (inCode) {
      blocks.push({ kind: 'code', text: rawLine.replace(/\s+$/, '') });
      continue;
    }

    if (!line) continue;

    const heading = line.match(HEADING_PATTERN);
    if (heading) {
      blocks.push({ kind: 'heading', text: heading[2].trim(), hashes: heading[1].length });
      continue;
    }

    const listItem = rawLine.match(LIST_PATTERN);
    if (listItem) {
      blocks.push({
        kind: 'list-item',
        spans: parseInline(listItem[2].trim()),
        indent: Math.floor(indentWidth(listItem[1]) / 2)
      });
      continue;
    }

    blocks.push({ kind: 'paragraph', spans: parseInline(line) });
  }

  return blocks;
}
