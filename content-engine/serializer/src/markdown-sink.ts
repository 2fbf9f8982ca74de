import { DocumentSink, InlineSpan, ParagraphStyle } from './types.js';

type BlockKind = 'heading' | 'paragraph' | 'quote' | 'list' | 'code';

function formatSpans(spans: readonly InlineSpan[]): string {
  return spans
    .map(span => {
      switch (span.emphasis) {
        case 'bold':
          return `**${span.text}**`;
        case 'italic':
          return `*${span.text}*`;
        default:
          return span.text;
      }
    })
    .join('');
}

/**
 * Renders the document as Markdown text. Consecutive list items and code
 * lines stay together; other blocks are separated by a blank line.
 */
export class MarkdownDocumentSink implements DocumentSink<string> {
  private lines: string[] = [];
  private last: BlockKind | null = null;

  addHeading(text: string, level: number): void {
    this.open('heading');
    this.lines.push(`${'#'.repeat(Math.min(6, Math.max(1, level)))} ${text}`);
  }

  addParagraph(spans: readonly InlineSpan[], style: ParagraphStyle = 'Normal'): void {
    if (style === 'Code') {
      this.open('code');
      this.lines.push(spans.map(span => span.text).join(''));
      return;
    }
    if (style === 'Quote') {
      this.open('quote');
      this.lines.push(`> ${formatSpans(spans)}`);
      return;
    }
    this.open('paragraph');
    this.lines.push(formatSpans(spans));
  }

  addListItem(spans: readonly InlineSpan[], indent: number): void {
    this.open('list');
    this.lines.push(`${'  '.repeat(Math.max(0, indent))}- ${formatSpans(spans)}`);
  }

  async save(): Promise<string> {
    const output = this.last === 'code' ? [...this.lines, '```'] : this.lines;
    return output.length > 0 ? `${output.join('\n')}\n` : '';
  }

  private open(kind: BlockKind): void {
    const continues = kind === this.last && (kind === 'list' || kind === 'code');
    if (this.last === 'code' && !continues) {
      this.lines.push('```');
    }
    if (this.last !== null && !continues) {
      this.lines.push('');
    }
    if (kind === 'code' && !continues) {
      this.lines.push('```');
    }
    this.last = kind;
  }
}
