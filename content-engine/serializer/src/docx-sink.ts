import { Document, Packer, Paragraph, TextRun, HeadingLevel } from 'docx';
import { DocumentSink, InlineSpan, ParagraphStyle } from './types.js';

const HEADING_LEVELS = [
  HeadingLevel.HEADING_1,
  HeadingLevel.HEADING_2,
  HeadingLevel.HEADING_3,
  HeadingLevel.HEADING_4,
  HeadingLevel.HEADING_5,
  HeadingLevel.HEADING_6
] as const;

// Word bullets go eight levels deep below the first
const MAX_BULLET_LEVEL = 8;

export interface DocxSinkConfig {
  font: string;
  fontSize: number;          // Points
  codeFont: string;
  codeFontSize: number;      // Points
  title?: string;
  creator: string;
}

export const DEFAULT_DOCX_SINK_CONFIG: DocxSinkConfig = {
  font: 'Calibri',
  fontSize: 12,
  codeFont: 'Courier New',
  codeFontSize: 10,
  creator: 'syllabus-notes-engine'
};

/**
 * Collects paragraphs and packs them into a .docx buffer on save
 */
export class DocxDocumentSink implements DocumentSink<Buffer> {
  private config: DocxSinkConfig;
  private paragraphs: Paragraph[] = [];

  constructor(config: Partial<DocxSinkConfig> = {}) {
    this.config = { ...DEFAULT_DOCX_SINK_CONFIG, ...config };
  }

  addHeading(text: string, level: number): void {
    // Word's built-in heading styles stop at 6
    const index = Math.min(HEADING_LEVELS.length, Math.max(1, level)) - 1;
    this.paragraphs.push(new Paragraph({ text, heading: HEADING_LEVELS[index] }));
  }

  addParagraph(spans: readonly InlineSpan[], style: ParagraphStyle = 'Normal'): void {
    if (style === 'Code') {
      this.paragraphs.push(new Paragraph({
        children: [new TextRun({
          text: spans.map(span => span.text).join(''),
          font: this.config.codeFont,
          size: this.config.codeFontSize * 2
        })]
      }));
      return;
    }

    this.paragraphs.push(new Paragraph({
      children: this.runs(spans, style === 'Quote'),
      ...(style === 'Quote' ? { indent: { left: 720 } } : {})
    }));
  }

  addListItem(spans: readonly InlineSpan[], indent: number): void {
    this.paragraphs.push(new Paragraph({
      children: this.runs(spans, false),
      bullet: { level: Math.min(MAX_BULLET_LEVEL, Math.max(0, indent)) }
    }));
  }

  async save(): Promise<Buffer> {
    const document = new Document({
      creator: this.config.creator,
      ...(this.config.title ? { title: this.config.title } : {}),
      styles: {
        default: {
          document: {
            run: { font: this.config.font, size: this.config.fontSize * 2 }
          }
        }
      },
      sections: [{ children: this.paragraphs }]
    });
    return Packer.toBuffer(document);
  }

  get paragraphCount(): number {
    return this.paragraphs.length;
  }

  private runs(spans: readonly InlineSpan[], italicize: boolean): TextRun[] {
    return spans.map(span => new TextRun({
      text: span.text,
      bold: span.emphasis === 'bold',
      italics: italicize || span.emphasis === 'italic'
    }));
  }
}
