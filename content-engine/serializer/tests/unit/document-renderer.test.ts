import { renderDocument } from '../../src/document-renderer.js';
import { MarkdownDocumentSink } from '../../src/markdown-sink.js';
import { DocxDocumentSink } from '../../src/docx-sink.js';
import { DocumentSink, InlineSpan, LessonSnapshot, ParagraphStyle, SnapshotTopic } from '../../src/types.js';

type SinkCall =
  | ['heading', string, number]
  | ['paragraph', InlineSpan[], ParagraphStyle | undefined]
  | ['list', InlineSpan[], number];

class RecordingSink implements DocumentSink<SinkCall[]> {
  calls: SinkCall[] = [];

  addHeading(text: string, level: number): void {
    this.calls.push(['heading', text, level]);
  }

  addParagraph(spans: readonly InlineSpan[], style?: ParagraphStyle): void {
    this.calls.push(['paragraph', [...spans], style]);
  }

  addListItem(spans: readonly InlineSpan[], indent: number): void {
    this.calls.push(['list', [...spans], indent]);
  }

  async save(): Promise<SinkCall[]> {
    return this.calls;
  }
}

function topic(id: string, title: string, subtopics: SnapshotTopic[] = [], content?: string): SnapshotTopic {
  return { id, title, description: title, ...(content !== undefined ? { content } : {}), subtopics };
}

function snapshot(topics: SnapshotTopic[]): LessonSnapshot {
  return {
    version: '1.0.0',
    stage: 'lecture-notes',
    subject: 'Physics',
    difficulty: 'Beginner',
    generatedAt: '2026-01-05T10:00:00.000Z',
    topics
  };
}

const EXAMPLE = snapshot([
  topic('T1', 'Intro', [topic('T1.1', 'Sub')], '# A\n- one\n- two\n**bold** text')
]);

describe('renderDocument', () => {
  test('should emit node headings and their markdown content in document order', async () => {
    const result = await renderDocument(EXAMPLE, new RecordingSink());

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toEqual([
      ['heading', 'T1: Intro', 2],
      ['heading', 'A', 3],
      ['list', [{ text: 'one', emphasis: 'plain' }], 0],
      ['list', [{ text: 'two', emphasis: 'plain' }], 0],
      ['paragraph', [{ text: 'bold', emphasis: 'bold' }, { text: ' text', emphasis: 'plain' }], 'Normal'],
      ['heading', 'T1.1: Sub', 3]
    ]);
  });

  test('should add the title as a level-one heading', async () => {
    const result = await renderDocument(snapshot([topic('T1', 'Intro')]), new RecordingSink(), { title: 'Physics' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toEqual([
      ['heading', 'Physics', 1],
      ['heading', 'T1: Intro', 2]
    ]);
  });

  test('should clamp heading levels to the 1-9 range', async () => {
    const doc = snapshot([topic('T1', 'Deep', [topic('T1.1', 'Deeper')], '#### Four')]);

    const result = await renderDocument(doc, new RecordingSink(), { baseOffset: 7 });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toEqual([
      ['heading', 'T1: Deep', 8],
      ['heading', 'Four', 9],
      ['heading', 'T1.1: Deeper', 9]
    ]);
  });

  test('should emit code block lines as Code paragraphs', async () => {
    const doc = snapshot([topic('T1', 'Code', [], '```\nx = 1\n```')]);

    const result = await renderDocument(doc, new RecordingSink());

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value[1]).toEqual(['paragraph', [{ text: 'x = 1', emphasis: 'plain' }], 'Code']);
  });

  test('should report a sink that throws while rendering', async () => {
    const sink = new RecordingSink();
    sink.addListItem = () => {
      throw new Error('list unsupported');
    };

    const result = await renderDocument(EXAMPLE, sink);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.code).toBe('E-SERIALIZE-SINK-FAILED');
    expect(result.errors.data.error).toBe('list unsupported');
  });

  test('should report a sink that fails to save', async () => {
    const sink = new RecordingSink();
    sink.save = async () => {
      throw new Error('disk full');
    };

    const result = await renderDocument(EXAMPLE, sink);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.code).toBe('E-SERIALIZE-SAVE-FAILED');
  });
});

describe('MarkdownDocumentSink', () => {
  test('should render the example as markdown text', async () => {
    const result = await renderDocument(EXAMPLE, new MarkdownDocumentSink());

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value).toBe('## T1: Intro\n\n### A\n\n- one\n- two\n\n**bold** text\n\n### T1.1: Sub\n');
  });

  test('should fence consecutive code lines together', async () => {
    const sink = new MarkdownDocumentSink();
    sink.addParagraph([{ text: 'Intro:', emphasis: 'plain' }]);
    sink.addParagraph([{ text: 'const x = 1;', emphasis: 'plain' }], 'Code');
    sink.addParagraph([{ text: '  return x;', emphasis: 'plain' }], 'Code');
    sink.addParagraph([{ text: 'After', emphasis: 'italic' }]);

    expect(await sink.save()).toBe('Intro:\n\n```\nconst x = 1;\n  return x;\n```\n\n*After*\n');
  });

  test('should close a trailing code fence on save', async () => {
    const sink = new MarkdownDocumentSink();
    sink.addListItem([{ text: 'nested', emphasis: 'plain' }], 1);
    sink.addParagraph([{ text: 'y()', emphasis: 'plain' }], 'Code');

    expect(await sink.save()).toBe('  - nested\n\n```\ny()\n```\n');
  });
});

describe('DocxDocumentSink', () => {
  test('should pack the rendered document into a docx archive', async () => {
    const sink = new DocxDocumentSink({ title: 'Physics' });

    const result = await renderDocument(EXAMPLE, sink);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(sink.paragraphCount).toBe(6);
    expect(result.value.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});
