import path from 'path';
import {
  PromptBuilder,
  EMPTY_CONTEXT,
  extendContext,
  formatContext,
  truncateText
} from '../../src/prompt-builder.js';
import { loadPromptTemplates, parseTemplate, renderTemplate } from '../../src/template-loader.js';
import { PromptTemplateSet } from '../../src/types.js';

const TEMPLATES_DIR = path.resolve(__dirname, '../../templates');

function loadTemplates(): PromptTemplateSet {
  const loaded = loadPromptTemplates(TEMPLATES_DIR);
  if (!loaded.success) {
    throw new Error(`templates failed to load: ${JSON.stringify(loaded.errors.data)}`);
  }
  return loaded.value;
}

describe('loadPromptTemplates', () => {
  test('should load every shipped template with its directives', () => {
    const builder = new PromptBuilder(loadTemplates());

    expect(builder.directives('roadmap')).toEqual({ temperature: 0.7, maxTokens: undefined });
    expect(builder.directives('lesson-chunk')).toEqual({ temperature: 0.7, maxTokens: 500 });
    expect(builder.directives('lecture-notes')).toEqual({ temperature: 0.8, maxTokens: undefined });
    expect(builder.directives('notes-qa')).toEqual({ temperature: 0.7, maxTokens: 500 });
    expect(builder.templateInfo().map(t => t.hash)).toEqual(
      expect.arrayContaining([expect.stringMatching(/^[a-f0-9]{64}$/)])
    );
  });

  test('should report a missing template directory', () => {
    const loaded = loadPromptTemplates(path.join(TEMPLATES_DIR, 'does-not-exist'));

    expect(loaded.success).toBe(false);
    if (!loaded.success) {
      expect(loaded.errors.code).toBe('E-PROMPTS-TEMPLATE-INVALID');
      expect(loaded.errors.module).toBe('PROMPTS');
    }
  });
});

describe('parseTemplate', () => {
  test('should reject a temperature outside [0, 1]', () => {
    const raw = [
      'template_id: notes-qa',
      'template_version: 1.0.0',
      'llm_directives:',
      '  temperature: 1.5',
      'prompt: Hello'
    ].join('\n');

    const result = parseTemplate(raw, 'notes-qa');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.some(message => message.startsWith('llm_directives.temperature:'))).toBe(true);
    }
  });

  test('should require depth bands on lesson-chunk templates', () => {
    const raw = [
      'template_id: lesson-chunk',
      'template_version: 1.0.0',
      'llm_directives:',
      '  temperature: 0.5',
      'prompt: Hello'
    ].join('\n');

    const result = parseTemplate(raw, 'lesson-chunk');

    expect(result).toEqual({ success: false, errors: ['depth_bands: lesson-chunk templates need depth_bands'] });
  });

  test('should reject a template filed under the wrong id', () => {
    const raw = 'template_id: roadmap\ntemplate_version: 1.0.0\nllm_directives:\n  temperature: 0.5\nprompt: Hi';

    const result = parseTemplate(raw, 'notes-qa');

    expect(result).toEqual({ success: false, errors: ['template_id is roadmap, expected notes-qa'] });
  });
});

describe('renderTemplate', () => {
  test('should substitute variables literally and drop false blocks', () => {
    const template = 'Hello {{name}}{{#flag}}!{{/flag}} {{missing}}end';

    expect(renderTemplate(template, { name: 'A $& B' })).toBe('Hello A $& B end');
    expect(renderTemplate(template, { name: 'A', flag: 'true' })).toBe('Hello A! end');
  });

  test('should not expand placeholders that arrive inside values', () => {
    expect(renderTemplate('{{a}}', { a: '{{b}}', b: 'x' })).toBe('{{b}}');
  });
});

describe('PromptBuilder', () => {
  const builder = new PromptBuilder(loadTemplates(), { referenceMaxChars: 10 });

  describe('roadmapPrompt', () => {
    test('should carry the inputs and the outline rules', () => {
      const prompt = builder.roadmapPrompt('Thermodynamics', '  Laws of thermodynamics, entropy  ', 'Btech');

      expect(prompt).toContain('"Thermodynamics"');
      expect(prompt).toContain('Laws of thermodynamics, entropy');
      expect(prompt).toContain('Target audience: Btech level students');
      expect(prompt).toContain('No asterisks anywhere in the output.');
      expect(prompt).toContain('Sequence: <Sequence Type>');
    });

    test('should be a pure function of its inputs', () => {
      expect(builder.roadmapPrompt('A', 'B', 'C')).toBe(builder.roadmapPrompt('A', 'B', 'C'));
    });
  });

  describe('lessonChunkPrompt', () => {
    test('should list only the inherited ancestors', () => {
      const rootContext = extendContext(EMPTY_CONTEXT, { id: 'T1', title: 'Kinematics' });

      const prompt = builder.lessonChunkPrompt(
        'Physics',
        'Btech',
        { id: 'T1.2', description: 'Acceleration' },
        rootContext,
        2
      );

      expect(prompt).toContain('**Context from Parent Topics:**\n  - **T1:** Kinematics');
      expect(prompt).toContain('**Current Chunk:** T1.2: Acceleration');
      expect(prompt).not.toContain('T1.1');
    });

    test('should omit the parent section for root topics', () => {
      const prompt = builder.lessonChunkPrompt('Physics', 'Btech', { id: 'T1', description: 'Kinematics' }, EMPTY_CONTEXT, 1);

      expect(prompt).not.toContain('Context from Parent Topics');
    });

    test('should phrase the focus by depth band', () => {
      const node = { id: 'T1', description: 'Kinematics' };

      expect(builder.lessonChunkPrompt('P', 'B', node, EMPTY_CONTEXT, 1)).toContain('Provide a comprehensive overview');
      expect(builder.lessonChunkPrompt('P', 'B', node, EMPTY_CONTEXT, 2)).toContain('Elaborate on the key concepts');
      expect(builder.lessonChunkPrompt('P', 'B', node, EMPTY_CONTEXT, 3)).toContain('Dive deep into the intricacies');
      expect(builder.lessonChunkPrompt('P', 'B', node, EMPTY_CONTEXT, 7)).toBe(
        builder.lessonChunkPrompt('P', 'B', node, EMPTY_CONTEXT, 3)
      );
    });
  });

  describe('lectureNotesPrompt', () => {
    test('should include lesson plan context and highlighted topics', () => {
      const context = extendContext(EMPTY_CONTEXT, { id: 'T2', title: 'Dynamics' });

      const prompt = builder.lectureNotesPrompt(
        'Physics',
        'Mtech',
        'Objectives: explain inertia',
        'T2.1',
        ['Friction', 'Momentum'],
        context
      );

      expect(prompt).toContain('**Topic ID:** T2.1');
      expect(prompt).toContain('**Lesson Plan Context (Reference):**\nObjectives: explain inertia');
      expect(prompt).toContain('**Highlighted Topics (for numericals/examples):**\nFriction, Momentum');
      expect(prompt).toContain('  - **T2:** Dynamics');
      expect(prompt).not.toContain('Reference Material');
    });

    test('should fall back when inputs are empty', () => {
      const prompt = builder.lectureNotesPrompt('Physics', 'Mtech', '   ', 'T3', [], EMPTY_CONTEXT);

      expect(prompt).toContain('No lesson plan content is available for this topic.');
      expect(prompt).toContain('None specified');
    });

    test('should include a truncated reference excerpt', () => {
      const prompt = builder.lectureNotesPrompt('Physics', 'Mtech', 'plan', 'T3', [], EMPTY_CONTEXT, 'abcdefghijklmnop');

      expect(prompt).toContain('**Reference Material (excerpt):**\nabcdefghij\n[...truncated]');
    });
  });

  describe('questionPrompt', () => {
    test('should embed notes and question', () => {
      expect(builder.questionPrompt('Entropy always increases.', ' Why? ')).toBe(
        'Answer the following question based on the notes. If the notes do not cover it, say so.\n\n' +
        'Notes:\nEntropy always increases.\n\nQuestion: Why?'
      );
    });
  });
});

describe('context helpers', () => {
  test('should extend without touching the original context', () => {
    const parent = extendContext(EMPTY_CONTEXT, { id: 'T1', title: 'A' });
    const left = extendContext(parent, { id: 'T1.1', title: 'B' });
    const right = extendContext(parent, { id: 'T1.2', title: 'C' });

    expect(parent).toEqual([{ id: 'T1', title: 'A' }]);
    expect(left.map(entry => entry.id)).toEqual(['T1', 'T1.1']);
    expect(right.map(entry => entry.id)).toEqual(['T1', 'T1.2']);
    expect(Object.isFrozen(left)).toBe(true);
    expect(formatContext(left)).toBe('  - **T1:** A\n  - **T1.1:** B');
  });

  test('should truncate long text with a marker', () => {
    expect(truncateText('short', 10)).toBe('short');
    expect(truncateText('abc def ghi', 4)).toBe('abc\n[...truncated]');
  });
});
