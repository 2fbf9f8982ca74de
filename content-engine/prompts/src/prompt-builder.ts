import {
  PromptTemplateSet,
  PromptTemplateId,
  PromptContext,
  PromptNode,
  LLMDirectives,
  DepthBands
} from './types.js';
import { loadPromptTemplates, renderTemplate } from './template-loader.js';
import { resolveConfiguredPath } from '../../../config/paths.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Builder configuration
 */
export interface PromptBuilderConfig {
  referenceMaxChars: number;      // Reference material excerpt cap
  notesMaxChars: number;          // Notes passed to question answering
}

export const DEFAULT_PROMPT_BUILDER_CONFIG: PromptBuilderConfig = {
  referenceMaxChars: 6000,
  notesMaxChars: 60000
};

/**
 * Root context for a traversal
 */
export const EMPTY_CONTEXT: PromptContext = Object.freeze([]);

/**
 * New context with `node` appended; the input context is left as is
 */
export function extendContext(context: PromptContext, node: { id: string; title: string }): PromptContext {
  return Object.freeze([...context, Object.freeze({ id: node.id, title: node.title })]);
}

export function formatContext(context: PromptContext): string {
  return context.map(entry => `  - **${entry.id}:** ${entry.title}`).join('\n');
}

export function depthBand(bands: DepthBands, depth: number): string {
  if (depth >= 3) return bands.deep_dive;
  if (depth === 2) return bands.elaboration;
  return bands.foundational;
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars).trimEnd()}\n[...truncated]`;
}

/**
 * Stage prompts as pure functions of their inputs and the loaded templates.
 * Nothing here talks to the LLM.
 */
export class PromptBuilder {
  private config: PromptBuilderConfig;

  constructor(private templates: PromptTemplateSet, config: Partial<PromptBuilderConfig> = {}) {
    this.config = { ...DEFAULT_PROMPT_BUILDER_CONFIG, ...config };
  }

  /**
   * Temperature and token limit a template asks for
   */
  directives(id: PromptTemplateId): LLMDirectives {
    return { ...this.templates[id].directives };
  }

  templateInfo(): Array<{ id: PromptTemplateId; version: string; hash: string }> {
    return Object.values(this.templates).map(template => ({
      id: template.id,
      version: template.version,
      hash: template.hash
    }));
  }

  roadmapPrompt(subject: string, syllabusText: string, difficulty: string): string {
    return renderTemplate(this.templates['roadmap'].body, {
      subject,
      difficulty,
      syllabus: syllabusText.trim()
    });
  }

  lessonChunkPrompt(
    subject: string,
    difficulty: string,
    node: PromptNode,
    ancestorContext: PromptContext,
    depth: number
  ): string {
    const template = this.templates['lesson-chunk'];
    const bands = template.depthBands;

    return renderTemplate(template.body, {
      subject,
      difficulty,
      topic_id: node.id,
      topic_description: node.description,
      has_context: ancestorContext.length > 0 ? 'true' : '',
      ancestor_context: formatContext(ancestorContext),
      depth_focus: bands ? depthBand(bands, depth) : ''
    });
  }

  lectureNotesPrompt(
    subject: string,
    difficulty: string,
    lessonPlanContext: string,
    nodeId: string,
    highlightedTopics: readonly string[],
    ancestorContext: PromptContext,
    referenceMaterial?: string
  ): string {
    const reference = referenceMaterial?.trim() ?? '';

    return renderTemplate(this.templates['lecture-notes'].body, {
      subject,
      difficulty,
      topic_id: nodeId,
      lesson_plan_context: lessonPlanContext.trim() || 'No lesson plan content is available for this topic.',
      highlighted_topics: highlightedTopics.length > 0 ? highlightedTopics.join(', ') : 'None specified',
      has_context: ancestorContext.length > 0 ? 'true' : '',
      ancestor_context: formatContext(ancestorContext),
      has_reference: reference ? 'true' : '',
      reference_material: truncateText(reference, this.config.referenceMaxChars)
    });
  }

  questionPrompt(notesText: string, question: string): string {
    return renderTemplate(this.templates['notes-qa'].body, {
      notes: truncateText(notesText.trim(), this.config.notesMaxChars),
      question: question.trim()
    });
  }
}

/**
 * Builder over the templates in the configured directory. Throws when the
 * templates are missing or invalid, which is a startup error.
 */
export function createPromptBuilder(
  config: Partial<PromptBuilderConfig> = {},
  templatesDir: string = resolveConfiguredPath('TEMPLATES_DIR'),
  logger?: Logger
): PromptBuilder {
  const loaded = loadPromptTemplates(templatesDir, logger);
  if (!loaded.success) {
    const problems = loaded.errors.data.problems;
    throw new Error(
      `Prompt templates could not be loaded (${loaded.errors.code}): ${Array.isArray(problems) ? problems.join('; ') : templatesDir}`
    );
  }
  return new PromptBuilder(loaded.value, config);
}
