// Core types for the Prompt Builder module

export type PromptTemplateId = 'roadmap' | 'lesson-chunk' | 'lecture-notes' | 'notes-qa';

export const PROMPT_TEMPLATE_IDS: readonly PromptTemplateId[] = ['roadmap', 'lesson-chunk', 'lecture-notes', 'notes-qa'];

export interface DepthBands {
  foundational: string;
  elaboration: string;
  deep_dive: string;
}

export interface LLMDirectives {
  temperature: number;
  maxTokens?: number;
}

export interface PromptTemplate {
  id: PromptTemplateId;
  version: string;
  hash: string;               // SHA256 of the raw template file
  directives: LLMDirectives;
  body: string;
  depthBands?: DepthBands;
}

export type PromptTemplateSet = Readonly<Record<PromptTemplateId, PromptTemplate>>;

/**
 * One ancestor of the node being prompted for
 */
export type ContextEntry = Readonly<{ id: string; title: string }>;

/**
 * Ancestors from the root down to the parent. Never mutated once built;
 * extending it yields a new frozen array.
 */
export type PromptContext = readonly ContextEntry[];

export interface PromptNode {
  id: string;
  description: string;
}
