// Prompt Builder module exports

export {
  PromptBuilder,
  createPromptBuilder,
  extendContext,
  formatContext,
  depthBand,
  truncateText,
  EMPTY_CONTEXT,
  DEFAULT_PROMPT_BUILDER_CONFIG
} from './prompt-builder.js';
export type { PromptBuilderConfig } from './prompt-builder.js';
export { loadPromptTemplates, parseTemplate, renderTemplate, templateFileName } from './template-loader.js';
export { PROMPT_TEMPLATE_IDS } from './types.js';
export type {
  PromptTemplate,
  PromptTemplateId,
  PromptTemplateSet,
  PromptContext,
  ContextEntry,
  PromptNode,
  LLMDirectives,
  DepthBands
} from './types.js';
