import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { createHash } from 'crypto';
import { z } from 'zod';
import { PromptTemplate, PromptTemplateId, PromptTemplateSet, PROMPT_TEMPLATE_IDS } from './types.js';
import { Result, Ok, Err, ModuleError, errorMessage, generateCorrelationId } from '../../utils/result.js';
import type { Logger } from '../../utils/logger.js';

const TemplateFileSchema = z
  .object({
    template_id: z.enum(['roadmap', 'lesson-chunk', 'lecture-notes', 'notes-qa']),
    template_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    description: z.string().optional(),
    llm_directives: z.object({
      temperature: z.number().min(0).max(1),
      max_output_tokens: z.number().int().positive().optional()
    }),
    depth_bands: z
      .object({
        foundational: z.string().min(1),
        elaboration: z.string().min(1),
        deep_dive: z.string().min(1)
      })
      .optional(),
    prompt: z.string().min(1)
  })
  .superRefine((file, ctx) => {
    if (file.template_id === 'lesson-chunk' && !file.depth_bands) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['depth_bands'], message: 'lesson-chunk templates need depth_bands' });
    }
  });

export function templateFileName(id: PromptTemplateId): string {
  return `${id}.v1.yaml`;
}

/**
 * Parse and validate one template file's text
 */
export function parseTemplate(raw: string, expectedId: PromptTemplateId): Result<PromptTemplate, string[]> {
  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    return Err([`Invalid YAML: ${errorMessage(error)}`]);
  }

  const parsed = TemplateFileSchema.safeParse(document);
  if (!parsed.success) {
    return Err(parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }

  const file = parsed.data;
  if (file.template_id !== expectedId) {
    return Err([`template_id is ${file.template_id}, expected ${expectedId}`]);
  }

  return Ok({
    id: file.template_id,
    version: file.template_version,
    hash: createHash('sha256').update(raw).digest('hex'),
    directives: {
      temperature: file.llm_directives.temperature,
      maxTokens: file.llm_directives.max_output_tokens
    },
    body: file.prompt,
    depthBands: file.depth_bands
  });
}

/**
 * Load every template the builder needs from a directory
 */
export function loadPromptTemplates(templatesDir: string, logger?: Logger): Result<PromptTemplateSet, ModuleError> {
  const correlationId = generateCorrelationId('tpl');
  const loaded: Partial<Record<PromptTemplateId, PromptTemplate>> = {};
  const problems: string[] = [];

  for (const id of PROMPT_TEMPLATE_IDS) {
    const filePath = path.resolve(templatesDir, templateFileName(id));
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      problems.push(`${filePath}: ${errorMessage(error)}`);
      continue;
    }

    const result = parseTemplate(raw, id);
    if (result.success) {
      loaded[id] = result.value;
    } else {
      problems.push(...result.errors.map(message => `${filePath}: ${message}`));
    }
  }

  const roadmap = loaded['roadmap'];
  const lessonChunk = loaded['lesson-chunk'];
  const lectureNotes = loaded['lecture-notes'];
  const notesQa = loaded['notes-qa'];

  if (problems.length > 0 || !roadmap || !lessonChunk || !lectureNotes || !notesQa) {
    logger?.('error', 'Failed to load prompt templates', { templatesDir, problems });
    return Err({
      code: 'E-PROMPTS-TEMPLATE-INVALID',
      module: 'PROMPTS',
      data: { templatesDir, problems },
      correlationId
    });
  }

  logger?.('debug', 'Prompt templates loaded', {
    templatesDir,
    templates: PROMPT_TEMPLATE_IDS.map(id => `${id}@${loaded[id]?.version}`)
  });

  return Ok({
    'roadmap': roadmap,
    'lesson-chunk': lessonChunk,
    'lecture-notes': lectureNotes,
    'notes-qa': notesQa
  });
}

/**
 * Render `{{#flag}}...{{/flag}}` blocks, then `{{name}}` variables.
 * Missing variables render as empty text.
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  let rendered = template.replace(
    /\{\{#([a-zA-Z_][a-zA-Z0-9_]*)\}\}([\s\S]*?)\{\{\/\1\}\}/g,
    (_match: string, condition: string, content: string) => (vars[condition] ? content : '')
  );

  rendered = rendered.replace(
    /\{\{\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*\}\}/g,
    (_match: string, key: string) => vars[key] ?? ''
  );

  // Collapse the blank runs left behind by dropped blocks
  return rendered.replace(/\n{3,}/g, '\n\n').trim();
}
