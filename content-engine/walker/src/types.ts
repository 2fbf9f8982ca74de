// Core types for the Tree Walker module

import type { TopicNode } from '../../outline/src/types.js';
import type { GenerationFailure, Result } from '../../utils/result.js';
import type { LLMCallContext } from '../../utils/llm-client.js';

export type WalkStage = 'lesson-plan' | 'lecture-notes';

/**
 * What a stage needs beyond the tree itself
 */
export type StageRequest =
  | { stage: 'lesson-plan' }
  | {
      stage: 'lecture-notes';
      lessonPlan?: readonly TopicNode[];    // Defaults to the walked forest
      highlightedTopics: readonly string[];
      referenceMaterial?: string;
    };

export interface ProgressEvent {
  stage: WalkStage;
  progress: number;           // visited / total, 1 for an empty forest
  visited: number;
  total: number;
  nodeId?: string;
}

export type ProgressObserver = (event: ProgressEvent) => void;

export interface WalkOptions {
  subject: string;
  difficulty: string;
  temperature?: number;       // Overrides the template directive
  maxTokens?: number;         // Overrides the template directive
  detailLevel?: number;       // Depth band of root nodes (1-3)
  siblingConcurrency?: number;
  correlationId?: string;
  onProgress?: ProgressObserver;
}

export interface WalkReport {
  stage: WalkStage;
  topics: TopicNode[];
  failures: GenerationFailure[];
  skippedIds: string[];
  visited: number;
  total: number;
  durationMs: number;
}

/**
 * The slice of the LLM gateway the walker calls
 */
export interface TextGateway {
  generate(
    prompt: string,
    temperature: number,
    maxTokens?: number,
    context?: LLMCallContext
  ): Promise<Result<string, GenerationFailure>>;
}
