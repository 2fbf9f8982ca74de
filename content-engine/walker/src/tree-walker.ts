import { TopicNode } from '../../outline/src/types.js';
import { indexTopicsById } from '../../outline/src/outline-parser.js';
import { PromptBuilder, EMPTY_CONTEXT, extendContext } from '../../prompts/src/prompt-builder.js';
import { PromptContext, PromptTemplateId } from '../../prompts/src/types.js';
import { GenerationCache } from '../../utils/cache-manager.js';
import { GenerationFailure, errorMessage, generateCorrelationId } from '../../utils/result.js';
import type { Logger } from '../../utils/logger.js';
import {
  StageRequest,
  WalkOptions,
  WalkReport,
  WalkStage,
  TextGateway,
  ProgressEvent,
  ProgressObserver
} from './types.js';

/**
 * Walker configuration
 */
export interface TreeWalkerConfig {
  siblingConcurrency: number;
  detailLevel: number;
}

export const DEFAULT_TREE_WALKER_CONFIG: TreeWalkerConfig = {
  siblingConcurrency: 1,
  detailLevel: 1
};

interface WalkState {
  stage: WalkStage;
  request: StageRequest;
  options: WalkOptions;
  correlationId: string;
  temperature: number;
  maxTokens?: number;
  concurrency: number;
  lessonPlanIndex: Map<string, TopicNode>;
  total: number;
  visited: number;
  failures: GenerationFailure[];
  skippedIds: string[];
  seenNodes: Set<TopicNode>;
  seenIds: Set<string>;
}

/**
 * Every node object reachable from the forest, each counted once
 */
function countDistinctNodes(forest: readonly TopicNode[]): number {
  const seen = new Set<TopicNode>();
  const stack = [...forest];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || seen.has(node)) continue;
    seen.add(node);
    stack.push(...node.children);
  }
  return seen.size;
}

export function clampDetailLevel(level: number): number {
  if (!Number.isFinite(level)) return 1;
  return Math.min(3, Math.max(1, Math.round(level)));
}

/**
 * Depth-first generator shared by the lesson-plan and lecture-notes stages.
 *
 * A node's prompt sees only its ancestors; failures leave the node's content
 * empty and never stop the traversal. The input forest is not modified.
 */
export class TreeWalker {
  private config: TreeWalkerConfig;

  constructor(
    private builder: PromptBuilder,
    private gateway: TextGateway,
    private cache: GenerationCache,
    config: Partial<TreeWalkerConfig> = {},
    private logger?: Logger
  ) {
    this.config = { ...DEFAULT_TREE_WALKER_CONFIG, ...config };
  }

  async walk(forest: readonly TopicNode[], request: StageRequest, options: WalkOptions): Promise<WalkReport> {
    const startTime = Date.now();
    const stage = request.stage;
    const directives = this.builder.directives(this.templateFor(stage));

    const state: WalkState = {
      stage,
      request,
      options,
      correlationId: options.correlationId ?? generateCorrelationId(stage),
      temperature: options.temperature ?? directives.temperature,
      maxTokens: options.maxTokens ?? directives.maxTokens,
      concurrency: Math.max(1, Math.floor(options.siblingConcurrency ?? this.config.siblingConcurrency)),
      lessonPlanIndex: request.stage === 'lecture-notes' ? indexTopicsById(request.lessonPlan ?? forest) : new Map(),
      total: countDistinctNodes(forest),
      visited: 0,
      failures: [],
      skippedIds: [],
      seenNodes: new Set(),
      seenIds: new Set()
    };

    this.logger?.('info', 'Tree walk started', {
      stage,
      correlationId: state.correlationId,
      total: state.total,
      temperature: state.temperature,
      maxTokens: state.maxTokens,
      concurrency: state.concurrency
    });

    const rootDepth = clampDetailLevel(options.detailLevel ?? this.config.detailLevel);
    const topics = await this.walkSiblings(forest, EMPTY_CONTEXT, rootDepth, state);

    if (state.total === 0) {
      this.notify(options.onProgress, { stage, progress: 1, visited: 0, total: 0 });
    }

    const durationMs = Date.now() - startTime;
    this.logger?.(state.failures.length > 0 ? 'warn' : 'info', 'Tree walk finished', {
      stage,
      correlationId: state.correlationId,
      visited: state.visited,
      total: state.total,
      failures: state.failures.length,
      skipped: state.skippedIds.length,
      durationMs
    });

    return {
      stage,
      topics,
      failures: state.failures,
      skippedIds: state.skippedIds,
      visited: state.visited,
      total: state.total,
      durationMs
    };
  }

  /**
   * Walk siblings with up to `concurrency` in flight; output keeps document order
   */
  private async walkSiblings(
    nodes: readonly TopicNode[],
    context: PromptContext,
    depth: number,
    state: WalkState
  ): Promise<TopicNode[]> {
    const results: Array<TopicNode | null> = new Array(nodes.length).fill(null);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < nodes.length) {
        const index = next++;
        results[index] = await this.walkNode(nodes[index], context, depth, state);
      }
    };

    const workers = Array.from({ length: Math.min(state.concurrency, nodes.length) }, () => worker());
    await Promise.all(workers);

    return results.filter((node): node is TopicNode => node !== null);
  }

  private async walkNode(
    node: TopicNode,
    inherited: PromptContext,
    depth: number,
    state: WalkState
  ): Promise<TopicNode | null> {
    if (state.seenNodes.has(node)) {
      this.logger?.('warn', 'Topic node reached twice, skipping', { stage: state.stage, nodeId: node.id });
      return null;
    }

    if (state.stage === 'lecture-notes' && state.seenIds.has(node.id)) {
      const skipped = this.markSubtreeSeen(node, state);
      state.skippedIds.push(node.id);
      this.logger?.('warn', 'Duplicate topic id skipped', { stage: state.stage, nodeId: node.id, skipped });
      this.advance(state, skipped, node.id);
      return null;
    }

    state.seenNodes.add(node);
    state.seenIds.add(node.id);

    // Children see this node; its own prompt does not
    const outgoing = extendContext(inherited, node);

    const prompt = this.buildPrompt(node, inherited, depth, state);

    const result = await this.cache.getOrGenerate(prompt, () =>
      this.gateway.generate(prompt, state.temperature, state.maxTokens, {
        correlationId: state.correlationId,
        operation: state.stage,
        nodeId: node.id
      })
    );

    let content = '';
    if (result.success) {
      content = this.postProcess(state.stage, result.value);
    } else {
      const failure: GenerationFailure = {
        code: result.errors.code,
        stage: state.stage,
        nodeId: node.id,
        cause: result.errors.cause
      };
      state.failures.push(failure);
      this.logger?.('warn', 'Generation failed for topic, continuing', { ...failure });
    }

    // Children in stored order
    const children = await this.walkSiblings(node.children, outgoing, depth + 1, state);

    this.advance(state, 1, node.id);

    return {
      id: node.id,
      title: node.title,
      description: node.description,
      content,
      children
    };
  }

  private buildPrompt(node: TopicNode, inherited: PromptContext, depth: number, state: WalkState): string {
    const { subject, difficulty } = state.options;
    const request = state.request;

    if (request.stage === 'lesson-plan') {
      return this.builder.lessonChunkPrompt(subject, difficulty, node, inherited, depth);
    }

    const lessonPlanEntry = state.lessonPlanIndex.get(node.id);
    return this.builder.lectureNotesPrompt(
      subject,
      difficulty,
      lessonPlanEntry?.content ?? '',
      node.id,
      request.highlightedTopics,
      inherited,
      request.referenceMaterial
    );
  }

  private postProcess(stage: WalkStage, text: string): string {
    const trimmed = text.trim();
    return stage === 'lesson-plan' ? trimmed.replace(/\*   /g, '- ') : trimmed;
  }

  /**
   * Mark a skipped subtree as seen, returning how many nodes it newly covers
   */
  private markSubtreeSeen(root: TopicNode, state: WalkState): number {
    let marked = 0;
    const stack = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || state.seenNodes.has(node)) continue;
      state.seenNodes.add(node);
      marked++;
      stack.push(...node.children);
    }
    return marked;
  }

  private advance(state: WalkState, count: number, nodeId: string): void {
    state.visited += count;
    this.notify(state.options.onProgress, {
      stage: state.stage,
      progress: state.total > 0 ? Math.min(1, state.visited / state.total) : 1,
      visited: state.visited,
      total: state.total,
      nodeId
    });
  }

  private notify(observer: ProgressObserver | undefined, event: ProgressEvent): void {
    if (!observer) return;
    try {
      observer(event);
    } catch (error) {
      this.logger?.('warn', 'Progress observer threw', { error: errorMessage(error) });
    }
  }

  private templateFor(stage: WalkStage): PromptTemplateId {
    return stage === 'lesson-plan' ? 'lesson-chunk' : 'lecture-notes';
  }
}
