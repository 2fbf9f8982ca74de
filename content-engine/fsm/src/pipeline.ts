import { TopicNode, ParseWarning, SequenceType, parseOutline, countTopics } from '../../outline/src/index.js';
import { PromptBuilder, createPromptBuilder } from '../../prompts/src/index.js';
import { TreeWalker, ProgressObserver, WalkReport } from '../../walker/src/index.js';
import {
  toSnapshot,
  snapshotTopics,
  renderDocument as renderSnapshot,
  MarkdownDocumentSink,
  DocumentSink,
  LessonSnapshot,
  RenderOptions,
  SnapshotTopic
} from '../../serializer/src/index.js';
import { GenerationCache, GenerationCacheMetrics } from '../../utils/cache-manager.js';
import { LLMClient, LLMClientMetrics, createLLMClient } from '../../utils/llm-client.js';
import { RequestLimiterMetrics } from '../../utils/rate-limiter.js';
import {
  Result,
  Ok,
  Err,
  ModuleError,
  GenerationFailure,
  errorMessage,
  generateCorrelationId
} from '../../utils/result.js';
import { Logger, withScope } from '../../utils/logger.js';

/**
 * Pipeline execution states
 */
export type PipelineState =
  | 'INITIALIZED'
  | 'ROADMAP'
  | 'LESSON_PLAN'
  | 'LECTURE_NOTES'
  | 'RENDERING'
  | 'COMPLETED'
  | 'FAILED';

export interface NotesPipelineConfig {
  siblingConcurrency: number;
  detailLevel: number;          // 1 Low, 2 Medium, 3 High
}

export const DEFAULT_NOTES_PIPELINE_CONFIG: NotesPipelineConfig = {
  siblingConcurrency: 1,
  detailLevel: 1
};

export interface RoadmapRequest {
  subject: string;
  syllabusText: string;
  difficulty: string;
}

export interface RoadmapResult {
  roadmapText: string;
  topics: TopicNode[];
  warnings: ParseWarning[];
  sequence?: SequenceType;
  snapshot: LessonSnapshot;
  correlationId: string;
}

export interface LessonPlanRequest {
  subject: string;
  difficulty: string;
  topics: readonly TopicNode[];
  sequence?: SequenceType;
}

export interface StageOptions {
  detailLevel?: number;
  siblingConcurrency?: number;
  temperature?: number;
  maxTokens?: number;
  onProgress?: ProgressObserver;
}

export interface LectureNotesOptions extends StageOptions {
  highlightedTopics?: readonly string[];
  referenceMaterial?: string;
}

export interface StageResult {
  snapshot: LessonSnapshot;
  failures: GenerationFailure[];
  skippedIds: string[];
  durationMs: number;
  correlationId: string;
}

/**
 * New content per topic id, or a hook that returns replacement content
 * (undefined keeps the current content)
 */
export type TopicEdits = Readonly<Record<string, string>> | ((topic: SnapshotTopic) => string | undefined);

export interface EditResult {
  snapshot: LessonSnapshot;
  appliedIds: string[];
  unknownIds: string[];
}

export interface PipelineMetrics {
  state: PipelineState;
  cache: GenerationCacheMetrics;
  llm: { gateway: LLMClientMetrics; rate_limiter: RequestLimiterMetrics };
}

/**
 * FSM-based notes orchestrator. One instance is one session: it owns the
 * generation cache, so a lecture-notes run after a lesson plan reuses any
 * prompt already answered.
 */
export class NotesPipeline {
  private config: NotesPipelineConfig;
  private walker: TreeWalker;
  private logger?: Logger;
  private state: PipelineState = 'INITIALIZED';

  constructor(
    private builder: PromptBuilder,
    private gateway: LLMClient,
    private cache: GenerationCache = new GenerationCache(),
    config: Partial<NotesPipelineConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_NOTES_PIPELINE_CONFIG, ...config };
    this.logger = withScope(logger, 'pipeline');
    this.walker = new TreeWalker(
      builder,
      gateway,
      cache,
      { siblingConcurrency: this.config.siblingConcurrency, detailLevel: this.config.detailLevel },
      withScope(logger, 'walker')
    );
  }

  /**
   * Stage 0: ask for an outline and parse it
   */
  async generateRoadmap(request: RoadmapRequest): Promise<Result<RoadmapResult, ModuleError>> {
    const correlationId = generateCorrelationId('roadmap');

    if (!request.syllabusText.trim()) {
      return this.fail('E-PIPELINE-INVALID-INPUT', correlationId, { reason: 'Syllabus text is empty' });
    }

    this.setState('ROADMAP', correlationId);

    try {
      const prompt = this.builder.roadmapPrompt(request.subject, request.syllabusText, request.difficulty);
      const directives = this.builder.directives('roadmap');
      const generated = await this.gateway.generate(prompt, directives.temperature, directives.maxTokens, {
        correlationId,
        operation: 'roadmap'
      });

      if (!generated.success) {
        return this.fail('E-PIPELINE-ROADMAP-FAILED', correlationId, {
          code: generated.errors.code,
          cause: generated.errors.cause
        });
      }

      const roadmapText = generated.value.trim();
      const parsed = parseOutline(roadmapText, withScope(this.logger, 'outline'));

      if (parsed.topics.length === 0) {
        return this.fail('E-PIPELINE-EMPTY-ROADMAP', correlationId, {
          warnings: parsed.warnings.length,
          reason: 'The generated roadmap contains no recognisable topics'
        });
      }

      this.logger?.('info', 'Roadmap generated', {
        correlationId,
        topics: countTopics(parsed.topics),
        warnings: parsed.warnings.length,
        sequence: parsed.sequence
      });

      return Ok({
        roadmapText,
        topics: parsed.topics,
        warnings: parsed.warnings,
        sequence: parsed.sequence,
        snapshot: toSnapshot(parsed.topics, {
          stage: 'roadmap',
          subject: request.subject,
          difficulty: request.difficulty,
          sequence: parsed.sequence
        }),
        correlationId
      });
    } catch (error) {
      return this.fail('E-PIPELINE-UNEXPECTED', correlationId, { error: errorMessage(error) });
    }
  }

  /**
   * Stage 1: one lesson chunk per roadmap node
   */
  async generateLessonPlan(
    request: LessonPlanRequest,
    options: StageOptions = {}
  ): Promise<Result<StageResult, ModuleError>> {
    const correlationId = generateCorrelationId('plan');

    if (request.topics.length === 0) {
      return this.fail('E-PIPELINE-EMPTY-ROADMAP', correlationId, { reason: 'The roadmap has no topics' });
    }

    this.setState('LESSON_PLAN', correlationId);

    try {
      const report = await this.walker.walk(request.topics, { stage: 'lesson-plan' }, {
        ...options,
        subject: request.subject,
        difficulty: request.difficulty,
        correlationId
      });

      return Ok(this.stageResult(report, correlationId, {
        subject: request.subject,
        difficulty: request.difficulty,
        sequence: request.sequence
      }));
    } catch (error) {
      return this.fail('E-PIPELINE-UNEXPECTED', correlationId, { error: errorMessage(error) });
    }
  }

  /**
   * User-edit hook: replace node content by id. The input snapshot is not
   * modified.
   */
  applyEdits(snapshot: LessonSnapshot, edits: TopicEdits): EditResult {
    const applied = new Set<string>();
    const editFor = typeof edits === 'function'
      ? edits
      : (topic: SnapshotTopic) => (Object.prototype.hasOwnProperty.call(edits, topic.id) ? edits[topic.id] : undefined);

    const edit = (topic: SnapshotTopic): SnapshotTopic => {
      const replacement = editFor(topic);
      if (replacement !== undefined) {
        applied.add(topic.id);
      }
      const content = replacement ?? topic.content;
      return {
        id: topic.id,
        title: topic.title,
        description: topic.description,
        ...(content !== undefined ? { content } : {}),
        subtopics: topic.subtopics.map(edit)
      };
    };

    const edited: LessonSnapshot = { ...snapshot, topics: snapshot.topics.map(edit) };
    const unknownIds = typeof edits === 'function' ? [] : Object.keys(edits).filter(id => !applied.has(id));

    if (unknownIds.length > 0) {
      this.logger?.('warn', 'Edits reference unknown topic ids', { unknownIds });
    }
    this.logger?.('info', 'Edits applied', { stage: snapshot.stage, applied: applied.size });

    return { snapshot: edited, appliedIds: [...applied], unknownIds };
  }

  /**
   * Stage 2: one lecture-notes chunk per lesson-plan node, prompted with that
   * node's lesson-plan content
   */
  async generateLectureNotes(
    lessonPlan: LessonSnapshot | undefined,
    options: LectureNotesOptions = {}
  ): Promise<Result<StageResult, ModuleError>> {
    const correlationId = generateCorrelationId('notes');

    if (!lessonPlan || lessonPlan.topics.length === 0) {
      return this.fail('E-PIPELINE-NO-LESSON-PLAN', correlationId, {
        reason: 'Generate a lesson plan before lecture notes'
      });
    }
    if (lessonPlan.stage !== 'lesson-plan') {
      return this.fail('E-PIPELINE-NO-LESSON-PLAN', correlationId, {
        reason: `Expected a lesson-plan snapshot, got ${lessonPlan.stage}`
      });
    }

    this.setState('LECTURE_NOTES', correlationId);

    try {
      const { highlightedTopics = [], referenceMaterial, ...walkOptions } = options;
      const forest = snapshotTopics(lessonPlan);

      const report = await this.walker.walk(
        forest,
        { stage: 'lecture-notes', lessonPlan: forest, highlightedTopics, referenceMaterial },
        { ...walkOptions, subject: lessonPlan.subject, difficulty: lessonPlan.difficulty, correlationId }
      );

      return Ok(this.stageResult(report, correlationId, {
        subject: lessonPlan.subject,
        difficulty: lessonPlan.difficulty,
        sequence: lessonPlan.sequence
      }));
    } catch (error) {
      return this.fail('E-PIPELINE-UNEXPECTED', correlationId, { error: errorMessage(error) });
    }
  }

  async renderDocument<T>(
    snapshot: LessonSnapshot,
    sink: DocumentSink<T>,
    options: Partial<RenderOptions> = {}
  ): Promise<Result<T, ModuleError>> {
    const correlationId = generateCorrelationId('render');
    this.setState('RENDERING', correlationId);

    const result = await renderSnapshot(snapshot, sink, options, withScope(this.logger, 'serializer'));
    this.setState(result.success ? 'COMPLETED' : 'FAILED', correlationId);
    return result;
  }

  /**
   * Answer a question from generated notes (raw text or a snapshot)
   */
  async askQuestion(notes: string | LessonSnapshot, question: string): Promise<Result<string, ModuleError>> {
    const correlationId = generateCorrelationId('qa');

    if (!question.trim()) {
      return Err(this.error('E-PIPELINE-INVALID-INPUT', correlationId, { reason: 'Question is empty' }));
    }

    let notesText: string;
    if (typeof notes === 'string') {
      notesText = notes;
    } else {
      const rendered = await renderSnapshot(notes, new MarkdownDocumentSink());
      if (!rendered.success) return rendered;
      notesText = rendered.value;
    }

    if (!notesText.trim()) {
      return Err(this.error('E-PIPELINE-INVALID-INPUT', correlationId, { reason: 'Notes are empty' }));
    }

    const directives = this.builder.directives('notes-qa');
    const answer = await this.gateway.generate(
      this.builder.questionPrompt(notesText, question),
      directives.temperature,
      directives.maxTokens,
      { correlationId, operation: 'question' }
    );

    if (!answer.success) {
      this.logger?.('warn', 'Question could not be answered', { correlationId, code: answer.errors.code });
      return Err(this.error('E-PIPELINE-QUESTION-FAILED', correlationId, {
        code: answer.errors.code,
        cause: answer.errors.cause
      }));
    }

    return Ok(answer.value.trim());
  }

  getState(): PipelineState {
    return this.state;
  }

  getMetrics(): PipelineMetrics {
    return {
      state: this.state,
      cache: this.cache.getMetrics(),
      llm: this.gateway.getMetrics()
    };
  }

  getHealth(): { healthy: boolean; state: PipelineState; model: string; queue_size: number } {
    const llm = this.gateway.getHealth();
    return {
      healthy: llm.healthy,
      state: this.state,
      model: llm.model,
      queue_size: llm.queue_size
    };
  }

  private stageResult(
    report: WalkReport,
    correlationId: string,
    meta: { subject: string; difficulty: string; sequence?: SequenceType }
  ): StageResult {
    if (report.failures.length > 0) {
      this.logger?.('warn', 'Stage finished with failed topics', {
        correlationId,
        stage: report.stage,
        failed: report.failures.map(failure => failure.nodeId)
      });
    }

    return {
      snapshot: toSnapshot(report.topics, { stage: report.stage, ...meta }),
      failures: report.failures,
      skippedIds: report.skippedIds,
      durationMs: report.durationMs,
      correlationId
    };
  }

  private error(code: string, correlationId: string, data: Record<string, unknown>): ModuleError {
    return { code, module: 'PIPELINE', data, correlationId };
  }

  private fail(code: string, correlationId: string, data: Record<string, unknown>): Result<never, ModuleError> {
    this.setState('FAILED', correlationId);
    this.logger?.('error', 'Pipeline stage failed', { code, correlationId, ...data });
    return Err(this.error(code, correlationId, data));
  }

  private setState(newState: PipelineState, correlationId: string): void {
    this.logger?.('info', `Pipeline state: ${this.state} → ${newState}`, { correlationId });
    this.state = newState;
  }
}

/**
 * Pipeline over the shipped templates and the OpenAI gateway from environment
 * settings
 */
export function createNotesPipeline(
  config: Partial<NotesPipelineConfig> = {},
  logger?: Logger,
  env: NodeJS.ProcessEnv = process.env
): NotesPipeline {
  return new NotesPipeline(
    createPromptBuilder({}, undefined, withScope(logger, 'prompts')),
    createLLMClient(withScope(logger, 'llm'), env),
    new GenerationCache({}, withScope(logger, 'cache')),
    config,
    logger
  );
}
