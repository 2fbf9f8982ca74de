/**
 * Pipeline API Endpoints
 * Roadmap generation, asynchronous lesson-plan and lecture-notes jobs,
 * document downloads and question answering
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import contentDisposition from 'content-disposition';
import { NotesPipeline } from '../../content-engine/fsm/src/pipeline.js';
import { parseOutline } from '../../content-engine/outline/src/index.js';
import { validateSnapshot, DocxDocumentSink, MarkdownDocumentSink } from '../../content-engine/serializer/src/index.js';
import { pathValidation } from '../../config/paths.js';
import { JobStore, JobRecord } from '../jobs/job-store.js';
import type { LessonSnapshot } from '../../content-engine/serializer/src/index.js';
import type { Logger } from '../../content-engine/utils/logger.js';

// Request validation schemas
// Free text handed to the prompts (Beginner, Btech, PhD, ...)
const DifficultySchema = z.string().trim().min(1).max(100).default('Intermediate');

export const RoadmapRequestSchema = z.object({
  subject: z.string().trim().min(1).max(200),
  syllabusText: z.string().trim().min(1).max(200_000),
  difficulty: DifficultySchema
});

const WalkSettingsSchema = z.object({
  detailLevel: z.number().int().min(1).max(3).optional(),
  siblingConcurrency: z.number().int().min(1).max(8).optional()
});

export const LessonPlanRequestSchema = WalkSettingsSchema.extend({
  subject: z.string().trim().min(1).max(200),
  difficulty: DifficultySchema,
  roadmapText: z.string().trim().min(1).max(200_000)
});

export const LectureNotesRequestSchema = WalkSettingsSchema.extend({
  snapshot: z.unknown(),
  highlightedTopics: z.array(z.string().trim().min(1).max(200)).max(200).default([]),
  referenceMaterial: z.string().max(1_000_000).optional()
});

export const QuestionRequestSchema = z
  .object({
    question: z.string().trim().min(1).max(2000),
    notes: z.string().min(1).optional(),
    jobId: z.string().min(1).optional()
  })
  .refine(body => body.notes !== undefined || body.jobId !== undefined, {
    message: 'Provide notes or the jobId of a lecture-notes job'
  });

export const DocumentQuerySchema = z.object({
  format: z.enum(['docx', 'markdown']).default('docx')
});

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface DocumentResponse {
  status: 200;
  contentType: string;
  filename: string;
  disposition: string;         // Content-Disposition, ASCII fallback plus filename*
  content: Buffer | string;
}

const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

function invalidRequest(error: z.ZodError): ApiResponse {
  return {
    status: 400,
    body: { success: false, error: 'Invalid request format', details: error.errors }
  };
}

function notFound(jobId: string): ApiResponse {
  return { status: 404, body: { success: false, error: `Job ${jobId} not found` } };
}

/**
 * Endpoint logic without the HTTP plumbing. Every method takes the raw request
 * input and resolves to a status and JSON body.
 */
export class NotesApi {
  constructor(
    private pipeline: NotesPipeline,
    private jobs: JobStore,
    private logger?: Logger
  ) {}

  async generateRoadmap(body: unknown): Promise<ApiResponse> {
    const parsed = RoadmapRequestSchema.safeParse(body);
    if (!parsed.success) return invalidRequest(parsed.error);

    const result = await this.pipeline.generateRoadmap(parsed.data);
    if (!result.success) {
      return { status: 502, body: { success: false, error: result.errors } };
    }

    return {
      status: 200,
      body: {
        success: true,
        roadmapText: result.value.roadmapText,
        sequence: result.value.sequence,
        topics: result.value.topics,
        warnings: result.value.warnings,
        snapshot: result.value.snapshot
      }
    };
  }

  /**
   * Parses the (possibly edited) roadmap text and starts a lesson-plan job
   */
  startLessonPlan(body: unknown): ApiResponse {
    const parsed = LessonPlanRequestSchema.safeParse(body);
    if (!parsed.success) return invalidRequest(parsed.error);

    const { subject, difficulty, roadmapText, ...settings } = parsed.data;
    const outline = parseOutline(roadmapText, this.logger);
    if (outline.topics.length === 0) {
      return {
        status: 422,
        body: { success: false, error: 'The roadmap contains no topics', warnings: outline.warnings }
      };
    }

    const job = this.jobs.start('lesson-plan', onProgress =>
      this.pipeline.generateLessonPlan(
        { subject, difficulty, topics: outline.topics, sequence: outline.sequence },
        { ...settings, onProgress }
      )
    );

    return this.accepted(job, { warnings: outline.warnings });
  }

  /**
   * Starts a lecture-notes job from a lesson-plan snapshot the client may have
   * edited
   */
  startLectureNotes(body: unknown): ApiResponse {
    const parsed = LectureNotesRequestSchema.safeParse(body);
    if (!parsed.success) return invalidRequest(parsed.error);

    const { snapshot, highlightedTopics, referenceMaterial, ...settings } = parsed.data;
    const lessonPlan = validateSnapshot(snapshot);
    if (!lessonPlan.success) {
      return { status: 400, body: { success: false, error: lessonPlan.errors } };
    }
    if (lessonPlan.value.stage !== 'lesson-plan') {
      return {
        status: 422,
        body: { success: false, error: `Expected a lesson-plan snapshot, got ${lessonPlan.value.stage}` }
      };
    }

    const job = this.jobs.start('lecture-notes', onProgress =>
      this.pipeline.generateLectureNotes(lessonPlan.value, {
        ...settings,
        highlightedTopics,
        referenceMaterial,
        onProgress
      })
    );

    return this.accepted(job);
  }

  getJob(jobId: string): ApiResponse {
    const job = this.jobs.get(jobId);
    if (!job) return notFound(jobId);
    return { status: 200, body: { success: true, job } };
  }

  async getDocument(jobId: string, query: unknown): Promise<ApiResponse | DocumentResponse> {
    const parsed = DocumentQuerySchema.safeParse(query);
    if (!parsed.success) return invalidRequest(parsed.error);

    const job = this.jobs.get(jobId);
    if (!job) return notFound(jobId);
    if (job.status !== 'completed' || !job.snapshot) {
      return { status: 409, body: { success: false, error: `Job ${jobId} is ${job.status}` } };
    }

    const filename = pathValidation.sanitizeFilename(`${job.snapshot.subject}-${job.kind}`);

    if (parsed.data.format === 'markdown') {
      const rendered = await this.pipeline.renderDocument(job.snapshot, new MarkdownDocumentSink());
      if (!rendered.success) return { status: 500, body: { success: false, error: rendered.errors } };
      return this.document('text/markdown; charset=utf-8', `${filename}.md`, rendered.value);
    }

    const rendered = await this.pipeline.renderDocument(job.snapshot, new DocxDocumentSink({ title: job.snapshot.subject }));
    if (!rendered.success) return { status: 500, body: { success: false, error: rendered.errors } };
    return this.document(DOCX_CONTENT_TYPE, `${filename}.docx`, rendered.value);
  }

  async askQuestion(body: unknown): Promise<ApiResponse> {
    const parsed = QuestionRequestSchema.safeParse(body);
    if (!parsed.success) return invalidRequest(parsed.error);

    const { question, notes, jobId } = parsed.data;
    let source: string | LessonSnapshot;
    if (notes !== undefined) {
      source = notes;
    } else {
      const job = this.jobs.get(jobId ?? '');
      if (!job) return notFound(jobId ?? '');
      if (job.kind !== 'lecture-notes' || !job.snapshot) {
        return { status: 409, body: { success: false, error: `Job ${job.jobId} has no lecture notes` } };
      }
      source = job.snapshot;
    }

    const answer = await this.pipeline.askQuestion(source, question);
    if (!answer.success) {
      const status = answer.errors.code === 'E-PIPELINE-INVALID-INPUT' ? 400 : 502;
      return { status, body: { success: false, error: answer.errors } };
    }
    return { status: 200, body: { success: true, answer: answer.value } };
  }

  private document(contentType: string, filename: string, content: Buffer | string): DocumentResponse {
    return { status: 200, contentType, filename, disposition: contentDisposition(filename), content };
  }

  private accepted(job: JobRecord, extra: Record<string, unknown> = {}): ApiResponse {
    return {
      status: 202,
      body: {
        success: true,
        jobId: job.jobId,
        message: `${job.kind} job started`,
        statusUrl: `/api/jobs/${job.jobId}`,
        ...extra
      }
    };
  }
}

function isDocument(response: ApiResponse | DocumentResponse): response is DocumentResponse {
  return 'content' in response;
}

/**
 * Express routes over a NotesApi
 */
export function createPipelineRouter(api: NotesApi): Router {
  const router = Router();

  const send = (res: Response, response: ApiResponse) => {
    res.status(response.status).json(response.body);
  };

  router.post('/roadmap', async (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, await api.generateRoadmap(req.body));
    } catch (error) {
      next(error);
    }
  });

  router.post('/lesson-plan', (req: Request, res: Response) => {
    send(res, api.startLessonPlan(req.body));
  });

  router.post('/lecture-notes', (req: Request, res: Response) => {
    send(res, api.startLectureNotes(req.body));
  });

  router.get('/jobs/:jobId', (req: Request, res: Response) => {
    send(res, api.getJob(req.params.jobId));
  });

  router.get('/jobs/:jobId/document', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const response = await api.getDocument(req.params.jobId, req.query);
      if (!isDocument(response)) {
        send(res, response);
        return;
      }
      res.setHeader('Content-Type', response.contentType);
      res.setHeader('Content-Disposition', response.disposition);
      res.status(response.status).send(response.content);
    } catch (error) {
      next(error);
    }
  });

  router.post('/notes/ask', async (req: Request, res: Response, next: NextFunction) => {
    try {
      send(res, await api.askQuestion(req.body));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
