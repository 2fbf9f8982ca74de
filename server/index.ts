/**
 * Notes API Server
 */

import 'dotenv/config';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createNotesPipeline, NotesPipeline } from '../content-engine/fsm/src/pipeline.js';
import { createConsoleLogger, withScope, Logger } from '../content-engine/utils/logger.js';
import { errorMessage } from '../content-engine/utils/result.js';
import { validatePathConfiguration } from '../config/paths.js';
import { NotesApi, createPipelineRouter } from './api/pipeline.js';
import { JobStore } from './jobs/job-store.js';
import { HealthMonitor } from './monitoring/health-endpoints.js';
import { SecurityMiddleware } from './security/middleware.js';

export interface ServerComponents {
  pipeline: NotesPipeline;
  jobs: JobStore;
  security?: SecurityMiddleware;
  logger?: Logger;
}

export function createApp({ pipeline, jobs, security = new SecurityMiddleware(), logger }: ServerComponents): Express {
  const app = express();
  const api = new NotesApi(pipeline, jobs, withScope(logger, 'api'));
  const health = new HealthMonitor(pipeline, jobs);

  // Security middleware (applied globally)
  app.use(security.securityHeaders());
  app.use(security.createRateLimit());

  // CORS and body parsing
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // LLM-backed routes get a tighter budget
  const generationLimit = security.createRateLimit('generation');
  app.use(['/api/roadmap', '/api/lesson-plan', '/api/lecture-notes', '/api/notes/ask'], generationLimit);
  app.use('/api', createPipelineRouter(api));

  // Health and monitoring endpoints
  app.get('/health', health.health);
  app.get('/metrics', health.metrics);

  // Error handling
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger?.('error', 'Server error', { error: errorMessage(err) });
    res.status(500).json({
      success: false,
      error: 'Internal server error'
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found'
    });
  });

  return app;
}

function startServer(): void {
  const logger = createConsoleLogger(undefined, 'server');

  const paths = validatePathConfiguration();
  if (!paths.valid) {
    logger('error', 'Invalid path configuration', { errors: paths.errors });
    process.exit(1);
  }

  let pipeline: NotesPipeline;
  try {
    pipeline = createNotesPipeline({}, logger);
  } catch (error) {
    logger('error', 'Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }

  const app = createApp({
    pipeline,
    jobs: new JobStore({}, withScope(logger, 'jobs')),
    security: new SecurityMiddleware({}, withScope(logger, 'security')),
    logger
  });

  const port = Number(process.env.PORT) || 3001;
  app.listen(port, () => {
    logger('info', `Notes API server running on http://localhost:${port}`);
    logger('info', 'Health endpoints: /health, /metrics');
  });
}

if (require.main === module) {
  startServer();
}
