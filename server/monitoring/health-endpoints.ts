/**
 * Health and Status Endpoints
 */

import { Request, Response } from 'express';
import { NotesPipeline } from '../../content-engine/fsm/src/pipeline.js';
import { JobStore, JobStatus } from '../jobs/job-store.js';

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  version: string;
  model: string;
  llmQueueSize: number;
  jobs: Record<JobStatus, number>;
}

export class HealthMonitor {
  private startTime = Date.now();

  constructor(private pipeline: NotesPipeline, private jobs: JobStore, private version = '1.0.0') {}

  check(): HealthStatus {
    const pipelineHealth = this.pipeline.getHealth();
    return {
      status: pipelineHealth.healthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      version: this.version,
      model: pipelineHealth.model,
      llmQueueSize: pipelineHealth.queue_size,
      jobs: this.jobs.counts()
    };
  }

  /**
   * GET /health
   */
  health = (_req: Request, res: Response): void => {
    const status = this.check();
    res.status(status.status === 'healthy' ? 200 : 503).json(status);
  };

  /**
   * GET /metrics
   */
  metrics = (_req: Request, res: Response): void => {
    res.json(this.pipeline.getMetrics());
  };
}
