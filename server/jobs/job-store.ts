/**
 * In-memory tracking of asynchronous generation jobs
 */

import type { LessonSnapshot } from '../../content-engine/serializer/src/types.js';
import type { StageResult } from '../../content-engine/fsm/src/pipeline.js';
import type { ProgressObserver } from '../../content-engine/walker/src/types.js';
import { GenerationFailure, ModuleError, Result, errorMessage } from '../../content-engine/utils/result.js';
import type { Logger } from '../../content-engine/utils/logger.js';

export type JobKind = 'lesson-plan' | 'lecture-notes';
export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface JobRecord {
  jobId: string;
  kind: JobKind;
  status: JobStatus;
  progress: number;            // 0-100
  createdAt: string;
  updatedAt: string;
  snapshot?: LessonSnapshot;
  failures: GenerationFailure[];
  skippedIds: string[];
  error?: ModuleError;
}

export type JobTask = (onProgress: ProgressObserver) => Promise<Result<StageResult, ModuleError>>;

export interface JobStoreConfig {
  maxJobs: number;             // Finished jobs beyond this are dropped, oldest first
}

export const DEFAULT_JOB_STORE_CONFIG: JobStoreConfig = {
  maxJobs: 100
};

export class JobStore {
  private config: JobStoreConfig;
  private jobs = new Map<string, JobRecord>();
  private running = new Map<string, Promise<void>>();

  constructor(config: Partial<JobStoreConfig> = {}, private logger?: Logger) {
    this.config = { ...DEFAULT_JOB_STORE_CONFIG, ...config };
  }

  /**
   * Register a job and start its task. Returns the job as first recorded.
   */
  start(kind: JobKind, task: JobTask): JobRecord {
    const now = new Date().toISOString();
    const record: JobRecord = {
      jobId: this.generateJobId(),
      kind,
      status: 'queued',
      progress: 0,
      createdAt: now,
      updatedAt: now,
      failures: [],
      skippedIds: []
    };
    this.jobs.set(record.jobId, record);
    this.evictFinished();

    const initial = { ...record };
    this.running.set(record.jobId, this.run(record.jobId, task));
    return initial;
  }

  get(jobId: string): JobRecord | undefined {
    const record = this.jobs.get(jobId);
    return record ? { ...record } : undefined;
  }

  /**
   * Resolves once the job has finished, whatever its outcome
   */
  async waitFor(jobId: string): Promise<JobRecord | undefined> {
    const pending = this.running.get(jobId);
    if (pending) {
      await pending;
    }
    return this.get(jobId);
  }

  counts(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = { queued: 0, processing: 0, completed: 0, failed: 0 };
    for (const record of this.jobs.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  private async run(jobId: string, task: JobTask): Promise<void> {
    this.update(jobId, { status: 'processing' });
    this.logger?.('info', 'Job started', { jobId });

    try {
      const result = await task(event => {
        this.update(jobId, { progress: Math.round(event.progress * 100) });
      });

      if (result.success) {
        this.update(jobId, {
          status: 'completed',
          progress: 100,
          snapshot: result.value.snapshot,
          failures: result.value.failures,
          skippedIds: result.value.skippedIds
        });
        this.logger?.('info', 'Job completed', { jobId, failures: result.value.failures.length });
      } else {
        this.update(jobId, { status: 'failed', error: result.errors });
        this.logger?.('warn', 'Job failed', { jobId, code: result.errors.code });
      }
    } catch (error) {
      this.update(jobId, {
        status: 'failed',
        error: {
          code: 'E-SERVER-JOB-CRASHED',
          module: 'PIPELINE',
          data: { error: errorMessage(error) },
          correlationId: jobId
        }
      });
      this.logger?.('error', 'Job crashed', { jobId, error: errorMessage(error) });
    } finally {
      this.running.delete(jobId);
    }
  }

  private update(jobId: string, updates: Partial<JobRecord>): void {
    const existing = this.jobs.get(jobId);
    if (existing) {
      this.jobs.set(jobId, { ...existing, ...updates, updatedAt: new Date().toISOString() });
    }
  }

  private evictFinished(): void {
    for (const [jobId, record] of this.jobs) {
      if (this.jobs.size <= this.config.maxJobs) return;
      if (record.status === 'completed' || record.status === 'failed') {
        this.jobs.delete(jobId);
      }
    }
  }

  private generateJobId(): string {
    return `job-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
  }
}
