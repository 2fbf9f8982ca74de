/**
 * Request Limiter for LLM API calls
 *
 * Bounds how many requests run at once and how often a new one may start.
 * Callers wait in a FIFO queue instead of being rejected; a request that
 * waits longer than the queue timeout fails with a QueueTimeoutError.
 */

import { EventEmitter } from 'events';
import type { Logger } from './logger.js';

/**
 * Limiter configuration
 */
export interface RequestLimiterConfig {
  maxConcurrentRequests: number;    // Max parallel requests
  requestsPerMinute: number;        // 0 disables start spacing
  queueTimeout: number;             // Max time to wait in queue (ms), 0 waits forever
}

/**
 * Defaults sized for a single OpenAI key
 */
export const DEFAULT_REQUEST_LIMITER_CONFIG: RequestLimiterConfig = {
  maxConcurrentRequests: 4,
  requestsPerMinute: 60,
  queueTimeout: 180000 // 3 minutes to allow long generations to queue
};

/**
 * Request context for tracking
 */
export interface RequestContext {
  correlationId: string;
  operation: string;
  metadata?: Record<string, unknown>;
}

export interface RequestLimiterMetrics {
  requests_total: number;
  requests_successful: number;
  requests_failed: number;
  requests_timed_out: number;
  queue_size_current: number;
  active_requests: number;
  queue_time_avg_ms: number;
}

export class QueueTimeoutError extends Error {
  readonly code = 'E-LLM-QUEUE-TIMEOUT';

  constructor(readonly context: RequestContext, readonly waitedMs: number) {
    super(`Request ${context.operation} waited ${waitedMs}ms in queue and timed out`);
    this.name = 'QueueTimeoutError';
  }
}

interface QueueItem {
  context: RequestContext;
  start: () => void;
  queuedAt: number;
  timeoutTimer?: NodeJS.Timeout;
}

export class RequestLimiter extends EventEmitter {
  private config: RequestLimiterConfig;
  private queue: QueueItem[] = [];
  private active = 0;
  private lastStartAt = 0;
  private spacingTimer?: NodeJS.Timeout;

  private metrics: RequestLimiterMetrics = {
    requests_total: 0,
    requests_successful: 0,
    requests_failed: 0,
    requests_timed_out: 0,
    queue_size_current: 0,
    active_requests: 0,
    queue_time_avg_ms: 0
  };
  private queueTimes: number[] = [];

  constructor(config: Partial<RequestLimiterConfig> = {}, private logger?: Logger) {
    super();
    this.config = { ...DEFAULT_REQUEST_LIMITER_CONFIG, ...config };
  }

  /**
   * Run fn once a slot is free and the start spacing allows it
   */
  schedule<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
    this.metrics.requests_total++;

    return new Promise<T>((resolve, reject) => {
      const item: QueueItem = {
        context,
        queuedAt: Date.now(),
        start: () => {
          this.run(item, fn).then(resolve, reject);
        }
      };

      if (this.config.queueTimeout > 0) {
        item.timeoutTimer = setTimeout(() => {
          const index = this.queue.indexOf(item);
          if (index === -1) return;
          this.queue.splice(index, 1);
          this.metrics.requests_timed_out++;
          const waited = Date.now() - item.queuedAt;
          this.logger?.('warn', 'Request timed out in queue', {
            correlationId: context.correlationId,
            operation: context.operation,
            waited
          });
          this.emit('timeout', { context, waited });
          reject(new QueueTimeoutError(context, waited));
        }, this.config.queueTimeout);
      }

      this.queue.push(item);
      this.emit('queued', { context, queueSize: this.queue.length });
      this.pump();
    });
  }

  private async run<T>(item: QueueItem, fn: () => Promise<T>): Promise<T> {
    this.recordQueueTime(Date.now() - item.queuedAt);
    this.emit('started', { context: item.context });

    try {
      const result = await fn();
      this.metrics.requests_successful++;
      this.emit('completed', { context: item.context });
      return result;
    } catch (error) {
      this.metrics.requests_failed++;
      this.emit('failed', { context: item.context, error });
      throw error;
    } finally {
      this.active--;
      this.pump();
    }
  }

  /**
   * Start as many queued requests as the limits allow
   */
  private pump(): void {
    while (this.queue.length > 0 && this.active < this.config.maxConcurrentRequests) {
      const wait = this.lastStartAt + this.minSpacing() - Date.now();
      if (wait > 0) {
        if (!this.spacingTimer) {
          this.spacingTimer = setTimeout(() => {
            this.spacingTimer = undefined;
            this.pump();
          }, wait);
        }
        return;
      }

      const item = this.queue.shift();
      if (!item) return;
      if (item.timeoutTimer) clearTimeout(item.timeoutTimer);

      this.active++;
      this.lastStartAt = Date.now();
      item.start();
    }
  }

  private minSpacing(): number {
    return this.config.requestsPerMinute > 0 ? 60000 / this.config.requestsPerMinute : 0;
  }

  private recordQueueTime(ms: number): void {
    this.queueTimes.push(ms);
    if (this.queueTimes.length > 100) {
      this.queueTimes = this.queueTimes.slice(-50);
    }
    this.metrics.queue_time_avg_ms = this.queueTimes.reduce((a, b) => a + b, 0) / this.queueTimes.length;
  }

  getMetrics(): RequestLimiterMetrics {
    return {
      ...this.metrics,
      queue_size_current: this.queue.length,
      active_requests: this.active
    };
  }

  getHealth(): { healthy: boolean; queue_size: number; active_requests: number } {
    return {
      healthy: this.queue.length < 100,
      queue_size: this.queue.length,
      active_requests: this.active
    };
  }
}

export function createRequestLimiter(config?: Partial<RequestLimiterConfig>, logger?: Logger): RequestLimiter {
  return new RequestLimiter(config, logger);
}
