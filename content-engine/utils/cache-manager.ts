/**
 * Generation Cache
 *
 * Session-scoped memo of LLM output keyed by the exact prompt text:
 * - SHA256-addressed entries (one per distinct prompt)
 * - Single-flight: concurrent misses for one prompt share a generator call
 * - Failures are returned to every waiter but never stored
 * - Metrics and hit/miss/set/failure events
 */

import { createHash } from 'crypto';
import { EventEmitter } from 'events';
import { Result, Err, GenerationFailure, errorMessage } from './result.js';
import type { Logger } from './logger.js';

export type TextGenerator = () => Promise<Result<string, GenerationFailure>>;

/**
 * Cache configuration
 */
export interface GenerationCacheConfig {
  enableMetrics: boolean;
  logHits: boolean;               // Log every hit at debug level
}

export const DEFAULT_GENERATION_CACHE_CONFIG: GenerationCacheConfig = {
  enableMetrics: true,
  logHits: false
};

type CacheCounter = 'hits_total' | 'misses_total' | 'coalesced_total' | 'writes_total' | 'failures_total';

interface CacheEntry {
  value: string;
  createdAt: number;
  accessCount: number;
}

/**
 * Cache metrics
 */
export interface GenerationCacheMetrics {
  hits_total: number;
  misses_total: number;
  coalesced_total: number;        // Misses that joined an in-flight call
  writes_total: number;
  failures_total: number;
  hit_rate: number;               // Hits over lookups (0-1)
  entries: number;
  in_flight: number;
}

export interface GenerationCacheEvents {
  hit: { key: string };
  miss: { key: string };
  set: { key: string; size: number };
  failure: { key: string; code: string };
}

export class GenerationCache extends EventEmitter {
  private config: GenerationCacheConfig;
  private entries = new Map<string, CacheEntry>();
  private inFlight = new Map<string, Promise<Result<string, GenerationFailure>>>();
  private metrics: Record<CacheCounter, number> = {
    hits_total: 0,
    misses_total: 0,
    coalesced_total: 0,
    writes_total: 0,
    failures_total: 0
  };

  constructor(config: Partial<GenerationCacheConfig> = {}, private logger?: Logger) {
    super();
    this.config = { ...DEFAULT_GENERATION_CACHE_CONFIG, ...config };
  }

  /**
   * Return the stored text for a prompt, or run the generator once and store
   * its output when it succeeds
   */
  async getOrGenerate(prompt: string, generator: TextGenerator): Promise<Result<string, GenerationFailure>> {
    const key = this.keyFor(prompt);

    const entry = this.entries.get(key);
    if (entry) {
      entry.accessCount++;
      this.record('hits_total');
      if (this.config.logHits) {
        this.logger?.('debug', 'Generation cache hit', { key, accessCount: entry.accessCount });
      }
      this.emitEvent('hit', { key });
      return { success: true, value: entry.value };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.record('coalesced_total');
      return pending;
    }

    this.record('misses_total');
    this.emitEvent('miss', { key });

    const call = this.runGenerator(key, generator);
    this.inFlight.set(key, call);
    return call;
  }

  private async runGenerator(key: string, generator: TextGenerator): Promise<Result<string, GenerationFailure>> {
    try {
      let result: Result<string, GenerationFailure>;
      try {
        result = await generator();
      } catch (error) {
        result = Err({ code: 'E-CACHE-GENERATOR-THREW', cause: errorMessage(error) });
      }

      if (result.success) {
        this.entries.set(key, { value: result.value, createdAt: Date.now(), accessCount: 0 });
        this.record('writes_total');
        this.emitEvent('set', { key, size: Buffer.byteLength(result.value, 'utf8') });
      } else {
        this.record('failures_total');
        this.logger?.('debug', 'Generation failed, result not cached', { key, code: result.errors.code });
        this.emitEvent('failure', { key, code: result.errors.code });
      }

      return result;
    } finally {
      this.inFlight.delete(key);
    }
  }

  /**
   * Whether a successful result is stored for this prompt
   */
  has(prompt: string): boolean {
    return this.entries.has(this.keyFor(prompt));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.logger?.('info', 'Generation cache cleared');
  }

  keyFor(prompt: string): string {
    return createHash('sha256').update(prompt, 'utf8').digest('hex');
  }

  getMetrics(): GenerationCacheMetrics {
    const lookups = this.metrics.hits_total + this.metrics.misses_total + this.metrics.coalesced_total;
    return {
      ...this.metrics,
      hit_rate: lookups > 0 ? this.metrics.hits_total / lookups : 0,
      entries: this.entries.size,
      in_flight: this.inFlight.size
    };
  }

  private record(counter: CacheCounter): void {
    if (this.config.enableMetrics) {
      this.metrics[counter]++;
    }
  }

  private emitEvent<K extends keyof GenerationCacheEvents>(event: K, payload: GenerationCacheEvents[K]): void {
    this.emit(event, payload);
  }
}

export function createGenerationCache(config?: Partial<GenerationCacheConfig>, logger?: Logger): GenerationCache {
  return new GenerationCache(config, logger);
}
