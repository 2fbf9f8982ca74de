/**
 * LLM Gateway
 *
 * One text-generation call per request:
 * - Parameter validation before anything is sent
 * - Request limiting (concurrency + start spacing)
 * - Request ids and latency logging
 * - Failures returned as GenerationFailure values, never thrown
 *
 * No retries happen here; callers decide what a failed node means.
 */

import OpenAI from 'openai';
import {
  RequestLimiter,
  RequestLimiterConfig,
  RequestLimiterMetrics,
  RequestContext,
  QueueTimeoutError
} from './rate-limiter.js';
import { Result, Ok, Err, GenerationFailure, errorMessage } from './result.js';
import type { Logger } from './logger.js';

export interface CompletionRequest {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens?: number;
  systemPrompt?: string;
}

export interface CompletionResponse {
  text: string;
  model?: string;
  finishReason?: string | null;
  promptTokens?: number;
  completionTokens?: number;
}

/**
 * The wire boundary. Implementations may throw; the gateway converts.
 */
export interface CompletionTransport {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface OpenAITransportOptions {
  apiKey?: string;
  baseURL?: string;
  timeout: number;
}

/**
 * Chat Completions transport. The SDK client is created on first use so a
 * missing API key surfaces as a failed request rather than at startup.
 */
export class OpenAITransport implements CompletionTransport {
  private openai?: OpenAI;

  constructor(private options: OpenAITransportOptions) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const completion = await this.client().chat.completions.create({
      model: request.model,
      messages,
      temperature: request.temperature,
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {})
    });

    const choice = completion.choices[0];
    return {
      text: choice?.message.content ?? '',
      model: completion.model,
      finishReason: choice?.finish_reason ?? null,
      promptTokens: completion.usage?.prompt_tokens,
      completionTokens: completion.usage?.completion_tokens
    };
  }

  private client(): OpenAI {
    if (!this.openai) {
      this.openai = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseURL,
        timeout: this.options.timeout,
        maxRetries: 0
      });
    }
    return this.openai;
  }
}

/**
 * Gateway configuration
 */
export interface LLMClientConfig {
  model: string;
  systemPrompt?: string;
}

export const DEFAULT_LLM_CONFIG: LLMClientConfig = {
  model: 'gpt-4o-mini'
};

export interface LLMCallContext {
  correlationId?: string;
  operation?: string;
  nodeId?: string;
}

export interface LLMClientMetrics {
  requests_total: number;
  requests_failed: number;
  responses_truncated: number;
  latency_avg_ms: number;
}

export class LLMClient {
  private config: LLMClientConfig;
  private metrics: LLMClientMetrics = {
    requests_total: 0,
    requests_failed: 0,
    responses_truncated: 0,
    latency_avg_ms: 0
  };
  private latencies: number[] = [];

  constructor(
    private transport: CompletionTransport,
    private limiter: RequestLimiter,
    config: Partial<LLMClientConfig> = {},
    private logger?: Logger
  ) {
    this.config = { ...DEFAULT_LLM_CONFIG, ...config };
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Generate text for a prompt
   */
  async generate(
    prompt: string,
    temperature: number,
    maxTokens?: number,
    context: LLMCallContext = {}
  ): Promise<Result<string, GenerationFailure>> {
    const invalid = this.validateParams(prompt, temperature, maxTokens);
    if (invalid) {
      this.logger?.('warn', 'LLM request rejected', { ...context, cause: invalid });
      return Err({ code: 'E-LLM-INVALID-PARAMS', nodeId: context.nodeId, cause: invalid });
    }

    const requestId = this.generateRequestId();
    const requestContext: RequestContext = {
      correlationId: context.correlationId ?? requestId,
      operation: context.operation ?? 'llm_generate',
      metadata: { nodeId: context.nodeId, model: this.config.model }
    };

    this.metrics.requests_total++;
    const startTime = Date.now();

    this.logger?.('debug', 'Executing LLM request', {
      requestId,
      correlationId: requestContext.correlationId,
      model: this.config.model,
      promptLength: prompt.length,
      temperature,
      maxTokens
    });

    let response: CompletionResponse;
    try {
      response = await this.limiter.schedule(requestContext, () =>
        this.transport.complete({
          model: this.config.model,
          prompt,
          temperature,
          maxTokens,
          systemPrompt: this.config.systemPrompt
        })
      );
    } catch (error) {
      this.metrics.requests_failed++;
      const latency = Date.now() - startTime;
      this.logger?.('error', 'LLM request failed', {
        requestId,
        correlationId: requestContext.correlationId,
        model: this.config.model,
        latency,
        error: errorMessage(error)
      });
      return Err({
        code: error instanceof QueueTimeoutError ? error.code : 'E-LLM-REQUEST-FAILED',
        nodeId: context.nodeId,
        cause: `LLM request ${requestId} failed: ${errorMessage(error)}`
      });
    }

    const latency = Date.now() - startTime;
    this.recordLatency(latency);

    if (!response.text || !response.text.trim()) {
      this.metrics.requests_failed++;
      this.logger?.('error', 'LLM returned an empty response', {
        requestId,
        model: response.model ?? this.config.model,
        finishReason: response.finishReason,
        latency
      });
      return Err({
        code: 'E-LLM-EMPTY-RESPONSE',
        nodeId: context.nodeId,
        cause: `LLM request ${requestId} returned no text`
      });
    }

    if (response.finishReason === 'length') {
      this.metrics.responses_truncated++;
      this.logger?.('warn', 'LLM response truncated at the token limit', {
        requestId,
        nodeId: context.nodeId,
        maxTokens
      });
    }

    this.logger?.('info', 'LLM request successful', {
      requestId,
      correlationId: requestContext.correlationId,
      model: response.model ?? this.config.model,
      promptTokens: response.promptTokens,
      completionTokens: response.completionTokens,
      latency
    });

    return Ok(response.text);
  }

  private validateParams(prompt: string, temperature: number, maxTokens?: number): string | null {
    if (!prompt.trim()) {
      return 'Prompt is empty';
    }
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
      return `Temperature must be within [0, 1], got ${temperature}`;
    }
    if (maxTokens !== undefined && (!Number.isInteger(maxTokens) || maxTokens <= 0)) {
      return `maxTokens must be a positive integer, got ${maxTokens}`;
    }
    return null;
  }

  private recordLatency(latency: number): void {
    this.latencies.push(latency);
    if (this.latencies.length > 100) {
      this.latencies = this.latencies.slice(-50);
    }
    this.metrics.latency_avg_ms = this.latencies.reduce((a, b) => a + b, 0) / this.latencies.length;
  }

  /**
   * Generate unique request ID
   */
  private generateRequestId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 11);
    return `req-${timestamp}-${random}`;
  }

  getMetrics(): { gateway: LLMClientMetrics; rate_limiter: RequestLimiterMetrics } {
    return {
      gateway: { ...this.metrics },
      rate_limiter: this.limiter.getMetrics()
    };
  }

  getHealth(): { healthy: boolean; model: string; queue_size: number; active_requests: number } {
    const limiterHealth = this.limiter.getHealth();
    return {
      healthy: limiterHealth.healthy,
      model: this.config.model,
      queue_size: limiterHealth.queue_size,
      active_requests: limiterHealth.active_requests
    };
  }
}

export interface LLMEnvironment {
  client: Partial<LLMClientConfig>;
  limiter: Partial<RequestLimiterConfig>;
  transport: OpenAITransportOptions;
}

function positiveNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Read LLM settings from environment variables
 */
export function loadLLMEnvironment(env: NodeJS.ProcessEnv = process.env): LLMEnvironment {
  const limiter: Partial<RequestLimiterConfig> = {};
  const maxConcurrent = Math.floor(positiveNumber(env.LLM_MAX_CONCURRENT) ?? 0);
  if (maxConcurrent >= 1) limiter.maxConcurrentRequests = maxConcurrent;
  const perMinute = positiveNumber(env.LLM_REQUESTS_PER_MINUTE);
  if (perMinute !== undefined) limiter.requestsPerMinute = perMinute;

  return {
    client: env.OPENAI_MODEL ? { model: env.OPENAI_MODEL } : {},
    limiter,
    transport: {
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL || undefined,
      timeout: positiveNumber(env.LLM_TIMEOUT_MS) ?? 120000
    }
  };
}

/**
 * Gateway wired to the OpenAI transport from environment settings
 */
export function createLLMClient(logger?: Logger, env: NodeJS.ProcessEnv = process.env): LLMClient {
  const settings = loadLLMEnvironment(env);
  return new LLMClient(
    new OpenAITransport(settings.transport),
    new RequestLimiter(settings.limiter, logger),
    settings.client,
    logger
  );
}
