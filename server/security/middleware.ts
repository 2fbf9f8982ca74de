/**
 * Security Middleware
 * Response hardening headers and request rate limits for the API
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { rateLimit, RateLimitRequestHandler } from 'express-rate-limit';
import type { Logger } from '../../content-engine/utils/logger.js';

export interface RateLimitSettings {
  windowMs: number;
  limit: number;
}

export interface SecurityConfig {
  globalRateLimit: RateLimitSettings;
  // Roadmap, job and question endpoints each start LLM work
  generationRateLimit: RateLimitSettings;
}

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  globalRateLimit: {
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: 1000
  },
  generationRateLimit: {
    windowMs: 15 * 60 * 1000,
    limit: 30
  }
};

export class SecurityMiddleware {
  private config: SecurityConfig;

  constructor(config: Partial<SecurityConfig> = {}, private logger?: Logger) {
    this.config = { ...DEFAULT_SECURITY_CONFIG, ...config };
  }

  securityHeaders(): RequestHandler {
    return (_req: Request, res: Response, next: NextFunction) => {
      res.setHeader('X-Content-Type-Options', 'nosniff');
      res.setHeader('X-Frame-Options', 'DENY');
      res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
      res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
      next();
    };
  }

  createRateLimit(kind: 'global' | 'generation' = 'global'): RateLimitRequestHandler {
    const settings = kind === 'global' ? this.config.globalRateLimit : this.config.generationRateLimit;

    return rateLimit({
      windowMs: settings.windowMs,
      limit: settings.limit,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req: Request, res: Response) => {
        this.logger?.('warn', 'Rate limit exceeded', { kind, ip: req.ip, path: req.path });
        res.status(429).json({
          success: false,
          error: 'Too many requests',
          retryAfter: Math.ceil(settings.windowMs / 1000)
        });
      }
    });
  }
}
