/**
 * Security Middleware
 * Rate limiting, optional API key authentication, request checks and response headers
 */

import { Request, Response } from 'express';
import { rateLimit, RateLimitRequestHandler } from 'express-rate-limit';
import { createHash, timingSafeEqual } from 'crypto';
import { SETTINGS } from '../../config/settings.js';
import { Logger, silentLogger } from '../../content-engine/utils/logger.js';

export interface SecurityConfig {
  globalRateLimit: {
    windowMs: number;
    max: number;
  };

  apiKeys: {
    enabled: boolean;
    headerName: string;
    allowedKeys: string[];
  };

  validation: {
    maxUrlLength: number;
    allowedContentTypes: string[];
  };
}

interface SecurityViolation {
  type: 'rate_limit' | 'invalid_auth' | 'invalid_request';
  ip: string;
  path: string;
  timestamp: number;
  details: string;
}

const MAX_RECORDED_VIOLATIONS = 1000;

/**
 * The parts of express's request and response the checks read and write
 */
export interface SecuredRequest {
  method: string;
  path: string;
  originalUrl: string;
  get(name: string): string | undefined;
  socket: { remoteAddress?: string };
}

export interface SecuredResponse {
  status(code: number): SecuredResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
}

export type SecurityHandler = (req: SecuredRequest, res: SecuredResponse, next: () => void) => void;

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  globalRateLimit: {
    windowMs: SETTINGS.RATE_LIMIT_WINDOW_MS,
    max: SETTINGS.RATE_LIMIT_MAX
  },

  apiKeys: {
    enabled: SETTINGS.REQUIRE_API_KEY,
    headerName: 'X-API-Key',
    allowedKeys: SETTINGS.API_KEYS
  },

  validation: {
    maxUrlLength: 2048,
    allowedContentTypes: ['application/json']
  }
};

function hashKey(key: string): Buffer {
  return createHash('sha256').update(key).digest();
}

export class SecurityMiddleware {
  private config: SecurityConfig;
  private logger: Logger;
  private violations: SecurityViolation[] = [];
  private hashedApiKeys: Buffer[];

  constructor(config: Partial<SecurityConfig> = {}, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_SECURITY_CONFIG, ...config };
    this.logger = logger;
    this.hashedApiKeys = this.config.apiKeys.allowedKeys.map(hashKey);
  }

  /**
   * Request checks, API key authentication and security headers
   */
  securityMiddleware(): SecurityHandler {
    return (req, res, next) => {
      const validation = this.validateRequest(req);
      if (!validation.valid) {
        this.logViolation('invalid_request', req, validation.reason);
        res.status(400).json({ success: false, error: validation.reason });
        return;
      }

      if (this.config.apiKeys.enabled && !this.validateApiKey(req)) {
        this.logViolation('invalid_auth', req, 'Invalid or missing API key');
        res.status(401).json({ success: false, error: 'Invalid API key' });
        return;
      }

      this.setSecurityHeaders(res);
      next();
    };
  }

  createRateLimit(options?: Partial<SecurityConfig['globalRateLimit']>): RateLimitRequestHandler {
    const config = { ...this.config.globalRateLimit, ...options };
    const retryAfter = Math.ceil(config.windowMs / 1000);

    return rateLimit({
      windowMs: config.windowMs,
      limit: config.max,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req: Request, res: Response) => this.rejectRateLimited(req, res, retryAfter)
    });
  }

  rejectRateLimited(req: SecuredRequest, res: SecuredResponse, retryAfter: number): void {
    this.logViolation('rate_limit', req, 'Rate limit exceeded');
    res.status(429).json({ success: false, error: 'Too many requests', retryAfter });
  }

  private validateRequest(req: SecuredRequest): { valid: true } | { valid: false; reason: string } {
    if (req.originalUrl.length > this.config.validation.maxUrlLength) {
      return { valid: false, reason: 'URL too long' };
    }

    const hasBody = req.method === 'POST' || req.method === 'PUT' || req.method === 'PATCH';
    if (hasBody) {
      const contentType = (req.get('Content-Type') || '').split(';')[0].trim().toLowerCase();
      if (!this.config.validation.allowedContentTypes.includes(contentType)) {
        return { valid: false, reason: `Unsupported content type: ${contentType || 'none'}` };
      }
    }

    return { valid: true };
  }

  /**
   * Compare SHA256 digests so every comparison has the same length
   */
  private validateApiKey(req: SecuredRequest): boolean {
    const provided = req.get(this.config.apiKeys.headerName);
    if (!provided) {
      return false;
    }
    const digest = hashKey(provided);
    return this.hashedApiKeys.some(allowed => timingSafeEqual(allowed, digest));
  }

  private setSecurityHeaders(res: SecuredResponse): void {
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
  }

  private getClientIP(req: SecuredRequest): string {
    const forwarded = req.get('X-Forwarded-For');
    return (forwarded || req.socket.remoteAddress || 'unknown').split(',')[0].trim();
  }

  private logViolation(type: SecurityViolation['type'], req: SecuredRequest, details: string): void {
    const violation: SecurityViolation = {
      type,
      ip: this.getClientIP(req),
      path: req.path,
      timestamp: Date.now(),
      details
    };

    this.violations.push(violation);
    if (this.violations.length > MAX_RECORDED_VIOLATIONS) {
      this.violations = this.violations.slice(-MAX_RECORDED_VIOLATIONS / 2);
    }

    this.logger('warn', 'Security violation', { ...violation });
  }

  getSecurityStats(): { totalViolations: number; byType: Record<string, number> } {
    const byType: Record<string, number> = {};
    for (const violation of this.violations) {
      byType[violation.type] = (byType[violation.type] ?? 0) + 1;
    }
    return { totalViolations: this.violations.length, byType };
  }
}
