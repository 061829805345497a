import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { RateLimiter } from '../../../core';
import { RATE_LIMITER } from '../constants';
import { ConfigurationService } from '../services/configuration.service';

/**
 * Default rate limit key: first forwarded address, else the socket address
 */
export function clientKey(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const address = first?.split(',')[0]?.trim();
  return address || req.socket?.remoteAddress || 'unknown';
}

/**
 * Lifecycle Rate Limit Guard
 *
 * Protects the transaction endpoints from being overwhelmed by one caller.
 * Window and strategy come from the module's `rateLimit` configuration.
 *
 * Usage:
 * @UseGuards(LifecycleRateLimitGuard)
 */
@Injectable()
export class LifecycleRateLimitGuard implements CanActivate {
  constructor(
    @Inject(RATE_LIMITER)
    private readonly rateLimiter: RateLimiter,
    private readonly configuration: ConfigurationService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    if (!this.configuration.isRateLimitEnabled()) {
      return true;
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const decision = this.rateLimiter.check(clientKey(request));

    response.setHeader('X-RateLimit-Limit', decision.limit.toString());
    response.setHeader('X-RateLimit-Remaining', decision.remaining.toString());
    response.setHeader('X-RateLimit-Reset', new Date(decision.resetAt).toISOString());

    if (!decision.allowed) {
      const retryAfter = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: `Rate limit exceeded. Please retry after ${retryAfter} seconds.`,
          error: 'Too Many Requests',
          retryAfter,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    return true;
  }
}
