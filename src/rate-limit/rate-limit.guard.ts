import { ExecutionContext, Injectable } from '@nestjs/common';
import { ThrottlerGuard, ThrottlerLimitDetail } from '@nestjs/throttler';
import { RateLimitException } from 'src/common/errors';
import { normalizeIdentity, rateLimitKey } from './rate-limiter.service';

/**
 * `ThrottlerGuard` con la misma clave que `RateLimiterService`: una IP comparte
 * el bucket entre todas las rutas HTTP y el canal en tiempo real.
 */
@Injectable()
export class RateLimitGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    return normalizeIdentity(typeof req.ip === 'string' ? req.ip : '');
  }

  protected generateKey(
    _context: ExecutionContext,
    tracker: string,
    _throttlerName: string,
  ): string {
    return rateLimitKey(tracker);
  }

  protected async throwThrottlingException(
    _context: ExecutionContext,
    detail: ThrottlerLimitDetail,
  ): Promise<void> {
    throw new RateLimitException(
      Math.max(1, Math.ceil(detail.timeToBlockExpire)),
    );
  }
}
