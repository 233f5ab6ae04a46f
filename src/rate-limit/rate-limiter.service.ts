import { Injectable, Logger } from '@nestjs/common';
import { InjectThrottlerStorage, ThrottlerStorage } from '@nestjs/throttler';
import { envs } from 'src/config/envs';

/** Nombre del throttler compartido por la subida HTTP y el canal en tiempo real. */
export const RATE_LIMIT_THROTTLER = 'default';

export type ThrottlerRecord = Awaited<ReturnType<ThrottlerStorage['increment']>>;

export interface RateLimitDecision {
  allowed: boolean;
  totalHits: number;
  limit: number;
  /** Segundos hasta que se levanta el bloqueo; 0 si se admitió. */
  retryAfterSeconds: number;
}

/**
 * Control de admisión único para la subida HTTP y el canal en tiempo real.
 * Ambos suman en el mismo `ThrottlerStorage` bajo la misma clave por identidad,
 * que es la que usa `RateLimitGuard`.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);

  constructor(
    @InjectThrottlerStorage()
    private readonly storage: ThrottlerStorage,
  ) {}

  async allow(identity: string, cost = 1): Promise<boolean> {
    const decision = await this.check(identity, cost);
    return decision.allowed;
  }

  async check(identity: string, cost = 1): Promise<RateLimitDecision> {
    const key = rateLimitKey(identity);
    let record = await this.increment(key);
    for (let hit = 1; hit < cost && !record.isBlocked; hit++) {
      record = await this.increment(key);
    }

    const decision = toDecision(record, envs.rateLimitMax);
    if (!decision.allowed) {
      this.logger.warn(
        `Solicitud rechazada por límite: identidad=${identity} hits=${decision.totalHits}/${decision.limit} espera=${decision.retryAfterSeconds}s`,
      );
    }
    return decision;
  }

  private increment(key: string): Promise<ThrottlerRecord> {
    return this.storage.increment(
      key,
      envs.rateLimitWindowMs,
      envs.rateLimitMax,
      envs.rateLimitWindowMs,
      RATE_LIMIT_THROTTLER,
    );
  }
}

export const toDecision = (
  record: ThrottlerRecord,
  limit: number,
): RateLimitDecision => ({
  allowed: !record.isBlocked,
  totalHits: record.totalHits,
  limit,
  retryAfterSeconds: record.isBlocked
    ? Math.max(1, Math.ceil(record.timeToBlockExpire))
    : 0,
});

/** `::ffff:10.0.0.1` y `10.0.0.1` son la misma identidad. */
export const normalizeIdentity = (identity: string): string => {
  const trimmed = identity.trim();
  return trimmed.startsWith('::ffff:') ? trimmed.slice(7) : trimmed || 'unknown';
};

export const rateLimitKey = (identity: string): string =>
  `rate:${normalizeIdentity(identity)}`;
