import { Logger, Module } from '@nestjs/common';
import { ThrottlerModule, ThrottlerStorage } from '@nestjs/throttler';
import Redis from 'ioredis';
import { envs } from 'src/config/envs';
import { RedisThrottlerStorage } from './infrastructure/redis-throttler.storage';
import { RATE_LIMIT_THROTTLER, RateLimiterService } from './rate-limiter.service';

const createStorage = (): ThrottlerStorage | undefined => {
  const logger = new Logger('RateLimitModule');
  if (!envs.redisUrl) {
    logger.log('Límite de solicitudes en memoria (REDIS_URL vacío)');
    return undefined;
  }
  logger.log('Límite de solicitudes respaldado por Redis');
  return new RedisThrottlerStorage(new Redis(envs.redisUrl));
};

@Module({
  imports: [
    ThrottlerModule.forRootAsync({
      useFactory: () => ({
        throttlers: [
          {
            name: RATE_LIMIT_THROTTLER,
            ttl: envs.rateLimitWindowMs,
            limit: envs.rateLimitMax,
            blockDuration: envs.rateLimitWindowMs,
          },
        ],
        storage: createStorage(),
      }),
    }),
  ],
  providers: [RateLimiterService],
  exports: [RateLimiterService, ThrottlerModule],
})
export class RateLimitModule {}
