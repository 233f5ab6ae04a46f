import { Logger, OnModuleDestroy } from '@nestjs/common';
import { ThrottlerStorage } from '@nestjs/throttler';
import type Redis from 'ioredis';
import { ThrottlerRecord } from 'src/rate-limit/rate-limiter.service';

/**
 * Suma y bloquea en un solo script para que varios procesos compartan el
 * contador sin carreras. Al bloquear se descarta la ventana: pasado el bloqueo
 * se empieza de cero, igual que el almacenamiento en memoria de throttler.
 *
 * KEYS = hits, bloqueo; ARGV = ttl, limit, blockDuration (ms)
 * Retorna { totalHits, pttl de la ventana, bloqueado (0|1), pttl del bloqueo }
 */
export const INCREMENT_SCRIPT = `
local ttl = tonumber(ARGV[1])
local limit = tonumber(ARGV[2])
local blockDuration = tonumber(ARGV[3])
local blockTtl = redis.call('PTTL', KEYS[2])
if blockTtl > 0 then
  return {limit + 1, blockTtl, 1, blockTtl}
end
local hits = redis.call('INCR', KEYS[1])
if hits == 1 then
  redis.call('PEXPIRE', KEYS[1], ttl)
end
if hits > limit then
  redis.call('DEL', KEYS[1])
  redis.call('SET', KEYS[2], '1', 'PX', blockDuration)
  return {hits, blockDuration, 1, blockDuration}
end
return {hits, redis.call('PTTL', KEYS[1]), 0, 0}
`;

const isScriptReply = (
  reply: unknown,
): reply is [number, number, number, number] =>
  Array.isArray(reply) &&
  reply.length === 4 &&
  reply.every((n) => typeof n === 'number');

const toSeconds = (ms: number): number => Math.max(0, Math.ceil(ms / 1000));

export type RedisScriptClient = Pick<Redis, 'eval' | 'quit'>;

export class RedisThrottlerStorage implements ThrottlerStorage, OnModuleDestroy {
  private readonly logger = new Logger(RedisThrottlerStorage.name);

  constructor(private readonly redis: RedisScriptClient) {}

  async increment(
    key: string,
    ttl: number,
    limit: number,
    blockDuration: number,
    throttlerName: string,
  ): Promise<ThrottlerRecord> {
    const reply = await this.redis.eval(
      INCREMENT_SCRIPT,
      2,
      `${key}:${throttlerName}:hits`,
      `${key}:${throttlerName}:blocked`,
      ttl,
      limit,
      blockDuration,
    );

    if (!isScriptReply(reply)) {
      throw new Error(`Unexpected rate limit reply: ${JSON.stringify(reply)}`);
    }

    const [totalHits, expiresInMs, blocked, blockExpiresInMs] = reply;
    return {
      totalHits,
      timeToExpire: toSeconds(expiresInMs),
      isBlocked: blocked === 1,
      timeToBlockExpire: toSeconds(blockExpiresInMs),
    };
  }

  async onModuleDestroy() {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.warn(
        `No se pudo cerrar la conexión a Redis: ${error instanceof Error ? error.message : error}`,
      );
    }
  }
}
