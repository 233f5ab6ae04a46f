import { ThrottlerException } from '@nestjs/throttler';

export class RateLimitException extends ThrottlerException {
  constructor(readonly retryAfterSeconds: number) {
    super(`Too many requests, retry in ${retryAfterSeconds}s`);
  }
}
