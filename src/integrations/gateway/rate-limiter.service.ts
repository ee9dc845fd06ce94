import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { InvalidTokenRequestError } from './gateway.errors';

export const RATE_LIMITER_CLOCK = Symbol('RATE_LIMITER_CLOCK');

interface Bucket {
  tokens: number;
  updatedAt: number;
}

/**
 * In-memory token bucket, one bucket per provider key.
 *
 * Every bucket shares the same refill rate and capacity. The refill/debit
 * step is synchronous, so the event loop serializes it; waiting happens
 * outside of it and never blocks other keys.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly buckets = new Map<string, Bucket>();
  private readonly clock: () => number;
  readonly rate: number;
  readonly capacity: number;

  constructor(
    private readonly configService: ConfigService,
    @Optional() @Inject(RATE_LIMITER_CLOCK) clock?: () => number,
  ) {
    this.clock = clock ?? (() => performance.now());
    this.rate = parseFloat(
      this.configService.get<string>('RATE_LIMIT_RATE') || '5',
    );
    this.capacity = parseFloat(
      this.configService.get<string>('RATE_LIMIT_CAPACITY') || '5',
    );

    this.logger.log(
      `Token bucket configured: rate=${this.rate}/s, capacity=${this.capacity}`,
    );
  }

  /**
   * Wait until `tokens` can be taken from the bucket for `key`, then take
   * them.
   *
   * @throws InvalidTokenRequestError when the request can never be satisfied
   */
  async acquire(key: string, tokens = 1, signal?: AbortSignal): Promise<void> {
    if (!Number.isFinite(tokens) || tokens > this.capacity || tokens <= 0) {
      throw new InvalidTokenRequestError(tokens, this.capacity);
    }

    for (;;) {
      const waitMs = this.tryDebit(key, tokens);
      if (waitMs === 0) {
        return;
      }

      this.logger.debug(`Rate limit reached for "${key}", waiting ${waitMs}ms`);
      await sleep(waitMs, undefined, { signal });
    }
  }

  /**
   * Tokens currently available for `key`, after refill.
   */
  available(key: string): number {
    return this.refill(key, this.clock()).tokens;
  }

  /**
   * Refill and, when enough tokens are present, debit them.
   *
   * @returns 0 on success, otherwise the milliseconds until the shortfall
   * is refilled
   */
  private tryDebit(key: string, tokens: number): number {
    const now = this.clock();
    const bucket = this.refill(key, now);

    if (bucket.tokens >= tokens) {
      this.buckets.set(key, { tokens: bucket.tokens - tokens, updatedAt: now });
      return 0;
    }

    this.buckets.set(key, bucket);
    if (this.rate <= 0) {
      return 1000;
    }
    return Math.max(1, Math.ceil(((tokens - bucket.tokens) / this.rate) * 1000));
  }

  private refill(key: string, now: number): Bucket {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      return { tokens: this.capacity, updatedAt: now };
    }

    const elapsedSeconds = Math.max(0, now - bucket.updatedAt) / 1000;
    return {
      tokens: Math.min(this.capacity, bucket.tokens + elapsedSeconds * this.rate),
      updatedAt: now,
    };
  }
}
