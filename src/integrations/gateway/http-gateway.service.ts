import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { setTimeout as sleep } from 'timers/promises';
import { UpstreamUnavailableError, describeError } from './gateway.errors';
import { RateLimiterService } from './rate-limiter.service';
import {
  AttemptResult,
  RetryPolicy,
  classifyError,
  planRetry,
} from './gateway-result';

export interface GatewayRequestOptions {
  /** Rate limiter bucket, one per upstream provider */
  rateKey: string;
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** Abandons the call, including limiter waits and backoff sleeps */
  signal?: AbortSignal;
}

/**
 * Single entry point for outbound GETs: rate limiting, timeout and
 * exponential backoff.
 */
@Injectable()
export class HttpGatewayService {
  private readonly logger = new Logger(HttpGatewayService.name);
  private readonly timeoutMs: number;
  private readonly policy: RetryPolicy;

  constructor(
    private readonly httpService: HttpService,
    private readonly rateLimiter: RateLimiterService,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = parseInt(
      this.configService.get<string>('HTTP_TIMEOUT_MS') || '2500',
      10,
    );
    this.policy = {
      maxRetries: parseInt(
        this.configService.get<string>('HTTP_MAX_RETRIES') || '2',
        10,
      ),
      backoffMs: parseInt(
        this.configService.get<string>('HTTP_BACKOFF_MS') || '500',
        10,
      ),
    };
  }

  /**
   * GET `url` and return the response body.
   *
   * @throws UpstreamUnavailableError once every retry has failed
   */
  async get<T>(url: string, options: GatewayRequestOptions): Promise<T> {
    const { rateKey, params, headers, signal } = options;

    for (let attempt = 0; ; attempt++) {
      await this.rateLimiter.acquire(rateKey, 1, signal);

      const result = await this.attempt<T>(url, params, headers, signal);
      const decision = planRetry(result, attempt, this.policy);

      switch (decision.action) {
        case 'return':
          return decision.value;

        case 'fail':
          if (decision.exhausted) {
            this.logger.warn(
              `GET ${rateKey} failed after ${attempt + 1} attempt(s): ${describeError(decision.cause)}`,
            );
            throw new UpstreamUnavailableError(
              rateKey,
              attempt + 1,
              decision.cause,
            );
          }
          throw decision.cause;

        case 'retry':
          this.logger.debug(
            `GET ${rateKey} attempt ${attempt + 1} failed, retrying in ${decision.delayMs}ms`,
          );
          await sleep(decision.delayMs, undefined, { signal });
          break;
      }
    }
  }

  private async attempt<T>(
    url: string,
    params: Record<string, string | number> | undefined,
    headers: Record<string, string> | undefined,
    signal: AbortSignal | undefined,
  ): Promise<AttemptResult<T>> {
    try {
      const response = await firstValueFrom(
        this.httpService.get<T>(url, {
          params,
          headers,
          signal,
          timeout: this.timeoutMs,
        }),
      );
      return { kind: 'success', value: response.data };
    } catch (error) {
      return classifyError(error, signal);
    }
  }
}
