import { injectable, inject } from 'inversify';
import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import { toError, type ILogger } from '../logging';
import { TYPES } from '../container/types';

export interface RateLimitConfig {
  keyPrefix: string;
  points: number;
  duration: number;
  blockDuration: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remainingPoints?: number;
  msBeforeNext?: number;
}

export interface IRateLimiter {
  checkLimit(key: string, config?: Partial<RateLimitConfig>): Promise<RateLimitResult>;
  resetKey(key: string): Promise<void>;
}

@injectable()
export class RateLimiter implements IRateLimiter {
  private readonly logger: ILogger;
  private readonly limiters: Map<string, RateLimiterMemory> = new Map();
  private readonly defaultConfig: RateLimitConfig = {
    keyPrefix: 'rl',
    points: 120,
    duration: 60,
    blockDuration: 60
  };

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.createChild('RateLimiter');
  }

  async checkLimit(key: string, config?: Partial<RateLimitConfig>): Promise<RateLimitResult> {
    const finalConfig: RateLimitConfig = { ...this.defaultConfig, ...config };
    const limiter = this.getOrCreateLimiter(finalConfig);

    try {
      const result = await limiter.consume(key);

      return {
        allowed: true,
        remainingPoints: result.remainingPoints,
        msBeforeNext: result.msBeforeNext
      };
    } catch (rejection) {
      if (rejection instanceof RateLimiterRes) {
        this.logger.warn('Rate limit exceeded', {
          metadata: {
            key,
            remainingPoints: rejection.remainingPoints,
            msBeforeNext: rejection.msBeforeNext
          }
        });

        return {
          allowed: false,
          remainingPoints: rejection.remainingPoints,
          msBeforeNext: rejection.msBeforeNext
        };
      }

      this.logger.error('Rate limiter error', toError(rejection), {
        metadata: { key, config: finalConfig }
      });
      return { allowed: false };
    }
  }

  async resetKey(key: string): Promise<void> {
    await Promise.all(Array.from(this.limiters.values()).map(limiter => limiter.delete(key)));
    this.logger.debug('Rate limit key reset', { metadata: { key } });
  }

  private getOrCreateLimiter(config: RateLimitConfig): RateLimiterMemory {
    const limiterKey = `${config.keyPrefix}_${config.points}_${config.duration}_${config.blockDuration}`;
    const existing = this.limiters.get(limiterKey);
    if (existing) {
      return existing;
    }

    const limiter = new RateLimiterMemory({
      keyPrefix: config.keyPrefix,
      points: config.points,
      duration: config.duration,
      blockDuration: config.blockDuration
    });

    this.limiters.set(limiterKey, limiter);
    return limiter;
  }
}
