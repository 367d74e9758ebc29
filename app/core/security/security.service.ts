import { injectable, inject } from 'inversify';
import type { ILogger } from '../logging';
import { TYPES } from '../container/types';
import type { ICryptoService } from './crypto.service';
import type { IRateLimiter, RateLimitConfig, RateLimitResult } from './rate-limiter';

export interface SecurityContext {
  ipAddress?: string;
  userAgent?: string;
  requestId?: string;
}

export interface AuthenticationResult {
  success: boolean;
  statusCode?: 401 | 429;
  error?: string;
  rateLimitInfo?: RateLimitResult;
}

export interface ISecurityService {
  authenticateAdmin(authorizationHeader: string | undefined, context: SecurityContext): Promise<AuthenticationResult>;
  checkRateLimit(context: SecurityContext, config?: Partial<RateLimitConfig>): Promise<RateLimitResult>;
}

const ADMIN_RATE_LIMIT: Partial<RateLimitConfig> = {
  keyPrefix: 'admin',
  points: 300,
  duration: 60,
  blockDuration: 60
};

@injectable()
export class SecurityService implements ISecurityService {
  private readonly logger: ILogger;
  private readonly adminApiKey: string | undefined;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.CryptoService) private readonly cryptoService: ICryptoService,
    @inject(TYPES.RateLimiter) private readonly rateLimiter: IRateLimiter
  ) {
    this.logger = logger.createChild('SecurityService');
    this.adminApiKey = process.env.ADMIN_API_KEY || undefined;

    if (!this.adminApiKey) {
      this.logger.warn('ADMIN_API_KEY is not set; every admin request will be rejected');
    }
  }

  async authenticateAdmin(authorizationHeader: string | undefined, context: SecurityContext): Promise<AuthenticationResult> {
    const rateLimitResult = await this.checkRateLimit(context, ADMIN_RATE_LIMIT);

    if (!rateLimitResult.allowed) {
      return {
        success: false,
        statusCode: 429,
        error: 'Rate limit exceeded',
        rateLimitInfo: rateLimitResult
      };
    }

    if (!authorizationHeader || !authorizationHeader.startsWith('Bearer ')) {
      return { success: false, statusCode: 401, error: 'Missing or invalid authorization header' };
    }

    const token = authorizationHeader.substring(7).trim();
    const isValid = this.adminApiKey !== undefined && this.cryptoService.constantTimeEquals(token, this.adminApiKey);

    if (!isValid) {
      this.logger.warn('Admin authentication failed', {
        requestId: context.requestId,
        operation: 'admin_auth_failed',
        metadata: { ipAddress: context.ipAddress, userAgent: context.userAgent }
      });

      return { success: false, statusCode: 401, error: 'Invalid API key', rateLimitInfo: rateLimitResult };
    }

    return { success: true, rateLimitInfo: rateLimitResult };
  }

  async checkRateLimit(context: SecurityContext, config?: Partial<RateLimitConfig>): Promise<RateLimitResult> {
    return this.rateLimiter.checkLimit(context.ipAddress || 'unknown', config);
  }
}
