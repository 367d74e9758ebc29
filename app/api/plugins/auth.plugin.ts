import { Elysia } from 'elysia';
import type { ILogger } from '../../core/logging';
import type { ISecurityService, SecurityContext } from '../../core/security';
import { generateRequestId } from '../../core/utils';

/**
 * Bearer-token guard for the admin routes. Scoped, so it covers the routes of
 * the controller that uses it and nothing above.
 */
export class AuthPlugin {
  private readonly logger: ILogger;

  constructor(private readonly securityService: ISecurityService, logger: ILogger) {
    this.logger = logger.createChild('AuthPlugin');
  }

  createPlugin() {
    return new Elysia()
      .onBeforeHandle({ as: 'scoped' }, async ({ headers, set }) => {
        const context = this.createSecurityContext(headers);
        const result = await this.securityService.authenticateAdmin(headers.authorization, context);

        if (result.success) {
          return;
        }

        set.status = result.statusCode ?? 401;
        if (result.rateLimitInfo?.msBeforeNext !== undefined && result.statusCode === 429) {
          set.headers['retry-after'] = String(Math.ceil(result.rateLimitInfo.msBeforeNext / 1000));
        }

        this.logger.debug('Admin request rejected', {
          requestId: context.requestId,
          metadata: { status: set.status, reason: result.error }
        });

        return {
          error: {
            message: result.error ?? 'Authentication failed',
            type: result.statusCode === 429 ? 'rate_limit_error' : 'authentication_error',
            code: result.statusCode === 429 ? 'rate_limit_exceeded' : 'invalid_api_key'
          }
        };
      });
  }

  private createSecurityContext(headers: Record<string, string | undefined>): SecurityContext {
    return {
      ipAddress: extractClientAddress(headers),
      userAgent: headers['user-agent'] ?? 'unknown',
      requestId: generateRequestId()
    };
  }
}

export function extractClientAddress(headers: Record<string, string | undefined>): string {
  const forwarded = headers['x-forwarded-for']?.split(',')[0]?.trim();
  return headers['cf-connecting-ip'] ?? (forwarded !== undefined && forwarded !== '' ? forwarded : 'unknown');
}
