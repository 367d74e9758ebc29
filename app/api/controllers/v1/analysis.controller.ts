import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { ContentAnalysisService, PostAnalysis } from '../../../application/services';
import { extractClientAddress } from '../../plugins';
import { PostSchema, toSocialPost } from '../../schemas';
import { BaseController, type ControllerConfiguration } from '../base.controller';

const ANALYZE_RATE_LIMIT = { keyPrefix: 'analyze', points: 60, duration: 60, blockDuration: 60 };

function presentAnalysis(analysis: PostAnalysis) {
  const { outcome } = analysis;
  return {
    object: 'post_analysis',
    postId: analysis.postId,
    mediaType: analysis.mediaType,
    ...outcome.result,
    providerId: outcome.providerId,
    fingerprint: outcome.fingerprint,
    cached: outcome.cached,
    attempts: outcome.attempts,
    elapsedMs: outcome.elapsedMs,
    notifications: analysis.notifications
  };
}

@injectable()
export class AnalysisController extends BaseController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/v1' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) private readonly securityService: ISecurityService,
    @inject(TYPES.ContentAnalysisService) private readonly contentAnalysis: ContentAnalysisService
  ) {
    super(logger, metricsService);
  }

  public registerRoutes() {
    return this.createApplication()
      .post('/analyze', ({ body, headers, set }) => {
        return this.executeWithContext('analyzePost', async ({ requestId }) => {
          const rateLimit = await this.securityService.checkRateLimit(
            { ipAddress: extractClientAddress(headers), requestId },
            ANALYZE_RATE_LIMIT
          );

          if (!rateLimit.allowed) {
            set.status = 429;
            return {
              error: {
                message: 'Rate limit exceeded',
                type: 'rate_limit_error',
                code: 'rate_limit_exceeded'
              }
            };
          }

          const analysis = await this.contentAnalysis.analyzePost(toSocialPost(body.post), {
            requestId,
            ...(body.template !== undefined && { template: body.template }),
            ...(body.notify !== undefined && { notify: body.notify })
          });

          return presentAnalysis(analysis);
        });
      }, {
        body: t.Object({
          post: PostSchema,
          template: t.Optional(t.String({ minLength: 1 })),
          notify: t.Optional(t.Boolean())
        })
      });
  }
}
