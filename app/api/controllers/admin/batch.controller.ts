import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { ContentAnalysisService } from '../../../application/services';
import type { BatchItem } from '../../../application/types';
import type { IBatchQueueService } from '../../../domain/services/batch';
import { PostSchema, toSocialPost } from '../../schemas';
import { AdminController, type ControllerConfiguration } from '../base.controller';

const BatchStatusSchema = t.Union([
  t.Literal('pending'),
  t.Literal('processing'),
  t.Literal('completed'),
  t.Literal('failed')
]);

function presentBatchItem(item: BatchItem) {
  return {
    id: item.id,
    object: 'batch_item',
    status: item.status,
    mediaType: item.request.mediaType,
    enqueuedAt: item.enqueuedAt,
    ...(item.completedAt !== undefined && { completedAt: item.completedAt }),
    ...(item.outcome !== undefined && { outcome: item.outcome }),
    ...(item.error !== undefined && { error: item.error })
  };
}

@injectable()
export class BatchController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.BatchQueueService) private readonly batchQueue: IBatchQueueService,
    @inject(TYPES.ContentAnalysisService) private readonly contentAnalysis: ContentAnalysisService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .post('/batch', ({ body, set }) => {
        return this.executeWithContext('enqueueBatch', ({ requestId }) => {
          const posts = body.posts.map(toSocialPost);
          const requests = posts.map(post => this.contentAnalysis.buildRequest(post, {
            ...(body.template !== undefined && { template: body.template }),
            requestId
          }));
          const items = requests.map(request => this.batchQueue.enqueue(request));

          set.status = 202;
          return {
            object: 'list',
            data: items.map((item, index) => ({ ...presentBatchItem(item), postId: posts[index]?.id }))
          };
        });
      }, {
        body: t.Object({
          posts: t.Array(PostSchema, { minItems: 1, maxItems: 500 }),
          template: t.Optional(t.String({ minLength: 1 }))
        })
      })
      .get('/batch', ({ query }) => {
        return this.executeWithContext('listBatch', () => ({
          object: 'list',
          status: this.batchQueue.getStatus(),
          data: this.batchQueue.list(query.status).map(presentBatchItem)
        }));
      }, {
        query: t.Object({ status: t.Optional(BatchStatusSchema) })
      })
      .get('/batch/:id', ({ params, set }) => {
        return this.executeWithContext('getBatchItem', () => {
          const item = this.batchQueue.get(params.id);
          if (!item) {
            set.status = 404;
            return {
              error: {
                message: `Batch item ${params.id} not found`,
                type: 'not_found_error',
                code: 'batch_item_not_found'
              }
            };
          }
          return presentBatchItem(item);
        });
      }, {
        params: t.Object({ id: t.String() })
      });
  }
}
