import { injectable, inject } from 'inversify';
import { t } from 'elysia';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ISecurityService } from '../../../core/security';
import type { ProviderSnapshot } from '../../../domain/entities';
import type { CreateProviderInput, IProviderRegistryService, UpdateProviderInput } from '../../../domain/services/provider';
import { AdminController, type ControllerConfiguration } from '../base.controller';

const ApiFormatSchema = t.Union([t.Literal('openai'), t.Literal('anthropic')]);

const ProviderFields = {
  api_format: t.Optional(ApiFormatSchema),
  priority: t.Optional(t.Integer({ minimum: 0 })),
  is_active: t.Optional(t.Boolean()),
  supports_text: t.Optional(t.Boolean()),
  supports_image: t.Optional(t.Boolean()),
  supports_video: t.Optional(t.Boolean()),
  supports_gif: t.Optional(t.Boolean())
};

const CreateProviderBody = t.Object({
  name: t.String({ minLength: 1 }),
  api_base: t.String({ minLength: 1 }),
  api_key: t.String({ minLength: 1 }),
  model: t.String({ minLength: 1 }),
  ...ProviderFields
});

const UpdateProviderBody = t.Object({
  name: t.Optional(t.String({ minLength: 1 })),
  api_base: t.Optional(t.String({ minLength: 1 })),
  api_key: t.Optional(t.String({ minLength: 1 })),
  model: t.Optional(t.String({ minLength: 1 })),
  ...ProviderFields
});

type CreateProviderBodyType = typeof CreateProviderBody.static;
type UpdateProviderBodyType = typeof UpdateProviderBody.static;

function toUpdateInput(body: UpdateProviderBodyType): UpdateProviderInput {
  return {
    ...(body.name !== undefined && { name: body.name }),
    ...(body.api_base !== undefined && { apiBase: body.api_base }),
    ...(body.api_key !== undefined && { apiKey: body.api_key }),
    ...(body.model !== undefined && { model: body.model }),
    ...(body.api_format !== undefined && { apiFormat: body.api_format }),
    ...(body.priority !== undefined && { priority: body.priority }),
    ...(body.is_active !== undefined && { isActive: body.is_active }),
    ...(body.supports_text !== undefined && { supportsText: body.supports_text }),
    ...(body.supports_image !== undefined && { supportsImage: body.supports_image }),
    ...(body.supports_video !== undefined && { supportsVideo: body.supports_video }),
    ...(body.supports_gif !== undefined && { supportsGif: body.supports_gif })
  };
}

function toCreateInput(body: CreateProviderBodyType): CreateProviderInput {
  return {
    ...toUpdateInput(body),
    name: body.name,
    apiBase: body.api_base,
    apiKey: body.api_key,
    model: body.model
  };
}

export function presentProvider(provider: ProviderSnapshot) {
  return {
    id: provider.id,
    object: 'provider',
    name: provider.name,
    apiBase: provider.apiBase,
    model: provider.model,
    apiFormat: provider.apiFormat,
    priority: provider.priority,
    isActive: provider.isActive,
    ...provider.capabilities,
    health: provider.health,
    stats: provider.stats,
    createdAt: provider.createdAt,
    updatedAt: provider.updatedAt
  };
}

@injectable()
export class ProvidersController extends AdminController {
  protected readonly configuration: ControllerConfiguration = { prefix: '/admin' };

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.SecurityService) securityService: ISecurityService,
    @inject(TYPES.ProviderRegistryService) private readonly registry: IProviderRegistryService
  ) {
    super(logger, metricsService, securityService);
  }

  public registerRoutes() {
    return this.createAdminApplication()
      .get('/providers', ({ query }) => {
        return this.executeWithContext('listProviders', () => ({
          object: 'list',
          data: this.registry.list(query.active_only === 'true').map(presentProvider)
        }));
      }, {
        query: t.Object({
          active_only: t.Optional(t.Union([t.Literal('true'), t.Literal('false')]))
        })
      })
      .get('/providers/:id', ({ params }) => {
        return this.executeWithContext('getProvider', () => presentProvider(this.registry.require(params.id)));
      }, {
        params: t.Object({ id: t.String() })
      })
      .post('/providers', ({ body, set }) => {
        return this.executeWithContext('createProvider', async () => {
          const provider = await this.registry.create(toCreateInput(body));
          set.status = 201;
          return presentProvider(provider);
        });
      }, {
        body: CreateProviderBody
      })
      .patch('/providers/:id', ({ params, body }) => {
        return this.executeWithContext('updateProvider', async () => {
          return presentProvider(await this.registry.update(params.id, toUpdateInput(body)));
        });
      }, {
        params: t.Object({ id: t.String() }),
        body: UpdateProviderBody
      })
      .delete('/providers/:id', ({ params }) => {
        return this.executeWithContext('deleteProvider', async () => {
          await this.registry.delete(params.id);
          return { id: params.id, object: 'provider', deleted: true };
        });
      }, {
        params: t.Object({ id: t.String() })
      })
      .post('/providers/:id/toggle', ({ params }) => {
        return this.executeWithContext('toggleProvider', async () => {
          return presentProvider(await this.registry.toggle(params.id));
        });
      }, {
        params: t.Object({ id: t.String() })
      });
  }
}
