import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { ErrorClassificationService } from '../../../core/error-classification';
import type { ILogger } from '../../../core/logging';
import type { ProviderAdapter } from '../../../infrastructure/providers/base';
import { createProviderAdapter } from '../../../infrastructure/providers/registry';
import type { ProviderSnapshot } from '../../entities';
import type { IProviderRegistryService } from './provider-registry.service';

interface AdapterInstance {
  readonly adapter: ProviderAdapter;
  readonly version: number;
  readonly createdAt: number;
}

export interface IAdapterFactoryService {
  getAdapter(provider: ProviderSnapshot): ProviderAdapter;
  releaseAdapter(providerId: string): boolean;
}

/**
 * Builds one adapter per provider and rebuilds it whenever the provider's
 * configuration changes, so a rotated key or api base is picked up on the
 * next request.
 */
@injectable()
export class AdapterFactoryService implements IAdapterFactoryService {
  private readonly logger: ILogger;
  private readonly adapterCache = new Map<string, AdapterInstance>();

  constructor(
    @inject(TYPES.Logger) private readonly rootLogger: ILogger,
    @inject(TYPES.ProviderRegistryService) private readonly providerRegistry: IProviderRegistryService,
    @inject(TYPES.ErrorClassificationService) private readonly errorClassification: ErrorClassificationService
  ) {
    this.logger = rootLogger.createChild('AdapterFactoryService');
  }

  getAdapter(provider: ProviderSnapshot): ProviderAdapter {
    const existing = this.adapterCache.get(provider.id);
    if (existing && existing.version === provider.updatedAt) {
      return existing.adapter;
    }

    const adapter = createProviderAdapter(
      {
        providerId: provider.id,
        name: provider.name,
        apiBase: provider.apiBase,
        apiKey: this.providerRegistry.revealApiKey(provider.id),
        model: provider.model,
        apiFormat: provider.apiFormat
      },
      this.rootLogger,
      this.errorClassification
    );

    this.adapterCache.set(provider.id, { adapter, version: provider.updatedAt, createdAt: Date.now() });
    this.logger.debug(existing ? 'Adapter rebuilt after provider change' : 'Adapter created', {
      providerId: provider.id,
      metadata: { apiFormat: provider.apiFormat, model: provider.model }
    });

    return adapter;
  }

  releaseAdapter(providerId: string): boolean {
    return this.adapterCache.delete(providerId);
  }
}
