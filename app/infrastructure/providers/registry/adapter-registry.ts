import type { ErrorClassificationService } from '../../../core/error-classification';
import type { ILogger } from '../../../core/logging';
import type { ApiFormat } from '../../../domain/entities';
import { AnthropicAdapter, OpenAICompatibleAdapter } from '../adapters';
import type { BaseProviderAdapter, ProviderAdapterConfiguration } from '../base';

export type ProviderAdapterClass = new (
  configuration: ProviderAdapterConfiguration,
  logger: ILogger,
  errorClassification: ErrorClassificationService
) => BaseProviderAdapter;

const ADAPTER_CLASSES: Readonly<Record<ApiFormat, ProviderAdapterClass>> = {
  openai: OpenAICompatibleAdapter,
  anthropic: AnthropicAdapter
};

export function getAdapterClass(apiFormat: ApiFormat): ProviderAdapterClass {
  return ADAPTER_CLASSES[apiFormat];
}

export function createProviderAdapter(
  configuration: ProviderAdapterConfiguration,
  logger: ILogger,
  errorClassification: ErrorClassificationService
): BaseProviderAdapter {
  const AdapterClass = getAdapterClass(configuration.apiFormat);
  return new AdapterClass(configuration, logger, errorClassification);
}
