import type { ProviderErrorCategory } from '../../core/errors';

export type RequestType = 'content_analysis' | 'health_check';

export interface RequestLogEntry {
  readonly id: string;
  readonly providerId: string;
  readonly requestType: RequestType;
  readonly isSuccess: boolean;
  readonly errorMessage?: string;
  readonly errorCategory?: ProviderErrorCategory;
  readonly responseTimeMs: number;
  readonly tokenCount?: number;
  readonly isCached: boolean;
  readonly cacheKey?: string;
  readonly createdAt: number;
}
