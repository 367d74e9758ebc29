import type { MediaType } from '../../domain/entities/provider.entity';

export interface AnalysisResult {
  readonly isRelevant: boolean;
  readonly analyticalBriefing: string;
  readonly confidence?: number;
  readonly reason?: string;
  readonly summary?: string;
  readonly keywords?: readonly string[];
}

export interface AnalysisRequest {
  readonly content: string;
  readonly mediaType: MediaType;
  readonly promptTemplate: string;
  readonly mediaUrls?: readonly string[];
  readonly requestId?: string;
}

export interface AnalysisOutcome {
  readonly result: AnalysisResult;
  readonly fingerprint: string;
  readonly providerId: string;
  readonly cached: boolean;
  readonly attempts: number;
  readonly elapsedMs: number;
}
