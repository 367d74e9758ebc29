import type { AnalysisOutcome, AnalysisRequest } from './analysis.types';

export type BatchItemStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface BatchItem {
  readonly id: string;
  readonly request: AnalysisRequest;
  readonly status: BatchItemStatus;
  readonly enqueuedAt: number;
  readonly completedAt?: number;
  readonly outcome?: AnalysisOutcome;
  readonly error?: string;
}

export interface BatchQueueStatus {
  readonly enabled: boolean;
  readonly pending: number;
  readonly processing: number;
  readonly completed: number;
  readonly failed: number;
  readonly processedCount: number;
  readonly groups: Readonly<Record<string, number>>;
}
