export type { AnalysisResult, AnalysisRequest, AnalysisOutcome } from './analysis.types';
export type { CompletionRequest, CompletionResult } from './completion.types';
export type { PostMediaKind, PostMedia, SocialPost, PostAnalysisOptions } from './post.types';
export type { BatchItem, BatchItemStatus, BatchQueueStatus } from './batch.types';
