import type { RequestLogEntry, RequestType } from '../entities';

export interface RequestLogQuery {
  readonly providerId?: string;
  readonly requestType?: RequestType;
  readonly limit: number;
}

export interface RequestLogRepository {
  save(entry: RequestLogEntry): Promise<void>;
  findRecent(query: RequestLogQuery): Promise<RequestLogEntry[]>;
  deleteOlderThan(timestamp: number): Promise<number>;
}
