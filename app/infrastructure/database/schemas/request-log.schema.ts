import type { IndexDescription } from 'mongodb';
import type { RequestLogEntry } from '../../../domain/entities';

export interface RequestLogDocument extends RequestLogEntry {
  loggedAt: Date;
}

export const RequestLogCollectionName = 'requestLogs';

export const RequestLogIndexes: IndexDescription[] = [
  { key: { id: 1 }, unique: true },
  { key: { providerId: 1, createdAt: -1 } },
  { key: { requestType: 1, createdAt: -1 } },
  { key: { createdAt: -1 } }
];
