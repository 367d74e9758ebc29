import type { IndexDescription } from 'mongodb';
import type { ProviderRecord } from '../../../domain/entities';

export type ProviderDocument = ProviderRecord;

export const ProviderCollectionName = 'providers';

export const ProviderIndexes: IndexDescription[] = [
  { key: { 'identity.id': 1 }, unique: true },
  { key: { 'configuration.name': 1 }, unique: true },
  { key: { 'configuration.isActive': 1, 'configuration.priority': 1 } }
];
