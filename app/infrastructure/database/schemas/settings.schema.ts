import type { IndexDescription } from 'mongodb';
import type { Settings } from '../../../domain/config/settings.config';

export interface SettingsDocument {
  key: string;
  values: Settings;
  updatedAt: Date;
}

export const SettingsCollectionName = 'settings';

export const RuntimeSettingsKey = 'runtime';

export const SettingsIndexes: IndexDescription[] = [
  { key: { key: 1 }, unique: true }
];
