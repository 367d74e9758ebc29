import type { Settings } from '../config/settings.config';

export interface SettingsRepository {
  /** Raw persisted overrides; callers validate before use. */
  load(): Promise<unknown>;
  save(settings: Settings): Promise<void>;
}
