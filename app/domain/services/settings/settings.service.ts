import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { SettingsValidationError } from '../../../core/errors';
import { toError, type ILogger } from '../../../core/logging';
import {
  loadSettingsFromEnvironment,
  validateSettingsPatch,
  type Settings
} from '../../config/settings.config';
import type { SettingsRepository } from '../../repositories';

export type SettingsListener = (current: Readonly<Settings>, previous: Readonly<Settings>) => void;

export interface ISettingsService {
  initialize(): Promise<void>;
  get(): Readonly<Settings>;
  update(patch: unknown): Promise<Readonly<Settings>>;
  onChange(listener: SettingsListener): () => void;
}

@injectable()
export class SettingsService implements ISettingsService {
  private readonly logger: ILogger;
  private readonly listeners = new Set<SettingsListener>();
  private current: Readonly<Settings>;
  private updateChain: Promise<unknown> = Promise.resolve();

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.SettingsRepository) private readonly settingsRepository: SettingsRepository
  ) {
    this.logger = logger.createChild('SettingsService');
    this.current = Object.freeze(loadSettingsFromEnvironment(process.env, (variable, value) => {
      this.logger.warn('Ignoring invalid environment setting', { metadata: { variable, value } });
    }));
  }

  async initialize(): Promise<void> {
    const persisted = await this.settingsRepository.load();
    if (persisted === null || persisted === undefined) {
      this.logger.info('No persisted settings found, using environment defaults');
      return;
    }

    const { patch, issues } = validateSettingsPatch(persisted);
    if (!patch) {
      this.logger.warn('Persisted settings are invalid and were ignored', { metadata: { issues } });
      return;
    }

    this.apply({ ...this.current, ...patch });
    this.logger.info('Persisted settings loaded', { metadata: { settings: this.current } });
  }

  get(): Readonly<Settings> {
    return this.current;
  }

  /**
   * Validates, persists and publishes a partial update. Updates are applied one
   * at a time; a rejected patch leaves the current settings untouched.
   */
  update(patch: unknown): Promise<Readonly<Settings>> {
    const run = this.updateChain.then(() => this.applyPatch(patch));
    // Failures reach the caller through `run`; the chain itself keeps going.
    this.updateChain = run.catch(() => undefined);
    return run;
  }

  onChange(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async applyPatch(candidate: unknown): Promise<Readonly<Settings>> {
    const { patch, issues } = validateSettingsPatch(candidate);
    if (!patch) {
      throw new SettingsValidationError(issues);
    }

    const next: Settings = { ...this.current, ...patch };
    await this.settingsRepository.save(next);
    this.apply(next);

    this.logger.info('Settings updated', { metadata: { changed: Object.keys(patch) } });
    return this.current;
  }

  private apply(next: Settings): void {
    const previous = this.current;
    this.current = Object.freeze(next);

    for (const listener of this.listeners) {
      try {
        listener(this.current, previous);
      } catch (error) {
        this.logger.error('Settings listener failed', toError(error));
      }
    }
  }
}
