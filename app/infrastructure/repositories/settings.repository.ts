import { injectable, inject } from 'inversify';
import type { Collection } from 'mongodb';
import type { Settings } from '../../domain/config/settings.config';
import type { SettingsRepository } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import { type SettingsDocument, SettingsCollectionName, RuntimeSettingsKey } from '../database/schemas';
import { toError, type ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';

@injectable()
export class MongoSettingsRepository implements SettingsRepository {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) private readonly databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoSettingsRepository');
  }

  private getCollection(): Collection<SettingsDocument> {
    return this.databaseService.getDatabase().collection<SettingsDocument>(SettingsCollectionName);
  }

  async load(): Promise<unknown> {
    try {
      const doc = await this.getCollection().findOne({ key: RuntimeSettingsKey });
      return doc ? doc.values : null;
    } catch (error) {
      this.logger.error('Failed to load settings', toError(error));
      throw error;
    }
  }

  async save(settings: Settings): Promise<void> {
    try {
      await this.getCollection().updateOne(
        { key: RuntimeSettingsKey },
        { $set: { values: settings, updatedAt: new Date() } },
        { upsert: true }
      );
    } catch (error) {
      this.logger.error('Failed to save settings', toError(error));
      throw error;
    }
  }
}
