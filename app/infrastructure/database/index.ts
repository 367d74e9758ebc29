export { DatabaseService } from './database.service';
export type { IDatabaseService } from './database.service';
