export { BatchQueueService, BATCH_RETENTION_MS, type IBatchQueueService } from './batch-queue.service';
