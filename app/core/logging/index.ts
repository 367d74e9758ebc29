export { Logger, toError } from './logger';
export type { ILogger, LogContext, LoggerOptions } from './logger';
