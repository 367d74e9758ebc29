import { injectable } from 'inversify';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LogContext {
  requestId?: string;
  providerId?: string;
  operation?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}

export interface ILogger {
  error(message: string, error?: Error, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  createChild(namespace: string): ILogger;
}

export interface LoggerOptions {
  level?: string;
  logDirectory?: string;
  writeFiles?: boolean;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function resolveOptions(options: LoggerOptions): Required<LoggerOptions> {
  return {
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    logDirectory: options.logDirectory ?? process.env.LOG_DIR ?? 'logs',
    writeFiles: options.writeFiles ?? (process.env.LOG_TO_FILES !== 'false' && process.env.NODE_ENV !== 'test')
  };
}

@injectable()
export class Logger implements ILogger {
  private readonly logger: winston.Logger;
  private readonly namespace: string;

  constructor(namespace: string = 'Application', options: LoggerOptions = {}, parent?: winston.Logger) {
    this.namespace = namespace;
    this.logger = parent ?? Logger.createWinstonLogger(resolveOptions(options), namespace);
  }

  private static createWinstonLogger(options: Required<LoggerOptions>, fallbackNamespace: string): winston.Logger {
    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, namespace, context, error }) => {
        const logEntry: Record<string, unknown> = {
          timestamp,
          level,
          namespace: namespace || fallbackNamespace,
          message
        };

        if (context) {
          logEntry.context = context;
        }

        if (error) {
          logEntry.error = error;
        }

        return JSON.stringify(logEntry);
      })
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, namespace }) => {
            return `${timestamp} [${level}] [${namespace || fallbackNamespace}] ${message}`;
          })
        )
      })
    ];

    if (options.writeFiles) {
      transports.push(
        new DailyRotateFile({
          filename: `${options.logDirectory}/application-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat
        }),
        new DailyRotateFile({
          filename: `${options.logDirectory}/error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          level: 'error',
          maxSize: '20m',
          maxFiles: '30d',
          format: logFormat
        })
      );
    }

    return winston.createLogger({
      level: options.level,
      format: logFormat,
      transports,
      exitOnError: false
    });
  }

  error(message: string, error?: Error, context?: LogContext): void {
    const logData: Record<string, unknown> = {
      namespace: this.namespace
    };

    if (context) {
      logData.context = context;
    }

    if (error) {
      logData.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    this.logger.error(message, logData);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, this.buildLogData(context));
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, this.buildLogData(context));
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, this.buildLogData(context));
  }

  createChild(namespace: string): ILogger {
    return new Logger(`${this.namespace}:${namespace}`, {}, this.logger);
  }

  private buildLogData(context?: LogContext): Record<string, unknown> {
    return context ? { namespace: this.namespace, context } : { namespace: this.namespace };
  }
}
