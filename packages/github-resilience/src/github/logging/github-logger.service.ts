import {
  Inject,
  Injectable,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import DailyRotateFile = require('winston-daily-rotate-file');
import { isGitHubException } from '../errors/github.exception';
import { SensitiveDataFilter } from './sensitive-data.filter';

/**
 * Replaces the default transports, mainly for tests
 */
export const GITHUB_LOG_TRANSPORTS = Symbol('GITHUB_LOG_TRANSPORTS');

export type GitHubLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type GitHubLogMetadata = Record<string, unknown>;

export interface GitHubOperationTimer {
  /** Milliseconds since the operation started */
  elapsedMs(): number;
  end(status: 'success' | 'error', error?: unknown, metadata?: GitHubLogMetadata): void;
}

/**
 * GitHub Logger Service
 *
 * Structured winston logger shared by the retry engine and the operation
 * context. Metadata and errors go through SensitiveDataFilter before they
 * reach a transport.
 */
@Injectable()
export class GitHubLoggerService implements OnModuleDestroy {
  private readonly logger: winston.Logger;
  private readonly isDevelopment: boolean;

  constructor(
    private readonly configService: ConfigService,
    @Optional()
    @Inject(GITHUB_LOG_TRANSPORTS)
    transports?: winston.transport[],
  ) {
    this.isDevelopment =
      this.configService.get<string>('app.environment', 'development') === 'development';

    this.logger = winston.createLogger({
      level: this.configService
        .get<string>('logging.level', this.isDevelopment ? 'debug' : 'info')
        .toLowerCase(),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      defaultMeta: { service: 'github-resilience' },
      transports: transports && transports.length > 0 ? transports : this.createTransports(),
      exitOnError: false,
    });

    // Fallback to stderr on logging failure
    this.logger.on('error', (error: Error) => {
      process.stderr.write(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: 'error',
          message: 'Logger error',
          error: error.message,
        }) + '\n',
      );
    });
  }

  private createTransports(): winston.transport[] {
    const transports: winston.transport[] = [];

    if (this.isDevelopment && this.configService.get<string>('logging.format') !== 'json') {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple(),
          ),
        }),
      );
    } else {
      transports.push(new winston.transports.Console());
    }

    const directory = this.configService.get<string>('logging.directory');
    if (directory) {
      transports.push(
        new DailyRotateFile({
          filename: `${directory}/github-operations-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: winston.format.json(),
        }),
      );
    }

    return transports;
  }

  debug(message: string, metadata?: GitHubLogMetadata): void {
    this.write('debug', message, undefined, metadata);
  }

  info(message: string, metadata?: GitHubLogMetadata): void {
    this.write('info', message, undefined, metadata);
  }

  warn(message: string, metadata?: GitHubLogMetadata): void {
    this.write('warn', message, undefined, metadata);
  }

  error(message: string, error?: unknown, metadata?: GitHubLogMetadata): void {
    this.write('error', message, error, metadata);
  }

  /**
   * Start timing an operation; `end` emits one success or error entry
   */
  startOperation(operation: string, metadata?: GitHubLogMetadata): GitHubOperationTimer {
    const startTime = Date.now();

    return {
      elapsedMs: () => Date.now() - startTime,
      end: (status, error, extra) => {
        const entry = {
          ...metadata,
          ...extra,
          operation,
          status,
          duration_ms: Date.now() - startTime,
        };
        if (status === 'error') {
          this.error(`${operation} failed`, error, entry);
        } else {
          this.info(`${operation} completed`, entry);
        }
      },
    };
  }

  private write(
    level: GitHubLogLevel,
    message: string,
    error: unknown,
    metadata: GitHubLogMetadata | undefined,
  ): void {
    const entry: Record<string, unknown> = metadata
      ? SensitiveDataFilter.filterObject(metadata)
      : {};

    if (error !== undefined) {
      entry.error = isGitHubException(error)
        ? SensitiveDataFilter.filter({ ...error.getDetails(), stack: error.stack })
        : SensitiveDataFilter.filter(error);
    }

    this.logger.log({
      ...entry,
      level,
      message: SensitiveDataFilter.filterString(message),
    });
  }

  onModuleDestroy(): void {
    this.logger.end();
  }
}
