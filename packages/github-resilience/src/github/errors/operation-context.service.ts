import { Injectable } from '@nestjs/common';
import { GitHubLoggerService } from '../logging/github-logger.service';
import { ErrorAnalyzerService } from './error-analyzer.service';
import { GitHubErrorContext } from './github-error.types';
import { GitHubException, isGitHubException } from './github.exception';

/**
 * Handle given to the body of a structured operation
 */
export interface GitHubOperationScope {
  readonly operation: string;
  readonly context: GitHubErrorContext;

  /** Log a success message for the operation */
  success(message: string, metadata?: Record<string, unknown>): void;

  /** Log the failure, convert it into the error taxonomy and throw it */
  error(message: string, cause?: unknown): never;
}

/**
 * Operation Context Service
 *
 * Scoped structured logging around a named GitHub operation. A normal exit
 * emits one completion entry, a failure exactly one error entry and no
 * completion entry, even when the body catches what `scope.error` threw.
 * No retries happen here.
 */
@Injectable()
export class OperationContextService {
  constructor(
    private readonly analyzer: ErrorAnalyzerService,
    private readonly logger: GitHubLoggerService,
  ) {}

  async run<T>(
    operation: string,
    body: (scope: GitHubOperationScope) => Promise<T> | T,
    context: GitHubErrorContext = {},
  ): Promise<T> {
    const timer = this.logger.startOperation(operation, context);
    const reported = new WeakSet<GitHubException>();
    let failureReported = false;

    this.logger.info(`Starting ${operation}`, { ...context, operation });

    const scope: GitHubOperationScope = {
      operation,
      context: { ...context },
      success: (message, metadata) => {
        this.logger.info(message, {
          ...context,
          ...metadata,
          operation,
          duration_ms: timer.elapsedMs(),
        });
      },
      error: (message, cause) => {
        const exception =
          cause === undefined
            ? new GitHubException(message, { context })
            : this.analyzer.toException(cause, context, { message });
        reported.add(exception);
        failureReported = true;
        timer.end('error', exception, { detail: message });
        throw exception;
      },
    };

    let result: T;
    try {
      result = await body(scope);
    } catch (error) {
      if (isGitHubException(error) && reported.has(error)) {
        throw error;
      }
      const exception = this.analyzer.toException(error, context);
      timer.end('error', exception);
      throw exception;
    }

    // A body that caught its own reported error already has its entry
    if (!failureReported) {
      timer.end('success');
    }
    return result;
  }
}
