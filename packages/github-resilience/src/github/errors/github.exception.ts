import { HttpException, HttpStatus } from '@nestjs/common';
import {
  GitHubErrorContext,
  GitHubErrorDetails,
  GitHubErrorType,
} from './github-error.types';

/**
 * Recovery suggestions used when the raiser does not supply any
 */
export const DEFAULT_RECOVERY_SUGGESTIONS: Readonly<
  Record<GitHubErrorType, readonly string[]>
> = {
  [GitHubErrorType.AUTH]: [
    'verify token validity',
    'check token scopes',
    'regenerate token',
  ],
  [GitHubErrorType.RATE_LIMIT]: [
    'wait for rate limit reset',
    'use a different token',
    'batch requests',
  ],
  [GitHubErrorType.NOT_FOUND]: [
    'verify the repository or resource name',
    'check that the token can access the organization',
  ],
  [GitHubErrorType.NETWORK]: [
    'check network connectivity',
    'retry the operation',
  ],
  [GitHubErrorType.SERVER]: [
    'check https://www.githubstatus.com for incidents',
    'retry the operation later',
  ],
  [GitHubErrorType.DISCOVERY]: [
    'verify the organization name and assignment prefix',
  ],
  [GitHubErrorType.UNKNOWN]: ['retry the operation'],
};

export interface GitHubExceptionOptions {
  context?: GitHubErrorContext;
  cause?: unknown;
  suggestions?: readonly string[];
  statusCode?: number;
}

/**
 * Base exception class for GitHub API errors.
 * Extends NestJS HttpException and doubles as the
 * generic (unclassified) variant.
 */
export class GitHubException extends HttpException {
  readonly type: GitHubErrorType;
  readonly context: GitHubErrorContext;
  readonly suggestions: string[];
  readonly statusCode?: number;

  constructor(
    message: string,
    options: GitHubExceptionOptions = {},
    type: GitHubErrorType = GitHubErrorType.UNKNOWN,
  ) {
    super(message, GitHubException.mapTypeToStatus(type), {
      cause: options.cause,
    });

    this.type = type;
    this.context = { ...(options.context ?? {}) };
    this.suggestions =
      options.suggestions && options.suggestions.length > 0
        ? [...options.suggestions]
        : [...DEFAULT_RECOVERY_SUGGESTIONS[type]];
    this.statusCode = options.statusCode;

    // Maintain proper stack trace for debugging
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Map GitHub error type to HTTP status code
   */
  private static mapTypeToStatus(type: GitHubErrorType): HttpStatus {
    switch (type) {
      case GitHubErrorType.RATE_LIMIT:
        return HttpStatus.TOO_MANY_REQUESTS;
      case GitHubErrorType.AUTH:
        return HttpStatus.UNAUTHORIZED;
      case GitHubErrorType.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case GitHubErrorType.DISCOVERY:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case GitHubErrorType.SERVER:
      case GitHubErrorType.NETWORK:
      case GitHubErrorType.UNKNOWN:
        return HttpStatus.BAD_GATEWAY;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  /**
   * Wrap an arbitrary error into the variant matching `type`
   */
  static fromError(cause: unknown, options: FromErrorOptions): GitHubException {
    const message = options.message ?? describeError(cause);
    const base: GitHubExceptionOptions = {
      context: options.context,
      cause,
      suggestions: options.suggestions,
      statusCode: options.statusCode,
    };

    switch (options.type) {
      case GitHubErrorType.AUTH:
        return new GitHubAuthenticationException(message, base);
      case GitHubErrorType.RATE_LIMIT:
        return new GitHubRateLimitException(message, {
          ...base,
          retryAfterMs: options.retryAfterMs,
          resetAt: options.resetAt,
        });
      case GitHubErrorType.NETWORK:
        return new GitHubNetworkException(message, {
          ...base,
          isTimeout: options.isTimeout,
          isConnectionError: options.isConnectionError,
        });
      case GitHubErrorType.SERVER:
        return new GitHubServerException(message, base);
      case GitHubErrorType.NOT_FOUND:
        return new GitHubNotFoundException(message, base);
      case GitHubErrorType.DISCOVERY:
        return new GitHubDiscoveryException(message, base);
      default:
        return new GitHubException(message, base);
    }
  }

  /**
   * Merge additional metadata into the context and return this exception
   */
  addContext(extra: GitHubErrorContext): this {
    Object.assign(this.context, extra);
    return this;
  }

  /**
   * Copy with merged context and the same variant. This exception becomes
   * the cause of the copy and is left untouched.
   */
  withContext(extra: GitHubErrorContext = {}, message: string = this.message): GitHubException {
    return GitHubException.fromError(this, {
      ...this.variantOptions(),
      type: this.type,
      message,
      context: { ...this.context, ...extra },
      suggestions: this.suggestions,
      statusCode: this.statusCode,
    });
  }

  protected variantOptions(): Partial<FromErrorOptions> {
    return {};
  }

  /**
   * Get detailed error information for logging
   */
  getDetails(): GitHubErrorDetails {
    return {
      type: this.type,
      message: this.message,
      status_code: this.statusCode,
      context: { ...this.context },
      suggestions: [...this.suggestions],
      cause: this.cause === undefined ? undefined : describeError(this.cause),
    };
  }
}

export interface FromErrorOptions extends Omit<GitHubExceptionOptions, 'cause'> {
  type: GitHubErrorType;
  message?: string;
  retryAfterMs?: number;
  resetAt?: Date;
  isTimeout?: boolean;
  isConnectionError?: boolean;
}

/**
 * Authentication/authorization exception
 */
export class GitHubAuthenticationException extends GitHubException {
  readonly tokenType?: string;

  constructor(
    message: string,
    options: GitHubExceptionOptions & { tokenType?: string } = {},
  ) {
    super(message, options, GitHubErrorType.AUTH);
    this.tokenType = options.tokenType;
  }
}

/**
 * Rate limit exceeded exception
 */
export class GitHubRateLimitException extends GitHubException {
  /** Delay requested by GitHub before the next call */
  readonly retryAfterMs?: number;
  readonly resetAt?: Date;

  constructor(
    message: string,
    options: GitHubExceptionOptions & { retryAfterMs?: number; resetAt?: Date } = {},
  ) {
    super(message, options, GitHubErrorType.RATE_LIMIT);
    this.retryAfterMs = options.retryAfterMs;
    this.resetAt = options.resetAt;
  }

  protected variantOptions(): Partial<FromErrorOptions> {
    return { retryAfterMs: this.retryAfterMs, resetAt: this.resetAt };
  }

  getDetails(): GitHubErrorDetails {
    return { ...super.getDetails(), retry_after_ms: this.retryAfterMs };
  }
}

/**
 * Network error exception (timeouts, connection failures)
 */
export class GitHubNetworkException extends GitHubException {
  readonly isTimeout: boolean;
  readonly isConnectionError: boolean;

  constructor(
    message: string,
    options: GitHubExceptionOptions & {
      isTimeout?: boolean;
      isConnectionError?: boolean;
    } = {},
  ) {
    super(message, options, GitHubErrorType.NETWORK);
    this.isTimeout = options.isTimeout ?? false;
    this.isConnectionError = options.isConnectionError ?? false;
  }

  protected variantOptions(): Partial<FromErrorOptions> {
    return { isTimeout: this.isTimeout, isConnectionError: this.isConnectionError };
  }
}

/**
 * Server error exception (5xx)
 */
export class GitHubServerException extends GitHubException {
  constructor(message: string, options: GitHubExceptionOptions = {}) {
    super(message, options, GitHubErrorType.SERVER);
  }
}

export interface RepositoryExceptionOptions extends GitHubExceptionOptions {
  repositoryName?: string;
  operation?: string;
}

/**
 * Failure tied to a single repository (secret deployment, collaborator
 * management, cloning...). Classified as unknown unless a subclass says otherwise.
 */
export class GitHubRepositoryException extends GitHubException {
  readonly repositoryName?: string;
  readonly operation?: string;

  constructor(
    message: string,
    options: RepositoryExceptionOptions = {},
    type: GitHubErrorType = GitHubErrorType.UNKNOWN,
  ) {
    super(
      message,
      {
        ...options,
        context: {
          ...options.context,
          ...compactContext({
            repository: options.repositoryName,
            operation: options.operation,
          }),
        },
      },
      type,
    );
    this.repositoryName = options.repositoryName;
    this.operation = options.operation;
  }
}

/**
 * Repository or resource does not exist
 */
export class GitHubNotFoundException extends GitHubRepositoryException {
  constructor(message: string, options: RepositoryExceptionOptions = {}) {
    super(message, options, GitHubErrorType.NOT_FOUND);
  }
}

/**
 * Secret deployment failure
 */
export class GitHubSecretsException extends GitHubRepositoryException {
  readonly secretName?: string;

  constructor(
    message: string,
    options: RepositoryExceptionOptions & { secretName?: string } = {},
  ) {
    super(message, {
      ...options,
      context: { ...options.context, ...compactContext({ secret: options.secretName }) },
    });
    this.secretName = options.secretName;
  }
}

/**
 * Collaborator management failure
 */
export class GitHubCollaboratorException extends GitHubRepositoryException {
  readonly username?: string;

  constructor(
    message: string,
    options: RepositoryExceptionOptions & { username?: string } = {},
  ) {
    super(message, {
      ...options,
      context: { ...options.context, ...compactContext({ username: options.username }) },
    });
    this.username = options.username;
  }
}

/**
 * Repository discovery failure
 */
export class GitHubDiscoveryException extends GitHubException {
  readonly organization?: string;
  readonly assignmentPrefix?: string;

  constructor(
    message: string,
    options: GitHubExceptionOptions & {
      organization?: string;
      assignmentPrefix?: string;
    } = {},
  ) {
    super(
      message,
      {
        ...options,
        context: {
          ...options.context,
          ...compactContext({
            organization: options.organization,
            assignment_prefix: options.assignmentPrefix,
          }),
        },
      },
      GitHubErrorType.DISCOVERY,
    );
    this.organization = options.organization;
    this.assignmentPrefix = options.assignmentPrefix;
  }
}

export function isGitHubException(error: unknown): error is GitHubException {
  return error instanceof GitHubException;
}

/**
 * Extract a technical message from any thrown value
 */
export function describeError(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (isRecord(error)) {
    if (typeof error.message === 'string' && error.message) {
      return error.message;
    }
    const data = isRecord(error.response) ? error.response.data : undefined;
    if (isRecord(data) && typeof data.message === 'string') {
      return data.message;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }
  return String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function compactContext(
  context: Record<string, string | number | undefined>,
): GitHubErrorContext {
  const result: GitHubErrorContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
