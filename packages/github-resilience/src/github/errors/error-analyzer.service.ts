import { Inject, Injectable, Optional } from '@nestjs/common';
import {
  AnalysisResult,
  GitHubErrorContext,
  GitHubErrorType,
  isRetryableErrorType,
} from './github-error.types';
import {
  DEFAULT_RECOVERY_SUGGESTIONS,
  GitHubException,
  GitHubRateLimitException,
  isGitHubException,
  isRecord,
} from './github.exception';
import { DEFAULT_RETRY_RUNTIME, RETRY_RUNTIME, RetryRuntime } from './retry-runtime';

const NETWORK_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);

const NETWORK_ERROR_NAMES = new Set([
  'TimeoutError',
  'AbortError',
  'NetworkError',
  'FetchError',
  'ConnectionError',
]);

const RATE_LIMIT_MESSAGE = /rate limit/;
const TIMEOUT_MESSAGE = /\btime(?:d)? ?out\b/;
const NETWORK_MESSAGE = /network|connection|socket hang up/;
const SERVER_MESSAGE = /server error|bad gateway|service unavailable|gateway timeout/;
const AUTH_MESSAGE = /bad credentials|requires authentication|unauthorized/;
const NOT_FOUND_MESSAGE = /not found/;

const SUGGESTED_ACTIONS: Record<GitHubErrorType, string> = {
  [GitHubErrorType.RATE_LIMIT]: 'Wait for the rate limit to reset before retrying',
  [GitHubErrorType.AUTH]: 'Check the GitHub token and its scopes',
  [GitHubErrorType.NOT_FOUND]: 'Verify that the repository or resource exists',
  [GitHubErrorType.NETWORK]: 'Retry once network connectivity is restored',
  [GitHubErrorType.SERVER]: 'Retry later, GitHub reported a server error',
  [GitHubErrorType.DISCOVERY]: 'Check the discovery parameters',
  [GitHubErrorType.UNKNOWN]: 'Retry the operation',
};

export interface ToExceptionOptions {
  /** Reuse an analysis already made for this error */
  analysis?: AnalysisResult;
  /** Replaces the message taken from the error */
  message?: string;
}

interface NetworkFailure {
  isTimeout: boolean;
  isConnectionError: boolean;
}

/**
 * Error Analyzer Service
 *
 * Classifies raw errors from the GitHub API or the network layer into the
 * error taxonomy, decides retryability and proposes a server-driven delay.
 * Pure apart from reading the injected clock.
 */
@Injectable()
export class ErrorAnalyzerService {
  private readonly runtime: RetryRuntime;

  constructor(@Optional() @Inject(RETRY_RUNTIME) runtime?: RetryRuntime) {
    this.runtime = runtime ?? DEFAULT_RETRY_RUNTIME;
  }

  /**
   * Analyze an error
   *
   * @param error - Raw error thrown by an API call, or an existing GitHubException
   */
  analyze(error: unknown): AnalysisResult {
    if (isGitHubException(error)) {
      return this.analyzeGitHubException(error);
    }

    const statusCode = this.extractStatusCode(error);
    const headers = this.extractHeaders(error);
    const message = this.extractMessage(error);

    if (this.isRateLimited(statusCode, headers, message)) {
      return this.buildResult(GitHubErrorType.RATE_LIMIT, {
        statusCode,
        retryDelayMs: this.extractRetryDelay(headers),
      });
    }

    if (
      statusCode === 401 ||
      statusCode === 403 ||
      (statusCode === undefined && AUTH_MESSAGE.test(message))
    ) {
      return this.buildResult(GitHubErrorType.AUTH, { statusCode });
    }

    if (this.detectNetworkFailure(error)) {
      return this.buildResult(GitHubErrorType.NETWORK, { statusCode });
    }

    if (
      (statusCode !== undefined && statusCode >= 500 && statusCode < 600) ||
      SERVER_MESSAGE.test(message)
    ) {
      return this.buildResult(GitHubErrorType.SERVER, { statusCode });
    }

    if (statusCode === 404 || NOT_FOUND_MESSAGE.test(message)) {
      return this.buildResult(GitHubErrorType.NOT_FOUND, { statusCode });
    }

    // Unrecognized errors are assumed transient
    return this.buildResult(GitHubErrorType.UNKNOWN, { statusCode });
  }

  /**
   * Analyze an error and wrap it into the matching taxonomy variant.
   * An existing GitHubException is returned as is when there is nothing to
   * add, otherwise as a copy whose cause is the original.
   */
  toException(
    error: unknown,
    context?: GitHubErrorContext,
    options: ToExceptionOptions = {},
  ): GitHubException {
    if (isGitHubException(error)) {
      const hasContext = context !== undefined && Object.keys(context).length > 0;
      return hasContext || options.message !== undefined
        ? error.withContext(context, options.message)
        : error;
    }

    const analysis = options.analysis ?? this.analyze(error);
    const network = this.detectNetworkFailure(error);
    return GitHubException.fromError(error, {
      type: analysis.error_type,
      message: options.message,
      context,
      suggestions: analysis.recovery_suggestions,
      statusCode: analysis.status_code,
      retryAfterMs: analysis.retry_delay_ms,
      isTimeout: network?.isTimeout,
      isConnectionError: network?.isConnectionError,
    });
  }

  private analyzeGitHubException(error: GitHubException): AnalysisResult {
    return this.buildResult(error.type, {
      statusCode: error.statusCode,
      retryDelayMs:
        error instanceof GitHubRateLimitException ? error.retryAfterMs : undefined,
      suggestions: error.suggestions,
    });
  }

  private buildResult(
    type: GitHubErrorType,
    options: {
      statusCode?: number;
      retryDelayMs?: number;
      suggestions?: readonly string[];
    },
  ): AnalysisResult {
    const result: AnalysisResult = {
      error_type: type,
      is_retryable: isRetryableErrorType(type),
      is_rate_limit_error: type === GitHubErrorType.RATE_LIMIT,
      is_authentication_error: type === GitHubErrorType.AUTH,
      suggested_action: SUGGESTED_ACTIONS[type],
      recovery_suggestions: [
        ...(options.suggestions && options.suggestions.length > 0
          ? options.suggestions
          : DEFAULT_RECOVERY_SUGGESTIONS[type]),
      ],
    };

    if (options.retryDelayMs !== undefined) {
      result.retry_delay_ms = options.retryDelayMs;
    }
    if (options.statusCode !== undefined) {
      result.status_code = options.statusCode;
    }
    return result;
  }

  /**
   * Rate limits arrive as 429, or as 403 carrying exhausted quota headers
   */
  private isRateLimited(
    statusCode: number | undefined,
    headers: Record<string, string>,
    message: string,
  ): boolean {
    if (statusCode === 429) {
      return true;
    }
    if (statusCode === 403) {
      return (
        headers['x-ratelimit-remaining'] === '0' ||
        headers['retry-after'] !== undefined ||
        RATE_LIMIT_MESSAGE.test(message)
      );
    }
    return statusCode === undefined && RATE_LIMIT_MESSAGE.test(message);
  }

  /**
   * Delay requested by GitHub, from Retry-After or X-RateLimit-Reset
   */
  private extractRetryDelay(headers: Record<string, string>): number | undefined {
    const retryAfter = headers['retry-after'];
    if (retryAfter !== undefined) {
      const seconds = Number(retryAfter);
      if (Number.isFinite(seconds)) {
        return Math.max(0, seconds * 1000);
      }
    }

    const resetHeader = headers['x-ratelimit-reset'];
    if (resetHeader !== undefined) {
      const resetTime = Number.parseInt(resetHeader, 10);
      if (!Number.isNaN(resetTime)) {
        return Math.max(0, resetTime * 1000 - this.runtime.now());
      }
    }

    return undefined;
  }

  /**
   * Extract HTTP status code from error object
   */
  private extractStatusCode(error: unknown): number | undefined {
    if (!isRecord(error)) {
      return undefined;
    }
    const candidates = [
      isRecord(error.response) ? error.response.status : undefined,
      error.status,
      error.statusCode,
    ];
    for (const candidate of candidates) {
      const status = typeof candidate === 'string' ? Number(candidate) : candidate;
      if (typeof status === 'number' && Number.isInteger(status) && status >= 100) {
        return status;
      }
    }
    return undefined;
  }

  /**
   * Response headers with lower-cased names
   */
  private extractHeaders(error: unknown): Record<string, string> {
    if (!isRecord(error)) {
      return {};
    }
    const raw = isRecord(error.response) && isRecord(error.response.headers)
      ? error.response.headers
      : error.headers;
    const headers: Record<string, string> = {};
    if (!isRecord(raw)) {
      return headers;
    }
    for (const [name, value] of Object.entries(raw)) {
      if (typeof value === 'string' || typeof value === 'number') {
        headers[name.toLowerCase()] = String(value);
      } else if (Array.isArray(value) && value.length > 0) {
        headers[name.toLowerCase()] = String(value[0]);
      }
    }
    return headers;
  }

  private extractMessage(error: unknown): string {
    if (typeof error === 'string') {
      return error.toLowerCase();
    }
    if (!isRecord(error)) {
      return '';
    }
    if (typeof error.message === 'string' && error.message) {
      return error.message.toLowerCase();
    }
    const data = isRecord(error.response) ? error.response.data : undefined;
    if (isRecord(data) && typeof data.message === 'string') {
      return data.message.toLowerCase();
    }
    return '';
  }

  /**
   * Check if error is a network error, looking one level into `cause`
   */
  private detectNetworkFailure(error: unknown): NetworkFailure | undefined {
    const direct = this.inspectNetworkSignals(error);
    if (direct) {
      return direct;
    }
    return isRecord(error) ? this.inspectNetworkSignals(error.cause) : undefined;
  }

  private inspectNetworkSignals(error: unknown): NetworkFailure | undefined {
    if (!isRecord(error)) {
      return undefined;
    }

    const code = typeof error.code === 'string' ? error.code : undefined;
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return {
        isTimeout: TIMEOUT_ERROR_CODES.has(code),
        isConnectionError: !TIMEOUT_ERROR_CODES.has(code),
      };
    }

    const name = typeof error.name === 'string' ? error.name : '';
    const message = this.extractMessage(error);
    const isTimeout =
      name === 'TimeoutError' || name === 'AbortError' || TIMEOUT_MESSAGE.test(message);
    const isConnectionError = NETWORK_MESSAGE.test(message);

    if (NETWORK_ERROR_NAMES.has(name) || isTimeout || isConnectionError) {
      return { isTimeout, isConnectionError };
    }
    return undefined;
  }
}
