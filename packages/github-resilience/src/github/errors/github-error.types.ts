/**
 * GitHub API Error Types
 * Categorizes errors for appropriate handling and retry strategies
 */
export enum GitHubErrorType {
  /**
   * Rate limit exceeded (403/429 with rate limit headers)
   * Retry after reset time from headers
   */
  RATE_LIMIT = 'GITHUB_RATE_LIMIT',

  /**
   * Authentication/authorization failures (401/403)
   * No retry - requires user action
   */
  AUTH = 'GITHUB_AUTH_ERROR',

  /**
   * Repository or resource does not exist (404)
   * No retry - the target is missing
   */
  NOT_FOUND = 'GITHUB_NOT_FOUND',

  /**
   * Server errors (5xx)
   * Retry with exponential backoff
   */
  SERVER = 'GITHUB_SERVER_ERROR',

  /**
   * Network timeouts and connection failures
   * Retry with exponential backoff
   */
  NETWORK = 'GITHUB_NETWORK_ERROR',

  /**
   * Repository discovery failures raised by callers
   */
  DISCOVERY = 'GITHUB_DISCOVERY_ERROR',

  /**
   * Unknown/unclassified errors
   * Retried until attempts run out
   */
  UNKNOWN = 'GITHUB_UNKNOWN_ERROR',
}

/**
 * Authentication failures and missing resources will not succeed on retry.
 * Every other classification, unknown errors included, is retried.
 */
export function isRetryableErrorType(type: GitHubErrorType): boolean {
  return type !== GitHubErrorType.AUTH && type !== GitHubErrorType.NOT_FOUND;
}

/**
 * Free-form metadata attached to an error (repository, organization, attempt...)
 */
export type GitHubErrorContext = Record<string, string | number>;

/**
 * Result of analyzing a raw error
 */
export interface AnalysisResult {
  /** Categorized error type */
  error_type: GitHubErrorType;

  /** Whether re-attempting the operation may succeed */
  is_retryable: boolean;

  is_rate_limit_error: boolean;

  is_authentication_error: boolean;

  /** Short description of what the caller should do next */
  suggested_action: string;

  /** Server-provided delay in milliseconds before the next attempt */
  retry_delay_ms?: number;

  /** Human-readable recovery suggestions, most relevant first */
  recovery_suggestions: string[];

  /** HTTP status code (if applicable) */
  status_code?: number;
}

/**
 * Why the retry engine stopped
 */
export type RetryOutcome = 'non_retryable' | 'max_attempts' | 'timeout';

/**
 * Log-friendly snapshot of a GitHub exception
 */
export interface GitHubErrorDetails {
  type: GitHubErrorType;
  message: string;
  status_code?: number;
  context: GitHubErrorContext;
  suggestions: string[];
  retry_after_ms?: number;
  cause?: string;
}

/**
 * Aggregated view of the failures of a batch operation
 */
export interface GitHubErrorSummary {
  total_errors: number;
  by_type: Record<GitHubErrorType, number>;
  retryable_errors: number;
  /** Fraction of successful operations, only when the total is known */
  success_rate?: number;
  suggestions: string[];
}
