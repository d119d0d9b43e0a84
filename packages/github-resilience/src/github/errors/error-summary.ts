import {
  GitHubErrorSummary,
  GitHubErrorType,
  isRetryableErrorType,
} from './github-error.types';
import { GitHubException } from './github.exception';

/**
 * Aggregate the failures of a batch operation per error type.
 * `success_rate` is only computed when the total number of operations is known.
 */
export function summarizeGitHubErrors(
  errors: readonly GitHubException[],
  totalOperations?: number,
): GitHubErrorSummary {
  const byType: Record<GitHubErrorType, number> = {
    [GitHubErrorType.RATE_LIMIT]: 0,
    [GitHubErrorType.AUTH]: 0,
    [GitHubErrorType.NOT_FOUND]: 0,
    [GitHubErrorType.SERVER]: 0,
    [GitHubErrorType.NETWORK]: 0,
    [GitHubErrorType.DISCOVERY]: 0,
    [GitHubErrorType.UNKNOWN]: 0,
  };
  const suggestions = new Set<string>();
  let retryable = 0;

  for (const error of errors) {
    byType[error.type] += 1;
    if (isRetryableErrorType(error.type)) {
      retryable += 1;
    }
    error.suggestions.forEach((suggestion) => suggestions.add(suggestion));
  }

  const summary: GitHubErrorSummary = {
    total_errors: errors.length,
    by_type: byType,
    retryable_errors: retryable,
    suggestions: [...suggestions],
  };

  if (totalOperations !== undefined && totalOperations > 0) {
    summary.success_rate = Math.max(0, totalOperations - errors.length) / totalOperations;
  }
  return summary;
}
