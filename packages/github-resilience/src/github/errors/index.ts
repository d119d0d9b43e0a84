/**
 * GitHub Error Handling
 *
 * - Error taxonomy with recovery suggestions
 * - Error analysis (rate limit, auth, network, server, not found)
 * - Retries with exponential backoff, jitter and rate-limit awareness
 * - Structured operation logging
 */

export * from './github-error.types';
export * from './github.exception';
export * from './retry-runtime';
export * from './retry-policy';
export * from './backoff';
export * from './error-analyzer.service';
export * from './retry-strategy.service';
export * from './github-api-retry.decorator';
export * from './operation-context.service';
export * from './error-summary';
export * from './octokit-retry';
export * from './github-error-handler.module';
