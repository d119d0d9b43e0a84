import { Octokit } from '@octokit/rest';
import { RetryOptions, RetryStrategyService } from './retry-strategy.service';

/**
 * Route every request made by an Octokit client through the retry engine.
 * Each request, pagination pages included, is its own retry episode.
 */
export function installGitHubRetry(
  octokit: Octokit,
  strategy: RetryStrategyService,
  options: RetryOptions = {},
): Octokit {
  octokit.hook.wrap('request', (request, requestOptions) => {
    const route = `${requestOptions.method} ${requestOptions.url}`;
    return strategy.executeWithRetry(async () => request(requestOptions), {
      ...options,
      operation: options.operation ?? route,
      context: { ...options.context, route },
    });
  });
  return octokit;
}
