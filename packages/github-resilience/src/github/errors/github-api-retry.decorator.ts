import { ConfigService } from '@nestjs/config';
import configuration from '../../config/configuration';
import { GitHubLoggerService } from '../logging/github-logger.service';
import { ErrorAnalyzerService } from './error-analyzer.service';
import { isRecord } from './github.exception';
import { RetryPolicy } from './retry-policy';
import { RetryOptions, RetryStrategyService } from './retry-strategy.service';

let standaloneStrategy: RetryStrategyService | undefined;

/**
 * Engine used outside of dependency injection, configured from the environment
 */
export function getStandaloneRetryStrategy(): RetryStrategyService {
  if (!standaloneStrategy) {
    const configService = new ConfigService(configuration());
    standaloneStrategy = new RetryStrategyService(
      new ErrorAnalyzerService(),
      new GitHubLoggerService(configService),
      configService,
    );
  }
  return standaloneStrategy;
}

/**
 * Wrap an async function so each call runs with the retry contract.
 * The returned function has the same signature as `fn`; the policy is
 * resolved here, once.
 */
export function withGitHubRetry<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: RetryOptions = {},
  strategy?: RetryStrategyService,
): (...args: A) => Promise<R> {
  return (strategy ?? getStandaloneRetryStrategy()).wrap(fn, {
    operation: fn.name || undefined,
    ...options,
  });
}

/**
 * Method decorator applying the retry contract to an async method.
 *
 * Uses the instance's `retryStrategy` property when it holds a
 * RetryStrategyService (e.g. injected by Nest), the standalone engine otherwise.
 * Plain policy options must form a valid policy on their own; invalid ones
 * throw when the class is defined.
 *
 * @example
 * class RepositoryDiscovery {
 *   constructor(readonly retryStrategy: RetryStrategyService) {}
 *
 *   @GitHubApiRetry({ policy: { maxAttempts: 5 } })
 *   async listRepositories(org: string) { ... }
 * }
 */
export function GitHubApiRetry(options: RetryOptions = {}) {
  if (options.policy !== undefined && !(options.policy instanceof RetryPolicy)) {
    // throws RetryPolicyValidationError
    new RetryPolicy(options.policy);
  }

  return function <A extends unknown[], R>(
    target: object,
    propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: A) => Promise<R>>,
  ): void {
    const original = descriptor.value;
    if (!original) {
      return;
    }

    const operation = options.operation ?? `${target.constructor.name}.${String(propertyKey)}`;
    const policies = new WeakMap<RetryStrategyService, RetryPolicy>();

    const policyFor = (strategy: RetryStrategyService): RetryPolicy => {
      let policy = policies.get(strategy);
      if (!policy) {
        policy = strategy.resolvePolicy(options.policy);
        policies.set(strategy, policy);
      }
      return policy;
    };

    descriptor.value = function (this: unknown, ...args: A): Promise<R> {
      const strategy = resolveStrategy(this);
      return strategy.executeWithRetry(() => original.apply(this, args), {
        ...options,
        operation,
        policy: policyFor(strategy),
      });
    };
  };
}

function resolveStrategy(instance: unknown): RetryStrategyService {
  if (isRecord(instance) && instance.retryStrategy instanceof RetryStrategyService) {
    return instance.retryStrategy;
  }
  return getStandaloneRetryStrategy();
}
