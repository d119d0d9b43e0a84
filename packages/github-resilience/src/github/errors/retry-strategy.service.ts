import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GitHubLoggerService } from '../logging/github-logger.service';
import { resolveRetryDelay } from './backoff';
import { ErrorAnalyzerService } from './error-analyzer.service';
import {
  AnalysisResult,
  GitHubErrorContext,
  RetryOutcome,
} from './github-error.types';
import { GitHubException } from './github.exception';
import { RetryPolicy, RetryPolicyOptions } from './retry-policy';
import { DEFAULT_RETRY_RUNTIME, RETRY_RUNTIME, RetryRuntime } from './retry-runtime';
import { RetryState } from './retry-state';

export interface RetryOptions {
  /** Policy to apply; plain options are merged over the configured default */
  policy?: RetryPolicy | RetryPolicyOptions;

  /** Operation name used in logs */
  operation?: string;

  /** Metadata attached to logs and to the final error */
  context?: GitHubErrorContext;
}

type Decision =
  | { kind: 'retry'; delayMs: number }
  | { kind: 'fail'; outcome: RetryOutcome };

/**
 * Retry Strategy Service
 *
 * Runs an asynchronous GitHub operation with bounded retries, exponential
 * backoff with jitter and rate-limit awareness. Every call starts a fresh
 * retry episode; nothing is shared between invocations except the logger.
 */
@Injectable()
export class RetryStrategyService {
  private readonly runtime: RetryRuntime;
  private readonly defaultPolicy: RetryPolicy;

  constructor(
    private readonly analyzer: ErrorAnalyzerService,
    private readonly logger: GitHubLoggerService,
    configService: ConfigService,
    @Optional() @Inject(RETRY_RUNTIME) runtime?: RetryRuntime,
  ) {
    this.runtime = runtime ?? DEFAULT_RETRY_RUNTIME;
    this.defaultPolicy = new RetryPolicy(
      configService.get<RetryPolicyOptions>('github.retry', {}),
    );
  }

  /**
   * Policy used when a call does not provide a complete one
   */
  getDefaultPolicy(): RetryPolicy {
    return this.defaultPolicy;
  }

  /**
   * Execute an operation, retrying transient failures.
   *
   * @returns The value of the first successful attempt
   * @throws GitHubException wrapping the last failure, with `attempt`,
   *   `total_delay_ms` and `outcome` in its context
   */
  async executeWithRetry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    const policy = this.resolvePolicy(options.policy);
    const operationName = options.operation ?? 'github.operation';
    const context = options.context ?? {};
    const state = new RetryState(this.runtime.now());

    for (;;) {
      const attempt = state.beginAttempt();
      this.logger.debug(`Attempt ${attempt}/${policy.maxAttempts} for ${operationName}`, {
        ...context,
        operation: operationName,
        attempt,
      });

      try {
        const result = await operation();
        if (attempt > 1) {
          this.logger.info(`${operationName} succeeded after ${attempt} attempts`, {
            ...context,
            operation: operationName,
            attempt,
            total_delay_ms: state.totalDelayMs,
          });
        }
        return result;
      } catch (error) {
        const analysis = this.analyzer.analyze(error);
        state.recordFailure(error);

        const decision = this.decide(policy, state, analysis);
        if (decision.kind === 'fail') {
          throw this.fail(error, state, decision.outcome, operationName, context, analysis);
        }

        this.logger.debug(
          `Retrying ${operationName} in ${decision.delayMs}ms after ${analysis.error_type}`,
          {
            ...context,
            operation: operationName,
            attempt,
            delay_ms: decision.delayMs,
            error_type: analysis.error_type,
          },
        );
        await this.runtime.sleep(decision.delayMs);
        state.recordDelay(decision.delayMs);
      }
    }
  }

  /**
   * Return a function with the same signature that retries on failure.
   * The policy is resolved once, so invalid options throw here.
   */
  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options: RetryOptions = {},
  ): (...args: A) => Promise<R> {
    const resolved: RetryOptions = { ...options, policy: this.resolvePolicy(options.policy) };
    return (...args: A) => this.executeWithRetry(() => fn(...args), resolved);
  }

  /**
   * Default policy, the given instance, or plain options merged over the default
   */
  resolvePolicy(policy: RetryPolicy | RetryPolicyOptions | undefined): RetryPolicy {
    if (policy === undefined) {
      return this.defaultPolicy;
    }
    return policy instanceof RetryPolicy ? policy : this.defaultPolicy.withOverrides(policy);
  }

  private decide(policy: RetryPolicy, state: RetryState, analysis: AnalysisResult): Decision {
    if (!analysis.is_retryable) {
      return { kind: 'fail', outcome: 'non_retryable' };
    }
    if (state.attempt >= policy.maxAttempts) {
      return { kind: 'fail', outcome: 'max_attempts' };
    }

    const delayMs = resolveRetryDelay(policy, state.attempt, analysis, () =>
      this.runtime.random(),
    );
    if (
      policy.timeoutMs !== null &&
      state.elapsedMs(this.runtime.now()) + delayMs > policy.timeoutMs
    ) {
      return { kind: 'fail', outcome: 'timeout' };
    }

    return { kind: 'retry', delayMs };
  }

  private fail(
    error: unknown,
    state: RetryState,
    outcome: RetryOutcome,
    operationName: string,
    context: GitHubErrorContext,
    analysis: AnalysisResult,
  ): GitHubException {
    const exception = this.analyzer.toException(
      error,
      { ...context, attempt: state.attempt, total_delay_ms: state.totalDelayMs, outcome },
      { analysis },
    );

    this.logger.error(
      `${operationName} failed after ${state.attempt} attempt(s): ${exception.message}`,
      exception,
      {
        operation: operationName,
        outcome,
        suggested_action: analysis.suggested_action,
      },
    );
    return exception;
  }
}
