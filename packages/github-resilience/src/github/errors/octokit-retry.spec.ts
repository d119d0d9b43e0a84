import { ConfigService } from '@nestjs/config';
import { Octokit } from '@octokit/rest';
import { FakeRetryRuntime } from '../../testing/fake-retry-runtime';
import { createMemoryLog } from '../../testing/memory-log';
import { GitHubLoggerService } from '../logging/github-logger.service';
import { ErrorAnalyzerService } from './error-analyzer.service';
import { GitHubException, GitHubNotFoundException } from './github.exception';
import { installGitHubRetry } from './octokit-retry';
import { RetryStrategyService } from './retry-strategy.service';

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

describe('installGitHubRetry', () => {
  let runtime: FakeRetryRuntime;
  let strategy: RetryStrategyService;
  let fetch: jest.Mock;
  let octokit: Octokit;

  beforeEach(() => {
    runtime = new FakeRetryRuntime();
    const configService = new ConfigService({
      app: { environment: 'test' },
      github: { retry: { jitter: false, timeoutMs: null } },
    });
    strategy = new RetryStrategyService(
      new ErrorAnalyzerService(runtime),
      new GitHubLoggerService(configService, [createMemoryLog().transport]),
      configService,
      runtime,
    );

    fetch = jest.fn();
    octokit = new Octokit({
      auth: 'test-secret',
      request: { fetch },
      log: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
    });
    installGitHubRetry(octokit, strategy);
  });

  it('should retry server errors', async () => {
    fetch
      .mockResolvedValueOnce(jsonResponse(502, { message: 'Server Error' }))
      .mockResolvedValueOnce(jsonResponse(200, { name: 'hw1-alice' }));

    const { data } = await octokit.rest.repos.get({ owner: 'acme-classroom', repo: 'hw1-alice' });

    expect(data.name).toBe('hw1-alice');
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(runtime.sleeps).toEqual([1000]);
  });

  it('should wait for the rate limit reset', async () => {
    fetch
      .mockResolvedValueOnce(
        jsonResponse(
          403,
          { message: 'API rate limit exceeded' },
          { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000005' },
        ),
      )
      .mockResolvedValueOnce(jsonResponse(200, { name: 'hw1-alice' }));

    await octokit.rest.repos.get({ owner: 'acme-classroom', repo: 'hw1-alice' });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(runtime.sleeps).toEqual([5000]);
  });

  it('should fail once on missing repositories with the route in context', async () => {
    fetch.mockResolvedValue(jsonResponse(404, { message: 'Not Found' }));

    const error = await octokit.rest.repos
      .get({ owner: 'acme-classroom', repo: 'hw1-missing' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GitHubNotFoundException);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(error instanceof GitHubException && String(error.context.route)).toMatch(
      /^GET \/repos\//,
    );
    expect(error instanceof GitHubException && error.statusCode).toBe(404);
  });
});
