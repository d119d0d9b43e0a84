import { Test, TestingModule } from '@nestjs/testing';
import { FakeRetryRuntime } from '../../testing/fake-retry-runtime';
import { ErrorAnalyzerService } from './error-analyzer.service';
import { GitHubErrorType } from './github-error.types';
import {
  GitHubAuthenticationException,
  GitHubNetworkException,
  GitHubRateLimitException,
  GitHubServerException,
} from './github.exception';
import { RETRY_RUNTIME } from './retry-runtime';

describe('ErrorAnalyzerService', () => {
  let service: ErrorAnalyzerService;
  let runtime: FakeRetryRuntime;

  beforeEach(async () => {
    runtime = new FakeRetryRuntime(1_700_000_000_000);

    const module: TestingModule = await Test.createTestingModule({
      providers: [ErrorAnalyzerService, { provide: RETRY_RUNTIME, useValue: runtime }],
    }).compile();

    service = module.get<ErrorAnalyzerService>(ErrorAnalyzerService);
  });

  describe('Rate limit errors', () => {
    it('should compute the delay from x-ratelimit-reset', () => {
      const error = {
        response: {
          status: 429,
          headers: { 'x-ratelimit-reset': '1700000005' },
        },
        message: 'API rate limit exceeded',
      };

      const result = service.analyze(error);

      expect(result.error_type).toBe(GitHubErrorType.RATE_LIMIT);
      expect(result.is_retryable).toBe(true);
      expect(result.is_rate_limit_error).toBe(true);
      expect(result.retry_delay_ms).toBe(5000);
      expect(result.status_code).toBe(429);
      expect(result.recovery_suggestions).toEqual([
        'wait for rate limit reset',
        'use a different token',
        'batch requests',
      ]);
    });

    it('should detect an exhausted quota on 403 with mixed-case headers', () => {
      const error = {
        status: 403,
        headers: { 'X-RateLimit-Remaining': '0', 'X-RateLimit-Reset': '1700000030' },
        message: 'Forbidden',
      };

      const result = service.analyze(error);

      expect(result.error_type).toBe(GitHubErrorType.RATE_LIMIT);
      expect(result.retry_delay_ms).toBe(30000);
    });

    it('should prefer retry-after seconds', () => {
      const result = service.analyze({
        status: 403,
        response: { headers: { 'retry-after': '60' } },
        message: 'You have exceeded a secondary rate limit',
      });

      expect(result.error_type).toBe(GitHubErrorType.RATE_LIMIT);
      expect(result.retry_delay_ms).toBe(60000);
    });

    it('should never propose a negative delay for a past reset', () => {
      const result = service.analyze({
        status: 429,
        headers: { 'x-ratelimit-reset': '1699999990' },
      });

      expect(result.retry_delay_ms).toBe(0);
    });

    it('should treat 429 without headers as a rate limit without delay', () => {
      const result = service.analyze({ status: 429 });

      expect(result.error_type).toBe(GitHubErrorType.RATE_LIMIT);
      expect(result.retry_delay_ms).toBeUndefined();
      expect(result.is_retryable).toBe(true);
    });

    it('should detect a secondary rate limit from a 403 message', () => {
      const result = service.analyze({
        status: 403,
        message: 'You have exceeded a secondary rate limit.',
      });

      expect(result.error_type).toBe(GitHubErrorType.RATE_LIMIT);
      expect(result.retry_delay_ms).toBeUndefined();
    });
  });

  describe('Authentication errors', () => {
    it('should classify 401 as not retryable', () => {
      const result = service.analyze({ status: 401, message: 'Bad credentials' });

      expect(result.error_type).toBe(GitHubErrorType.AUTH);
      expect(result.is_retryable).toBe(false);
      expect(result.is_authentication_error).toBe(true);
      expect(result.recovery_suggestions).toEqual([
        'verify token validity',
        'check token scopes',
        'regenerate token',
      ]);
    });

    it('should classify 403 without rate limit signals as authentication', () => {
      const result = service.analyze({
        response: { status: 403, headers: { 'x-ratelimit-remaining': '4999' } },
        message: 'Resource not accessible by integration',
      });

      expect(result.error_type).toBe(GitHubErrorType.AUTH);
      expect(result.is_retryable).toBe(false);
    });

    it('should recognise a bad credentials message without status', () => {
      const result = service.analyze(new Error('Bad credentials'));

      expect(result.error_type).toBe(GitHubErrorType.AUTH);
    });

    it('should never mark authentication errors retryable', () => {
      const errors: unknown[] = [
        { status: 401 },
        { status: 403 },
        { statusCode: '401' },
        new Error('Requires authentication'),
        new GitHubAuthenticationException('token revoked'),
      ];

      for (const error of errors) {
        const result = service.analyze(error);
        expect(result.is_authentication_error).toBe(true);
        expect(result.is_retryable).toBe(false);
      }
    });
  });

  describe('Network errors', () => {
    it('should classify connection resets', () => {
      const error = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });

      const result = service.analyze(error);

      expect(result.error_type).toBe(GitHubErrorType.NETWORK);
      expect(result.is_retryable).toBe(true);
      expect(result.retry_delay_ms).toBeUndefined();
      expect(result.status_code).toBeUndefined();
    });

    it('should look at the cause of a wrapped error', () => {
      const error = new Error('fetch failed', {
        cause: Object.assign(new Error('connect'), { code: 'ETIMEDOUT' }),
      });

      const result = service.analyze(error);
      const exception = service.toException(error);

      expect(result.error_type).toBe(GitHubErrorType.NETWORK);
      expect(exception).toBeInstanceOf(GitHubNetworkException);
      expect(exception instanceof GitHubNetworkException && exception.isTimeout).toBe(true);
    });

    it('should recognise timeout messages', () => {
      const result = service.analyze(new Error('Request timed out'));

      expect(result.error_type).toBe(GitHubErrorType.NETWORK);
    });

    it('should not read timeout inside other words', () => {
      const result = service.analyze(new Error('invalid runtime output format'));

      expect(result.error_type).toBe(GitHubErrorType.UNKNOWN);
    });

    it('should recognise timeout error names', () => {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';

      expect(service.analyze(error).error_type).toBe(GitHubErrorType.NETWORK);
    });
  });

  describe('Server errors', () => {
    it('should classify 5xx as retryable server errors', () => {
      const result = service.analyze({ response: { status: 502 }, message: 'Bad Gateway' });

      expect(result.error_type).toBe(GitHubErrorType.SERVER);
      expect(result.is_retryable).toBe(true);
      expect(result.status_code).toBe(502);
    });

    it('should recognise a server error message without status', () => {
      const result = service.analyze(new Error('Internal Server Error'));

      expect(result.error_type).toBe(GitHubErrorType.SERVER);
    });
  });

  describe('Not found errors', () => {
    it('should classify 404 as not retryable', () => {
      const result = service.analyze({ status: 404, message: 'Not Found' });

      expect(result.error_type).toBe(GitHubErrorType.NOT_FOUND);
      expect(result.is_retryable).toBe(false);
      expect(result.is_authentication_error).toBe(false);
    });
  });

  describe('Unknown errors', () => {
    it('should retry unrecognised errors', () => {
      const result = service.analyze(new Error('something odd happened'));

      expect(result).toEqual({
        error_type: GitHubErrorType.UNKNOWN,
        is_retryable: true,
        is_rate_limit_error: false,
        is_authentication_error: false,
        suggested_action: 'Retry the operation',
        recovery_suggestions: ['retry the operation'],
      });
    });

    it('should handle values that are not errors', () => {
      expect(service.analyze(undefined).error_type).toBe(GitHubErrorType.UNKNOWN);
      expect(service.analyze(42).error_type).toBe(GitHubErrorType.UNKNOWN);
    });
  });

  describe('Existing GitHub exceptions', () => {
    it('should keep the variant and delay of a rate limit exception', () => {
      const result = service.analyze(
        new GitHubRateLimitException('limit', { retryAfterMs: 3000 }),
      );

      expect(result.error_type).toBe(GitHubErrorType.RATE_LIMIT);
      expect(result.retry_delay_ms).toBe(3000);
    });

    it('should add context on a copy and leave the original untouched', () => {
      const original = new GitHubServerException('server', { context: { repository: 'hw1' } });

      const exception = service.toException(original, { attempt: 2 });

      expect(exception).not.toBe(original);
      expect(exception).toBeInstanceOf(GitHubServerException);
      expect(exception.message).toBe('server');
      expect(exception.cause).toBe(original);
      expect(exception.context).toEqual({ repository: 'hw1', attempt: 2 });
      expect(original.context).toEqual({ repository: 'hw1' });
    });

    it('should keep the delay of a copied rate limit exception', () => {
      const original = new GitHubRateLimitException('limit', { retryAfterMs: 3000 });

      const exception = service.toException(original, { repository: 'hw1-alice' });

      expect(exception instanceof GitHubRateLimitException && exception.retryAfterMs).toBe(3000);
    });

    it('should return the exception itself when there is nothing to add', () => {
      const original = new GitHubServerException('server');

      expect(service.toException(original)).toBe(original);
      expect(service.toException(original, {})).toBe(original);
    });
  });

  describe('toException', () => {
    it('should wrap a raw error with its analysis and context', () => {
      const cause = { status: 401, message: 'Bad credentials' };

      const exception = service.toException(cause, { organization: 'acme-classroom' });

      expect(exception).toBeInstanceOf(GitHubAuthenticationException);
      expect(exception.message).toBe('Bad credentials');
      expect(exception.statusCode).toBe(401);
      expect(exception.cause).toBe(cause);
      expect(exception.context).toEqual({ organization: 'acme-classroom' });
    });

    it('should use an explicit message', () => {
      const cause = { status: 500 };

      const exception = service.toException(cause, undefined, { message: 'Could not add ta-carol' });

      expect(exception).toBeInstanceOf(GitHubServerException);
      expect(exception.message).toBe('Could not add ta-carol');
      expect(exception.cause).toBe(cause);
    });
  });

  it('should return equal results for the same error at the same instant', () => {
    const error = {
      status: 429,
      headers: { 'x-ratelimit-reset': '1700000010' },
    };

    expect(service.analyze(error)).toEqual(service.analyze(error));
  });
});
