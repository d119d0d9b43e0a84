const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return !['false', '0', 'no', 'off'].includes(value.toLowerCase());
};

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  jitter: boolean;
  respectRateLimits: boolean;
  timeoutMs: number | null;
}

export interface ResilienceConfig {
  app: {
    environment: string;
    name: string;
  };
  logging: {
    level: string;
    format: string;
    directory?: string;
  };
  github: {
    retry: RetryConfig;
  };
}

export default (): ResilienceConfig => {
  const timeoutMs = parseNumber(process.env.GITHUB_RETRY_TIMEOUT_MS, 30000);

  return {
    app: {
      environment: process.env.NODE_ENV || 'development',
      name: 'GitHub Resilience',
    },
    logging: {
      level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
      format: process.env.LOG_FORMAT || (process.env.NODE_ENV === 'production' ? 'json' : 'pretty'),
      directory: process.env.LOG_DIRECTORY || undefined,
    },
    github: {
      retry: {
        maxAttempts: parseNumber(process.env.GITHUB_RETRY_MAX_ATTEMPTS, 3),
        baseDelayMs: parseNumber(process.env.GITHUB_RETRY_BASE_DELAY_MS, 1000),
        maxDelayMs: parseNumber(process.env.GITHUB_RETRY_MAX_DELAY_MS, 60000),
        exponentialBase: parseNumber(process.env.GITHUB_RETRY_EXPONENTIAL_BASE, 2),
        jitter: parseBoolean(process.env.GITHUB_RETRY_JITTER, true),
        respectRateLimits: parseBoolean(process.env.GITHUB_RETRY_RESPECT_RATE_LIMITS, true),
        // 0 disables the overall timeout
        timeoutMs: timeoutMs === 0 ? null : timeoutMs,
      },
    },
  };
};
