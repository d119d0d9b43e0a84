import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  Min,
  ValidationError,
  validateSync,
} from 'class-validator';

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts?: number;

  /** Delay before the first retry */
  baseDelayMs?: number;

  /** Upper bound for the exponential component */
  maxDelayMs?: number;

  exponentialBase?: number;

  /** Randomize each delay by ±10% */
  jitter?: boolean;

  /** Wait at least as long as GitHub asks when rate limited */
  respectRateLimits?: boolean;

  /** Overall budget for attempts and sleeps; null disables it */
  timeoutMs?: number | null;
}

export const DEFAULT_RETRY_POLICY_OPTIONS: Readonly<Required<RetryPolicyOptions>> = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  exponentialBase: 2,
  jitter: true,
  respectRateLimits: true,
  timeoutMs: 30000,
};

/**
 * Thrown when a retry policy is constructed with invalid values
 */
export class RetryPolicyValidationError extends Error {
  constructor(public readonly violations: string[]) {
    super(`Invalid retry policy: ${violations.join('; ')}`);
    this.name = 'RetryPolicyValidationError';
  }
}

/**
 * Immutable retry configuration shared by every invocation of a call site
 */
export class RetryPolicy {
  @IsInt()
  @Min(1)
  readonly maxAttempts: number;

  @IsNumber()
  @IsPositive()
  readonly baseDelayMs: number;

  @IsNumber()
  readonly maxDelayMs: number;

  @IsNumber()
  readonly exponentialBase: number;

  @IsBoolean()
  readonly jitter: boolean;

  @IsBoolean()
  readonly respectRateLimits: boolean;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  readonly timeoutMs: number | null;

  constructor(options: RetryPolicyOptions = {}) {
    const merged = { ...DEFAULT_RETRY_POLICY_OPTIONS, ...stripUndefined(options) };
    this.maxAttempts = merged.maxAttempts;
    this.baseDelayMs = merged.baseDelayMs;
    this.maxDelayMs = merged.maxDelayMs;
    this.exponentialBase = merged.exponentialBase;
    this.jitter = merged.jitter;
    this.respectRateLimits = merged.respectRateLimits;
    this.timeoutMs = merged.timeoutMs;

    const violations = this.collectViolations();
    if (violations.length > 0) {
      throw new RetryPolicyValidationError(violations);
    }

    Object.freeze(this);
  }

  /**
   * Create a new policy with some values replaced
   */
  withOverrides(options: RetryPolicyOptions): RetryPolicy {
    return new RetryPolicy({ ...this.toOptions(), ...stripUndefined(options) });
  }

  toOptions(): Required<RetryPolicyOptions> {
    return {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      exponentialBase: this.exponentialBase,
      jitter: this.jitter,
      respectRateLimits: this.respectRateLimits,
      timeoutMs: this.timeoutMs,
    };
  }

  private collectViolations(): string[] {
    const violations = flattenConstraints(validateSync(this));

    if (
      Number.isFinite(this.maxDelayMs) &&
      Number.isFinite(this.baseDelayMs) &&
      this.maxDelayMs < this.baseDelayMs
    ) {
      violations.push('maxDelayMs must not be less than baseDelayMs');
    }
    if (!(this.exponentialBase > 1)) {
      violations.push('exponentialBase must be greater than 1');
    }
    return violations;
  }
}

function flattenConstraints(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => Object.values(error.constraints ?? {}));
}

function stripUndefined(options: RetryPolicyOptions): RetryPolicyOptions {
  const result: RetryPolicyOptions = {};
  if (options.maxAttempts !== undefined) result.maxAttempts = options.maxAttempts;
  if (options.baseDelayMs !== undefined) result.baseDelayMs = options.baseDelayMs;
  if (options.maxDelayMs !== undefined) result.maxDelayMs = options.maxDelayMs;
  if (options.exponentialBase !== undefined) result.exponentialBase = options.exponentialBase;
  if (options.jitter !== undefined) result.jitter = options.jitter;
  if (options.respectRateLimits !== undefined) result.respectRateLimits = options.respectRateLimits;
  if (options.timeoutMs !== undefined) result.timeoutMs = options.timeoutMs;
  return result;
}
