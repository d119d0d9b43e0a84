/**
 * Bookkeeping for a single retry episode. Created per call, never shared.
 */
export class RetryState {
  attempt = 0;
  totalDelayMs = 0;
  /** Raw value thrown by the latest attempt */
  lastError?: unknown;

  constructor(readonly startTime: number) {}

  beginAttempt(): number {
    this.attempt += 1;
    return this.attempt;
  }

  recordFailure(error: unknown): void {
    this.lastError = error;
  }

  recordDelay(delayMs: number): void {
    this.totalDelayMs += delayMs;
  }

  elapsedMs(now: number): number {
    return Math.max(0, now - this.startTime);
  }
}
