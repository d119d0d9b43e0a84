/**
 * Side-effecting primitives used by the retry engine and the analyzer.
 * Injected so tests can drive time and randomness deterministically.
 */
export interface RetryRuntime {
  /** Suspend the calling async flow for `ms` milliseconds */
  sleep(ms: number): Promise<void>;

  /** Uniform random number in [0, 1) */
  random(): number;

  /** Current time in epoch milliseconds */
  now(): number;
}

export const RETRY_RUNTIME = Symbol('RETRY_RUNTIME');

export const DEFAULT_RETRY_RUNTIME: RetryRuntime = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: () => Math.random(),
  now: () => Date.now(),
};
