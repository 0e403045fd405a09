/**
 * Health monitoring types.
 */

/** Anything with an HTTP base address and a health endpoint. */
export interface HealthTarget {
  /** Base URL, e.g. `http://127.0.0.1:49153`. */
  address(): string;
  /** Path of the health endpoint, e.g. `/health`. */
  healthPath(): string;
}

/**
 * A named, timeout-bounded probe. It runs on every tick of the monitor it
 * is registered with, so its polling interval is the monitor's.
 *
 * `check` resolves when the target is healthy and rejects with a
 * diagnostic otherwise. It should honor `signal`; the monitor abandons
 * the probe when the signal fires either way.
 */
export interface HealthCheck<T = HealthTarget> {
  readonly name: string;
  readonly timeoutMs: number;
  check(target: T, signal: AbortSignal): Promise<void>;
}

export type CheckStatus = 'healthy' | 'unhealthy';

export type OverallStatus = 'healthy' | 'unhealthy' | 'unknown';

/** Outcome of one check on one tick. */
export interface CheckResult {
  readonly name: string;
  readonly status: CheckStatus;
  readonly durationMs: number;
  /** ISO 8601 time the check finished. */
  readonly timestamp: string;
  /** Why the check failed: it ran out of time, or it ran and found a problem. */
  readonly failure?: 'timeout' | 'error';
  /** Diagnostic message of the failure. */
  readonly error?: string;
}

/**
 * Whole-tick view of a target's health. Replaced wholesale every tick and
 * frozen, so readers never see a mix of two ticks.
 */
export interface HealthSnapshot {
  readonly overall: OverallStatus;
  readonly checks: Readonly<Record<string, CheckResult>>;
  /** ISO 8601 time the tick completed. */
  readonly timestamp: string;
  /** Monotonic tick counter; 0 for the initial snapshot. */
  readonly tick: number;
}

export type HealthListener = (snapshot: HealthSnapshot) => void;
