/**
 * Health monitoring engine.
 *
 * A {@link HealthMonitor} evaluates a set of named checks against one
 * target. Each tick runs the due checks concurrently, each bounded by its
 * own timeout, and folds the results into a single verdict: healthy only
 * when every check is healthy. The resulting snapshot is frozen and swapped
 * in with one assignment, and ticks are queued so two passes never
 * interleave.
 *
 * ```
 *   start() ──► initial pass ──► loop: sleep(interval) ──► tick ──┐
 *                                  ▲                              │
 *                                  └──────────────────────────────┘
 *   waitForHealthy() ──► tick ──► healthy? ──no──► sleep(waitInterval) ──► tick ...
 * ```
 */

import { createScope, raceAbort, sleep, type Scope } from '../abort.js';
import { createLogger, type Logger } from '../logger.js';
import {
  BerthError,
  CancelledError,
  CheckFailedError,
  CheckTimeoutError,
  ErrorCode,
  MonitorStateError,
} from '../../types/errors.js';
import type {
  CheckResult,
  HealthCheck,
  HealthListener,
  HealthSnapshot,
  HealthTarget,
  OverallStatus,
} from './types.js';

export const DEFAULT_MONITOR_INTERVAL_MS = 30_000;
export const DEFAULT_WAIT_INTERVAL_MS = 1_000;
export const DEFAULT_HEALTH_WAIT_TIMEOUT_MS = 30_000;

export interface HealthMonitorOptions {
  /** Background loop interval. */
  intervalMs?: number;
  /** Poll interval of {@link HealthMonitor.waitForHealthy}. */
  waitIntervalMs?: number;
  /** Budget of {@link HealthMonitor.waitForHealthy} when the caller gives none. */
  waitTimeoutMs?: number;
  /** Label used in errors and logs. Defaults to the target's `name`, if any. */
  name?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** `waitForHealthy` ran out of time. Carries the last snapshot seen. */
export class HealthTimeoutError extends BerthError {
  readonly timeoutMs: number;
  readonly snapshot: HealthSnapshot;

  constructor(target: string, timeoutMs: number, snapshot: HealthSnapshot) {
    const diagnostics = Object.values(snapshot.checks)
      .filter((result) => result.status !== 'healthy')
      .map((result) => result.error ?? `check ${result.name} unhealthy`);
    const detail = diagnostics.length > 0 ? diagnostics.join('; ') : 'no health check completed';
    super(ErrorCode.HEALTH_TIMEOUT, `${target} did not become healthy within ${timeoutMs}ms: ${detail}`, {
      subject: target,
    });
    this.name = 'HealthTimeoutError';
    this.timeoutMs = timeoutMs;
    this.snapshot = snapshot;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function describeTarget(target: HealthTarget): string {
  if ('name' in target && typeof target.name === 'string') {
    return target.name;
  }
  return 'health target';
}

function initialSnapshot(): HealthSnapshot {
  return Object.freeze({
    overall: 'unknown',
    checks: Object.freeze({}),
    timestamp: new Date().toISOString(),
    tick: 0,
  });
}

interface Loop {
  scope: Scope;
  done: Promise<void>;
}

// ---------------------------------------------------------------------------
// HealthMonitor
// ---------------------------------------------------------------------------

export class HealthMonitor<T extends HealthTarget = HealthTarget> {
  readonly target: T;
  readonly intervalMs: number;
  readonly waitIntervalMs: number;
  readonly waitTimeoutMs: number;

  private readonly label: string;
  private readonly logger: Logger;
  private readonly checks = new Map<string, HealthCheck<T>>();
  private readonly listeners = new Set<HealthListener>();

  private current: HealthSnapshot = initialSnapshot();
  private tickCount = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private loop?: Loop;

  constructor(target: T, options: HealthMonitorOptions = {}) {
    this.target = target;
    this.intervalMs = options.intervalMs ?? DEFAULT_MONITOR_INTERVAL_MS;
    this.waitIntervalMs = options.waitIntervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_HEALTH_WAIT_TIMEOUT_MS;
    this.label = options.name ?? describeTarget(target);
    this.logger = (options.logger ?? createLogger('health')).withContext({ container: this.label });
  }

  /**
   * Register a check. Takes effect on the next tick.
   * @throws {MonitorStateError} if a check with the same name exists.
   */
  addCheck(check: HealthCheck<T>): this {
    if (this.checks.has(check.name)) {
      throw new MonitorStateError(`health check ${check.name} is already registered on ${this.label}`);
    }
    this.checks.set(check.name, check);
    return this;
  }

  /** Names of the registered checks, in registration order. */
  checkNames(): string[] {
    return [...this.checks.keys()];
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  /** Latest snapshot. Never blocks and never runs a check. */
  status(): HealthSnapshot {
    return this.current;
  }

  /** Call `listener` with every new snapshot. Returns an unsubscribe function. */
  subscribe(listener: HealthListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Run one pass, then keep polling in the background every `intervalMs`
   * until {@link stop} is called or `signal` aborts.
   * @throws {MonitorStateError} when already running.
   * @throws {CancelledError} when `signal` aborts during the first pass.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.loop) {
      throw new MonitorStateError(`health monitor for ${this.label} is already running`);
    }
    const loop: Loop = { scope: createScope(signal), done: Promise.resolve() };
    this.loop = loop;
    this.logger.info('health monitor started', {
      checks: this.checkNames(),
      interval_ms: this.intervalMs,
    });

    try {
      await this.tick(loop.scope.signal);
    } catch (err) {
      // A stop() during the first pass is not an error.
      if (this.loop !== loop) return;
      this.release(loop);
      throw err;
    }
    if (this.loop !== loop) return;
    loop.done = this.runLoop(loop);
  }

  /** Stop the background loop and wait for it to exit. Idempotent. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.release(loop);
    await loop.done;
    this.logger.info('health monitor stopped');
  }

  private release(loop: Loop): void {
    loop.scope.cancel();
    loop.scope.dispose();
    if (this.loop === loop) {
      this.loop = undefined;
    }
  }

  private async runLoop(loop: Loop): Promise<void> {
    const signal = loop.scope.signal;
    while (await sleep(this.intervalMs, signal)) {
      try {
        await this.tick(signal);
      } catch (err) {
        if (signal.aborted) break;
        this.logger.error('health tick failed', { error: err });
      }
    }
    this.release(loop);
  }

  // -----------------------------------------------------------------------
  // Waiting
  // -----------------------------------------------------------------------

  /**
   * Poll every `waitIntervalMs`, starting immediately, until the target is
   * healthy. Works whether or not the monitor was started.
   * @returns the healthy snapshot.
   * @throws {HealthTimeoutError} listing the failing checks' diagnostics.
   * @throws {CancelledError} when `signal` aborts.
   */
  async waitForHealthy(timeoutMs: number = this.waitTimeoutMs, signal?: AbortSignal): Promise<HealthSnapshot> {
    const startedAt = Date.now();
    const scope = createScope(signal, timeoutMs);
    try {
      do {
        try {
          const snapshot = await raceAbort(this.tick(scope.signal), scope.signal);
          if (snapshot.overall === 'healthy') {
            this.logger.info('target healthy', { duration_ms: Date.now() - startedAt });
            return snapshot;
          }
        } catch (err) {
          if (!scope.signal.aborted) throw err;
          break;
        }
      } while (await sleep(this.waitIntervalMs, scope.signal));

      if (!scope.timedOut) {
        throw new CancelledError(`wait for ${this.label} to become healthy`, signal?.reason);
      }
      const error = new HealthTimeoutError(this.label, timeoutMs, this.current);
      this.logger.warn('health wait timed out', { error_code: error.code, error: error.message });
      throw error;
    } finally {
      scope.dispose();
    }
  }

  // -----------------------------------------------------------------------
  // Ticks
  // -----------------------------------------------------------------------

  /** Queue a pass behind any pass already running. */
  private tick(signal: AbortSignal): Promise<HealthSnapshot> {
    const run = this.queue.then(() => this.evaluate(signal));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Run every registered check concurrently and publish the aggregate. */
  private async evaluate(signal: AbortSignal): Promise<HealthSnapshot> {
    if (signal.aborted) {
      throw new CancelledError(`health pass on ${this.label}`, signal.reason);
    }

    const checks = [...this.checks.values()];
    const results = await Promise.all(checks.map((check) => this.runCheck(check, signal)));

    const byName: Record<string, CheckResult> = {};
    for (const result of results) {
      byName[result.name] = result;
    }
    const overall: OverallStatus = results.every((r) => r.status === 'healthy')
      ? 'healthy'
      : 'unhealthy';

    this.tickCount += 1;
    const snapshot: HealthSnapshot = Object.freeze({
      overall,
      checks: Object.freeze(byName),
      timestamp: new Date().toISOString(),
      tick: this.tickCount,
    });

    const before = this.current.overall;
    this.current = snapshot;
    if (before !== overall) {
      this.logger.info('health changed', { from: before, to: overall, tick: snapshot.tick });
    }
    this.publish(snapshot);
    return snapshot;
  }

  private async runCheck(check: HealthCheck<T>, signal: AbortSignal): Promise<CheckResult> {
    const startedAt = Date.now();
    const scope = createScope(signal, check.timeoutMs);
    try {
      await raceAbort(check.check(this.target, scope.signal), scope.signal);
      return Object.freeze({
        name: check.name,
        status: 'healthy',
        durationMs: Date.now() - startedAt,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      if (signal.aborted) {
        throw new CancelledError(`health check ${check.name}`, signal.reason);
      }
      const failure = scope.timedOut
        ? new CheckTimeoutError(check.name, check.timeoutMs)
        : new CheckFailedError(check.name, err);
      this.logger.debug('check unhealthy', { check: check.name, error_code: failure.code, error: failure.message });
      return Object.freeze({
        name: check.name,
        status: 'unhealthy',
        durationMs: Date.now() - startedAt,
        timestamp: new Date().toISOString(),
        failure: scope.timedOut ? 'timeout' : 'error',
        error: failure.message,
      });
    } finally {
      scope.dispose();
    }
  }

  private publish(snapshot: HealthSnapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.warn('health listener threw', { error: err });
      }
    }
  }
}
