/**
 * Container contract and its generic implementation.
 *
 * A {@link Container} is a handle to one managed process sandbox. Its state
 * machine is:
 *
 * ```
 * created → starting → running → stopping → stopped
 *              ↓          ↓          ↓
 *            failed    stopped    failed
 *                     (crashed)
 * ```
 *
 * `failed` is terminal. A failed container is never restarted implicitly;
 * callers build a new one.
 */

import { randomUUID } from 'node:crypto';
import type { Readable } from 'node:stream';
import { createScope, raceAbort, sleep } from '../abort.js';
import { createLogger, ContainerLogRouter, type Logger } from '../logger.js';
import {
  CancelledError,
  ContainerError,
  StartError,
  StopError,
  WaitError,
  errorMessage,
} from '../../types/errors.js';
import type { PortTracker } from './port-tracker.js';
import type { ReadinessProbe } from './readiness.js';
import {
  FIXTURE_LABEL,
  type ExecResult,
  type PortBinding,
  type RuntimeDriver,
  type RuntimeHandle,
} from './runtime.js';

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export type ContainerState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped' | 'failed';

/** `'not-running'` when there was nothing to stop. */
export type StopResult = 'stopped' | 'not-running';

export interface Container {
  readonly id: string;
  readonly name: string;
  readonly image: string;
  readonly state: ContainerState;

  /**
   * Materialize and start the sandbox. Valid only from `created`.
   * @throws {StartError} when the runtime fails; the container is then `failed`.
   * @throws {ContainerError} kind `already-started` from any other state.
   */
  start(signal?: AbortSignal): Promise<void>;

  /**
   * Request graceful termination. Never rejects for a container that is
   * not running.
   * @throws {StopError} when the runtime fails; the container is then `failed`.
   */
  stop(signal?: AbortSignal): Promise<StopResult>;

  /** Last-known state; no runtime call. */
  isRunning(): boolean;

  /** Re-inspect the runtime. A running container found exited becomes `stopped`. */
  refresh(): Promise<ContainerState>;

  /** @throws {ContainerError} kind `not-running` unless running. */
  host(): string;

  /**
   * External port mapped to a declared internal port.
   * @throws {ContainerError} kind `not-running` unless running, `port-lookup`
   *   for an undeclared port.
   */
  port(internal: number): number;

  /** Address clients use to reach the container's primary port. */
  connectionString(): string;

  /**
   * Resolve once the container is running and its readiness probe passes.
   * @throws {WaitError} `WAIT_TIMEOUT` or `WAIT_FAILED`.
   * @throws {CancelledError} when `signal` aborts.
   */
  waitForReady(timeoutMs: number, signal?: AbortSignal): Promise<void>;

  /** @throws {ContainerError} kind `logs`. */
  logs(): Promise<Readable>;

  /** @throws {ContainerError} kind `not-running` or `exec`. */
  exec(cmd: readonly string[]): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// Specification
// ---------------------------------------------------------------------------

export interface ContainerSpec {
  name: string;
  image: string;
  env?: Record<string, string>;
  /** Declared ports. The first one backs {@link Container.connectionString}. */
  ports?: PortBinding[];
  command?: string[];
  /** Seconds the runtime waits before force-killing on stop. Default 10. */
  stopGraceSeconds?: number;
  /** Upper bound on a runtime stop call. Default: grace period plus 5s. */
  stopTimeoutMs?: number;
  readiness?: ReadinessProbe;
  /** Poll interval of {@link Container.waitForReady}. Default 250ms. */
  pollIntervalMs?: number;
}

export interface GenericContainerOptions {
  /** Records mapped external ports while the container runs. */
  portTracker?: PortTracker;
  logger?: Logger;
}

export const DEFAULT_STOP_GRACE_SECONDS = 10;
export const DEFAULT_POLL_INTERVAL_MS = 250;

// ---------------------------------------------------------------------------
// GenericContainer
// ---------------------------------------------------------------------------

export class GenericContainer implements Container {
  readonly id: string;
  readonly name: string;
  readonly image: string;

  protected readonly runtime: RuntimeDriver;
  protected readonly spec: Readonly<ContainerSpec>;
  protected readonly logger: Logger;

  private readonly portTracker?: PortTracker;
  private currentState: ContainerState = 'created';
  private handle?: RuntimeHandle;
  private resolvedHost?: string;
  private readonly mappedPorts = new Map<number, number>();
  private startAttempt?: Promise<void>;
  private stopAttempt?: Promise<StopResult>;
  private exitCode?: number;
  private removed = false;

  constructor(runtime: RuntimeDriver, spec: ContainerSpec, options?: GenericContainerOptions) {
    this.runtime = runtime;
    this.spec = Object.freeze({ ...spec });
    this.id = `${spec.name}-${randomUUID().slice(0, 8)}`;
    this.name = spec.name;
    this.image = spec.image;
    this.portTracker = options?.portTracker;
    this.logger = (options?.logger ?? createLogger('container')).withContext({
      container: spec.name,
    });
  }

  get state(): ContainerState {
    return this.currentState;
  }

  /** Exit code reported by the runtime once the container has exited. */
  get lastExitCode(): number | undefined {
    return this.exitCode;
  }

  // -----------------------------------------------------------------------
  // Start
  // -----------------------------------------------------------------------

  start(signal?: AbortSignal): Promise<void> {
    if (this.currentState !== 'created') {
      return Promise.reject(
        new ContainerError(this.name, 'already-started', `cannot start from state ${this.currentState}`),
      );
    }
    this.currentState = 'starting';
    this.startAttempt = this.doStart(signal);
    return this.startAttempt;
  }

  private async doStart(signal?: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    this.logger.info('starting container', { image: this.image });

    try {
      this.throwIfAborted(signal, 'start');
      this.handle = await this.runtime.create({
        name: this.id,
        labels: { [FIXTURE_LABEL]: this.name },
        image: this.image,
        env: { ...(this.spec.env ?? {}) },
        ports: [...(this.spec.ports ?? [])],
        command: this.spec.command,
      });

      this.throwIfAborted(signal, 'start');
      await this.runtime.start(this.handle);

      this.resolvedHost = await this.runtime.host(this.handle);
      for (const binding of this.spec.ports ?? []) {
        const external = await this.runtime.mappedPort(this.handle, binding.internal);
        this.mappedPorts.set(binding.internal, external);
        this.portTracker?.allocate(this.id, external);
      }
    } catch (err) {
      this.currentState = 'failed';
      this.releasePorts();
      await this.removeQuietly();
      this.logger.error('container failed to start', {
        error: errorMessage(err),
        duration_ms: Date.now() - startedAt,
      });
      if (err instanceof CancelledError) throw err;
      throw new StartError(this.name, err);
    }

    this.currentState = 'running';
    this.logger.info('container started', {
      duration_ms: Date.now() - startedAt,
      ports: Object.fromEntries(this.mappedPorts),
    });
  }

  // -----------------------------------------------------------------------
  // Stop
  // -----------------------------------------------------------------------

  async stop(signal?: AbortSignal): Promise<StopResult> {
    if (this.currentState === 'starting' && this.startAttempt) {
      await this.startAttempt.catch(() => undefined);
    }
    if (this.currentState === 'stopping' && this.stopAttempt) {
      return this.stopAttempt;
    }
    if (this.currentState !== 'running') {
      this.logger.debug('stop requested while not running', { state: this.currentState });
      // Crashed and failed containers may still hold their runtime resource.
      if (this.currentState === 'stopped' || this.currentState === 'failed') {
        await this.removeQuietly();
      }
      return 'not-running';
    }

    this.currentState = 'stopping';
    this.stopAttempt = this.doStop(signal);
    return this.stopAttempt;
  }

  private async doStop(signal?: AbortSignal): Promise<StopResult> {
    const startedAt = Date.now();
    const grace = this.spec.stopGraceSeconds ?? DEFAULT_STOP_GRACE_SECONDS;
    const limit = this.spec.stopTimeoutMs ?? (grace + 5) * 1000;
    const scope = createScope(signal, limit);
    this.logger.info('stopping container', { grace_seconds: grace });

    try {
      if (this.handle) {
        await raceAbort(this.runtime.stop(this.handle, grace), scope.signal);
      }
    } catch (err) {
      this.currentState = 'failed';
      this.releasePorts();
      await this.removeQuietly();
      this.logger.error('container failed to stop', {
        error: errorMessage(err),
        duration_ms: Date.now() - startedAt,
      });
      if (signal?.aborted && !scope.timedOut) {
        throw new CancelledError(`stop of container ${this.name}`, err);
      }
      throw new StopError(this.name, err);
    } finally {
      scope.dispose();
    }

    this.currentState = 'stopped';
    this.releasePorts();
    await this.removeQuietly();
    this.logger.info('container stopped', { duration_ms: Date.now() - startedAt });
    return 'stopped';
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  isRunning(): boolean {
    return this.currentState === 'running';
  }

  async refresh(): Promise<ContainerState> {
    if (this.currentState !== 'running' || !this.handle) {
      return this.currentState;
    }
    const state = await this.runtime.state(this.handle);
    // A concurrent stop may have moved on while the runtime answered.
    if (!state.running && this.currentState === 'running') {
      this.currentState = 'stopped';
      this.exitCode = state.exitCode;
      this.releasePorts();
      this.logger.warn('container exited unexpectedly', {
        status: state.status,
        exit_code: state.exitCode,
      });
    }
    return this.currentState;
  }

  host(): string {
    if (!this.isRunning() || this.resolvedHost === undefined) {
      throw this.notRunning('host');
    }
    return this.resolvedHost;
  }

  port(internal: number): number {
    if (!this.isRunning()) {
      throw this.notRunning(`port ${internal}`);
    }
    const external = this.mappedPorts.get(internal);
    if (external === undefined) {
      throw new ContainerError(this.name, 'port-lookup', `port ${internal} was not declared`);
    }
    return external;
  }

  connectionString(): string {
    const primary = this.spec.ports?.[0];
    if (!primary) {
      throw new ContainerError(this.name, 'port-lookup', 'no ports declared');
    }
    return `${this.host()}:${this.port(primary.internal)}`;
  }

  // -----------------------------------------------------------------------
  // Readiness
  // -----------------------------------------------------------------------

  async waitForReady(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    const interval = this.spec.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const probe = this.spec.readiness;
    const scope = createScope(signal, timeoutMs);
    let lastError: unknown;

    try {
      while (!scope.signal.aborted) {
        try {
          const state = await raceAbort(this.refresh(), scope.signal);
          if (state === 'stopped' || state === 'failed') {
            const detail =
              this.exitCode === undefined ? `state ${state}` : `exited with code ${this.exitCode}`;
            await this.dumpLogs();
            throw new WaitError(this.name, 'failed', new Error(detail));
          }
          if (state === 'running') {
            if (!probe || (await raceAbort(probe.check(this, scope.signal), scope.signal))) {
              this.logger.info('container ready', { duration_ms: Date.now() - startedAt });
              return;
            }
            lastError = new Error(`${probe.description} not satisfied`);
          }
        } catch (err) {
          if (err instanceof WaitError) throw err;
          if (scope.signal.aborted) break;
          lastError = err;
          this.logger.debug('not ready yet', { error: errorMessage(err) });
        }
        await sleep(interval, scope.signal);
      }

      if (!scope.timedOut) {
        throw new CancelledError(`wait for container ${this.name}`, signal?.reason);
      }
      await this.dumpLogs();
      throw new WaitError(this.name, 'timeout', lastError ?? new Error(`not ready after ${timeoutMs}ms`));
    } finally {
      scope.dispose();
    }
  }

  // -----------------------------------------------------------------------
  // Logs and exec
  // -----------------------------------------------------------------------

  async logs(): Promise<Readable> {
    if (!this.handle || this.removed) {
      throw new ContainerError(this.name, 'logs', `no logs available in state ${this.currentState}`);
    }
    try {
      return await this.runtime.logs(this.handle);
    } catch (err) {
      throw new ContainerError(this.name, 'logs', 'log retrieval failed', err);
    }
  }

  async exec(cmd: readonly string[]): Promise<ExecResult> {
    if (!this.handle || !this.isRunning()) {
      throw this.notRunning(`exec ${cmd.join(' ')}`);
    }
    try {
      return await this.runtime.exec(this.handle, cmd);
    } catch (err) {
      throw new ContainerError(this.name, 'exec', `${cmd.join(' ')} failed`, err);
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private notRunning(operation: string): ContainerError {
    return new ContainerError(
      this.name,
      'not-running',
      `${operation} requires a running container (state ${this.currentState})`,
    );
  }

  private throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
    if (signal?.aborted) {
      throw new CancelledError(`${operation} of container ${this.name}`, signal.reason);
    }
  }

  private releasePorts(): void {
    this.portTracker?.deallocateAll(this.id);
  }

  private async removeQuietly(): Promise<void> {
    if (!this.handle || this.removed) return;
    this.removed = true;
    try {
      await this.runtime.remove(this.handle);
    } catch (err) {
      this.logger.warn('container removal failed', { error: errorMessage(err) });
    }
  }

  /** Replay the container's output into host logs, for post-mortem. */
  private async dumpLogs(): Promise<void> {
    if (!this.handle) return;
    try {
      const stream = await this.runtime.logs(this.handle);
      await new ContainerLogRouter(this.name, this.logger).drain(stream, 'warn');
    } catch (err) {
      this.logger.debug('container logs unavailable', { error: errorMessage(err) });
    }
  }
}
