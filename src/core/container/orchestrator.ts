/**
 * Dependency lifecycle orchestration.
 *
 * Sequences start, stop and readiness across a primary container and its
 * dependencies. The dependency list is a plain ordered list: no transitive
 * resolution happens, so callers list dependencies in the order they must
 * start.
 */

import { createLogger, type Logger } from '../logger.js';
import { CancelledError, ErrorCode, WaitError, hasErrorCode } from '../../types/errors.js';
import type { Container } from './container.js';
import { startSequentially, stopSequentially } from './sequence.js';

export const DEFAULT_READY_TIMEOUT_MS = 30_000;

export interface OrchestratorOptions {
  /** Budget of {@link DependencyOrchestrator.waitForReady} when the caller gives none. */
  readyTimeoutMs?: number;
  logger?: Logger;
}

export class DependencyOrchestrator {
  readonly primary: Container;
  readonly dependencies: readonly Container[];
  readonly readyTimeoutMs: number;
  private readonly logger: Logger;

  constructor(primary: Container, dependencies: readonly Container[], options?: OrchestratorOptions) {
    this.primary = primary;
    this.dependencies = [...dependencies];
    this.readyTimeoutMs = options?.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.logger = (options?.logger ?? createLogger('orchestrator')).withContext({
      container: primary.name,
    });
  }

  /**
   * Start every dependency in listed order, then the primary.
   *
   * Dependencies that are already running are left alone. The first failure
   * aborts the sequence; nothing after it is started.
   * @throws {StartError} naming the container that failed.
   */
  async start(signal?: AbortSignal): Promise<void> {
    this.logger.info('starting dependency graph', {
      dependencies: this.dependencies.map((d) => d.name),
    });
    await startSequentially(this.dependencies, {
      signal,
      logger: this.logger,
      describe: () => `dependency of ${this.primary.name}`,
    });
    await startSequentially([this.primary], { signal, logger: this.logger });
    this.logger.info('dependency graph started');
  }

  /**
   * Stop the primary, then dependencies in reverse order.
   *
   * Every started container is attempted even when an earlier one fails.
   * @throws {StopError} the last failure.
   */
  async stop(signal?: AbortSignal): Promise<void> {
    this.logger.info('stopping dependency graph');
    await stopSequentially([this.primary, ...[...this.dependencies].reverse()], {
      signal,
      logger: this.logger,
    });
    this.logger.info('dependency graph stopped');
  }

  /**
   * Wait for each dependency in start order, then the primary.
   *
   * All stages share one deadline: each receives whatever budget the
   * previous stages left, so the whole wait never exceeds `timeoutMs`.
   * @throws {WaitError} naming the stage that did not become ready.
   * @throws {CancelledError} when `signal` aborts.
   */
  async waitForReady(timeoutMs: number = this.readyTimeoutMs, signal?: AbortSignal): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    const stages: Array<[string, Container]> = [
      ...this.dependencies.map((d): [string, Container] => [`dependency ${d.name}`, d]),
      [`primary ${this.primary.name}`, this.primary],
    ];

    for (const [stage, container] of stages) {
      const remaining = Math.max(0, deadline - Date.now());
      try {
        await container.waitForReady(remaining, signal);
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        const reason = hasErrorCode(err, ErrorCode.WAIT_FAILED) ? 'failed' : 'timeout';
        const cause = err instanceof WaitError ? err.cause : err;
        throw new WaitError(container.name, reason, cause, stage);
      }
      this.logger.debug('stage ready', { stage, remaining_ms: Math.max(0, deadline - Date.now()) });
    }
  }
}
