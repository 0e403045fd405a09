/**
 * Ordered start and stop over a list of containers.
 *
 * Startup is fail-fast: a half-started fixture is not useful, so the first
 * failure aborts the sequence. Shutdown is best-effort: every container is
 * attempted, each failure is logged, and the last one is reported.
 */

import type { Logger } from '../logger.js';
import { CancelledError, StartError, StopError, errorMessage } from '../../types/errors.js';
import type { Container } from './container.js';

export interface StartSequenceOptions {
  signal?: AbortSignal;
  logger: Logger;
  /** Extra context for the StartError of a container, e.g. `dependency of app`. */
  describe?: (container: Container) => string | undefined;
}

/**
 * Start each container in order, skipping those already running.
 * @throws {StartError} naming the first container that failed.
 */
export async function startSequentially(
  containers: readonly Container[],
  options: StartSequenceOptions,
): Promise<void> {
  for (const container of containers) {
    if (container.isRunning()) {
      options.logger.debug('already running, skipping start', { container: container.name });
      continue;
    }
    try {
      await container.start(options.signal);
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      const cause = err instanceof StartError ? err.cause : err;
      const failure = new StartError(container.name, cause, options.describe?.(container));
      options.logger.error('startup aborted', {
        container: container.name,
        error_code: failure.code,
        error: failure.message,
      });
      throw failure;
    }
  }
}

export interface StopSequenceOptions {
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * Stop each container in the given order, continuing past failures.
 * Containers that were never started are skipped. Stopped and failed ones
 * are still visited: their `stop` reports `not-running` and removes what
 * the runtime still holds.
 * @throws {StopError} the last failure, after every container was attempted.
 */
export async function stopSequentially(
  containers: readonly Container[],
  options: StopSequenceOptions,
): Promise<void> {
  let lastFailure: StopError | undefined;

  for (const container of containers) {
    if (container.state === 'created') {
      options.logger.debug('never started, skipping stop', {
        container: container.name,
        state: container.state,
      });
      continue;
    }
    try {
      await container.stop(options.signal);
    } catch (err) {
      lastFailure = err instanceof StopError ? err : new StopError(container.name, err);
      options.logger.warn('stop failed, continuing cleanup', {
        container: container.name,
        error_code: lastFailure.code,
        error: errorMessage(err),
      });
    }
  }

  if (lastFailure) {
    throw lastFailure;
  }
}
