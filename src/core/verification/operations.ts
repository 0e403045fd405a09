/**
 * State-changing operations with a verified result.
 *
 * Kept apart from the read-only strategies so that running a strategy is
 * always repeatable. An operation reports through the same outcome type.
 */

import type { Logger } from '../logger.js';
import { executeStrategy, type VerificationOutcome } from './strategy.js';

/** What {@link ShutdownOperation} needs from a container. */
export interface StoppableTarget {
  readonly name: string;
  isRunning(): boolean;
  stop(signal?: AbortSignal): Promise<unknown>;
}

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;

export interface ShutdownOperationOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class ShutdownOperation {
  readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: ShutdownOperationOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.logger = options.logger;
  }

  /**
   * Stop `container` and confirm it is no longer running. A container that
   * is already stopped passes without another stop call.
   * @returns an outcome named `shutdown`.
   */
  stopAndConfirm(container: StoppableTarget, signal?: AbortSignal): Promise<VerificationOutcome> {
    return executeStrategy(
      {
        name: 'shutdown',
        timeoutMs: this.timeoutMs,
        async verify(target: StoppableTarget, scoped: AbortSignal) {
          if (!target.isRunning()) return;
          await target.stop(scoped);
          if (target.isRunning()) {
            throw new Error(`${target.name} is still running after stop`);
          }
        },
      },
      container,
      signal,
      this.logger,
    );
  }
}
