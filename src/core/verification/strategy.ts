/**
 * Verification strategies: one-shot, named, timeout-bounded assertions.
 *
 * A strategy answers one question about a running target. Running it
 * through {@link executeStrategy} yields one of four outcomes, so callers
 * can tell "could not determine" (timeout) apart from "determined and
 * wrong" (failed), and both apart from a caller abort.
 */

import { createScope, raceAbort } from '../abort.js';
import { createLogger, type Logger } from '../logger.js';
import {
  CancelledError,
  VerificationFailedError,
  VerificationTimeoutError,
} from '../../types/errors.js';
import type { HealthTarget } from '../health/types.js';

export const DEFAULT_VERIFICATION_TIMEOUT_MS = 10_000;

/** What the built-in strategies inspect. {@link AppContainer} satisfies it. */
export interface VerificationTarget extends HealthTarget {
  readonly name: string;
  isRunning(): boolean;
}

export interface VerificationStrategy<T = VerificationTarget> {
  readonly name: string;
  readonly timeoutMs: number;
  /** Resolve when the assertion holds; reject with a diagnostic otherwise. */
  verify(target: T, signal: AbortSignal): Promise<void>;
}

interface OutcomeBase {
  readonly strategy: string;
  readonly durationMs: number;
}

export type VerificationOutcome =
  | (OutcomeBase & { readonly status: 'passed' })
  | (OutcomeBase & { readonly status: 'failed'; readonly error: VerificationFailedError })
  | (OutcomeBase & { readonly status: 'timeout'; readonly error: VerificationTimeoutError })
  | (OutcomeBase & { readonly status: 'cancelled'; readonly error: CancelledError });

export type FailedOutcome = Exclude<VerificationOutcome, { status: 'passed' }>;

const defaultLogger = createLogger('verification');

/**
 * Run `strategy` against `target` under its own timeout.
 *
 * Never rejects for verification problems: every result, including a
 * timeout or a caller abort, is an outcome.
 */
export async function executeStrategy<T>(
  strategy: VerificationStrategy<T>,
  target: T,
  signal?: AbortSignal,
  logger: Logger = defaultLogger,
): Promise<VerificationOutcome> {
  const startedAt = Date.now();
  const scope = createScope(signal, strategy.timeoutMs);
  const log = logger.withContext({ strategy: strategy.name });

  let outcome: VerificationOutcome;
  try {
    await raceAbort(strategy.verify(target, scope.signal), scope.signal);
    outcome = { status: 'passed', strategy: strategy.name, durationMs: Date.now() - startedAt };
  } catch (err) {
    const durationMs = Date.now() - startedAt;
    if (scope.timedOut) {
      outcome = {
        status: 'timeout',
        strategy: strategy.name,
        durationMs,
        error: new VerificationTimeoutError(strategy.name, strategy.timeoutMs),
      };
    } else if (signal?.aborted) {
      outcome = {
        status: 'cancelled',
        strategy: strategy.name,
        durationMs,
        error: new CancelledError(`verification ${strategy.name}`, signal.reason),
      };
    } else {
      outcome = {
        status: 'failed',
        strategy: strategy.name,
        durationMs,
        error: new VerificationFailedError(strategy.name, err),
      };
    }
  } finally {
    scope.dispose();
  }

  if (outcome.status === 'passed') {
    log.info('verification passed', { ok: true, duration_ms: outcome.durationMs });
  } else {
    log.warn('verification did not pass', {
      ok: false,
      duration_ms: outcome.durationMs,
      error_code: outcome.error.code,
      error: outcome.error.message,
    });
  }
  return outcome;
}
