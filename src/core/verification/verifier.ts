/**
 * Sequential composition of verification strategies.
 */

import { createLogger, type Logger } from '../logger.js';
import {
  executeStrategy,
  type FailedOutcome,
  type VerificationOutcome,
  type VerificationStrategy,
} from './strategy.js';

export interface VerificationReport {
  readonly passed: boolean;
  /** Outcomes in run order, ending at the first one that did not pass. */
  readonly outcomes: readonly VerificationOutcome[];
  /** The outcome that stopped the run, if any. */
  readonly failed?: FailedOutcome;
}

export interface VerifierOptions {
  logger?: Logger;
}

/** Runs strategies in the caller's order and stops at the first that does not pass. */
export class Verifier {
  private readonly logger: Logger;

  constructor(options: VerifierOptions = {}) {
    this.logger = options.logger ?? createLogger('verification');
  }

  async run<T>(
    strategies: readonly VerificationStrategy<T>[],
    target: T,
    signal?: AbortSignal,
  ): Promise<VerificationReport> {
    const outcomes: VerificationOutcome[] = [];
    for (const strategy of strategies) {
      const outcome = await executeStrategy(strategy, target, signal, this.logger);
      outcomes.push(outcome);
      if (outcome.status !== 'passed') {
        return Object.freeze({ passed: false, outcomes: Object.freeze(outcomes), failed: outcome });
      }
    }
    return Object.freeze({ passed: true, outcomes: Object.freeze(outcomes) });
  }
}

/**
 * Throw the error of the outcome that stopped `report`, if any.
 * For test code that wants a failing report to fail the test.
 */
export function assertPassed(report: VerificationReport): void {
  if (report.failed) {
    throw report.failed.error;
  }
}
