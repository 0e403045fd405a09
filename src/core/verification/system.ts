/**
 * System-level verification of an application under test.
 */

import {
  HealthEndpointStrategy,
  RunningStrategy,
  SystemServiceStrategy,
} from './strategies.js';
import type { VerificationTarget } from './strategy.js';
import { Verifier, type VerificationReport } from './verifier.js';

export interface TargetVerifierOptions {
  /** Timeout of each strategy. */
  timeoutMs?: number;
  verifier?: Verifier;
}

export class SystemVerifier {
  private readonly verifier: Verifier;
  private readonly timeoutMs?: number;

  constructor(
    readonly app: VerificationTarget,
    options: TargetVerifierOptions = {},
  ) {
    this.verifier = options.verifier ?? new Verifier();
    this.timeoutMs = options.timeoutMs;
  }

  /** Running, then the system service, then the health endpoint. */
  verifyStartup(signal?: AbortSignal): Promise<VerificationReport> {
    return this.verifier.run(
      [
        new RunningStrategy(this.timeoutMs),
        new SystemServiceStrategy(this.timeoutMs),
        new HealthEndpointStrategy(this.timeoutMs),
      ],
      this.app,
      signal,
    );
  }

  verifyHealth(signal?: AbortSignal): Promise<VerificationReport> {
    return this.verifier.run(
      [new RunningStrategy(this.timeoutMs), new HealthEndpointStrategy(this.timeoutMs)],
      this.app,
      signal,
    );
  }

  verifySystemService(signal?: AbortSignal): Promise<VerificationReport> {
    return this.verifier.run(
      [new RunningStrategy(this.timeoutMs), new SystemServiceStrategy(this.timeoutMs)],
      this.app,
      signal,
    );
  }
}
