/**
 * Component-level verification of an application under test.
 *
 * Every check first confirms the application is running, so a stopped
 * target reports `running` as the failing strategy rather than a
 * connection error.
 */

import {
  ComponentDisposedStrategy,
  ComponentInitializedStrategy,
  ComponentMetadataStrategy,
  ComponentRegisteredStrategy,
  RunningStrategy,
} from './strategies.js';
import type { VerificationStrategy, VerificationTarget } from './strategy.js';
import type { TargetVerifierOptions } from './system.js';
import { Verifier, type VerificationReport } from './verifier.js';

export class ComponentVerifier {
  private readonly verifier: Verifier;
  private readonly timeoutMs?: number;

  constructor(
    readonly app: VerificationTarget,
    options: TargetVerifierOptions = {},
  ) {
    this.verifier = options.verifier ?? new Verifier();
    this.timeoutMs = options.timeoutMs;
  }

  verifyRegistered(componentId: string, signal?: AbortSignal): Promise<VerificationReport> {
    return this.runWhileRunning(new ComponentRegisteredStrategy(componentId, this.timeoutMs), signal);
  }

  verifyInitialized(componentId: string, signal?: AbortSignal): Promise<VerificationReport> {
    return this.runWhileRunning(new ComponentInitializedStrategy(componentId, this.timeoutMs), signal);
  }

  verifyDisposed(componentId: string, signal?: AbortSignal): Promise<VerificationReport> {
    return this.runWhileRunning(new ComponentDisposedStrategy(componentId, this.timeoutMs), signal);
  }

  verifyMetadata(
    componentId: string,
    expected: Readonly<Record<string, unknown>>,
    signal?: AbortSignal,
  ): Promise<VerificationReport> {
    return this.runWhileRunning(
      new ComponentMetadataStrategy(componentId, expected, this.timeoutMs),
      signal,
    );
  }

  private runWhileRunning(
    strategy: VerificationStrategy,
    signal?: AbortSignal,
  ): Promise<VerificationReport> {
    return this.verifier.run([new RunningStrategy(this.timeoutMs), strategy], this.app, signal);
  }
}
