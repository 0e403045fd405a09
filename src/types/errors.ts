/**
 * Error taxonomy for Berth.
 *
 * Every failure raised by the orchestration core is a {@link BerthError}
 * carrying a machine-readable code and the name of the container, check or
 * strategy it concerns. Test authors debug failed runs from the message
 * alone, so messages always lead with that subject.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  START_FAILED: 'START_FAILED',
  STOP_FAILED: 'STOP_FAILED',
  WAIT_TIMEOUT: 'WAIT_TIMEOUT',
  WAIT_FAILED: 'WAIT_FAILED',
  CONTAINER_ERROR: 'CONTAINER_ERROR',
  CHECK_TIMEOUT: 'CHECK_TIMEOUT',
  CHECK_FAILED: 'CHECK_FAILED',
  HEALTH_TIMEOUT: 'HEALTH_TIMEOUT',
  VERIFICATION_TIMEOUT: 'VERIFICATION_TIMEOUT',
  VERIFICATION_FAILED: 'VERIFICATION_FAILED',
  CANCELLED: 'CANCELLED',
  MONITOR_STATE: 'MONITOR_STATE',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Whether an operation that failed with the given code may succeed when
 * attempted again with a fresh fixture or a longer budget.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  [ErrorCode.START_FAILED]: false,
  [ErrorCode.STOP_FAILED]: false,
  [ErrorCode.WAIT_TIMEOUT]: true,
  [ErrorCode.WAIT_FAILED]: false,
  [ErrorCode.CONTAINER_ERROR]: false,
  [ErrorCode.CHECK_TIMEOUT]: true,
  [ErrorCode.CHECK_FAILED]: true,
  [ErrorCode.HEALTH_TIMEOUT]: true,
  [ErrorCode.VERIFICATION_TIMEOUT]: true,
  [ErrorCode.VERIFICATION_FAILED]: false,
  [ErrorCode.CANCELLED]: false,
  [ErrorCode.MONITOR_STATE]: false,
  [ErrorCode.CONFIG_INVALID]: false,
};

// ---------------------------------------------------------------------------
// Brand symbol
// ---------------------------------------------------------------------------

/**
 * Registered symbol so errors raised by a second copy of this module
 * (e.g. a nested node_modules install) still pass {@link isBerthError}.
 */
const BERTH_ERROR_BRAND = Symbol.for('berth.BerthError');

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export interface BerthErrorOptions {
  /** Container, check or strategy the error concerns. */
  subject?: string;
  /** Underlying failure. */
  cause?: unknown;
}

export class BerthError extends Error {
  readonly code: ErrorCodeValue;
  readonly subject?: string;
  readonly retriable: boolean;

  /** @internal */
  readonly [BERTH_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string, options: BerthErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'BerthError';
    this.code = code;
    this.retriable = ERROR_RETRIABLE_DEFAULTS[code];
    if (options.subject !== undefined) {
      this.subject = options.subject;
    }
  }
}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function withCause(message: string, cause: unknown): string {
  return cause === undefined ? message : `${message}: ${errorMessage(cause)}`;
}

// ---------------------------------------------------------------------------
// Lifecycle errors
// ---------------------------------------------------------------------------

/** A container or dependency failed to launch. Fatal to the startup sequence. */
export class StartError extends BerthError {
  constructor(container: string, cause?: unknown, detail?: string) {
    super(
      ErrorCode.START_FAILED,
      withCause(`failed to start container ${container}${detail ? ` (${detail})` : ''}`, cause),
      { subject: container, cause },
    );
    this.name = 'StartError';
  }
}

/** A container failed to terminate. Reported, never aborts sibling cleanup. */
export class StopError extends BerthError {
  constructor(container: string, cause?: unknown) {
    super(ErrorCode.STOP_FAILED, withCause(`failed to stop container ${container}`, cause), {
      subject: container,
      cause,
    });
    this.name = 'StopError';
  }
}

/**
 * Readiness was not reached.
 *
 * `WAIT_TIMEOUT` means the container never became ready within the budget;
 * `WAIT_FAILED` means it exited or failed while being waited on.
 */
export class WaitError extends BerthError {
  constructor(
    container: string,
    reason: 'timeout' | 'failed',
    cause?: unknown,
    stage?: string,
  ) {
    const label = stage ?? `container ${container}`;
    const what =
      reason === 'timeout'
        ? `timed out waiting for ${label} to be ready`
        : `${label} failed while waiting for readiness`;
    super(reason === 'timeout' ? ErrorCode.WAIT_TIMEOUT : ErrorCode.WAIT_FAILED, withCause(what, cause), {
      subject: container,
      cause,
    });
    this.name = 'WaitError';
  }
}

/** Kinds of operational failure on a single container. */
export type ContainerErrorKind =
  | 'port-lookup'
  | 'not-running'
  | 'logs'
  | 'exec'
  | 'already-started'
  | 'not-registered';

/** Operational error on a container (port lookup, log retrieval, exec, …). */
export class ContainerError extends BerthError {
  readonly kind: ContainerErrorKind;

  constructor(container: string, kind: ContainerErrorKind, message: string, cause?: unknown) {
    super(ErrorCode.CONTAINER_ERROR, withCause(`container ${container} ${kind}: ${message}`, cause), {
      subject: container,
      cause,
    });
    this.name = 'ContainerError';
    this.kind = kind;
  }
}

// ---------------------------------------------------------------------------
// Probe errors
// ---------------------------------------------------------------------------

/** A health probe did not finish within its timeout. */
export class CheckTimeoutError extends BerthError {
  readonly timeoutMs: number;

  constructor(check: string, timeoutMs: number) {
    super(ErrorCode.CHECK_TIMEOUT, `check ${check} timed out after ${timeoutMs}ms`, {
      subject: check,
    });
    this.name = 'CheckTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** A health probe ran and found an unhealthy condition. */
export class CheckFailedError extends BerthError {
  constructor(check: string, cause: unknown) {
    super(ErrorCode.CHECK_FAILED, withCause(`check ${check} failed`, cause), {
      subject: check,
      cause,
    });
    this.name = 'CheckFailedError';
  }
}

/** One-shot verification could not reach a verdict within its timeout. */
export class VerificationTimeoutError extends BerthError {
  readonly timeoutMs: number;

  constructor(strategy: string, timeoutMs: number) {
    super(
      ErrorCode.VERIFICATION_TIMEOUT,
      `verification ${strategy} could not be determined within ${timeoutMs}ms`,
      { subject: strategy },
    );
    this.name = 'VerificationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** One-shot verification reached a verdict and the target is wrong. */
export class VerificationFailedError extends BerthError {
  constructor(strategy: string, cause: unknown) {
    super(ErrorCode.VERIFICATION_FAILED, withCause(`verification ${strategy} failed`, cause), {
      subject: strategy,
      cause,
    });
    this.name = 'VerificationFailedError';
  }
}

/** A caller-supplied signal aborted a suspending operation. */
export class CancelledError extends BerthError {
  constructor(operation: string, cause?: unknown) {
    super(ErrorCode.CANCELLED, `${operation} was cancelled`, { subject: operation, cause });
    this.name = 'CancelledError';
  }
}

/** Misuse of a health monitor's lifecycle. */
export class MonitorStateError extends BerthError {
  constructor(message: string) {
    super(ErrorCode.MONITOR_STATE, message);
    this.name = 'MonitorStateError';
  }
}

/** Configuration failed validation. */
export class ConfigError extends BerthError {
  readonly problems: readonly string[];

  constructor(source: string, problems: string[]) {
    super(ErrorCode.CONFIG_INVALID, `invalid configuration in ${source}: ${problems.join('; ')}`, {
      subject: source,
    });
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

/**
 * Brand-checked type guard for {@link BerthError}.
 *
 * Falls back to the registered symbol so instances created by another copy
 * of this module are still recognised.
 */
export function isBerthError(value: unknown): value is BerthError {
  if (value instanceof BerthError) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    BERTH_ERROR_BRAND in value &&
    value[BERTH_ERROR_BRAND] === true
  );
}

/** True when `value` is a {@link BerthError} with the given code. */
export function hasErrorCode(value: unknown, code: ErrorCodeValue): value is BerthError {
  return isBerthError(value) && value.code === code;
}
