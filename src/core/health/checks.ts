/**
 * Built-in health checks.
 *
 * HTTP checks issue a GET against the target and treat any non-2xx status
 * or transport error as a failure. {@link createCheck} wraps an arbitrary
 * predicate for everything else.
 */

import { expectSuccess } from './http-probe.js';
import type { HealthCheck, HealthTarget } from './types.js';

export const DEFAULT_CHECK_TIMEOUT_MS = 10_000;

export interface CheckOptions {
  /** Budget of a single run. */
  timeoutMs?: number;
}

export interface HttpCheckOptions extends CheckOptions {
  /** Path appended to the target address. Defaults to the target's health path. */
  path?: string;
  /** Absolute URL; takes precedence over `path`. */
  url?: string;
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

export class HttpHealthCheck implements HealthCheck {
  readonly name: string;
  readonly timeoutMs: number;
  private readonly path?: string;
  private readonly url?: string;

  constructor(name: string, options: HttpCheckOptions = {}) {
    this.name = name;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
    this.path = options.path;
    this.url = options.url;
  }

  /** URL this check requests for `target`. */
  urlFor(target: HealthTarget): string {
    return this.url ?? target.address() + (this.path ?? target.healthPath());
  }

  async check(target: HealthTarget, signal: AbortSignal): Promise<void> {
    await expectSuccess(this.urlFor(target), signal);
  }
}

/** The application's system service endpoint answers 2xx. */
export class SystemServiceCheck extends HttpHealthCheck {
  constructor(options: CheckOptions = {}) {
    super('system-service', { ...options, path: '/api/system/health' });
  }
}

/** A single component's status endpoint answers 2xx. */
export class ComponentStatusCheck extends HttpHealthCheck {
  readonly componentId: string;

  constructor(componentId: string, options: CheckOptions = {}) {
    super(`component-${componentId}`, {
      ...options,
      path: `/api/components/${encodeURIComponent(componentId)}/status`,
    });
    this.componentId = componentId;
  }
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

/**
 * Resolves or returns `true` when healthy. Returning `false` or rejecting
 * marks the check unhealthy.
 */
export type CheckPredicate<T> = (target: T, signal: AbortSignal) => Promise<boolean | void>;

/** Turn a predicate into a named {@link HealthCheck}. */
export function createCheck<T = HealthTarget>(
  name: string,
  predicate: CheckPredicate<T>,
  options: CheckOptions = {},
): HealthCheck<T> {
  return {
    name,
    timeoutMs: options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS,
    async check(target, signal) {
      if ((await predicate(target, signal)) === false) {
        throw new Error('predicate reported unhealthy');
      }
    },
  };
}
