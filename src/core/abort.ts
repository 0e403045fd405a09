/**
 * Cancellation helpers.
 *
 * Every suspending operation in Berth takes an optional `AbortSignal`.
 * These helpers turn timers and in-flight promises into something that
 * settles the moment the signal fires, rather than at the next poll.
 */

/** Reason attached to signals aborted by a deadline rather than the caller. */
export class DeadlineExceeded extends Error {
  constructor(readonly timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceeded';
  }
}

/** Sleep for `ms`, resolving early (with `false`) if `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race `promise` against `signal`. Rejects with the signal's reason as soon
 * as it aborts; the losing promise is left to settle on its own.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep a late rejection from surfacing as unhandled.
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      promise.catch(() => undefined);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** A child signal that aborts on its parent, a deadline, or {@link Scope.cancel}. */
export interface Scope {
  readonly signal: AbortSignal;
  /** True once the deadline (not the parent) aborted the scope. */
  readonly timedOut: boolean;
  cancel(reason?: unknown): void;
  /** Release the timer and parent listener. Idempotent. */
  dispose(): void;
}

/**
 * Derive a scope from an optional parent signal, bounded by `timeoutMs`
 * when given. The scope's abort reason is a {@link DeadlineExceeded} when
 * the deadline fired, otherwise the parent's reason.
 */
export function createScope(parent?: AbortSignal, timeoutMs?: number): Scope {
  const controller = new AbortController();
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort(new DeadlineExceeded(timeoutMs));
      }, Math.max(0, timeoutMs));
    }
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    cancel(reason?: unknown) {
      controller.abort(reason);
    },
    dispose() {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
