/**
 * Readiness probes.
 *
 * A running process is necessary but not sufficient for "ready". A probe
 * answers the second half: it resolves `true` once the service inside the
 * container accepts work, `false` (or rejects) while it does not yet.
 */

import type { Readable } from 'node:stream';
import { expectSuccess } from '../health/http-probe.js';
import type { ExecResult } from './runtime.js';

/** What a probe may look at. Every {@link Container} satisfies this. */
export interface ReadinessTarget {
  readonly name: string;
  host(): string;
  port(internal: number): number;
  logs(): Promise<Readable>;
  exec(cmd: readonly string[]): Promise<ExecResult>;
}

export interface ReadinessProbe {
  /** Short human description, used in wait errors. */
  readonly description: string;
  check(target: ReadinessTarget, signal: AbortSignal): Promise<boolean>;
}

/** Ready once `GET http://host:port<path>` answers 2xx. */
export function httpReadiness(path: string, internalPort: number): ReadinessProbe {
  return {
    description: `GET ${path} on port ${internalPort}`,
    async check(target, signal) {
      const url = `http://${target.host()}:${target.port(internalPort)}${path}`;
      await expectSuccess(url, signal);
      return true;
    },
  };
}

/** Ready once the container's log output contains `pattern`. */
export function logReadiness(pattern: string | RegExp): ReadinessProbe {
  return {
    description: `log output matching ${String(pattern)}`,
    async check(target) {
      let text = '';
      for await (const chunk of await target.logs()) {
        text += String(chunk);
      }
      return typeof pattern === 'string' ? text.includes(pattern) : pattern.test(text);
    },
  };
}

/** Ready once `cmd` exits with code 0 inside the container. */
export function execReadiness(cmd: readonly string[]): ReadinessProbe {
  return {
    description: `exec ${cmd.join(' ')}`,
    async check(target) {
      const result = await target.exec(cmd);
      return result.exitCode === 0;
    },
  };
}

/** Ready once every probe is ready, checked in order. */
export function allOf(...probes: ReadinessProbe[]): ReadinessProbe {
  return {
    description: probes.map((probe) => probe.description).join(' and '),
    async check(target, signal) {
      for (const probe of probes) {
        if (!(await probe.check(target, signal))) return false;
      }
      return true;
    },
  };
}
