/**
 * Built-in read-only verification strategies.
 *
 * None of these change the target: they only query it. Operations that do
 * change it live in `operations.ts`.
 */

import { isDeepStrictEqual } from 'node:util';
import { getJson, httpGet } from '../health/http-probe.js';
import {
  schemaErrors,
  validateComponentList,
  validateComponentMetadata,
  type ComponentList,
  type ComponentMetadata,
} from './schemas.js';
import {
  DEFAULT_VERIFICATION_TIMEOUT_MS,
  type VerificationStrategy,
  type VerificationTarget,
} from './strategy.js';

export const SYSTEM_HEALTH_PATH = '/api/system/health';
export const COMPONENTS_PATH = '/api/components';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** GET `url` and require exactly 200. */
async function expectOk(url: string, signal: AbortSignal): Promise<void> {
  const res = await httpGet(url, signal);
  if (res.status !== 200) {
    throw new Error(`GET ${url} returned ${res.status}`);
  }
}

function componentPath(id: string, leaf: 'status' | 'metadata'): string {
  return `${COMPONENTS_PATH}/${encodeURIComponent(id)}/${leaf}`;
}

async function fetchComponents(target: VerificationTarget, signal: AbortSignal): Promise<ComponentList> {
  const url = target.address() + COMPONENTS_PATH;
  const body = await getJson(url, signal);
  if (!validateComponentList(body)) {
    throw new Error(`GET ${url} returned an unexpected body: ${schemaErrors(validateComponentList)}`);
  }
  return body;
}

async function fetchMetadata(
  target: VerificationTarget,
  id: string,
  signal: AbortSignal,
): Promise<ComponentMetadata> {
  const url = target.address() + componentPath(id, 'metadata');
  const body = await getJson(url, signal);
  if (!validateComponentMetadata(body)) {
    throw new Error(`GET ${url} returned an unexpected body: ${schemaErrors(validateComponentMetadata)}`);
  }
  return body;
}

function render(value: unknown): string {
  return value === undefined ? 'undefined' : JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

abstract class BaseStrategy implements VerificationStrategy {
  readonly timeoutMs: number;

  constructor(
    readonly name: string,
    timeoutMs?: number,
  ) {
    this.timeoutMs = timeoutMs ?? DEFAULT_VERIFICATION_TIMEOUT_MS;
  }

  abstract verify(target: VerificationTarget, signal: AbortSignal): Promise<void>;
}

// ---------------------------------------------------------------------------
// System
// ---------------------------------------------------------------------------

/** The target's process is running. */
export class RunningStrategy extends BaseStrategy {
  constructor(timeoutMs?: number) {
    super('running', timeoutMs);
  }

  async verify(target: VerificationTarget): Promise<void> {
    if (!target.isRunning()) {
      throw new Error(`${target.name} is not running`);
    }
  }
}

/** `GET /api/system/health` answers 200. */
export class SystemServiceStrategy extends BaseStrategy {
  constructor(timeoutMs?: number) {
    super('system-service', timeoutMs);
  }

  async verify(target: VerificationTarget, signal: AbortSignal): Promise<void> {
    await expectOk(target.address() + SYSTEM_HEALTH_PATH, signal);
  }
}

/** The target's own health endpoint answers 200. */
export class HealthEndpointStrategy extends BaseStrategy {
  constructor(timeoutMs?: number) {
    super('health-endpoint', timeoutMs);
  }

  async verify(target: VerificationTarget, signal: AbortSignal): Promise<void> {
    await expectOk(target.address() + target.healthPath(), signal);
  }
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

/** The component appears in `GET /api/components`. */
export class ComponentRegisteredStrategy extends BaseStrategy {
  constructor(
    readonly componentId: string,
    timeoutMs?: number,
  ) {
    super(`component-registered:${componentId}`, timeoutMs);
  }

  async verify(target: VerificationTarget, signal: AbortSignal): Promise<void> {
    const components = await fetchComponents(target, signal);
    if (!components.includes(this.componentId)) {
      throw new Error(`component ${this.componentId} is not registered`);
    }
  }
}

/** The component is registered and its status endpoint answers 200. */
export class ComponentInitializedStrategy extends BaseStrategy {
  constructor(
    readonly componentId: string,
    timeoutMs?: number,
  ) {
    super(`component-initialized:${componentId}`, timeoutMs);
  }

  async verify(target: VerificationTarget, signal: AbortSignal): Promise<void> {
    const components = await fetchComponents(target, signal);
    if (!components.includes(this.componentId)) {
      throw new Error(`component ${this.componentId} is not registered`);
    }
    await expectOk(target.address() + componentPath(this.componentId, 'status'), signal);
  }
}

/** The component no longer appears in `GET /api/components`. */
export class ComponentDisposedStrategy extends BaseStrategy {
  constructor(
    readonly componentId: string,
    timeoutMs?: number,
  ) {
    super(`component-disposed:${componentId}`, timeoutMs);
  }

  async verify(target: VerificationTarget, signal: AbortSignal): Promise<void> {
    const components = await fetchComponents(target, signal);
    if (components.includes(this.componentId)) {
      throw new Error(`component ${this.componentId} is still registered`);
    }
  }
}

/** Every expected key is present and deeply equal in the component's metadata. */
export class ComponentMetadataStrategy extends BaseStrategy {
  constructor(
    readonly componentId: string,
    readonly expected: Readonly<Record<string, unknown>>,
    timeoutMs?: number,
  ) {
    super(`component-metadata:${componentId}`, timeoutMs);
  }

  async verify(target: VerificationTarget, signal: AbortSignal): Promise<void> {
    const metadata = await fetchMetadata(target, this.componentId, signal);
    for (const [key, want] of Object.entries(this.expected)) {
      if (!Object.hasOwn(metadata, key)) {
        throw new Error(`component ${this.componentId} is missing metadata key ${key}`);
      }
      const got = metadata[key];
      if (!isDeepStrictEqual(got, want)) {
        throw new Error(
          `component ${this.componentId} metadata key ${key}: expected ${render(want)}, got ${render(got)}`,
        );
      }
    }
  }
}
