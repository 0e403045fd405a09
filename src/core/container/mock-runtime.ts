/**
 * In-memory runtime driver for tests.
 *
 * Implements {@link RuntimeDriver} without a container engine, recording
 * every call so tests can assert ordering. Calls, failures and lookups
 * use the fixture name (the {@link FIXTURE_LABEL} label, else the runtime
 * name), so failures can be arranged before the container exists. Like a
 * real engine it refuses a second live container under the same runtime
 * name.
 */

import { Readable } from 'node:stream';
import {
  FIXTURE_LABEL,
  type CreateOptions,
  type ExecResult,
  type RuntimeDriver,
  type RuntimeHandle,
  type RuntimeState,
} from './runtime.js';

// ---------------------------------------------------------------------------
// Call recording
// ---------------------------------------------------------------------------

export type RuntimeOperation = 'create' | 'start' | 'stop' | 'remove' | 'exec' | 'logs';

export interface RuntimeCall {
  op: RuntimeOperation;
  /** Fixture name of the container the call targeted. */
  name: string;
}

export interface MockRuntimeOptions {
  /** Host reported for every container. Defaults to `'127.0.0.1'`. */
  host?: string;
  /** First port handed out for bindings without an external port. */
  firstEphemeralPort?: number;
}

// ---------------------------------------------------------------------------
// Internal container record
// ---------------------------------------------------------------------------

interface ContainerRecord {
  handle: RuntimeHandle;
  fixture: string;
  options: CreateOptions;
  status: 'created' | 'running' | 'exited';
  exitCode?: number;
  ports: Map<number, number>;
}

// ---------------------------------------------------------------------------
// MockRuntime
// ---------------------------------------------------------------------------

export class MockRuntime implements RuntimeDriver {
  readonly name = 'mock' as const;

  /** Every lifecycle call, in the order it was made. */
  readonly calls: RuntimeCall[] = [];

  private readonly containers = new Map<string, ContainerRecord>();
  private readonly hostName: string;
  private readonly firstEphemeralPort: number;
  private nextEphemeralPort: number;
  private idCounter = 0;

  // -- Failure simulation --

  private available = true;
  private readonly createFailures = new Map<string, string>();
  private readonly startFailures = new Map<string, string>();
  private readonly stopFailures = new Map<string, string>();
  private readonly stopHangs = new Set<string>();
  private readonly logsByName = new Map<string, string | Error>();
  private readonly execByName = new Map<string, ExecResult | Error>();

  constructor(options?: MockRuntimeOptions) {
    this.hostName = options?.host ?? '127.0.0.1';
    this.firstEphemeralPort = options?.firstEphemeralPort ?? 49152;
    this.nextEphemeralPort = this.firstEphemeralPort;
  }

  // -----------------------------------------------------------------------
  // RuntimeDriver
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async create(options: CreateOptions): Promise<RuntimeHandle> {
    const fixture = options.labels?.[FIXTURE_LABEL] ?? options.name;
    this.calls.push({ op: 'create', name: fixture });

    const failure = this.createFailures.get(options.image);
    if (failure !== undefined) {
      throw new Error(failure);
    }
    for (const record of this.containers.values()) {
      if (record.handle.name === options.name) {
        throw new Error(`container name ${options.name} is already in use`);
      }
    }

    this.idCounter += 1;
    const handle: RuntimeHandle = {
      id: `mock-${this.idCounter}`,
      name: options.name,
      runtime: this.name,
    };

    const ports = new Map<number, number>();
    for (const binding of options.ports) {
      ports.set(binding.internal, binding.external ?? this.nextEphemeralPort++);
    }

    this.containers.set(handle.id, { handle, fixture, options, status: 'created', ports });
    return handle;
  }

  async start(handle: RuntimeHandle): Promise<void> {
    const record = this.record(handle);
    this.calls.push({ op: 'start', name: record.fixture });

    const failure = this.startFailures.get(record.fixture);
    if (failure !== undefined) {
      throw new Error(failure);
    }
    record.status = 'running';
    record.exitCode = undefined;
  }

  async stop(handle: RuntimeHandle, _graceSeconds: number): Promise<void> {
    const record = this.record(handle);
    this.calls.push({ op: 'stop', name: record.fixture });

    if (this.stopHangs.has(record.fixture)) {
      return new Promise<void>(() => {
        // Intentionally never resolves.
      });
    }

    const failure = this.stopFailures.get(record.fixture);
    if (failure !== undefined) {
      throw new Error(failure);
    }

    if (record.status === 'running') {
      record.status = 'exited';
      record.exitCode = 0;
    }
  }

  async remove(handle: RuntimeHandle): Promise<void> {
    this.calls.push({ op: 'remove', name: this.containers.get(handle.id)?.fixture ?? handle.name });
    this.containers.delete(handle.id);
  }

  async state(handle: RuntimeHandle): Promise<RuntimeState> {
    const record = this.record(handle);
    return {
      running: record.status === 'running',
      status: record.status,
      exitCode: record.exitCode,
    };
  }

  async host(handle: RuntimeHandle): Promise<string> {
    this.record(handle);
    return this.hostName;
  }

  async mappedPort(handle: RuntimeHandle, internalPort: number): Promise<number> {
    const external = this.record(handle).ports.get(internalPort);
    if (external === undefined) {
      throw new Error(`port ${internalPort} is not exposed`);
    }
    return external;
  }

  async logs(handle: RuntimeHandle): Promise<Readable> {
    const record = this.record(handle);
    this.calls.push({ op: 'logs', name: record.fixture });
    const logs = this.logsByName.get(record.fixture) ?? '';
    if (logs instanceof Error) {
      throw logs;
    }
    return Readable.from(logs.length > 0 ? [logs] : []);
  }

  async exec(handle: RuntimeHandle, _cmd: readonly string[]): Promise<ExecResult> {
    const record = this.record(handle);
    this.calls.push({ op: 'exec', name: record.fixture });
    if (record.status !== 'running') {
      throw new Error(`container ${record.fixture} is not running`);
    }
    const result = this.execByName.get(record.fixture) ?? { exitCode: 0, stdout: '', stderr: '' };
    if (result instanceof Error) {
      throw result;
    }
    return { ...result };
  }

  // -----------------------------------------------------------------------
  // Failure simulation
  // -----------------------------------------------------------------------

  /** Make every `create()` of `image` reject (e.g. a missing image). */
  simulateCreateFailure(image: string, message = `image ${image} not found`): void {
    this.createFailures.set(image, message);
  }

  /** Make `start()` of the named container reject. */
  simulateStartFailure(name: string, message = 'start failed'): void {
    this.startFailures.set(name, message);
  }

  /** Make `stop()` of the named container reject. */
  simulateStopFailure(name: string, message = 'stop failed'): void {
    this.stopFailures.set(name, message);
  }

  /** Make `stop()` of the named container hang forever. */
  simulateStopHang(name: string): void {
    this.stopHangs.add(name);
  }

  /**
   * Simulate an unexpected exit of a running container.
   * Defaults to exit code 137 (SIGKILL).
   */
  simulateCrash(name: string, exitCode = 137): void {
    for (const record of this.containers.values()) {
      if (record.fixture === name) {
        record.status = 'exited';
        record.exitCode = exitCode;
      }
    }
  }

  /** Log output returned by `logs()`, or an error it rejects with. */
  setLogs(name: string, logs: string | Error): void {
    this.logsByName.set(name, logs);
  }

  /** Result returned by `exec()`, or an error it rejects with. */
  setExecResult(name: string, result: ExecResult | Error): void {
    this.execByName.set(name, result);
  }

  setAvailable(value: boolean): void {
    this.available = value;
  }

  // -----------------------------------------------------------------------
  // Inspection helpers (test-only)
  // -----------------------------------------------------------------------

  /** Names targeted by calls of one kind, in call order. */
  callsOf(op: RuntimeOperation): string[] {
    return this.calls.filter((call) => call.op === op).map((call) => call.name);
  }

  /** Options the named container was created with. */
  createdWith(name: string): CreateOptions | undefined {
    for (const record of this.containers.values()) {
      if (record.fixture === name) return record.options;
    }
    return undefined;
  }

  /** Names of containers currently running. */
  runningNames(): string[] {
    return [...this.containers.values()]
      .filter((record) => record.status === 'running')
      .map((record) => record.fixture);
  }

  /** Clear all internal state. */
  reset(): void {
    this.calls.length = 0;
    this.containers.clear();
    this.idCounter = 0;
    this.nextEphemeralPort = this.firstEphemeralPort;
    this.available = true;
    this.createFailures.clear();
    this.startFailures.clear();
    this.stopFailures.clear();
    this.stopHangs.clear();
    this.logsByName.clear();
    this.execByName.clear();
  }

  private record(handle: RuntimeHandle): ContainerRecord {
    const record = this.containers.get(handle.id);
    if (!record) {
      throw new Error(`no such container: ${handle.name}`);
    }
    return record;
  }
}
