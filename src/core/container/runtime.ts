/**
 * Runtime driver contract and supporting types.
 *
 * The container abstraction is defined entirely in terms of these
 * primitives. Any engine satisfying {@link RuntimeDriver} is substitutable:
 * the Docker CLI adapter in production, the in-memory mock in tests.
 */

import { execFile as execFileCb } from 'node:child_process';
import type { Readable } from 'node:stream';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFileCb);

// ---------------------------------------------------------------------------
// Runtime name
// ---------------------------------------------------------------------------

/**
 * Supported runtime drivers.
 *
 * - `'docker'`: shells out to the Docker CLI.
 * - `'mock'`  : in-memory, for tests.
 */
export type RuntimeName = 'docker' | 'mock';

// ---------------------------------------------------------------------------
// Port mapping
// ---------------------------------------------------------------------------

/**
 * A declared container port.
 *
 * When `external` is omitted the runtime assigns an ephemeral host port;
 * the actual value is read back through {@link RuntimeDriver.mappedPort}.
 */
export interface PortBinding {
  internal: number;
  external?: number;
}

// ---------------------------------------------------------------------------
// Create options
// ---------------------------------------------------------------------------

/** Label carrying the fixture name a container was created for. */
export const FIXTURE_LABEL = 'berth.fixture';

/** Options for materializing a new container. */
export interface CreateOptions {
  /** Image reference (e.g. `"postgres:15"`). */
  image: string;
  /** Container name; unique among live containers on the runtime. */
  name: string;
  /** Labels attached to the container. */
  labels?: Record<string, string>;
  /** Environment variables injected into the container. */
  env: Record<string, string>;
  /** Ports exposed to the host. */
  ports: PortBinding[];
  /** Override the image's default command. */
  command?: string[];
}

// ---------------------------------------------------------------------------
// Handle and state
// ---------------------------------------------------------------------------

/**
 * Opaque handle to a created container, returned by {@link RuntimeDriver.create}.
 *
 * Only the driver that created it can interpret `id`.
 */
export interface RuntimeHandle {
  readonly id: string;
  readonly name: string;
  readonly runtime: RuntimeName;
}

/** Snapshot of a container as the runtime reports it. */
export interface RuntimeState {
  running: boolean;
  /** Engine-reported status string (`created`, `running`, `exited`, …). */
  status: string;
  /** Process exit code, once the container has exited. */
  exitCode?: number;
}

/** Outcome of a command run inside a container. */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ---------------------------------------------------------------------------
// Runtime driver interface
// ---------------------------------------------------------------------------

/**
 * External collaborator that materializes and controls process sandboxes.
 *
 * All methods are async; every failure is a rejected promise carrying the
 * engine's own error, which the container layer wraps with the container's
 * name.
 */
export interface RuntimeDriver {
  readonly name: RuntimeName;

  /** Check whether the engine is installed and responsive. */
  isAvailable(): Promise<boolean>;

  /** Create (but do not start) a container. */
  create(options: CreateOptions): Promise<RuntimeHandle>;

  start(handle: RuntimeHandle): Promise<void>;

  /**
   * Gracefully stop a container.
   * @param graceSeconds - Seconds to wait before the engine force-kills it.
   */
  stop(handle: RuntimeHandle, graceSeconds: number): Promise<void>;

  /** Remove a stopped container and its resources. */
  remove(handle: RuntimeHandle): Promise<void>;

  state(handle: RuntimeHandle): Promise<RuntimeState>;

  /** Host name or address under which mapped ports are reachable. */
  host(handle: RuntimeHandle): Promise<string>;

  /** Host port the runtime assigned to a declared internal port. */
  mappedPort(handle: RuntimeHandle, internalPort: number): Promise<number>;

  /** The container's combined log output so far. */
  logs(handle: RuntimeHandle): Promise<Readable>;

  exec(handle: RuntimeHandle, cmd: readonly string[]): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// Exec function (shared by CLI adapters)
// ---------------------------------------------------------------------------

/**
 * Injectable exec function for shelling out to container CLI binaries.
 * Returns stdout/stderr as strings.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
) => Promise<{ stdout: string; stderr: string }>;

/** Default exec implementation, wrapping child_process.execFile. */
export const defaultExec: ExecFn = async (file, args) => {
  return execFileAsync(file, [...args], { encoding: 'utf-8', maxBuffer: 16 * 1024 * 1024 });
};
