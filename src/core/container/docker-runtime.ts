/**
 * Docker runtime driver.
 *
 * Implements {@link RuntimeDriver} on top of the Docker CLI via an
 * injectable exec function. No Docker SDK dependency; just shell out to
 * the `docker` binary.
 *
 * Docker-specific behavior:
 * - Ports are published on loopback only (`-p 127.0.0.1:ext:int`). An
 *   omitted external port lets Docker pick an ephemeral one.
 * - `docker logs` output is buffered and replayed as a stream.
 * - A non-zero exit from `docker exec` is a result, not a failure.
 */

import { Readable } from 'node:stream';
import { defaultExec } from './runtime.js';
import type {
  CreateOptions,
  ExecFn,
  ExecResult,
  RuntimeDriver,
  RuntimeHandle,
  RuntimeState,
} from './runtime.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DockerRuntimeOptions {
  /** Injectable exec function for testing. Defaults to promisified execFile. */
  exec?: ExecFn;
  /** Path to the docker binary. Defaults to `'docker'`. */
  dockerPath?: string;
  /** Host under which published ports are reachable. Defaults to `'localhost'`. */
  host?: string;
}

// ---------------------------------------------------------------------------
// CLI output parsing
// ---------------------------------------------------------------------------

interface DockerStateJson {
  Status: string;
  Running: boolean;
  ExitCode: number;
}

function isDockerStateJson(value: unknown): value is DockerStateJson {
  return (
    typeof value === 'object' &&
    value !== null &&
    'Status' in value &&
    typeof value.Status === 'string' &&
    'Running' in value &&
    typeof value.Running === 'boolean' &&
    'ExitCode' in value &&
    typeof value.ExitCode === 'number'
  );
}

/**
 * Parse `docker port` output (`0.0.0.0:49153\n[::]:49153`) into the first
 * published host port.
 */
export function parsePortOutput(output: string): number | undefined {
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    const colon = trimmed.lastIndexOf(':');
    if (colon < 0) continue;
    const port = Number(trimmed.slice(colon + 1));
    if (Number.isInteger(port) && port > 0) return port;
  }
  return undefined;
}

/** execFile failures carry the process's exit code and captured output. */
interface ExecFailure {
  code: number;
  stdout: string;
  stderr: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'number' &&
    'stdout' in err &&
    typeof err.stdout === 'string' &&
    'stderr' in err &&
    typeof err.stderr === 'string'
  );
}

// ---------------------------------------------------------------------------
// DockerRuntime
// ---------------------------------------------------------------------------

export class DockerRuntime implements RuntimeDriver {
  readonly name = 'docker' as const;

  private readonly execFn: ExecFn;
  private readonly dockerPath: string;
  private readonly hostName: string;

  constructor(options?: DockerRuntimeOptions) {
    this.execFn = options?.exec ?? defaultExec;
    this.dockerPath = options?.dockerPath ?? 'docker';
    this.hostName = options?.host ?? 'localhost';
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.docker('info');
      return true;
    } catch {
      return false;
    }
  }

  async create(options: CreateOptions): Promise<RuntimeHandle> {
    const { stdout } = await this.docker(...this.buildCreateArgs(options));
    return { id: stdout.trim(), name: options.name, runtime: this.name };
  }

  async start(handle: RuntimeHandle): Promise<void> {
    await this.docker('start', handle.id);
  }

  async stop(handle: RuntimeHandle, graceSeconds: number): Promise<void> {
    await this.docker('stop', '-t', String(graceSeconds), handle.id);
  }

  async remove(handle: RuntimeHandle): Promise<void> {
    await this.docker('rm', '-f', handle.id);
  }

  async state(handle: RuntimeHandle): Promise<RuntimeState> {
    const { stdout } = await this.docker('inspect', '--format', '{{json .State}}', handle.id);
    const raw: unknown = JSON.parse(stdout);
    if (!isDockerStateJson(raw)) {
      throw new Error(`unexpected docker inspect output for ${handle.name}`);
    }
    return {
      running: raw.Running,
      status: raw.Status,
      exitCode: raw.Running ? undefined : raw.ExitCode,
    };
  }

  async host(_handle: RuntimeHandle): Promise<string> {
    return this.hostName;
  }

  async mappedPort(handle: RuntimeHandle, internalPort: number): Promise<number> {
    const { stdout } = await this.docker('port', handle.id, `${internalPort}/tcp`);
    const port = parsePortOutput(stdout);
    if (port === undefined) {
      throw new Error(`port ${internalPort}/tcp is not published`);
    }
    return port;
  }

  async logs(handle: RuntimeHandle): Promise<Readable> {
    const { stdout, stderr } = await this.docker('logs', handle.id);
    return Readable.from([stdout, stderr].filter((chunk) => chunk.length > 0));
  }

  async exec(handle: RuntimeHandle, cmd: readonly string[]): Promise<ExecResult> {
    try {
      const { stdout, stderr } = await this.docker('exec', handle.id, ...cmd);
      return { exitCode: 0, stdout, stderr };
    } catch (err) {
      if (isExecFailure(err)) {
        return { exitCode: err.code, stdout: err.stdout, stderr: err.stderr };
      }
      throw err;
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private buildCreateArgs(options: CreateOptions): string[] {
    const args: string[] = ['create', '--name', options.name];

    for (const [key, value] of Object.entries(options.labels ?? {})) {
      args.push('--label', `${key}=${value}`);
    }

    for (const [key, value] of Object.entries(options.env)) {
      args.push('-e', `${key}=${value}`);
    }

    for (const port of options.ports) {
      args.push('-p', `127.0.0.1:${port.external ?? ''}:${port.internal}`);
    }

    args.push(options.image);
    if (options.command && options.command.length > 0) {
      args.push(...options.command);
    }
    return args;
  }

  private async docker(...args: string[]): Promise<{ stdout: string; stderr: string }> {
    return this.execFn(this.dockerPath, args);
  }
}
