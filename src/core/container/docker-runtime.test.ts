import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DockerRuntime, parsePortOutput } from './docker-runtime.js';
import { FIXTURE_LABEL, type CreateOptions, type RuntimeDriver, type RuntimeHandle } from './runtime.js';
import { GenericContainer } from './container.js';
import { configureLogging, resetLogging } from '../logger.js';

// ---------------------------------------------------------------------------
// Mock exec helper
// ---------------------------------------------------------------------------

type ExecCall = { file: string; args: readonly string[] };

function createMockExec() {
  const calls: ExecCall[] = [];
  const handler =
    vi.fn<(file: string, args: readonly string[]) => Promise<{ stdout: string; stderr: string }>>();

  const exec = async (file: string, args: readonly string[]) => {
    calls.push({ file, args });
    return handler(file, args);
  };

  return { exec, handler, calls };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createOptions(overrides?: Partial<CreateOptions>): CreateOptions {
  return {
    image: 'postgres:15',
    name: 'db-1',
    env: {},
    ports: [],
    ...overrides,
  };
}

const HANDLE: RuntimeHandle = { id: 'abc123', name: 'db-1', runtime: 'docker' };

function ok(stdout = '') {
  return { stdout, stderr: '' };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('DockerRuntime', () => {
  let mock: ReturnType<typeof createMockExec>;
  let runtime: DockerRuntime;

  beforeEach(() => {
    mock = createMockExec();
    runtime = new DockerRuntime({ exec: mock.exec });
  });

  it('implements the RuntimeDriver interface', () => {
    const _rt: RuntimeDriver = runtime;
    expect(_rt.name).toBe('docker');
  });

  describe('isAvailable', () => {
    it('returns true when docker info succeeds', async () => {
      mock.handler.mockResolvedValueOnce(ok('info output'));
      expect(await runtime.isAvailable()).toBe(true);
      expect(mock.calls[0]).toEqual({ file: 'docker', args: ['info'] });
    });

    it('returns false when docker info fails', async () => {
      mock.handler.mockRejectedValueOnce(new Error('Cannot connect to the Docker daemon'));
      expect(await runtime.isAvailable()).toBe(false);
    });
  });

  describe('create', () => {
    it('passes name, env, loopback ports and image', async () => {
      mock.handler.mockResolvedValueOnce(ok('abc123\n'));
      const handle = await runtime.create(
        createOptions({
          env: { POSTGRES_DB: 'app' },
          ports: [{ internal: 5432 }, { internal: 8080, external: 18080 }],
        }),
      );

      expect(handle).toEqual({ id: 'abc123', name: 'db-1', runtime: 'docker' });
      expect(mock.calls[0].args).toEqual([
        'create',
        '--name',
        'db-1',
        '-e',
        'POSTGRES_DB=app',
        '-p',
        '127.0.0.1::5432',
        '-p',
        '127.0.0.1:18080:8080',
        'postgres:15',
      ]);
    });

    it('passes labels after the name', async () => {
      mock.handler.mockResolvedValueOnce(ok('id\n'));
      await runtime.create(createOptions({ labels: { [FIXTURE_LABEL]: 'db' } }));
      expect(mock.calls[0].args.slice(0, 5)).toEqual(['create', '--name', 'db-1', '--label', 'berth.fixture=db']);
    });

    it('gives two fixtures of the same name distinct container names', async () => {
      configureLogging({ sink: () => undefined });
      try {
        mock.handler.mockResolvedValue(ok('cid\n'));
        const first = new GenericContainer(runtime, { name: 'postgres', image: 'postgres:15' });
        const second = new GenericContainer(runtime, { name: 'postgres', image: 'postgres:15' });
        await first.start();
        await second.start();

        const names = mock.calls
          .filter((call) => call.args[0] === 'create')
          .map((call) => call.args[call.args.indexOf('--name') + 1]);
        expect(names).toEqual([first.id, second.id]);
        expect(first.id).not.toBe(second.id);
        expect(first.name).toBe('postgres');
      } finally {
        resetLogging();
      }
    });

    it('appends the command after the image', async () => {
      mock.handler.mockResolvedValueOnce(ok('id\n'));
      await runtime.create(
        createOptions({ image: 'redis:7', command: ['redis-server', '--requirepass', 'x'] }),
      );
      expect(mock.calls[0].args.slice(-4)).toEqual(['redis:7', 'redis-server', '--requirepass', 'x']);
    });

    it('uses a custom docker path', async () => {
      const custom = new DockerRuntime({ exec: mock.exec, dockerPath: '/usr/local/bin/docker' });
      mock.handler.mockResolvedValueOnce(ok('id'));
      await custom.create(createOptions());
      expect(mock.calls[0].file).toBe('/usr/local/bin/docker');
    });

    it('propagates CLI errors', async () => {
      mock.handler.mockRejectedValueOnce(new Error('image not found'));
      await expect(runtime.create(createOptions())).rejects.toThrow('image not found');
    });
  });

  describe('lifecycle commands', () => {
    it('start runs docker start', async () => {
      mock.handler.mockResolvedValueOnce(ok());
      await runtime.start(HANDLE);
      expect(mock.calls[0].args).toEqual(['start', 'abc123']);
    });

    it('stop passes the grace period', async () => {
      mock.handler.mockResolvedValueOnce(ok());
      await runtime.stop(HANDLE, 5);
      expect(mock.calls[0].args).toEqual(['stop', '-t', '5', 'abc123']);
    });

    it('remove forces removal', async () => {
      mock.handler.mockResolvedValueOnce(ok());
      await runtime.remove(HANDLE);
      expect(mock.calls[0].args).toEqual(['rm', '-f', 'abc123']);
    });
  });

  describe('state', () => {
    it('maps a running container', async () => {
      mock.handler.mockResolvedValueOnce(
        ok(JSON.stringify({ Status: 'running', Running: true, ExitCode: 0 })),
      );
      expect(await runtime.state(HANDLE)).toEqual({
        running: true,
        status: 'running',
        exitCode: undefined,
      });
      expect(mock.calls[0].args).toEqual(['inspect', '--format', '{{json .State}}', 'abc123']);
    });

    it('reports the exit code of an exited container', async () => {
      mock.handler.mockResolvedValueOnce(
        ok(JSON.stringify({ Status: 'exited', Running: false, ExitCode: 137 })),
      );
      expect(await runtime.state(HANDLE)).toEqual({
        running: false,
        status: 'exited',
        exitCode: 137,
      });
    });

    it('rejects malformed inspect output', async () => {
      mock.handler.mockResolvedValueOnce(ok('{"Status": 1}'));
      await expect(runtime.state(HANDLE)).rejects.toThrow(
        'unexpected docker inspect output for db-1',
      );
    });
  });

  describe('network', () => {
    it('host defaults to localhost', async () => {
      expect(await runtime.host(HANDLE)).toBe('localhost');
    });

    it('host is configurable', async () => {
      const rt = new DockerRuntime({ exec: mock.exec, host: '127.0.0.1' });
      expect(await rt.host(HANDLE)).toBe('127.0.0.1');
    });

    it('mappedPort reads docker port output', async () => {
      mock.handler.mockResolvedValueOnce(ok('127.0.0.1:49153\n'));
      expect(await runtime.mappedPort(HANDLE, 5432)).toBe(49153);
      expect(mock.calls[0].args).toEqual(['port', 'abc123', '5432/tcp']);
    });

    it('mappedPort rejects when nothing is published', async () => {
      mock.handler.mockResolvedValueOnce(ok(''));
      await expect(runtime.mappedPort(HANDLE, 5432)).rejects.toThrow(
        'port 5432/tcp is not published',
      );
    });
  });

  describe('parsePortOutput', () => {
    it('takes the first line with a port', () => {
      expect(parsePortOutput('0.0.0.0:49153\n[::]:49153\n')).toBe(49153);
    });

    it('handles IPv6 addresses', () => {
      expect(parsePortOutput('[::]:32768')).toBe(32768);
    });

    it('returns undefined for empty output', () => {
      expect(parsePortOutput('')).toBeUndefined();
    });
  });

  describe('logs', () => {
    it('streams stdout then stderr', async () => {
      mock.handler.mockResolvedValueOnce({ stdout: 'out\n', stderr: 'err\n' });
      const stream = await runtime.logs(HANDLE);
      const chunks: string[] = [];
      for await (const chunk of stream) chunks.push(String(chunk));
      expect(chunks.join('')).toBe('out\nerr\n');
      expect(mock.calls[0].args).toEqual(['logs', 'abc123']);
    });
  });

  describe('exec', () => {
    it('returns exit code 0 on success', async () => {
      mock.handler.mockResolvedValueOnce({ stdout: 'accepting connections\n', stderr: '' });
      const result = await runtime.exec(HANDLE, ['pg_isready']);
      expect(result).toEqual({ exitCode: 0, stdout: 'accepting connections\n', stderr: '' });
      expect(mock.calls[0].args).toEqual(['exec', 'abc123', 'pg_isready']);
    });

    it('returns a non-zero exit code as a result', async () => {
      mock.handler.mockRejectedValueOnce(
        Object.assign(new Error('Command failed'), { code: 2, stdout: '', stderr: 'no response' }),
      );
      const result = await runtime.exec(HANDLE, ['pg_isready']);
      expect(result).toEqual({ exitCode: 2, stdout: '', stderr: 'no response' });
    });

    it('rethrows failures without an exit code', async () => {
      mock.handler.mockRejectedValueOnce(new Error('No such container'));
      await expect(runtime.exec(HANDLE, ['true'])).rejects.toThrow('No such container');
    });
  });
});
