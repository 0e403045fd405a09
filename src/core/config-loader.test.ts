import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyEnvOverrides,
  createRuntime,
  healthCheckOptions,
  healthMonitorOptions,
  initialize,
  loadConfig,
  orchestratorOptions,
  resolveConfigPath,
  verificationOptions,
} from './config-loader.js';
import { DEFAULT_CONFIG, parseConfig } from '../types/config.js';
import { ConfigError, ErrorCode } from '../types/errors.js';
import { DependencyOrchestrator } from './container/orchestrator.js';
import { FakeContainer } from '../testing/fake-container.js';
import { HealthMonitor } from './health/monitor.js';
import { createCheck } from './health/checks.js';
import { ShutdownOperation } from './verification/operations.js';
import { DockerRuntime } from './container/docker-runtime.js';
import { MockRuntime } from './container/mock-runtime.js';
import { configureLogging, resetLogging, type LogEntry } from './logger.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createTempRoot(): string {
  const root = join(tmpdir(), `berth-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(root, { recursive: true });
  return root;
}

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

describe('resolveConfigPath', () => {
  it('uses $BERTH_CONFIG when set', () => {
    expect(resolveConfigPath({ BERTH_CONFIG: '/etc/berth/ci.toml' }, '/work')).toBe('/etc/berth/ci.toml');
  });

  it('resolves a relative $BERTH_CONFIG against the working directory', () => {
    expect(resolveConfigPath({ BERTH_CONFIG: 'config/ci.toml' }, '/work')).toBe('/work/config/ci.toml');
  });

  it('falls back to berth.toml in the working directory', () => {
    expect(resolveConfigPath({}, '/work')).toBe('/work/berth.toml');
    expect(resolveConfigPath({ BERTH_CONFIG: '' }, '/work')).toBe('/work/berth.toml');
  });
});

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let testRoot: string;
  let configPath: string;

  beforeEach(() => {
    testRoot = createTempRoot();
    configPath = join(testRoot, 'berth.toml');
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadConfig(configPath, {})).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for an empty file', () => {
    writeFileSync(configPath, '\n  \n', 'utf-8');
    expect(loadConfig(configPath, {})).toEqual(DEFAULT_CONFIG);
  });

  it('parses every section', () => {
    writeFileSync(
      configPath,
      `
[runtime]
engine = "mock"
host = "127.0.0.1"

[timeouts]
ready_ms = 60000

[health]
interval_ms = 5000
wait_interval_ms = 250
check_timeout_ms = 2000

[logging]
level = "debug"
`,
      'utf-8',
    );

    expect(loadConfig(configPath, {})).toEqual({
      runtime: { engine: 'mock', docker_path: 'docker', host: '127.0.0.1' },
      timeouts: { ready_ms: 60000, health_ms: 30_000, verify_ms: 10_000 },
      health: { interval_ms: 5000, wait_interval_ms: 250, check_timeout_ms: 2000 },
      logging: { level: 'debug' },
    });
  });

  it('throws ConfigError on invalid TOML', () => {
    writeFileSync(configPath, '[runtime\nengine = ', 'utf-8');
    expect(() => loadConfig(configPath, {})).toThrow(ConfigError);
  });

  it('throws ConfigError naming the file on schema violations', () => {
    writeFileSync(configPath, '[runtime]\nengine = "podman"\n', 'utf-8');
    expect(() => loadConfig(configPath, {})).toThrow(
      `invalid configuration in ${configPath}: /runtime/engine must be one of docker, mock`,
    );
  });

  it('applies $BERTH_LOG_LEVEL over the file', () => {
    writeFileSync(configPath, '[logging]\nlevel = "warn"\n', 'utf-8');
    expect(loadConfig(configPath, { BERTH_LOG_LEVEL: 'error' }).logging.level).toBe('error');
  });

  it('applies $BERTH_LOG_LEVEL when the file is absent', () => {
    expect(loadConfig(configPath, { BERTH_LOG_LEVEL: 'debug' }).logging.level).toBe('debug');
  });
});

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

describe('applyEnvOverrides', () => {
  it('leaves the config alone without overrides', () => {
    const config = parseConfig({});
    expect(applyEnvOverrides(config, {})).toBe(config);
    expect(applyEnvOverrides(config, { BERTH_LOG_LEVEL: '' })).toBe(config);
  });

  it('rejects an unknown level', () => {
    expect(() => applyEnvOverrides(parseConfig({}), { BERTH_LOG_LEVEL: 'verbose' })).toThrow(
      'invalid configuration in BERTH_LOG_LEVEL: must be one of debug, info, warn, error',
    );
  });
});

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

describe('createRuntime', () => {
  it('builds a docker driver with the configured binary and host', async () => {
    const calls: string[][] = [];
    const runtime = createRuntime(
      parseConfig({ runtime: { docker_path: '/usr/local/bin/docker', host: '10.0.0.5' } }),
      {
        exec: async (file, args) => {
          calls.push([file, ...args]);
          return { stdout: 'Docker version 24.0.7', stderr: '' };
        },
      },
    );

    expect(runtime).toBeInstanceOf(DockerRuntime);
    expect(runtime.name).toBe('docker');
    await runtime.isAvailable();
    expect(calls[0]?.[0]).toBe('/usr/local/bin/docker');
  });

  it('builds a mock driver', () => {
    const runtime = createRuntime(parseConfig({ runtime: { engine: 'mock' } }));
    expect(runtime).toBeInstanceOf(MockRuntime);
  });
});

describe('health options', () => {
  it('maps the health section', () => {
    const config = parseConfig({ health: { interval_ms: 5000, wait_interval_ms: 100, check_timeout_ms: 750 } });
    expect(healthMonitorOptions(config)).toEqual({ intervalMs: 5000, waitIntervalMs: 100, waitTimeoutMs: 30_000 });
    expect(healthCheckOptions(config)).toEqual({ timeoutMs: 750 });
  });
});

describe('timeout options', () => {
  const config = parseConfig({ timeouts: { ready_ms: 45_000, health_ms: 20_000, verify_ms: 2_500 } });

  it('maps the timeouts section onto each consumer', () => {
    expect(orchestratorOptions(config)).toEqual({ readyTimeoutMs: 45_000 });
    expect(healthMonitorOptions(config).waitTimeoutMs).toBe(20_000);
    expect(verificationOptions(config)).toEqual({ timeoutMs: 2_500 });
  });

  it('uses ready_ms as the default readiness budget', async () => {
    const db = new FakeContainer('db', { running: true });
    const orchestrator = new DependencyOrchestrator(
      new FakeContainer('app', { running: true }),
      [db],
      orchestratorOptions(config),
    );
    await orchestrator.waitForReady();
    expect(orchestrator.readyTimeoutMs).toBe(45_000);
    expect(db.waitBudgets).toHaveLength(1);
    expect(db.waitBudgets[0]).toBeGreaterThan(44_000);
    expect(db.waitBudgets[0]).toBeLessThanOrEqual(45_000);
  });

  it('uses health_ms as the default health wait budget', async () => {
    configureLogging({ level: 'error', sink: () => undefined });
    const target = { name: 'orders', address: () => 'http://127.0.0.1:1', healthPath: () => '/health' };
    const monitor = new HealthMonitor(target, healthMonitorOptions(parseConfig({ timeouts: { health_ms: 30 } })));
    monitor.addCheck(createCheck('never', async () => false, { timeoutMs: 10 }));

    await expect(monitor.waitForHealthy()).rejects.toMatchObject({
      code: ErrorCode.HEALTH_TIMEOUT,
      timeoutMs: 30,
    });
  });

  afterEach(() => {
    resetLogging();
  });

  it('uses verify_ms as the strategy timeout', () => {
    const operation = new ShutdownOperation(verificationOptions(config));
    expect(operation.timeoutMs).toBe(2_500);
  });
});

describe('initialize', () => {
  let testRoot: string;
  let entries: LogEntry[];

  beforeEach(() => {
    testRoot = createTempRoot();
    entries = [];
    configureLogging({ sink: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    rmSync(testRoot, { recursive: true, force: true });
    resetLogging();
  });

  it('loads the config, applies its log level and builds the runtime', () => {
    const configPath = join(testRoot, 'berth.toml');
    writeFileSync(configPath, '[runtime]\nengine = "mock"\n\n[logging]\nlevel = "error"\n', 'utf-8');

    const result = initialize(configPath, {});
    expect(result.configPath).toBe(configPath);
    expect(result.config.logging.level).toBe('error');
    expect(result.runtime).toBeInstanceOf(MockRuntime);
  });
});
