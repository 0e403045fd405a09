import { describe, it, expect } from 'vitest';
import type { BerthConfig } from './config.js';
import { parseConfig, DEFAULT_CONFIG } from './config.js';
import { ConfigError, ErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// DEFAULT_CONFIG
// ---------------------------------------------------------------------------

describe('DEFAULT_CONFIG', () => {
  it('has runtime defaults', () => {
    expect(DEFAULT_CONFIG.runtime).toEqual({ engine: 'docker', docker_path: 'docker', host: 'localhost' });
  });

  it('has timeout defaults', () => {
    expect(DEFAULT_CONFIG.timeouts).toEqual({ ready_ms: 30_000, health_ms: 30_000, verify_ms: 10_000 });
  });

  it('has health defaults', () => {
    expect(DEFAULT_CONFIG.health).toEqual({
      interval_ms: 30_000,
      wait_interval_ms: 1_000,
      check_timeout_ms: 10_000,
    });
  });

  it('logs at info by default', () => {
    expect(DEFAULT_CONFIG.logging.level).toBe('info');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.runtime)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function problemsOf(raw: unknown): readonly string[] {
  try {
    parseConfig(raw, 'berth.toml');
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseConfig', () => {
  it('returns defaults for empty input', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('merges keys over section defaults', () => {
    const config = parseConfig({ runtime: { engine: 'mock' }, health: { interval_ms: 500 } });
    expect(config.runtime).toEqual({ engine: 'mock', docker_path: 'docker', host: 'localhost' });
    expect(config.health).toEqual({ interval_ms: 500, wait_interval_ms: 1_000, check_timeout_ms: 10_000 });
    expect(config.timeouts).toEqual(DEFAULT_CONFIG.timeouts);
  });

  it('returns a fresh object', () => {
    const config = parseConfig({});
    config.logging.level = 'debug';
    expect(DEFAULT_CONFIG.logging.level).toBe('info');
  });

  it('rejects a non-object', () => {
    expect(problemsOf('docker')).toEqual(['/ must be object']);
  });

  it('rejects an unknown engine', () => {
    expect(problemsOf({ runtime: { engine: 'podman' } })).toEqual([
      '/runtime/engine must be one of docker, mock',
    ]);
  });

  it('rejects unknown keys', () => {
    expect(problemsOf({ runtime: { image: 'x' } })).toEqual(['/runtime has unknown key image']);
    expect(problemsOf({ network: {} })).toEqual(['/ has unknown key network']);
  });

  it('rejects non-positive and non-integer durations', () => {
    expect(problemsOf({ timeouts: { ready_ms: 0 } })).toEqual(['/timeouts/ready_ms must be >= 1']);
    expect(problemsOf({ health: { interval_ms: 1.5 } })).toEqual(['/health/interval_ms must be integer']);
  });

  it('rejects an invalid log level', () => {
    expect(problemsOf({ logging: { level: 'verbose' } })).toEqual([
      '/logging/level must be one of debug, info, warn, error',
    ]);
  });

  it('lists every violation', () => {
    const problems = problemsOf({ runtime: { engine: 'podman' }, logging: { level: 'loud' } });
    expect(problems).toHaveLength(2);
    expect(problems).toContain('/runtime/engine must be one of docker, mock');
    expect(problems).toContain('/logging/level must be one of debug, info, warn, error');
  });

  it('names the source in the error', () => {
    let caught: unknown;
    try {
      parseConfig({ runtime: { engine: 'podman' } }, '/etc/berth.toml');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: ErrorCode.CONFIG_INVALID,
      message: 'invalid configuration in /etc/berth.toml: /runtime/engine must be one of docker, mock',
    });
  });
});

describe('BerthConfig type structure', () => {
  it('is constructable with all sections', () => {
    const config: BerthConfig = {
      runtime: { engine: 'mock', docker_path: 'docker', host: '127.0.0.1' },
      timeouts: { ready_ms: 1, health_ms: 1, verify_ms: 1 },
      health: { interval_ms: 1, wait_interval_ms: 1, check_timeout_ms: 1 },
      logging: { level: 'warn' },
    };
    expect(parseConfig(config)).toEqual(config);
  });
});
