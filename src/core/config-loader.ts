/**
 * TOML-based configuration loader for Berth.
 *
 * Reads `berth.toml` (or the file named by `$BERTH_CONFIG`), parses it with
 * smol-toml, validates it against {@link BERTH_CONFIG_SCHEMA} and applies
 * environment overrides. {@link initialize} turns the result into a
 * configured logger and runtime driver.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseConfig, DEFAULT_CONFIG } from '../types/config.js';
import type { BerthConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import { configureLogging, isLogLevel, LOG_LEVELS } from './logger.js';
import { DockerRuntime } from './container/docker-runtime.js';
import { MockRuntime } from './container/mock-runtime.js';
import type { ExecFn, RuntimeDriver } from './container/runtime.js';
import type { CheckOptions } from './health/checks.js';
import type { HealthMonitorOptions } from './health/monitor.js';
import type { OrchestratorOptions } from './container/orchestrator.js';
import type { ShutdownOperationOptions } from './verification/operations.js';
import type { TargetVerifierOptions } from './verification/system.js';

export const CONFIG_FILE_NAME = 'berth.toml';

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Path of the configuration file.
 *
 * Precedence:
 *  1. `$BERTH_CONFIG` (if non-empty)
 *  2. `berth.toml` in the working directory
 */
export function resolveConfigPath(env: Env = process.env, cwd: string = process.cwd()): string {
  const fromEnv = env['BERTH_CONFIG'];
  if (fromEnv && fromEnv.length > 0) {
    return resolve(cwd, fromEnv);
  }
  return resolve(cwd, CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

function defaults(): BerthConfig {
  return {
    runtime: { ...DEFAULT_CONFIG.runtime },
    timeouts: { ...DEFAULT_CONFIG.timeouts },
    health: { ...DEFAULT_CONFIG.health },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/** Apply `$BERTH_LOG_LEVEL`. */
export function applyEnvOverrides(config: BerthConfig, env: Env = process.env): BerthConfig {
  const level = env['BERTH_LOG_LEVEL'];
  if (level === undefined || level.length === 0) {
    return config;
  }
  if (!isLogLevel(level)) {
    throw new ConfigError('BERTH_LOG_LEVEL', [`must be one of ${LOG_LEVELS.join(', ')}`]);
  }
  return { ...config, logging: { ...config.logging, level } };
}

/**
 * Load and validate a configuration file.
 *
 * A missing or empty file yields the defaults. Environment overrides apply
 * either way.
 * @throws {ConfigError} on invalid TOML or schema violations.
 */
export function loadConfig(path: string = resolveConfigPath(), env: Env = process.env): BerthConfig {
  if (!existsSync(path)) {
    return applyEnvOverrides(defaults(), env);
  }

  const content = readFileSync(path, 'utf-8');
  if (content.trim().length === 0) {
    return applyEnvOverrides(defaults(), env);
  }

  let raw: unknown;
  try {
    raw = parseTOML(content);
  } catch (err) {
    throw new ConfigError(path, [`invalid TOML: ${errorMessage(err)}`]);
  }
  return applyEnvOverrides(parseConfig(raw, path), env);
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export interface RuntimeFactoryOptions {
  /** Command runner for the docker driver. */
  exec?: ExecFn;
}

/** Build the runtime driver named by `runtime.engine`. */
export function createRuntime(config: BerthConfig, options: RuntimeFactoryOptions = {}): RuntimeDriver {
  switch (config.runtime.engine) {
    case 'docker':
      return new DockerRuntime({
        exec: options.exec,
        dockerPath: config.runtime.docker_path,
        host: config.runtime.host,
      });
    case 'mock':
      return new MockRuntime({ host: config.runtime.host });
  }
}

/** Monitor options from the `[health]` section and `timeouts.health_ms`. */
export function healthMonitorOptions(config: BerthConfig): HealthMonitorOptions {
  return {
    intervalMs: config.health.interval_ms,
    waitIntervalMs: config.health.wait_interval_ms,
    waitTimeoutMs: config.timeouts.health_ms,
  };
}

/** Readiness budget from `timeouts.ready_ms`. */
export function orchestratorOptions(config: BerthConfig): OrchestratorOptions {
  return { readyTimeoutMs: config.timeouts.ready_ms };
}

/**
 * Strategy timeout from `timeouts.verify_ms`, for the system and component
 * verifiers and the shutdown operation.
 */
export function verificationOptions(config: BerthConfig): TargetVerifierOptions & ShutdownOperationOptions {
  return { timeoutMs: config.timeouts.verify_ms };
}

/** Check options from the `[health]` section. */
export function healthCheckOptions(config: BerthConfig): CheckOptions {
  return { timeoutMs: config.health.check_timeout_ms };
}

/** Result of {@link initialize}: everything a test suite needs up front. */
export interface InitResult {
  config: BerthConfig;
  configPath: string;
  runtime: RuntimeDriver;
}

/**
 * Load configuration, apply its log level, and build the runtime driver.
 * Safe to call once per test suite.
 */
export function initialize(
  path: string = resolveConfigPath(),
  env: Env = process.env,
  options: RuntimeFactoryOptions = {},
): InitResult {
  const config = loadConfig(path, env);
  configureLogging({ level: config.logging.level });
  return { config, configPath: path, runtime: createRuntime(config, options) };
}
