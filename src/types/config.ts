/**
 * Berth configuration schema.
 *
 * Defines the TypeScript types for the sections of `berth.toml`, the JSON
 * Schema they are validated against, and the defaults applied to missing
 * sections and keys.
 */

import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { LogLevel } from '../core/logger.js';
import { ConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Section types
// ---------------------------------------------------------------------------

/** Runtime drivers selectable from configuration. */
export type RuntimeEngine = 'docker' | 'mock';

/** `[runtime]` section. */
export interface RuntimeConfig {
  engine: RuntimeEngine;
  /** Path or name of the docker CLI. */
  docker_path: string;
  /** Host under which mapped ports are reachable. */
  host: string;
}

/** `[timeouts]` section: default budgets for test code, in ms. */
export interface TimeoutsConfig {
  /** Default `DependencyOrchestrator.waitForReady` budget. */
  ready_ms: number;
  /** Default `HealthMonitor.waitForHealthy` budget. */
  health_ms: number;
  /** Per-strategy verification timeout. */
  verify_ms: number;
}

/** `[health]` section. */
export interface HealthConfig {
  interval_ms: number;
  wait_interval_ms: number;
  check_timeout_ms: number;
}

/** `[logging]` section. */
export interface LoggingConfig {
  level: LogLevel;
}

export interface BerthConfig {
  runtime: RuntimeConfig;
  timeouts: TimeoutsConfig;
  health: HealthConfig;
  logging: LoggingConfig;
}

/** Shape accepted by {@link parseConfig}: every section and key optional. */
export type BerthConfigInput = { [S in keyof BerthConfig]?: Partial<BerthConfig[S]> };

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: Readonly<BerthConfig> = Object.freeze({
  runtime: Object.freeze({ engine: 'docker', docker_path: 'docker', host: 'localhost' }),
  timeouts: Object.freeze({ ready_ms: 30_000, health_ms: 30_000, verify_ms: 10_000 }),
  health: Object.freeze({ interval_ms: 30_000, wait_interval_ms: 1_000, check_timeout_ms: 10_000 }),
  logging: Object.freeze({ level: 'info' }),
});

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const positiveMs = { type: 'integer', minimum: 1 } as const;

export const BERTH_CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    runtime: {
      type: 'object',
      additionalProperties: false,
      properties: {
        engine: { type: 'string', enum: ['docker', 'mock'] },
        docker_path: { type: 'string', minLength: 1 },
        host: { type: 'string', minLength: 1 },
      },
    },
    timeouts: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ready_ms: positiveMs,
        health_ms: positiveMs,
        verify_ms: positiveMs,
      },
    },
    health: {
      type: 'object',
      additionalProperties: false,
      properties: {
        interval_ms: positiveMs,
        wait_interval_ms: positiveMs,
        check_timeout_ms: positiveMs,
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateInput = ajv.compile<BerthConfigInput>(BERTH_CONFIG_SCHEMA);

function describeError(error: ErrorObject): string {
  const at = error.instancePath === '' ? '/' : error.instancePath;
  if (error.keyword === 'additionalProperties') {
    return `${at} has unknown key ${String(error.params.additionalProperty)}`;
  }
  if (error.keyword === 'enum') {
    return `${at} must be one of ${(error.params.allowedValues ?? []).join(', ')}`;
  }
  return `${at} ${error.message ?? 'is invalid'}`;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Validate a raw config object (e.g. parsed TOML) and apply defaults.
 *
 * @param source - Where the object came from, for error messages.
 * @throws {ConfigError} listing every schema violation.
 */
export function parseConfig(raw: unknown, source = 'configuration'): BerthConfig {
  if (!validateInput(raw)) {
    throw new ConfigError(source, (validateInput.errors ?? []).map(describeError));
  }
  return {
    runtime: { ...DEFAULT_CONFIG.runtime, ...raw.runtime },
    timeouts: { ...DEFAULT_CONFIG.timeouts, ...raw.timeouts },
    health: { ...DEFAULT_CONFIG.health, ...raw.health },
    logging: { ...DEFAULT_CONFIG.logging, ...raw.logging },
  };
}
