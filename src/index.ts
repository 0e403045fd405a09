export const VERSION = '0.1.0';

export {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
} from './core/logger.js';

export { sleep, raceAbort, createScope, DeadlineExceeded, type Scope } from './core/abort.js';

export * from './types/errors.js';

export {
  parseConfig,
  DEFAULT_CONFIG,
  BERTH_CONFIG_SCHEMA,
  type BerthConfig,
  type BerthConfigInput,
  type RuntimeEngine,
  type RuntimeConfig,
  type TimeoutsConfig,
  type HealthConfig,
  type LoggingConfig,
} from './types/config.js';

export {
  CONFIG_FILE_NAME,
  resolveConfigPath,
  loadConfig,
  applyEnvOverrides,
  createRuntime,
  healthMonitorOptions,
  healthCheckOptions,
  orchestratorOptions,
  verificationOptions,
  initialize,
  type InitResult,
  type RuntimeFactoryOptions,
} from './core/config-loader.js';

export * from './core/container/index.js';
export * from './core/health/index.js';
export * from './core/verification/index.js';
