export type {
  HealthTarget,
  HealthCheck,
  CheckStatus,
  OverallStatus,
  CheckResult,
  HealthSnapshot,
  HealthListener,
} from './types.js';

export {
  HttpHealthCheck,
  SystemServiceCheck,
  ComponentStatusCheck,
  createCheck,
  DEFAULT_CHECK_TIMEOUT_MS,
  type CheckOptions,
  type HttpCheckOptions,
  type CheckPredicate,
} from './checks.js';

export {
  HealthMonitor,
  HealthTimeoutError,
  DEFAULT_MONITOR_INTERVAL_MS,
  DEFAULT_WAIT_INTERVAL_MS,
  DEFAULT_HEALTH_WAIT_TIMEOUT_MS,
  type HealthMonitorOptions,
} from './monitor.js';

export { httpGet, getJson, expectSuccess, isSuccess, type HttpResponse } from './http-probe.js';
