export type {
  RuntimeName,
  PortBinding,
  CreateOptions,
  RuntimeHandle,
  RuntimeState,
  ExecResult,
  RuntimeDriver,
  ExecFn,
} from './runtime.js';

export { defaultExec } from './runtime.js';

export { DockerRuntime, parsePortOutput, type DockerRuntimeOptions } from './docker-runtime.js';

export {
  MockRuntime,
  type MockRuntimeOptions,
  type RuntimeCall,
  type RuntimeOperation,
} from './mock-runtime.js';

export { PortTracker } from './port-tracker.js';

export {
  httpReadiness,
  logReadiness,
  execReadiness,
  allOf,
  type ReadinessProbe,
  type ReadinessTarget,
} from './readiness.js';

export {
  GenericContainer,
  DEFAULT_STOP_GRACE_SECONDS,
  DEFAULT_POLL_INTERVAL_MS,
  type Container,
  type ContainerSpec,
  type ContainerState,
  type GenericContainerOptions,
  type StopResult,
} from './container.js';

export {
  startSequentially,
  stopSequentially,
  type StartSequenceOptions,
  type StopSequenceOptions,
} from './sequence.js';

export { DependencyOrchestrator, DEFAULT_READY_TIMEOUT_MS, type OrchestratorOptions } from './orchestrator.js';
export { ContainerRegistry, type ContainerRegistryOptions } from './registry.js';

export {
  PostgresContainer,
  RedisContainer,
  createPostgresContainer,
  createRedisContainer,
  POSTGRES_PORT,
  REDIS_PORT,
  type PostgresConfig,
  type RedisConfig,
} from './presets.js';

export {
  AppContainer,
  AppContainerBuilder,
  DEFAULT_APP_PORT,
  DEFAULT_HEALTH_PATH,
  DEFAULT_METRICS_PATH,
  DEFAULT_SHUTDOWN_PATH,
  SERVICE_READINESS_PATHS,
  type AppContainerSpec,
  type AppContainerOptions,
  type ServiceConfig,
  type ServicePluginConfig,
} from './app-container.js';
