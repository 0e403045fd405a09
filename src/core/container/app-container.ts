/**
 * Application-under-test container and its builder.
 *
 * An {@link AppContainer} is the primary of a dependency graph: starting it
 * starts its dependencies first, stopping it stops them after, and waiting
 * for it waits for the whole graph before checking the application's own
 * readiness endpoints.
 *
 * @example
 * ```ts
 * const app = await new AppContainerBuilder(runtime, 'orders-service:dev')
 *   .withDatabase(createPostgresContainer(runtime))
 *   .withServiceConfig({ serviceId: 'orders' })
 *   .start();
 * await app.waitForReady(30_000);
 * ```
 */

import type { Readable } from 'node:stream';
import { createLogger, type Logger } from '../logger.js';
import { ContainerError } from '../../types/errors.js';
import type { HealthTarget } from '../health/types.js';
import {
  GenericContainer,
  type Container,
  type ContainerState,
  type StopResult,
} from './container.js';
import { DependencyOrchestrator } from './orchestrator.js';
import type { PortTracker } from './port-tracker.js';
import { allOf, httpReadiness } from './readiness.js';
import type { ExecResult, PortBinding, RuntimeDriver } from './runtime.js';

// ---------------------------------------------------------------------------
// Service configuration
// ---------------------------------------------------------------------------

export interface ServicePluginConfig {
  name: string;
  version: string;
  config?: Record<string, unknown>;
}

/** Configuration handed to the application through its environment. */
export interface ServiceConfig {
  serviceId: string;
  plugins?: ServicePluginConfig[];
  storage?: { type: string; url: string };
}

// ---------------------------------------------------------------------------
// Spec
// ---------------------------------------------------------------------------

export const DEFAULT_APP_PORT = 8080;
export const DEFAULT_HEALTH_PATH = '/health';
export const DEFAULT_METRICS_PATH = '/metrics';
export const DEFAULT_SHUTDOWN_PATH = '/shutdown';
export const SERVICE_READINESS_PATHS: readonly string[] = ['/api/system/health', '/api/components'];

/** Immutable description produced by {@link AppContainerBuilder.build}. */
export interface AppContainerSpec {
  readonly name: string;
  readonly image: string;
  readonly env: Readonly<Record<string, string>>;
  readonly port: Readonly<PortBinding>;
  readonly healthPath: string;
  readonly metricsPath: string;
  readonly shutdownPath: string;
  readonly serviceConfig?: Readonly<ServiceConfig>;
  /** Paths that must answer 2xx before the app counts as ready. */
  readonly readinessPaths: readonly string[];
  readonly stopGraceSeconds?: number;
  readonly pollIntervalMs?: number;
}

export interface AppContainerOptions {
  portTracker?: PortTracker;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// AppContainer
// ---------------------------------------------------------------------------

export class AppContainer implements Container, HealthTarget {
  readonly spec: AppContainerSpec;
  readonly dependencies: readonly Container[];

  private readonly primary: GenericContainer;
  private readonly orchestrator: DependencyOrchestrator;

  constructor(
    runtime: RuntimeDriver,
    spec: AppContainerSpec,
    dependencies: readonly Container[],
    options?: AppContainerOptions,
  ) {
    this.spec = spec;
    this.dependencies = Object.freeze([...dependencies]);

    const probes = spec.readinessPaths.map((path) => httpReadiness(path, spec.port.internal));
    this.primary = new GenericContainer(
      runtime,
      {
        name: spec.name,
        image: spec.image,
        env: { ...spec.env },
        ports: [{ ...spec.port }],
        stopGraceSeconds: spec.stopGraceSeconds,
        pollIntervalMs: spec.pollIntervalMs,
        readiness: probes.length > 0 ? allOf(...probes) : undefined,
      },
      options,
    );
    this.orchestrator = new DependencyOrchestrator(this.primary, this.dependencies, {
      logger: options?.logger ?? createLogger('app'),
    });
  }

  get id(): string {
    return this.primary.id;
  }

  get name(): string {
    return this.primary.name;
  }

  get image(): string {
    return this.primary.image;
  }

  get state(): ContainerState {
    return this.primary.state;
  }

  /**
   * Start dependencies in order, then the application.
   * @throws {ContainerError} kind `already-started` unless never started.
   * @throws {StartError} naming the container that failed.
   */
  start(signal?: AbortSignal): Promise<void> {
    if (this.primary.state !== 'created') {
      return Promise.reject(
        new ContainerError(this.name, 'already-started', `cannot start from state ${this.primary.state}`),
      );
    }
    return this.orchestrator.start(signal);
  }

  /** Stop the application, then its dependencies in reverse order. */
  async stop(signal?: AbortSignal): Promise<StopResult> {
    const wasActive = this.primary.isRunning() || this.primary.state === 'starting';
    await this.orchestrator.stop(signal);
    return wasActive ? 'stopped' : 'not-running';
  }

  isRunning(): boolean {
    return this.primary.isRunning();
  }

  refresh(): Promise<ContainerState> {
    return this.primary.refresh();
  }

  host(): string {
    return this.primary.host();
  }

  port(internal: number): number {
    return this.primary.port(internal);
  }

  /** Same as {@link address}. */
  connectionString(): string {
    return this.address();
  }

  /** Wait for every dependency, then the application and its readiness endpoints. */
  waitForReady(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    return this.orchestrator.waitForReady(timeoutMs, signal);
  }

  logs(): Promise<Readable> {
    return this.primary.logs();
  }

  exec(cmd: readonly string[]): Promise<ExecResult> {
    return this.primary.exec(cmd);
  }

  // -- HTTP surface ---------------------------------------------------------

  address(): string {
    return `http://${this.host()}:${this.port(this.spec.port.internal)}`;
  }

  healthPath(): string {
    return this.spec.healthPath;
  }

  healthUrl(): string {
    return this.address() + this.spec.healthPath;
  }

  metricsUrl(): string {
    return this.address() + this.spec.metricsPath;
  }

  shutdownUrl(): string {
    return this.address() + this.spec.shutdownPath;
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

function normalizePath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

/**
 * Mutable builder for {@link AppContainer}.
 *
 * Every `with*` call mutates the builder and returns it for chaining, so a
 * discarded return value loses nothing. {@link build} snapshots the
 * configuration; later builder calls do not affect containers already built.
 */
export class AppContainerBuilder {
  private name = 'app';
  private readonly env: Record<string, string> = {};
  private readonly dependencies: Container[] = [];
  private port: PortBinding = { internal: DEFAULT_APP_PORT };
  private healthPath = DEFAULT_HEALTH_PATH;
  private metricsPath = DEFAULT_METRICS_PATH;
  private shutdownPath = DEFAULT_SHUTDOWN_PATH;
  private serviceConfig?: ServiceConfig;
  private readinessPaths?: string[];
  private stopGraceSeconds?: number;
  private pollIntervalMs?: number;
  private portTracker?: PortTracker;
  private logger?: Logger;

  constructor(
    private readonly runtime: RuntimeDriver,
    private readonly image: string,
  ) {}

  withName(name: string): this {
    this.name = name;
    return this;
  }

  /** Add a dependency. Dependencies start in the order they are added. */
  withDependency(container: Container): this {
    this.dependencies.push(container);
    return this;
  }

  withDatabase(container: Container): this {
    return this.withDependency(container);
  }

  withCache(container: Container): this {
    return this.withDependency(container);
  }

  withMessageQueue(container: Container): this {
    return this.withDependency(container);
  }

  /** Merge variables into the environment; later values win. */
  withEnvironment(env: Record<string, string>): this {
    Object.assign(this.env, env);
    return this;
  }

  /** Application port. Defaults to 8080 with an ephemeral host port. */
  withPort(internal: number, external?: number): this {
    this.port = external === undefined ? { internal } : { internal, external };
    return this;
  }

  withHealthEndpoint(path: string): this {
    this.healthPath = normalizePath(path);
    return this;
  }

  withMetricsEndpoint(path: string): this {
    this.metricsPath = normalizePath(path);
    return this;
  }

  withShutdownEndpoint(path: string): this {
    this.shutdownPath = normalizePath(path);
    return this;
  }

  /**
   * Pass a service configuration to the application. Also makes the
   * service endpoints part of readiness unless overridden.
   */
  withServiceConfig(config: ServiceConfig): this {
    this.serviceConfig = config;
    return this;
  }

  /** Paths that must answer 2xx before the app counts as ready. */
  withReadinessEndpoints(paths: readonly string[]): this {
    this.readinessPaths = paths.map(normalizePath);
    return this;
  }

  withStopGracePeriod(seconds: number): this {
    this.stopGraceSeconds = seconds;
    return this;
  }

  /** Poll interval of readiness waits. */
  withPollInterval(ms: number): this {
    this.pollIntervalMs = ms;
    return this;
  }

  withPortTracker(tracker: PortTracker): this {
    this.portTracker = tracker;
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /** Snapshot the configuration into an immutable spec. */
  buildSpec(): AppContainerSpec {
    const env: Record<string, string> = { ...this.env };
    const service = this.serviceConfig;
    if (service) {
      env.APP_CONFIG = JSON.stringify(service);
      if (service.serviceId) env.APP_SERVICE_ID = service.serviceId;
      if (service.storage?.type) env.APP_STORAGE_TYPE = service.storage.type;
      if (service.storage?.url) env.APP_STORAGE_URL = service.storage.url;
    }

    const readinessPaths = this.readinessPaths ?? (service ? [...SERVICE_READINESS_PATHS] : []);

    return Object.freeze({
      name: this.name,
      image: this.image,
      env: Object.freeze(env),
      port: Object.freeze({ ...this.port }),
      healthPath: this.healthPath,
      metricsPath: this.metricsPath,
      shutdownPath: this.shutdownPath,
      serviceConfig: service ? Object.freeze(structuredClone(service)) : undefined,
      readinessPaths: Object.freeze([...readinessPaths]),
      stopGraceSeconds: this.stopGraceSeconds,
      pollIntervalMs: this.pollIntervalMs,
    });
  }

  build(): AppContainer {
    return new AppContainer(this.runtime, this.buildSpec(), this.dependencies, {
      portTracker: this.portTracker,
      logger: this.logger,
    });
  }

  /** Build and start. Resolves with the started container. */
  async start(signal?: AbortSignal): Promise<AppContainer> {
    const app = this.build();
    await app.start(signal);
    return app;
  }
}
