/**
 * Caller-owned container registry.
 *
 * Each test or suite constructs its own registry; there is no process-wide
 * instance. The registry owns a {@link PortTracker} that the containers it
 * creates report their mapped ports to.
 */

import { createLogger, type Logger } from '../logger.js';
import { ContainerError } from '../../types/errors.js';
import { GenericContainer, type Container, type ContainerSpec } from './container.js';
import { PortTracker } from './port-tracker.js';
import type { RuntimeDriver } from './runtime.js';
import { startSequentially, stopSequentially } from './sequence.js';

export interface ContainerRegistryOptions {
  portTracker?: PortTracker;
  logger?: Logger;
}

export class ContainerRegistry {
  readonly ports: PortTracker;
  private readonly containers = new Map<string, Container>();
  private readonly logger: Logger;

  constructor(options?: ContainerRegistryOptions) {
    this.ports = options?.portTracker ?? new PortTracker();
    this.logger = options?.logger ?? createLogger('registry');
  }

  /** Build a {@link GenericContainer} wired to this registry's tracker and register it. */
  create(runtime: RuntimeDriver, spec: ContainerSpec): GenericContainer {
    const container = new GenericContainer(runtime, spec, { portTracker: this.ports });
    this.register(container);
    return container;
  }

  register(container: Container): void {
    this.containers.set(container.id, container);
    this.logger.debug('container registered', { container: container.name, id: container.id });
  }

  /** Forget a container and release its ports. Returns false for unknown ids. */
  unregister(id: string): boolean {
    this.ports.deallocateAll(id);
    return this.containers.delete(id);
  }

  /** @throws {ContainerError} kind `not-registered` for unknown ids. */
  get(id: string): Container {
    const container = this.containers.get(id);
    if (!container) {
      throw new ContainerError(id, 'not-registered', 'no such container in registry');
    }
    return container;
  }

  /** Registered containers in registration order. */
  list(): Container[] {
    return [...this.containers.values()];
  }

  /**
   * Start every registered container in registration order.
   * @throws {StartError} for the first container that fails.
   */
  async startAll(signal?: AbortSignal): Promise<void> {
    await startSequentially(this.list(), { signal, logger: this.logger });
  }

  /**
   * Stop every registered container in reverse registration order.
   * @throws {StopError} the last failure, after all were attempted.
   */
  async stopAll(signal?: AbortSignal): Promise<void> {
    await stopSequentially(this.list().reverse(), { signal, logger: this.logger });
  }
}
