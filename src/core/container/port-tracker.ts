/**
 * Port bookkeeping.
 *
 * Records which host ports the runtime reported for which container. It
 * does not reserve anything at the OS level; it gives the registry and
 * tests a single source of truth for what is in use.
 *
 * Every mutation runs to completion before another caller can observe the
 * maps, so readers only ever see whole allocations or deallocations.
 */

import { ContainerError } from '../../types/errors.js';

export class PortTracker {
  private readonly byContainer = new Map<string, Set<number>>();
  private readonly byPort = new Map<number, string>();

  /**
   * Record `port` as owned by `containerId`.
   *
   * Re-allocating a port to its current owner is a no-op.
   * @throws {ContainerError} kind `port-lookup` when another container owns it.
   */
  allocate(containerId: string, port: number): void {
    const owner = this.byPort.get(port);
    if (owner !== undefined && owner !== containerId) {
      throw new ContainerError(
        containerId,
        'port-lookup',
        `port ${port} is already allocated to container ${owner}`,
      );
    }

    let ports = this.byContainer.get(containerId);
    if (!ports) {
      ports = new Set();
      this.byContainer.set(containerId, ports);
    }
    ports.add(port);
    this.byPort.set(port, containerId);
  }

  /** Release one port. Ports the container does not own are ignored. */
  deallocate(containerId: string, port: number): void {
    if (this.byPort.get(port) !== containerId) return;
    this.byPort.delete(port);

    const ports = this.byContainer.get(containerId);
    ports?.delete(port);
    if (ports?.size === 0) {
      this.byContainer.delete(containerId);
    }
  }

  /** Release every port the container owns. */
  deallocateAll(containerId: string): void {
    const ports = this.byContainer.get(containerId);
    if (!ports) return;
    for (const port of ports) {
      this.byPort.delete(port);
    }
    this.byContainer.delete(containerId);
  }

  isAllocated(port: number): boolean {
    return this.byPort.has(port);
  }

  /** Ports owned by the container, ascending. Empty for unknown ids. */
  allocated(containerId: string): number[] {
    return [...(this.byContainer.get(containerId) ?? [])].sort((a, b) => a - b);
  }

  /** Container that owns `port`, if any. */
  owner(port: number): string | undefined {
    return this.byPort.get(port);
  }
}
