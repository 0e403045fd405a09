import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ContainerRegistry } from './registry.js';
import { MockRuntime } from './mock-runtime.js';
import { FakeContainer } from '../../testing/fake-container.js';
import { configureLogging, resetLogging } from '../logger.js';
import { ContainerError, StartError, StopError } from '../../types/errors.js';

describe('ContainerRegistry', () => {
  let registry: ContainerRegistry;
  let journal: string[];

  beforeEach(() => {
    registry = new ContainerRegistry();
    journal = [];
    configureLogging({ level: 'error', sink: () => undefined });
  });

  afterEach(() => {
    resetLogging();
  });

  it('registers and looks up containers', () => {
    const db = new FakeContainer('db');
    registry.register(db);
    expect(registry.get('fake-db')).toBe(db);
    expect(registry.list()).toEqual([db]);
  });

  it('throws not-registered for unknown ids', () => {
    let caught: unknown;
    try {
      registry.get('ghost');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ContainerError);
    expect(caught).toMatchObject({
      kind: 'not-registered',
      message: 'container ghost not-registered: no such container in registry',
    });
  });

  it('instances do not share state', () => {
    const other = new ContainerRegistry();
    registry.register(new FakeContainer('db'));
    expect(other.list()).toEqual([]);
  });

  it('unregister forgets the container and releases its ports', () => {
    registry.register(new FakeContainer('db'));
    registry.ports.allocate('fake-db', 5432);

    expect(registry.unregister('fake-db')).toBe(true);
    expect(registry.list()).toEqual([]);
    expect(registry.ports.isAllocated(5432)).toBe(false);
    expect(registry.unregister('fake-db')).toBe(false);
  });

  it('create wires containers to the registry tracker', async () => {
    const runtime = new MockRuntime();
    const db = registry.create(runtime, { name: 'db', image: 'postgres:15', ports: [{ internal: 5432 }] });
    await db.start();

    expect(registry.get(db.id)).toBe(db);
    expect(registry.ports.allocated(db.id)).toEqual([49152]);

    await db.stop();
    expect(registry.ports.isAllocated(49152)).toBe(false);
  });

  it('startAll starts in registration order and skips running containers', async () => {
    registry.register(new FakeContainer('a', { journal }));
    registry.register(new FakeContainer('b', { journal, running: true }));
    registry.register(new FakeContainer('c', { journal }));

    await registry.startAll();
    expect(journal).toEqual(['start a', 'start c']);
  });

  it('startAll fails fast', async () => {
    registry.register(new FakeContainer('a', { journal, startError: new Error('boom') }));
    registry.register(new FakeContainer('b', { journal }));

    await expect(registry.startAll()).rejects.toBeInstanceOf(StartError);
    expect(journal).toEqual(['start a']);
  });

  it('stopAll stops in reverse order and reports the last failure', async () => {
    registry.register(new FakeContainer('a', { journal, running: true }));
    registry.register(new FakeContainer('b', { journal, running: true, stopError: new Error('busy') }));
    registry.register(new FakeContainer('c', { journal, running: true }));

    const result = registry.stopAll();
    await expect(result).rejects.toBeInstanceOf(StopError);
    await expect(result).rejects.toMatchObject({ message: 'failed to stop container b: busy' });
    expect(journal).toEqual(['stop c', 'stop b', 'stop a']);
  });
});
