import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AppContainerBuilder } from './app-container.js';
import { MockRuntime } from './mock-runtime.js';
import { startHttpFixture, type HttpFixture } from '../../testing/http-fixture.js';
import { configureLogging, resetLogging } from '../logger.js';
import { CancelledError, ErrorCode } from '../../types/errors.js';

describe('AppContainer readiness endpoints', () => {
  let runtime: MockRuntime;
  let fixture: HttpFixture;

  beforeEach(async () => {
    runtime = new MockRuntime();
    fixture = await startHttpFixture();
    configureLogging({ level: 'error', sink: () => undefined });
  });

  afterEach(async () => {
    resetLogging();
    await fixture.close();
  });

  function builder(): AppContainerBuilder {
    return new AppContainerBuilder(runtime, 'orders:dev')
      .withPort(8080, fixture.port)
      .withPollInterval(10);
  }

  it('is ready once every service endpoint answers 2xx', async () => {
    fixture.route('/api/system/health', { status: 200, body: { status: 'healthy' } });
    fixture.route('/api/components', { status: 200, body: [] });

    const app = await builder().withServiceConfig({ serviceId: 'orders' }).start();
    await expect(app.waitForReady(2000)).resolves.toBeUndefined();
    expect(app.address()).toBe(fixture.address);
    expect(fixture.hits('/api/system/health')).toBeGreaterThan(0);
    expect(fixture.hits('/api/components')).toBeGreaterThan(0);
  });

  it('keeps polling until a failing endpoint recovers', async () => {
    let calls = 0;
    fixture.route('/ready', () => {
      calls += 1;
      return { status: calls < 3 ? 503 : 200 };
    });

    const app = await builder().withReadinessEndpoints(['/ready']).start();
    await expect(app.waitForReady(2000)).resolves.toBeUndefined();
    expect(fixture.hits('/ready')).toBe(3);
  });

  it('reports the last endpoint failure on timeout', async () => {
    fixture.route('/api/system/health', { status: 200 });
    fixture.route('/api/components', { status: 500 });

    const app = await builder().withServiceConfig({ serviceId: 'orders' }).start();
    await expect(app.waitForReady(150)).rejects.toMatchObject({
      code: ErrorCode.WAIT_TIMEOUT,
      message: `timed out waiting for primary app to be ready: GET ${fixture.address}/api/components returned 500`,
    });
  });

  it('stops waiting when cancelled', async () => {
    fixture.route('/ready', { status: 503 });
    const app = await builder().withReadinessEndpoints(['/ready']).start();

    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);
    await expect(app.waitForReady(5000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
