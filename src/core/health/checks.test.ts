import { describe, it, expect } from 'vitest';
import {
  ComponentStatusCheck,
  createCheck,
  DEFAULT_CHECK_TIMEOUT_MS,
  HttpHealthCheck,
  SystemServiceCheck,
} from './checks.js';
import type { HealthTarget } from './types.js';

const target: HealthTarget = {
  address: () => 'http://127.0.0.1:49152',
  healthPath: () => '/health',
};

describe('HttpHealthCheck', () => {
  it('defaults to the target health path', () => {
    const check = new HttpHealthCheck('http');
    expect(check.urlFor(target)).toBe('http://127.0.0.1:49152/health');
    expect(check.timeoutMs).toBe(DEFAULT_CHECK_TIMEOUT_MS);
  });

  it('appends a custom path', () => {
    const check = new HttpHealthCheck('ready', { path: '/ready', timeoutMs: 500 });
    expect(check.urlFor(target)).toBe('http://127.0.0.1:49152/ready');
    expect(check.timeoutMs).toBe(500);
  });

  it('prefers an absolute url', () => {
    const check = new HttpHealthCheck('gateway', { url: 'http://127.0.0.1:9000/ping', path: '/ignored' });
    expect(check.urlFor(target)).toBe('http://127.0.0.1:9000/ping');
  });
});

describe('service checks', () => {
  it('SystemServiceCheck targets the system health endpoint', () => {
    const check = new SystemServiceCheck();
    expect(check.name).toBe('system-service');
    expect(check.urlFor(target)).toBe('http://127.0.0.1:49152/api/system/health');
  });

  it('ComponentStatusCheck is named after its component', () => {
    const check = new ComponentStatusCheck('user service');
    expect(check.name).toBe('component-user service');
    expect(check.componentId).toBe('user service');
    expect(check.urlFor(target)).toBe('http://127.0.0.1:49152/api/components/user%20service/status');
  });
});

describe('createCheck', () => {
  const signal = new AbortController().signal;

  it('resolves when the predicate returns true or nothing', async () => {
    await expect(createCheck('yes', async () => true).check(target, signal)).resolves.toBeUndefined();
    await expect(createCheck('void', async () => undefined).check(target, signal)).resolves.toBeUndefined();
  });

  it('rejects when the predicate returns false', async () => {
    await expect(createCheck('no', async () => false).check(target, signal)).rejects.toThrow(
      'predicate reported unhealthy',
    );
  });

  it('passes the target and signal through', async () => {
    const seen: unknown[] = [];
    const check = createCheck('spy', async (t, s) => {
      seen.push(t, s);
    });
    await check.check(target, signal);
    expect(seen).toEqual([target, signal]);
  });

  it('applies options', () => {
    const check = createCheck('custom', async () => true, { timeoutMs: 7 });
    expect(check.timeoutMs).toBe(7);
  });
});
