import { describe, it, expect } from 'vitest';
import * as berth from './index.js';

describe('index', () => {
  it('exports a version string', () => {
    expect(berth.VERSION).toBe('0.1.0');
  });

  it('exposes the container, health and verification entry points', () => {
    expect(typeof berth.AppContainerBuilder).toBe('function');
    expect(typeof berth.HealthMonitor).toBe('function');
    expect(typeof berth.SystemVerifier).toBe('function');
    expect(typeof berth.loadConfig).toBe('function');
  });
});
