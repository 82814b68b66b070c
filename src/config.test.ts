import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('defaults to throwing outside production', () => {
    expect(loadConfig({})).toEqual({ errorPolicy: 'error', tickRate: 60 });
  });

  it('defaults to warnings in production', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).errorPolicy).toBe('warn');
  });

  it('reads an explicit policy regardless of case', () => {
    expect(loadConfig({ MOTION_ERROR_POLICY: ' WARN ' }).errorPolicy).toBe('warn');
    expect(loadConfig({ MOTION_ERROR_POLICY: 'error', NODE_ENV: 'production' }).errorPolicy).toBe('error');
  });

  it('ignores an unknown policy with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(loadConfig({ MOTION_ERROR_POLICY: 'loud' }).errorPolicy).toBe('error');
    expect(warn).toHaveBeenCalledWith('[Config] Ignoring MOTION_ERROR_POLICY="loud", expected "warn" or "error"');
  });

  it('reads the tick rate', () => {
    expect(loadConfig({ MOTION_TICK_RATE: '30' }).tickRate).toBe(30);
  });

  it('falls back to 60 ticks for a bad rate', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(loadConfig({ MOTION_TICK_RATE: 'fast' }).tickRate).toBe(60);
    expect(loadConfig({ MOTION_TICK_RATE: '-5' }).tickRate).toBe(60);
    expect(warn).toHaveBeenCalledWith('[Config] Ignoring MOTION_TICK_RATE="fast", using 60');
  });
});
