import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PathGuard } from './PathGuard';
import { createTestHost, TEST_SEARCH_PATH_VARIABLE } from '@tests/utils/packages';

describe('PathGuard', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reverts an unauthorized change on the next tick', () => {
    const { host, env } = createTestHost({ searchPath: '/envs/web/Modules' });
    const guard = new PathGuard(host, { intervalMs: 100 });

    expect(guard.enable('/envs/web/Modules')).toBe(true);
    expect(guard.getState()).toBe('Armed');

    env[TEST_SEARCH_PATH_VARIABLE] = '/tampered';
    vi.advanceTimersByTime(100);

    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/envs/web/Modules');
    expect(guard.getStats().restorations).toBe(1);
    guard.disable();
  });

  it('refuses a second enable while armed', () => {
    const { host } = createTestHost();
    const guard = new PathGuard(host);

    expect(guard.enable('/a')).toBe(true);
    expect(guard.enable('/b')).toBe(false);
    expect(guard.getProtectedPath()).toBe('/a');
    guard.disable();
  });

  it('tolerates changes during a bypass window and re-arms when it expires', () => {
    const { host, env } = createTestHost({ searchPath: '/protected' });
    const guard = new PathGuard(host, { intervalMs: 100 });
    guard.enable('/protected');

    guard.requestBypass(1);
    expect(guard.getState()).toBe('BypassWindow');

    env[TEST_SEARCH_PATH_VARIABLE] = '/during-install';
    vi.advanceTimersByTime(900);
    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/during-install');

    vi.advanceTimersByTime(100);
    expect(guard.getState()).toBe('Armed');

    vi.advanceTimersByTime(100);
    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/protected');
    guard.disable();
  });

  it('replaces the pending deadline when a new bypass is requested', () => {
    const { host } = createTestHost({ searchPath: '/protected' });
    const guard = new PathGuard(host, { intervalMs: 100 });
    guard.enable('/protected');

    guard.requestBypass(1);
    vi.advanceTimersByTime(800);
    guard.requestBypass(1);
    vi.advanceTimersByTime(800);

    expect(guard.getState()).toBe('BypassWindow');
    vi.advanceTimersByTime(200);
    expect(guard.getState()).toBe('Armed');
    expect(guard.getStats().bypasses).toBe(2);
    guard.disable();
  });

  it('ignores bypass requests while inactive', () => {
    const { host } = createTestHost();
    const guard = new PathGuard(host);

    guard.requestBypass(5);
    expect(guard.getState()).toBe('Inactive');
    expect(guard.getBypassDeadline()).toBeNull();
  });

  it('counts failed restorations without throwing', () => {
    const host = {
      searchPathVariable: TEST_SEARCH_PATH_VARIABLE,
      readSearchPath: () => '/tampered',
      writeSearchPath: () => {
        throw new Error('read-only');
      }
    };
    const guard = new PathGuard(host, { intervalMs: 50 });
    guard.enable('/protected');

    expect(() => vi.advanceTimersByTime(50)).not.toThrow();
    expect(guard.getStats().failures).toBe(1);
    guard.disable();
  });

  it('stops watching after disable', () => {
    const { host, env } = createTestHost({ searchPath: '/protected' });
    const guard = new PathGuard(host, { intervalMs: 100 });
    guard.enable('/protected');
    guard.disable();

    env[TEST_SEARCH_PATH_VARIABLE] = '/free';
    vi.advanceTimersByTime(500);

    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/free');
    expect(guard.getState()).toBe('Inactive');
    expect(guard.getProtectedPath()).toBeNull();
  });
});
