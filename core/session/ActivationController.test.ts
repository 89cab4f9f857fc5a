import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ActivationController } from './ActivationController';
import { EnvironmentLog } from './EnvironmentLog';
import type { PromptDecorator } from './types';
import { CallInterceptor } from '@core/isolation/CallInterceptor';
import { PathGuard } from '@core/isolation/PathGuard';
import { SearchPathManager } from '@core/isolation/SearchPathManager';
import { EnvironmentRegistry } from '@core/registry/EnvironmentRegistry';
import type { Environment } from '@core/registry/types';
import {
  ActiveEnvironmentConflictError,
  EnvironmentCorruptedError,
  EnvironmentNotFoundError
} from '@core/errors';
import { createTestHost, makeTempDir, removeTempDir, TEST_SEARCH_PATH_VARIABLE } from '@tests/utils/packages';

const FIXED_NOW = new Date('2026-03-01T10:00:00.000Z');

describe('ActivationController', () => {
  let home: string;
  let registry: EnvironmentRegistry;

  beforeEach(() => {
    home = makeTempDir('modenv-activation-');
    registry = new EnvironmentRegistry(path.join(home, '.modenv', 'registry.json'));
  });

  afterEach(() => {
    removeTempDir(home);
  });

  async function addEnvironment(name: string, settings: Partial<Environment['settings']> = {}): Promise<string> {
    const envPath = path.join(home, 'envs', name);
    fs.mkdirSync(path.join(envPath, 'Modules'), { recursive: true });
    await registry.save({
      name,
      path: envPath,
      created: FIXED_NOW.toISOString(),
      description: '',
      modules: [],
      settings: { includeSystemPaths: false, autoActivate: false, ...settings }
    });
    return envPath;
  }

  function setup(options: { guard?: Pick<PathGuard, 'enable' | 'disable'>; searchPath?: string | null } = {}) {
    const { host, env } = createTestHost({ searchPath: options.searchPath === undefined ? '/orig' : options.searchPath });
    const guard = new PathGuard(host, { intervalMs: 60_000 });
    const interceptor = new CallInterceptor(host, guard);
    const prompt: PromptDecorator = { decorate: vi.fn(), restore: vi.fn() };
    const controller = new ActivationController({
      registry,
      searchPath: new SearchPathManager(host),
      guard: options.guard ?? guard,
      interceptor,
      prompt,
      log: new EnvironmentLog(() => FIXED_NOW)
    });
    return { env, guard, interceptor, prompt, controller };
  }

  it('activates an environment and protects its search path', async () => {
    const envPath = await addEnvironment('web');
    const { env, guard, interceptor, prompt, controller } = setup();

    const session = await controller.activate('web');

    const modules = path.join(envPath, 'Modules');
    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe(modules);
    expect(session).toMatchObject({
      environmentName: 'web',
      environmentPath: envPath,
      originalSearchPath: '/orig',
      protectedSearchPath: modules,
      scope: 'Session'
    });
    expect(guard.getState()).toBe('Armed');
    expect(interceptor.isEnabled()).toBe(true);
    expect(prompt.decorate).toHaveBeenCalledWith('web');
    expect(fs.readFileSync(EnvironmentLog.activationLogPath(envPath), 'utf8'))
      .toBe('[2026-03-01T10:00:00.000Z] Activated (Session)\n');

    await controller.deactivate();
  });

  it('restores everything on deactivate', async () => {
    const envPath = await addEnvironment('web');
    const { env, guard, interceptor, prompt, controller } = setup();
    await controller.activate('web');

    expect(await controller.deactivate()).toBe(true);

    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/orig');
    expect(guard.getState()).toBe('Inactive');
    expect(interceptor.isEnabled()).toBe(false);
    expect(prompt.restore).toHaveBeenCalledTimes(1);
    expect(controller.getActiveSession()).toBeNull();
    expect(fs.readFileSync(EnvironmentLog.activationLogPath(envPath), 'utf8').split('\n')[1])
      .toBe('[2026-03-01T10:00:00.000Z] Deactivated');
  });

  it('unsets the variable again when it was unset before activation', async () => {
    await addEnvironment('web');
    const { env, controller } = setup({ searchPath: null });

    await controller.activate('web');
    await controller.deactivate();

    expect(TEST_SEARCH_PATH_VARIABLE in env).toBe(false);
  });

  it('returns false when nothing is active', async () => {
    const { controller } = setup();

    expect(await controller.deactivate()).toBe(false);
  });

  it('rejects unknown and corrupted environments without touching the search path', async () => {
    const envPath = await addEnvironment('web');
    fs.rmSync(envPath, { recursive: true, force: true });
    const { env, controller } = setup();

    await expect(controller.activate('ghost')).rejects.toBeInstanceOf(EnvironmentNotFoundError);
    await expect(controller.activate('web')).rejects.toBeInstanceOf(EnvironmentCorruptedError);
    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/orig');
    expect(controller.isActive()).toBe(false);
  });

  it('switches environments by deactivating the current one first', async () => {
    await addEnvironment('web');
    const opsPath = await addEnvironment('ops');
    const { env, controller } = setup();

    await controller.activate('web');
    const session = await controller.activate('ops');

    expect(session.originalSearchPath).toBe('/orig');
    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe(path.join(opsPath, 'Modules'));

    await controller.deactivate();
    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/orig');
  });

  it('keeps existing system entries when the environment includes them', async () => {
    const shared = path.join(home, 'shared');
    fs.mkdirSync(shared);
    const envPath = await addEnvironment('web', { includeSystemPaths: true });
    const { env, controller } = setup({ searchPath: [shared, path.join(home, 'absent')].join(path.delimiter) });

    await controller.activate('web');

    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe([path.join(envPath, 'Modules'), shared].join(path.delimiter));
    await controller.deactivate();
  });

  it('rolls back when the guard cannot be armed', async () => {
    await addEnvironment('web');
    const { env, interceptor, controller } = setup({ guard: { enable: () => false, disable: vi.fn() } });

    await expect(controller.activate('web')).rejects.toBeInstanceOf(ActiveEnvironmentConflictError);

    expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/orig');
    expect(interceptor.isEnabled()).toBe(false);
    expect(controller.isActive()).toBe(false);
  });

  it('flags Global activations and restores them in a later process', async () => {
    await addEnvironment('web');
    const first = setup();
    await first.controller.activate('web', { scope: 'Global' });
    await first.controller.deactivate();

    expect(registry.getAutoActivate()?.name).toBe('web');

    const second = setup();
    const session = await second.controller.restoreAutoActivated();

    expect(session?.scope).toBe('Global');
    expect(second.controller.getActiveSession()?.environmentName).toBe('web');
    await second.controller.deactivate();
  });

  it('warns instead of failing when the flagged environment is gone', async () => {
    const envPath = await addEnvironment('web', { autoActivate: true });
    fs.rmSync(envPath, { recursive: true, force: true });
    const { controller } = setup();

    expect(await controller.restoreAutoActivated()).toBeUndefined();
    expect(controller.isActive()).toBe(false);
  });
});
