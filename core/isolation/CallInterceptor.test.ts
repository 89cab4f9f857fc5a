import { describe, it, expect, vi } from 'vitest';
import { CallInterceptor } from './CallInterceptor';
import type { GuardState } from './PathGuard';
import type { HostImportOptions, HostInstallRequest, InstalledPackage, LoadedPackage } from '@core/host/types';

function loaded(name: string): LoadedPackage {
  return {
    name,
    version: '1.0.0',
    path: `/envs/web/Modules/${name}/1.0.0`,
    manifestPath: `/envs/web/Modules/${name}/1.0.0/manifest.json`,
    assemblies: [],
    source: 'host',
    loadedAt: '2026-01-01T00:00:00.000Z'
  };
}

function setup(state: GuardState = 'Armed') {
  const guard = {
    requestBypass: vi.fn<[number], void>(),
    getState: vi.fn<[], GuardState>(() => state)
  };
  const host = {
    importPackage: vi.fn(async (name: string, _options?: HostImportOptions) => loaded(name)),
    installPackage: vi.fn(async (request: HostInstallRequest): Promise<InstalledPackage> => ({
      name: request.name,
      version: '1.0.0',
      path: request.destination,
      repository: request.repository.name,
      status: 'installed',
      dependencies: []
    }))
  };
  const interceptor = new CallInterceptor(host, guard, { importBypassSeconds: 3, installBypassSeconds: 9 });
  return { guard, host, interceptor };
}

describe('CallInterceptor', () => {
  it('passes calls straight through while hooks are disabled', async () => {
    const { guard, host, interceptor } = setup();

    const result = await interceptor.importPackage('Pester', { requiredVersion: '5.3.0' });

    expect(result.name).toBe('Pester');
    expect(host.importPackage).toHaveBeenCalledWith('Pester', { requiredVersion: '5.3.0' });
    expect(guard.requestBypass).not.toHaveBeenCalled();
  });

  it('opens an import bypass window before delegating', async () => {
    const { guard, host, interceptor } = setup();
    interceptor.enableHooks();

    await interceptor.importPackage('Pester');

    expect(guard.requestBypass).toHaveBeenCalledWith(3);
    expect(guard.requestBypass.mock.invocationCallOrder[0])
      .toBeLessThan(host.importPackage.mock.invocationCallOrder[0]);
  });

  it('uses the longer window for installs', async () => {
    const { guard, interceptor } = setup();
    interceptor.enableHooks();

    const repository = {
      name: 'default',
      find: vi.fn(async () => []),
      save: vi.fn(async () => '/unused')
    };
    const installed = await interceptor.installPackage({ name: 'Web', repository, destination: '/envs/web/Modules' });

    expect(guard.requestBypass).toHaveBeenCalledWith(9);
    expect(installed.repository).toBe('default');
  });

  it('propagates failures from the host', async () => {
    const { host, interceptor } = setup();
    interceptor.enableHooks();
    host.importPackage.mockRejectedValueOnce(new Error('not found'));

    await expect(interceptor.importPackage('Missing')).rejects.toThrow('not found');
  });

  it('stops requesting bypasses after hooks are disabled', async () => {
    const { guard, interceptor } = setup();
    interceptor.enableHooks();
    interceptor.disableHooks();

    await interceptor.importPackage('Pester');

    expect(interceptor.isEnabled()).toBe(false);
    expect(guard.requestBypass).not.toHaveBeenCalled();
  });
});
