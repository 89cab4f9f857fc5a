import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { IsolatedLoader } from './IsolatedLoader';
import { SearchPathManager } from './SearchPathManager';
import type { WorkerExit, WorkerInvocation, WorkerLauncher } from './worker/launcher';
import type { WorkerDescriptor } from './worker/descriptor';
import { EnvironmentNotFoundError, ExternalOperationError, IsolatedImportError } from '@core/errors';
import type { HostImportOptions, HostInstallRequest, InstalledPackage } from '@core/host/types';
import type { PackageRepository } from '@core/repository/types';
import {
  createTestHost,
  makeTempDir,
  removeTempDir,
  writePackage,
  TEST_SEARCH_PATH_VARIABLE
} from '@tests/utils/packages';

class ScriptedLauncher implements WorkerLauncher {
  readonly invocations: WorkerInvocation[] = [];

  constructor(private readonly behave: (invocation: WorkerInvocation) => Promise<WorkerExit>) {}

  launch(invocation: WorkerInvocation): Promise<WorkerExit> {
    this.invocations.push(invocation);
    return this.behave(invocation);
  }
}

const ok: WorkerExit = { code: 0, signal: null, timedOut: false };

function writeDescriptor(invocation: WorkerInvocation, descriptor: WorkerDescriptor | string): void {
  const outputFile = invocation.args[2];
  fs.writeFileSync(outputFile, typeof descriptor === 'string' ? descriptor : JSON.stringify(descriptor));
}

const emptyRepository: PackageRepository = {
  name: 'default',
  find: async () => [],
  save: async () => ''
};

describe('IsolatedLoader', () => {
  let workspace: string;
  let envPath: string;
  let modules: string;
  let scratch: string;

  beforeEach(() => {
    workspace = makeTempDir('modenv-loader-');
    envPath = path.join(workspace, 'envs', 'web');
    modules = path.join(envPath, 'Modules');
    scratch = path.join(workspace, 'scratch');
    fs.mkdirSync(scratch, { recursive: true });
  });

  afterEach(() => {
    removeTempDir(workspace);
  });

  function setup(launcher?: WorkerLauncher, installImpl?: (request: HostInstallRequest) => Promise<InstalledPackage>) {
    const { host, env } = createTestHost({ searchPath: '/protected' });
    const searchPath = new SearchPathManager(host);
    const observed: Array<string | undefined> = [];
    const interceptor = {
      importPackage: vi.fn(async (name: string, options?: HostImportOptions) => {
        observed.push(env[TEST_SEARCH_PATH_VARIABLE]);
        return host.importPackage(name, options);
      }),
      installPackage: vi.fn(async (request: HostInstallRequest) => {
        observed.push(env[TEST_SEARCH_PATH_VARIABLE]);
        if (installImpl) {
          return installImpl(request);
        }
        return host.installPackage(request);
      })
    };
    const loader = new IsolatedLoader(host, searchPath, interceptor, { launcher, tempDir: scratch, workerTimeoutMs: 5_000 });
    return { host, env, loader, interceptor, observed };
  }

  describe('installToEnvironment', () => {
    it('exposes the system path only while the install runs', async () => {
      const { env, loader, observed } = setup(undefined, async request => ({
        name: request.name,
        version: '1.0.0',
        path: path.join(request.destination, request.name, '1.0.0'),
        repository: request.repository.name,
        status: 'installed',
        dependencies: []
      }));

      const installed = await loader.installToEnvironment({
        name: 'Web',
        environmentPath: envPath,
        systemSearchPath: '/system/modules',
        repository: emptyRepository
      });

      expect(observed).toEqual(['/system/modules']);
      expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/protected');
      expect(installed.path).toBe(path.join(modules, 'Web', '1.0.0'));
      expect(fs.existsSync(modules)).toBe(true);
    });

    it('restores the protected value and wraps foreign failures', async () => {
      const { env, loader } = setup(undefined, async () => {
        throw new Error('network down');
      });

      const attempt = loader.installToEnvironment({
        name: 'Web',
        environmentPath: envPath,
        systemSearchPath: '/system/modules',
        repository: emptyRepository
      });

      await expect(attempt).rejects.toBeInstanceOf(ExternalOperationError);
      await expect(attempt).rejects.toThrow('Failed to install Web: network down');
      expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/protected');
    });
  });

  describe('importFromEnvironment', () => {
    it('rejects a package that is not in the environment', async () => {
      const { loader } = setup();

      await expect(loader.importFromEnvironment({ name: 'Missing', environmentPath: envPath }))
        .rejects.toBeInstanceOf(EnvironmentNotFoundError);
    });

    it('imports in process against the environment only', async () => {
      writePackage(modules, { name: 'Pester', version: '5.3.0' });
      const { host, env, loader, observed } = setup();

      const loaded = await loader.importFromEnvironment({
        name: 'Pester',
        environmentPath: envPath,
        strategy: 'in-process'
      });

      expect(observed).toEqual([modules]);
      expect(env[TEST_SEARCH_PATH_VARIABLE]).toBe('/protected');
      expect(loaded.version).toBe('5.3.0');
      expect(host.getLoadedPackage('pester')?.path).toBe(path.join(modules, 'Pester', '5.3.0'));
    });

    it('replaces a loaded copy of a different version when importing in process', async () => {
      writePackage(modules, { name: 'Pester', version: '5.3.0' });
      const { host, loader } = setup();
      host.attachPackage({
        name: 'Pester',
        version: '3.4.0',
        path: '/system/Pester/3.4.0',
        manifestPath: '/system/Pester/3.4.0/manifest.json',
        assemblies: [],
        source: 'host',
        loadedAt: '2026-01-01T00:00:00.000Z'
      });

      await loader.importFromEnvironment({ name: 'Pester', environmentPath: envPath, strategy: 'in-process' });

      expect(host.getLoadedPackage('Pester')?.version).toBe('5.3.0');
    });

    it('attaches what the isolated worker reports', async () => {
      writePackage(modules, { name: 'Web', version: '1.0.0', requiredPackages: ['Pester'] });
      const launcher = new ScriptedLauncher(async invocation => {
        writeDescriptor(invocation, {
          root: { name: 'Web', version: '1.0.0', path: '/w', manifestPath: '/w/manifest.json', assemblies: [] },
          dependencies: [
            { name: 'Pester', version: '5.3.0', path: '/p', manifestPath: '/p/manifest.json', assemblies: [] }
          ],
          unresolved: []
        });
        return ok;
      });
      const { host, loader } = setup(launcher);

      const loaded = await loader.importFromEnvironment({ name: 'Web', environmentPath: envPath });

      expect(loaded.source).toBe('isolated');
      expect(host.listLoadedPackages().map(pkg => `${pkg.name}@${pkg.version}`)).toEqual(['Pester@5.3.0', 'Web@1.0.0']);

      const [invocation] = launcher.invocations;
      expect(invocation.command).toBe(process.execPath);
      expect(invocation.env).toEqual({ [TEST_SEARCH_PATH_VARIABLE]: modules });
      expect(invocation.args.slice(1)).toEqual(['Web', invocation.args[2], '1.0.0', '10', TEST_SEARCH_PATH_VARIABLE, '[]']);
      expect(fs.readdirSync(scratch)).toEqual([]);
    });

    it('hands pinned versions to the worker', async () => {
      writePackage(modules, { name: 'Web', version: '1.0.0', requiredPackages: ['Pester'] });
      const launcher = new ScriptedLauncher(async invocation => {
        writeDescriptor(invocation, {
          root: { name: 'Web', version: '1.0.0', path: '/w', manifestPath: '/w/manifest.json', assemblies: [] },
          dependencies: [],
          unresolved: ['Pester']
        });
        return ok;
      });
      const { loader } = setup(launcher);

      const result = await loader.importClosure({
        name: 'Web',
        environmentPath: envPath,
        pins: [{ name: 'Pester', version: '5.3.0' }]
      });

      expect(launcher.invocations[0].args[6]).toBe('[{"name":"Pester","version":"5.3.0"}]');
      expect(result.loaded.map(pkg => pkg.name)).toEqual(['Web']);
      expect(result.unresolved).toEqual(['Pester']);
    });

    it('detaches the whole closure when one package clashes', async () => {
      writePackage(modules, { name: 'Reports', version: '2.0.0', requiredPackages: ['Helper', 'Zeta'] });
      const launcher = new ScriptedLauncher(async invocation => {
        writeDescriptor(invocation, {
          root: { name: 'Reports', version: '2.0.0', path: '/r', manifestPath: '/r/manifest.json', assemblies: [] },
          dependencies: [
            { name: 'Helper', version: '1.0.0', path: '/h', manifestPath: '/h/manifest.json', assemblies: [] },
            {
              name: 'Zeta',
              version: '1.0.0',
              path: '/z',
              manifestPath: '/z/manifest.json',
              assemblies: [{ name: 'Json.Core', version: '13.0.0' }]
            }
          ],
          unresolved: []
        });
        return ok;
      });
      const { host, loader } = setup(launcher);
      host.attachPackage({
        name: 'Accounts',
        version: '1.0.0',
        path: '/opt/accounts',
        manifestPath: '/opt/accounts/manifest.json',
        assemblies: [{ name: 'Json.Core', version: '12.0.0', publicKeyToken: 'abc' }],
        source: 'host',
        loadedAt: '2026-03-01T10:00:00.000Z'
      });
      host.attachPackage({
        name: 'Helper',
        version: '0.9.0',
        path: '/opt/helper',
        manifestPath: '/opt/helper/manifest.json',
        assemblies: [],
        source: 'host',
        loadedAt: '2026-03-01T10:00:00.000Z'
      });

      await expect(loader.importFromEnvironment({ name: 'Reports', environmentPath: envPath }))
        .rejects.toBeInstanceOf(ExternalOperationError);

      expect(host.listLoadedPackages().map(pkg => `${pkg.name}@${pkg.version}`).sort()).toEqual([
        'Accounts@1.0.0',
        'Helper@0.9.0'
      ]);
      expect(fs.readdirSync(scratch)).toEqual([]);
    });

    it('reports a worker that cannot be started', async () => {
      writePackage(modules, { name: 'Web', version: '1.0.0' });
      const { loader } = setup(new ScriptedLauncher(async () => {
        throw new Error('spawn EACCES');
      }));

      const attempt = loader.importFromEnvironment({ name: 'Web', environmentPath: envPath });

      await expect(attempt).rejects.toBeInstanceOf(IsolatedImportError);
      await expect(attempt).rejects.toMatchObject({ stage: 'spawn' });
    });

    it('reports a failed worker with its stderr', async () => {
      writePackage(modules, { name: 'Web', version: '1.0.0' });
      const { loader } = setup(new ScriptedLauncher(async invocation => {
        fs.writeFileSync(invocation.stderrFile, 'Package Web not found\nmore detail\n');
        return { code: 2, signal: null, timedOut: false };
      }));

      const attempt = loader.importFromEnvironment({ name: 'Web', environmentPath: envPath });

      await expect(attempt).rejects.toThrow('Import worker for Web exited with code 2: Package Web not found');
      await expect(attempt).rejects.toMatchObject({ stage: 'exit', stderr: 'Package Web not found\nmore detail' });
    });

    it('reports a worker that timed out', async () => {
      writePackage(modules, { name: 'Web', version: '1.0.0' });
      const { loader } = setup(new ScriptedLauncher(async () => ({ code: null, signal: 'SIGKILL', timedOut: true })));

      await expect(loader.importFromEnvironment({ name: 'Web', environmentPath: envPath }))
        .rejects.toThrow('Import worker for Web timed out after 5000ms');
    });

    it('reports missing and unreadable worker output', async () => {
      writePackage(modules, { name: 'Web', version: '1.0.0' });
      const silent = setup(new ScriptedLauncher(async () => ok));
      await expect(silent.loader.importFromEnvironment({ name: 'Web', environmentPath: envPath }))
        .rejects.toThrow('Import worker for Web produced no output');

      const garbled = setup(new ScriptedLauncher(async invocation => {
        writeDescriptor(invocation, '{"root": 1}');
        return ok;
      }));
      await expect(garbled.loader.importFromEnvironment({ name: 'Web', environmentPath: envPath }))
        .rejects.toThrow('Import worker for Web produced an unreadable descriptor');
    });

    it('runs the real worker against the environment', async () => {
      writePackage(modules, {
        name: 'Web',
        version: '1.0.0',
        requiredPackages: [{ name: 'Pester', version: '5.3.0' }],
        requiredAssemblies: [{ name: 'Web.Core', version: '1.0.0', location: 'lib/Web.Core.dll' }]
      });
      writePackage(modules, { name: 'Pester', version: '5.3.0' });
      writePackage(modules, { name: 'Pester', version: '5.5.0' });
      const { host, loader } = setup();

      const loaded = await loader.importFromEnvironment({ name: 'Web', environmentPath: envPath });

      expect(loaded.assemblies).toEqual([
        { name: 'Web.Core', version: '1.0.0', location: path.join(modules, 'Web', '1.0.0', 'lib', 'Web.Core.dll') }
      ]);
      expect(host.getLoadedPackage('Pester')?.version).toBe('5.3.0');
      expect(host.getLoadedPackage('Pester')?.source).toBe('isolated');
    });

    it('matches range requirements in the real worker', async () => {
      writePackage(modules, { name: 'App', version: '1.0.0', requiredPackages: [{ name: 'Dep', version: '^1.0.0' }] });
      writePackage(modules, { name: 'Dep', version: '1.2.0' });
      writePackage(modules, { name: 'Dep', version: '2.0.0' });
      const { host, loader } = setup();

      const result = await loader.importClosure({ name: 'App', environmentPath: envPath });

      expect(result.loaded.map(pkg => `${pkg.name}@${pkg.version}`)).toEqual(['Dep@1.2.0', 'App@1.0.0']);
      expect(result.unresolved).toEqual([]);
      expect(host.getLoadedPackage('Dep')?.version).toBe('1.2.0');
    });

    it('loads pinned versions over the newest match in the real worker', async () => {
      writePackage(modules, { name: 'App', version: '1.0.0', requiredPackages: ['Dep'] });
      writePackage(modules, { name: 'Dep', version: '1.2.0' });
      writePackage(modules, { name: 'Dep', version: '2.0.0' });
      const { host, loader } = setup();

      await loader.importClosure({
        name: 'App',
        environmentPath: envPath,
        pins: [{ name: 'Dep', version: '1.2.0' }]
      });

      expect(host.getLoadedPackage('Dep')?.version).toBe('1.2.0');
    });

    it('loads nested packages and reports missing ones from the real worker', async () => {
      writePackage(modules, {
        name: 'App',
        version: '1.0.0',
        requiredPackages: ['Missing'],
        nestedPackages: [{ name: 'Inner', version: '>=0.2.0' }]
      });
      writePackage(modules, { name: 'Inner', version: '0.3.0', layout: 'flat' });
      const { host, loader } = setup();

      const result = await loader.importClosure({ name: 'App', environmentPath: envPath });

      expect(result.loaded.map(pkg => `${pkg.name}@${pkg.version}`)).toEqual(['Inner@0.3.0', 'App@1.0.0']);
      expect(result.unresolved).toEqual(['Missing']);
      expect(host.getLoadedPackage('Inner')?.path).toBe(path.join(modules, 'Inner'));
    });
  });
});
