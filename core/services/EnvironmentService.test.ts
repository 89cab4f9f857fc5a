import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import type { ModEnv } from '@core/ModEnv';
import {
  ActiveEnvironmentConflictError,
  EnvironmentExistsError,
  EnvironmentNotFoundError,
  InvalidEnvironmentNameError
} from '@core/errors';
import { makeTempDir, removeTempDir, writePackage } from '@tests/utils/packages';
import { createTestModEnv } from '@tests/utils/modenv';

describe('EnvironmentService', () => {
  let home: string;
  let modenv: ModEnv;

  beforeEach(() => {
    home = makeTempDir('modenv-envs-');
    ({ modenv } = createTestModEnv(home));
  });

  afterEach(async () => {
    await modenv.dispose();
    removeTempDir(home);
  });

  describe('create', () => {
    it('lays out the environment directory and registers it', async () => {
      const environment = await modenv.create('web', { description: 'Web tooling', includeSystemModules: true });

      const root = path.join(home, '.modenv', 'environments', 'web');
      expect(environment.path).toBe(root);
      expect(fs.readdirSync(root).sort()).toEqual(['Cache', 'Logs', 'Modules', 'Scripts', 'config.json']);
      expect(modenv.registry.get('web')?.settings).toEqual({ includeSystemPaths: true, autoActivate: false });
      expect(modenv.registry.get('web')?.description).toBe('Web tooling');
    });

    it('honours a custom path', async () => {
      const custom = path.join(home, 'elsewhere', 'web');

      const environment = await modenv.create('web', { path: custom });

      expect(environment.path).toBe(custom);
      expect(fs.existsSync(path.join(custom, 'Modules'))).toBe(true);
    });

    it('rejects invalid and duplicate names', async () => {
      await modenv.create('web');

      await expect(modenv.create('bad name')).rejects.toBeInstanceOf(InvalidEnvironmentNameError);
      await expect(modenv.create('WEB')).rejects.toBeInstanceOf(EnvironmentExistsError);
    });

    it('refuses to take over an existing directory without force', async () => {
      fs.mkdirSync(path.join(home, '.modenv', 'environments', 'web'), { recursive: true });

      await expect(modenv.create('web')).rejects.toBeInstanceOf(EnvironmentExistsError);
      await expect(modenv.create('web', { force: true })).resolves.toMatchObject({ name: 'web' });
    });

    it('replaces an existing environment with force', async () => {
      const first = await modenv.create('web');
      writePackage(path.join(first.path, 'Modules'), { name: 'Pester', version: '5.3.0' });

      await modenv.create('web', { force: true });

      expect(fs.readdirSync(path.join(first.path, 'Modules'))).toEqual([]);
      expect(modenv.list().map(summary => summary.name)).toEqual(['web']);
    });

    it('moves a replaced environment to an empty path and deletes only its old directory', async () => {
      const first = await modenv.create('web');
      const target = path.join(home, 'relocated');

      const moved = await modenv.create('web', { force: true, path: target });

      expect(moved.path).toBe(target);
      expect(fs.existsSync(first.path)).toBe(false);
      expect(fs.existsSync(path.join(target, 'Modules'))).toBe(true);
    });

    it('will not replace an environment into a directory that holds other files', async () => {
      const first = await modenv.create('web');
      const project = path.join(home, 'my-project');
      fs.mkdirSync(project);
      fs.writeFileSync(path.join(project, 'precious.txt'), 'keep me');

      await expect(modenv.create('web', { force: true, path: project }))
        .rejects.toThrow(`Cannot replace environment 'web': ${project} is not empty`);

      expect(fs.readFileSync(path.join(project, 'precious.txt'), 'utf8')).toBe('keep me');
      expect(fs.existsSync(path.join(first.path, 'Modules'))).toBe(true);
      expect(modenv.registry.get('web')?.path).toBe(first.path);
    });

    it('refuses to replace an environment with a copy of itself', async () => {
      const first = await modenv.create('web');
      writePackage(path.join(first.path, 'Modules'), { name: 'Pester', version: '5.3.0' });

      await expect(modenv.create('web', { force: true, baseEnvironment: 'WEB' }))
        .rejects.toThrow("Environment 'web' cannot be replaced by a copy of itself");

      expect(fs.existsSync(path.join(first.path, 'Modules', 'Pester', '5.3.0', 'manifest.json'))).toBe(true);
    });

    it('copies packages from a base environment', async () => {
      const base = await modenv.create('base');
      writePackage(path.join(base.path, 'Modules'), { name: 'Pester', version: '5.3.0' });
      await modenv.registry.recordModule('base', {
        name: 'Pester',
        version: '5.3.0',
        installedAt: '2026-03-01T10:00:00.000Z',
        repository: 'default'
      });

      const copy = await modenv.create('copy', { baseEnvironment: 'base' });

      expect(fs.existsSync(path.join(copy.path, 'Modules', 'Pester', '5.3.0', 'manifest.json'))).toBe(true);
      expect(copy.modules).toEqual([{
        name: 'Pester',
        version: '5.3.0',
        installedAt: '2026-03-01T10:00:00.000Z',
        repository: 'default'
      }]);
    });

    it('requires the base environment to exist', async () => {
      await expect(modenv.create('copy', { baseEnvironment: 'ghost' })).rejects.toBeInstanceOf(EnvironmentNotFoundError);
    });
  });

  describe('remove', () => {
    it('asks for confirmation and keeps the environment when declined', async () => {
      const environment = await modenv.create('web');
      const questions: string[] = [];

      const removed = await modenv.remove('web', {
        confirm: async message => {
          questions.push(message);
          return false;
        }
      });

      expect(removed).toBe(false);
      expect(questions).toEqual([`Remove environment 'web' and delete ${environment.path}?`]);
      expect(fs.existsSync(environment.path)).toBe(true);
    });

    it('deletes the directory and the registry entry', async () => {
      const environment = await modenv.create('web');

      expect(await modenv.remove('web', { force: true })).toBe(true);

      expect(fs.existsSync(environment.path)).toBe(false);
      expect(modenv.registry.has('web')).toBe(false);
    });

    it('refuses to remove the active environment', async () => {
      await modenv.create('web');
      await modenv.activate('web');

      await expect(modenv.remove('web', { force: true })).rejects.toBeInstanceOf(ActiveEnvironmentConflictError);
    });

    it('reports unknown environments', async () => {
      await expect(modenv.remove('ghost', { force: true })).rejects.toBeInstanceOf(EnvironmentNotFoundError);
    });
  });

  describe('list', () => {
    it('filters by wildcard and by activity', async () => {
      await modenv.create('web-api');
      await modenv.create('web-ui');
      await modenv.create('ops');
      await modenv.activate('web-ui');

      expect(modenv.list({ namePattern: 'WEB-*' }).map(summary => summary.name)).toEqual(['web-api', 'web-ui']);
      expect(modenv.list({ activeOnly: true }).map(summary => summary.name)).toEqual(['web-ui']);
    });

    it('flags environments whose directory is gone', async () => {
      const environment = await modenv.create('web');
      fs.rmSync(environment.path, { recursive: true, force: true });

      const [summary] = modenv.list({ detailed: true });

      expect(summary).toMatchObject({ name: 'web', healthy: false, active: false, moduleCount: 0, modules: [] });
    });
  });
});
