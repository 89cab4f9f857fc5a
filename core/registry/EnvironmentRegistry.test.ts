import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { EnvironmentRegistry } from './EnvironmentRegistry';
import type { Environment } from './types';
import { EnvironmentNotFoundError, InvalidEnvironmentNameError } from '@core/errors';
import { makeTempDir, removeTempDir } from '@tests/utils/packages';

function environment(name: string, envPath: string): Environment {
  return {
    name,
    path: envPath,
    created: '2026-03-01T10:00:00.000Z',
    description: '',
    modules: [],
    settings: { includeSystemPaths: false, autoActivate: false }
  };
}

describe('EnvironmentRegistry', () => {
  let home: string;
  let registryPath: string;

  beforeEach(() => {
    home = makeTempDir('modenv-registry-');
    registryPath = path.join(home, '.modenv', 'registry.json');
  });

  afterEach(() => {
    removeTempDir(home);
  });

  it('validates names', () => {
    expect(EnvironmentRegistry.isValidName('web_2-dev')).toBe(true);
    expect(EnvironmentRegistry.isValidName('has space')).toBe(false);
    expect(EnvironmentRegistry.isValidName('')).toBe(false);
    expect(EnvironmentRegistry.isValidName('x'.repeat(51))).toBe(false);
    expect(() => EnvironmentRegistry.assertValidName('a/b')).toThrow(InvalidEnvironmentNameError);
  });

  it('persists environments and mirrors config.json into existing directories', async () => {
    const envPath = path.join(home, 'envs', 'web');
    fs.mkdirSync(envPath, { recursive: true });
    const registry = new EnvironmentRegistry(registryPath);

    await registry.save(environment('web', envPath));

    const reread = new EnvironmentRegistry(registryPath);
    expect(reread.get('WEB')?.path).toBe(envPath);
    expect(JSON.parse(fs.readFileSync(path.join(envPath, 'config.json'), 'utf8')).name).toBe('web');
  });

  it('hands out copies', async () => {
    const registry = new EnvironmentRegistry(registryPath);
    await registry.save(environment('web', path.join(home, 'missing')));

    const copy = registry.get('web');
    copy?.modules.push({ name: 'Pester', version: '5.3.0', installedAt: '2026-03-01T10:00:00.000Z' });

    expect(registry.get('web')?.modules).toEqual([]);
  });

  it('records and forgets modules', async () => {
    const registry = new EnvironmentRegistry(registryPath);
    await registry.save(environment('web', path.join(home, 'web')));

    await registry.recordModule('web', { name: 'Pester', version: '5.3.0', installedAt: 'a' });
    await registry.recordModule('web', { name: 'Pester', version: '5.3.0', installedAt: 'b' });
    await registry.recordModule('web', { name: 'Pester', version: '4.10.1', installedAt: 'c' });

    expect(registry.get('web')?.modules.map(entry => `${entry.version}:${entry.installedAt}`)).toEqual(['5.3.0:b', '4.10.1:c']);

    await registry.forgetModule('web', 'pester', '5.3.0');
    expect(registry.get('web')?.modules.map(entry => entry.version)).toEqual(['4.10.1']);

    await registry.forgetModule('web', 'Pester');
    expect(registry.get('web')?.modules).toEqual([]);
  });

  it('keeps a single auto-activate flag', async () => {
    const registry = new EnvironmentRegistry(registryPath);
    await registry.save(environment('web', path.join(home, 'web')));
    await registry.save(environment('ops', path.join(home, 'ops')));

    await registry.setAutoActivate('web');
    await registry.setAutoActivate('ops');

    expect(registry.getAutoActivate()?.name).toBe('ops');
    expect(registry.get('web')?.settings.autoActivate).toBe(false);

    await registry.setAutoActivate(null);
    expect(registry.getAutoActivate()).toBeUndefined();
    await expect(registry.setAutoActivate('nope')).rejects.toBeInstanceOf(EnvironmentNotFoundError);
  });

  it('removes environments', async () => {
    const registry = new EnvironmentRegistry(registryPath);
    await registry.save(environment('web', path.join(home, 'web')));

    expect(await registry.remove('Web')).toBe(true);
    expect(await registry.remove('web')).toBe(false);
    expect(registry.list()).toEqual([]);
  });

  it('skips malformed records and fills defaults', () => {
    fs.mkdirSync(path.dirname(registryPath), { recursive: true });
    fs.writeFileSync(registryPath, JSON.stringify([
      { name: 'web', path: '/envs/web' },
      { name: 'broken' },
      'junk'
    ]));

    const registry = new EnvironmentRegistry(registryPath);

    expect(registry.list()).toEqual([{
      name: 'web',
      path: '/envs/web',
      created: '1970-01-01T00:00:00.000Z',
      description: '',
      modules: [],
      settings: { includeSystemPaths: false, autoActivate: false }
    }]);
  });

  it('refuses an unreadable registry file', () => {
    fs.mkdirSync(path.dirname(registryPath), { recursive: true });
    fs.writeFileSync(registryPath, '{ broken');

    const registry = new EnvironmentRegistry(registryPath);

    expect(() => registry.list()).toThrow(/is unreadable/);
  });
});
