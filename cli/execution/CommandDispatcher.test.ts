import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ModEnv } from '@core/ModEnv';
import { CommandDispatcher } from './CommandDispatcher';
import { UserInteraction } from '../interaction/UserInteraction';
import { makeTempDir, removeTempDir } from '@tests/utils/packages';
import { createTestModEnv } from '@tests/utils/modenv';

describe('CommandDispatcher', () => {
  describe('parseCommandFlags', () => {
    const dispatcher = new CommandDispatcher();

    it('separates flags from positional arguments', () => {
      expect(dispatcher.parseCommandFlags(['Pester', '--version', '5.3.0', '-f', '--repository=internal'])).toEqual({
        flags: { version: '5.3.0', f: true, repository: 'internal' },
        remaining: ['Pester']
      });
    });

    it('never lets a boolean flag swallow the next word', () => {
      expect(dispatcher.parseCommandFlags(['--force', 'web'])).toEqual({
        flags: { force: true },
        remaining: ['web']
      });
    });

    it('treats a value flag followed by another flag as set', () => {
      expect(dispatcher.parseCommandFlags(['--name', '--json'])).toEqual({
        flags: { name: true, json: true },
        remaining: []
      });
    });

    it('stops reading flags after --', () => {
      expect(dispatcher.parseCommandFlags(['--detailed', '--', '--literal'])).toEqual({
        flags: { detailed: true },
        remaining: ['--literal']
      });
    });
  });

  describe('registration', () => {
    it('resolves aliases to their command', () => {
      const dispatcher = new CommandDispatcher();

      expect(dispatcher.getCommand('i')?.name).toBe('install');
      expect(dispatcher.getCommand('un')?.name).toBe('uninstall');
      expect(dispatcher.supportsCommand('shell')).toBe(false);
    });

    it('offers the shell only when it has a runner', () => {
      const dispatcher = new CommandDispatcher(async () => undefined);

      expect(dispatcher.getCommands().map(command => command.name)).toEqual([
        'create', 'remove', 'activate', 'deactivate', 'list', 'status',
        'install', 'uninstall', 'packages', 'update', 'import', 'shell'
      ]);
    });
  });

  describe('executeCommand', () => {
    let home: string;
    let modenv: ModEnv;

    beforeEach(() => {
      home = makeTempDir('modenv-dispatch-');
      ({ modenv } = createTestModEnv(home));
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await modenv.dispose();
      removeTempDir(home);
    });

    it('passes parsed flags through to the command', async () => {
      const dispatcher = new CommandDispatcher();
      const interaction = new UserInteraction({ assumeYes: true });

      await dispatcher.executeCommand('new', ['web', '--include-system', '--description', 'Web tooling'], { modenv, interaction });

      expect(modenv.registry.get('web')).toMatchObject({
        description: 'Web tooling',
        settings: { includeSystemPaths: true, autoActivate: false }
      });
    });

    it('rejects unknown commands', async () => {
      const dispatcher = new CommandDispatcher();
      const interaction = new UserInteraction({ assumeYes: true });

      await expect(dispatcher.executeCommand('frobnicate', [], { modenv, interaction }))
        .rejects.toThrow('Unknown command: frobnicate');
    });
  });
});
