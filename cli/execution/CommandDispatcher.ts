import { createActivateCommand } from '../commands/activate';
import { createCreateCommand } from '../commands/create';
import { createDeactivateCommand } from '../commands/deactivate';
import { createImportCommand } from '../commands/import';
import { createInstallCommand } from '../commands/install';
import { createListCommand } from '../commands/list';
import { createPackagesCommand } from '../commands/packages';
import { createRemoveCommand } from '../commands/remove';
import { createShellCommand, type ShellRunner } from '../commands/shell';
import { createStatusCommand } from '../commands/status';
import { createUninstallCommand } from '../commands/uninstall';
import { createUpdateCommand } from '../commands/update';
import type { CLICommand, CommandContext, CommandFlags } from '../commands/types';

// Flags that never take a value; everything else consumes the next word
const BOOLEAN_FLAGS = new Set([
  'force',
  'f',
  'include-system',
  'active',
  'detailed',
  'json',
  'prerelease',
  'all-versions',
  'accept-license',
  'in-process'
]);

export class CommandDispatcher {
  private readonly commandMap: Map<string, CLICommand> = new Map();
  private readonly commands: CLICommand[] = [];

  constructor(shellRunner?: ShellRunner) {
    this.register(createCreateCommand());
    this.register(createRemoveCommand());
    this.register(createActivateCommand());
    this.register(createDeactivateCommand());
    this.register(createListCommand());
    this.register(createStatusCommand());
    this.register(createInstallCommand());
    this.register(createUninstallCommand());
    this.register(createPackagesCommand());
    this.register(createUpdateCommand());
    this.register(createImportCommand());
    if (shellRunner) {
      this.register(createShellCommand(shellRunner));
    }
  }

  private register(command: CLICommand): void {
    this.commands.push(command);
    this.commandMap.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      this.commandMap.set(alias, command);
    }
  }

  async executeCommand(command: string, args: string[], context: CommandContext): Promise<void> {
    const handler = this.commandMap.get(command);
    if (!handler) {
      throw new Error(`Unknown command: ${command}`);
    }

    const { flags, remaining } = this.parseCommandFlags(args);
    await handler.execute(remaining, flags, context);
  }

  supportsCommand(command: string): boolean {
    return this.commandMap.has(command);
  }

  getCommand(command: string): CLICommand | undefined {
    return this.commandMap.get(command);
  }

  /** Distinct commands in registration order */
  getCommands(): CLICommand[] {
    return [...this.commands];
  }

  parseCommandFlags(args: string[]): { flags: CommandFlags; remaining: string[] } {
    const flags: CommandFlags = {};
    const remaining: string[] = [];

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--') {
        remaining.push(...args.slice(i + 1));
        break;
      }

      if (arg.startsWith('-') && arg.length > 1) {
        const body = arg.replace(/^--?/, '');
        const eq = body.indexOf('=');
        if (eq > 0) {
          flags[body.slice(0, eq)] = body.slice(eq + 1);
          continue;
        }

        if (BOOLEAN_FLAGS.has(body)) {
          flags[body] = true;
        } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
          flags[body] = args[++i];
        } else {
          flags[body] = true;
        }
      } else {
        remaining.push(arg);
      }
    }

    return { flags, remaining };
  }
}
