import type { ModEnv } from '@core/ModEnv';
import type { UserInteraction } from '../interaction/UserInteraction';

export type CommandFlags = Record<string, string | boolean>;

export interface CommandContext {
  modenv: ModEnv;
  interaction: UserInteraction;
  /** Set while commands run inside `modenv shell` */
  inShell?: boolean;
}

export interface CLICommand {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  /** Flag lines shown by `modenv help <command>` */
  options?: string[];
  execute(args: string[], flags: CommandFlags, context: CommandContext): Promise<void>;
}

export function stringFlag(flags: CommandFlags, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = flags[name];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

export function booleanFlag(flags: CommandFlags, ...names: string[]): boolean {
  return names.some(name => flags[name] === true || flags[name] === 'true');
}
