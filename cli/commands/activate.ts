import chalk from 'chalk';
import type { ActivationScope } from '@core/session/types';
import { stringFlag, type CLICommand } from './types';

function parseScope(value: string | undefined): ActivationScope {
  if (value === undefined) {
    return 'Session';
  }
  const normalized = value.toLowerCase();
  if (normalized === 'session') return 'Session';
  if (normalized === 'global') return 'Global';
  throw new Error(`--scope must be Session or Global, got '${value}'`);
}

export function createActivateCommand(): CLICommand {
  return {
    name: 'activate',
    description: 'Activate an environment',
    usage: 'modenv activate <name> [--scope Session|Global]',
    options: [
      '--scope <scope>         Session (this process) or Global (every new modenv process)'
    ],

    async execute(args, flags, { modenv, inShell }) {
      const name = args[0];
      if (!name) {
        throw new Error('Usage: modenv activate <name>');
      }

      const scope = parseScope(stringFlag(flags, 'scope'));
      const session = await modenv.activate(name, { scope });

      console.log(chalk.green(`Activated '${session.environmentName}'`) + chalk.gray(` (${scope})`));
      if (scope === 'Session' && !inShell) {
        console.log(chalk.gray("Session scope ends with this command; use 'modenv shell' or --scope Global to keep it"));
      }
    }
  };
}
