import chalk from 'chalk';
import type { CLICommand } from './types';

export function createDeactivateCommand(): CLICommand {
  return {
    name: 'deactivate',
    description: 'Deactivate the active environment',
    usage: 'modenv deactivate',

    async execute(_args, _flags, { modenv }) {
      const session = modenv.controller.getActiveSession();
      if (await modenv.deactivate()) {
        console.log(chalk.green(`Deactivated '${session?.environmentName ?? ''}'`));
      }
    }
  };
}
