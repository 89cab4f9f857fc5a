import chalk from 'chalk';
import { booleanFlag, stringFlag, type CLICommand } from './types';

export function createUninstallCommand(): CLICommand {
  return {
    name: 'uninstall',
    aliases: ['un'],
    description: 'Remove a package from the active environment',
    usage: 'modenv uninstall <name> [--version v] [--force]',
    options: [
      '--version <version>     Only this version (default all)',
      '-f, --force             Skip the confirmation prompt',
      '--env <name>            Activate <name> for this command'
    ],

    async execute(args, flags, { modenv, interaction }) {
      const name = args[0];
      if (!name) {
        throw new Error('Usage: modenv uninstall <name>');
      }

      const removed = await modenv.uninstallPackage(name, {
        version: stringFlag(flags, 'version'),
        force: booleanFlag(flags, 'force', 'f'),
        confirm: message => interaction.confirm(message)
      });

      if (removed.length > 0) {
        console.log(chalk.green(`Uninstalled ${name} ${removed.join(', ')}`));
      } else {
        console.log(chalk.gray('Nothing uninstalled'));
      }
    }
  };
}
