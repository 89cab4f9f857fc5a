import chalk from 'chalk';
import { booleanFlag, type CLICommand } from './types';

export function createRemoveCommand(): CLICommand {
  return {
    name: 'remove',
    aliases: ['rm'],
    description: 'Delete an environment and its directory',
    usage: 'modenv remove <name> [--force]',
    options: ['-f, --force             Skip the confirmation prompt'],

    async execute(args, flags, { modenv, interaction }) {
      const name = args[0];
      if (!name) {
        throw new Error('Usage: modenv remove <name>');
      }

      const removed = await modenv.remove(name, {
        force: booleanFlag(flags, 'force', 'f'),
        confirm: message => interaction.confirm(message)
      });

      if (removed) {
        console.log(chalk.green(`Removed environment '${name}'`));
      } else {
        console.log(chalk.gray('Nothing removed'));
      }
    }
  };
}
