import chalk from 'chalk';
import { booleanFlag, stringFlag, type CLICommand } from './types';

export function createCreateCommand(): CLICommand {
  return {
    name: 'create',
    aliases: ['new'],
    description: 'Create an environment',
    usage: 'modenv create <name> [options]',
    options: [
      '--path <dir>            Root directory (default ~/.modenv/environments/<name>)',
      '--include-system        Keep system package directories on the search path',
      '--base <env>            Copy packages from an existing environment',
      '--description <text>    Free-form description',
      '-f, --force             Replace an existing environment of the same name'
    ],

    async execute(args, flags, { modenv }) {
      const name = args[0];
      if (!name) {
        throw new Error('Usage: modenv create <name>');
      }

      const environment = await modenv.create(name, {
        path: stringFlag(flags, 'path'),
        includeSystemModules: booleanFlag(flags, 'include-system'),
        baseEnvironment: stringFlag(flags, 'base'),
        force: booleanFlag(flags, 'force', 'f'),
        description: stringFlag(flags, 'description')
      });

      console.log(chalk.green(`Created environment '${environment.name}'`));
      console.log(chalk.gray(`  ${environment.path}`));
      console.log(chalk.gray(`Run 'modenv activate ${environment.name}' to use it`));
    }
  };
}
