import { OutputFormatter } from '../utils/output';
import { booleanFlag, type CLICommand } from './types';

export function createListCommand(): CLICommand {
  return {
    name: 'list',
    aliases: ['ls'],
    description: 'List environments',
    usage: 'modenv list [pattern] [--active] [--detailed] [--json]',
    options: [
      '--active                Only the active environment',
      '--detailed              Include settings and installed packages',
      '--json                  Machine-readable output'
    ],

    async execute(args, flags, { modenv }) {
      const environments = modenv.list({
        namePattern: args[0],
        activeOnly: booleanFlag(flags, 'active'),
        detailed: booleanFlag(flags, 'detailed')
      });

      if (booleanFlag(flags, 'json')) {
        console.log(JSON.stringify(environments, null, 2));
        return;
      }
      console.log(OutputFormatter.formatEnvironmentList(environments, { detailed: booleanFlag(flags, 'detailed') }));
    }
  };
}
