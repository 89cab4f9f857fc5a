import { OutputFormatter } from '../utils/output';
import { booleanFlag, type CLICommand } from './types';

export function createStatusCommand(): CLICommand {
  return {
    name: 'status',
    description: 'Show the active environment, guard state and search path',
    usage: 'modenv status [--json]',

    async execute(_args, flags, { modenv }) {
      const status = modenv.status();
      if (booleanFlag(flags, 'json')) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }
      console.log(OutputFormatter.formatStatus(status));
    }
  };
}
