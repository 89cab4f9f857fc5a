import { OutputFormatter } from '../utils/output';
import { booleanFlag, type CLICommand } from './types';

export function createUpdateCommand(): CLICommand {
  return {
    name: 'update',
    aliases: ['upgrade'],
    description: 'Update packages in the active environment',
    usage: 'modenv update [name] [--force] [--accept-license]',
    options: [
      '-f, --force             Reinstall even when current',
      '--accept-license        Accept licenses of packages that require it',
      '--env <name>            Activate <name> for this command'
    ],

    async execute(args, flags, { modenv }) {
      const summary = await modenv.updatePackages({
        name: args[0],
        force: booleanFlag(flags, 'force', 'f'),
        acceptLicense: booleanFlag(flags, 'accept-license')
      });
      console.log(OutputFormatter.formatUpdateSummary(summary));
    }
  };
}
