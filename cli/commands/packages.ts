import { OutputFormatter } from '../utils/output';
import { booleanFlag, type CLICommand } from './types';

export function createPackagesCommand(): CLICommand {
  return {
    name: 'packages',
    aliases: ['pkgs'],
    description: 'List packages installed in the active environment',
    usage: 'modenv packages [pattern] [--all-versions] [--json]',
    options: [
      '--all-versions          Every installed version, not just the newest',
      '--json                  Machine-readable output',
      '--env <name>            Activate <name> for this command'
    ],

    async execute(args, flags, { modenv }) {
      const packages = await modenv.listPackages({
        namePattern: args[0],
        listAllVersions: booleanFlag(flags, 'all-versions')
      });

      if (booleanFlag(flags, 'json')) {
        console.log(JSON.stringify(packages, null, 2));
        return;
      }
      if (modenv.controller.isActive()) {
        console.log(OutputFormatter.formatPackageList(packages));
      }
    }
  };
}
