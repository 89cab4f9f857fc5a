import { OutputFormatter } from '../utils/output';
import { ProgressIndicator } from '../utils/progress';
import { booleanFlag, stringFlag, type CLICommand } from './types';

export function createInstallCommand(): CLICommand {
  return {
    name: 'install',
    aliases: ['i'],
    description: 'Install a package into the active environment',
    usage: 'modenv install <name> [options]',
    options: [
      '--version <version>     Version or range (default newest)',
      '--repository <name>     Repository to install from (default "default")',
      '--prerelease            Allow prerelease versions',
      '-f, --force             Reinstall when already present',
      '--env <name>            Activate <name> for this command'
    ],

    async execute(args, flags, { modenv }) {
      const name = args[0];
      if (!name) {
        throw new Error('Usage: modenv install <name>');
      }

      const progress = new ProgressIndicator();
      progress.start(`Installing ${name}`);
      try {
        const installed = await modenv.installPackage(name, {
          version: stringFlag(flags, 'version'),
          repository: stringFlag(flags, 'repository'),
          force: booleanFlag(flags, 'force', 'f'),
          allowPrerelease: booleanFlag(flags, 'prerelease')
        });
        progress.succeed(`Installed ${installed.name} ${installed.version}`);
        if (installed.dependencies.length > 0) {
          console.log(OutputFormatter.formatInstallResult(installed));
        }
      } catch (error) {
        progress.fail(`Failed to install ${name}`);
        throw error;
      }
    }
  };
}
