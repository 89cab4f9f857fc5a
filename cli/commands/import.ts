import chalk from 'chalk';
import { ProgressIndicator } from '../utils/progress';
import type { ImportResult } from '@core/services/PackageService';
import { booleanFlag, stringFlag, type CLICommand } from './types';

export function createImportCommand(): CLICommand {
  return {
    name: 'import',
    description: 'Load a package and its dependencies from the active environment',
    usage: 'modenv import <name> [--version v] [--in-process]',
    options: [
      '--version <version>     Version or range (default newest installed)',
      '--in-process            Load in this process instead of an isolated worker',
      '--env <name>            Activate <name> for this command'
    ],

    async execute(args, flags, { modenv }) {
      const name = args[0];
      if (!name) {
        throw new Error('Usage: modenv import <name>');
      }

      const progress = new ProgressIndicator();
      progress.start(`Importing ${name}`);
      let result: ImportResult;
      try {
        result = await modenv.importPackage(name, {
          version: stringFlag(flags, 'version'),
          strategy: booleanFlag(flags, 'in-process') ? 'in-process' : undefined
        });
      } catch (error) {
        progress.fail(`Failed to import ${name}`);
        throw error;
      }

      if (result.package) {
        progress.succeed(`Imported ${result.package.name} ${result.package.version}` + chalk.gray(` [${result.package.source}]`));
      } else {
        progress.warn(`${name} did not report a loaded package`);
      }
      for (const failure of result.outcome.failed) {
        console.log(chalk.yellow(`  ${failure.name}: ${failure.error}`));
      }
      if (result.analysis.tree.unresolved.length > 0) {
        console.log(chalk.yellow(`Unresolved: ${result.analysis.tree.unresolved.join(', ')}`));
      }
    }
  };
}
