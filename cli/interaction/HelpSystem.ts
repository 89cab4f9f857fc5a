import chalk from 'chalk';
import type { CLICommand } from '../commands/types';

export class HelpSystem {
  constructor(private readonly commands: () => CLICommand[]) {}

  displayHelp(command?: string): void {
    const target = command
      ? this.commands().find(entry => entry.name === command || entry.aliases?.includes(command))
      : undefined;

    if (target) {
      this.displayCommandHelp(target);
      return;
    }

    if (command) {
      console.log(chalk.yellow(`Unknown command: ${command}`));
      console.log('');
    }

    this.displayGeneralHelp();
  }

  private displayCommandHelp(command: CLICommand): void {
    console.log(`Usage: ${command.usage}`);
    console.log('');
    console.log(command.description);

    if (command.aliases && command.aliases.length > 0) {
      console.log('');
      console.log(`Aliases: ${command.aliases.join(', ')}`);
    }

    if (command.options && command.options.length > 0) {
      console.log('');
      console.log('Options:');
      for (const line of command.options) {
        console.log(`  ${line}`);
      }
    }
  }

  private displayGeneralHelp(): void {
    const commands = this.commands();
    const width = Math.max(...commands.map(command => command.name.length));

    console.log(`
Usage: modenv [global options] <command> [options]

Isolated package environments for the host's module search path.

Commands:`);
    for (const command of commands) {
      console.log(`  ${command.name.padEnd(width)}  ${command.description}`);
    }
    console.log(`  ${'help'.padEnd(width)}  Show help for a command`);

    console.log(`
Global options:
  -e, --env <name>    Activate <name> for this command only
  --home <dir>        Use <dir>/.modenv for state (default: MODENV_HOME or ~)
  -y, --yes           Answer yes to confirmation prompts
  -v, --verbose       Show informational logs
  -d, --debug         Show debug logs
  -V, --version       Show version
  -h, --help          Show this help

Examples:
  modenv create web --description "Web tooling"
  modenv activate web --scope Global
  modenv --env web install Pester --version 5.3.0
  modenv shell`);
  }
}
