import chalk from 'chalk';
import { createInterface } from 'readline';
import * as shellQuote from 'shell-quote';
import type { PromptDecorator } from '@core/session/types';
import type { CLICommand, CommandContext } from './types';

/** Runs one parsed command line; reports its own errors */
export type ShellRunner = (argv: string[], context: CommandContext) => Promise<void>;

const BASE_PROMPT = 'modenv> ';

/**
 * Split a shell line into words, dropping operators and comments.
 */
export function splitShellLine(line: string): string[] {
  return shellQuote.parse(line).filter((entry): entry is string => typeof entry === 'string');
}

export function createShellCommand(run: ShellRunner): CLICommand {
  return {
    name: 'shell',
    description: 'Interactive session that keeps an environment active between commands',
    usage: 'modenv shell',

    async execute(_args, _flags, { modenv, interaction, inShell }) {
      if (inShell) {
        throw new Error('Already inside a modenv shell');
      }

      const { input, output } = interaction.streams;
      const rl = createInterface({ input, output, terminal: process.stdin.isTTY === true && input === process.stdin });

      const decorator: PromptDecorator = {
        decorate(name) {
          rl.setPrompt(`(${name}) ${BASE_PROMPT}`);
        },
        restore() {
          rl.setPrompt(BASE_PROMPT);
        }
      };

      interaction.useInterface(rl);
      modenv.controller.setPromptDecorator(decorator);

      const active = modenv.controller.getActiveSession();
      if (active) {
        decorator.decorate(active.environmentName);
      } else {
        decorator.restore();
      }

      console.log(chalk.gray("Type a command (e.g. 'activate dev'), 'help', or 'exit'"));

      try {
        await new Promise<void>(resolve => {
          let busy = Promise.resolve();

          rl.on('line', line => {
            busy = busy.then(async () => {
              const argv = splitShellLine(line);
              if (argv.length === 0) {
                rl.prompt();
                return;
              }
              if (argv[0] === 'exit' || argv[0] === 'quit') {
                rl.close();
                return;
              }
              if (argv[0] === 'shell') {
                console.error(chalk.yellow('Already inside a modenv shell'));
                rl.prompt();
                return;
              }
              await run(argv, { modenv, interaction, inShell: true });
              rl.prompt();
            });
          });

          rl.on('close', () => {
            busy.then(() => resolve(), () => resolve());
          });

          rl.prompt();
        });
      } finally {
        interaction.useInterface(null);
        modenv.controller.setPromptDecorator(undefined);
      }
    }
  };
}
