import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { ModEnv } from '@core/ModEnv';
import { version } from '@core/version';
import { cliLogger, configureFileLogging, setLogLevel } from '@core/utils/logger';
import type { CLIOptions } from './index';
import type { CommandContext } from './commands/types';
import { ErrorHandler } from './error/ErrorHandler';
import { CommandDispatcher } from './execution/CommandDispatcher';
import { HelpSystem } from './interaction/HelpSystem';
import { UserInteraction } from './interaction/UserInteraction';
import { ArgumentParser } from './parsers/ArgumentParser';

export interface CLIOrchestratorOptions {
  interaction?: UserInteraction;
  createModEnv?: (config: ResolvedConfig) => ModEnv;
}

export class CLIOrchestrator {
  private readonly errorHandler: ErrorHandler;
  private readonly userInteraction: UserInteraction;
  private readonly helpSystem: HelpSystem;
  private readonly argumentParser: ArgumentParser;
  private readonly commandDispatcher: CommandDispatcher;
  private readonly createModEnv: (config: ResolvedConfig) => ModEnv;
  private cliOptions: CLIOptions = { _: [] };

  constructor(options: CLIOrchestratorOptions = {}) {
    this.errorHandler = new ErrorHandler();
    this.userInteraction = options.interaction ?? new UserInteraction();
    this.argumentParser = new ArgumentParser();
    this.commandDispatcher = new CommandDispatcher((argv, context) => this.runInShell(argv, context));
    this.helpSystem = new HelpSystem(() => this.commandDispatcher.getCommands());
    this.createModEnv = options.createModEnv ?? (config => new ModEnv({ config }));
  }

  async main(customArgs?: string[]): Promise<void> {
    process.title = 'modenv';

    let modenv: ModEnv | undefined;

    try {
      const args = customArgs || process.argv.slice(2);
      this.cliOptions = this.argumentParser.parseArgs(args);
      const options = this.cliOptions;

      this.configureLogging(options);
      this.userInteraction.setAssumeYes(options.yes === true);

      if (options.version) {
        console.log(`modenv version ${version}`);
        return;
      }

      const command = options.command;
      if (!command || command === 'help') {
        this.helpSystem.displayHelp(command === 'help' ? options._[0] : undefined);
        return;
      }
      if (options.help) {
        this.helpSystem.displayHelp(command);
        return;
      }
      if (!this.commandDispatcher.supportsCommand(command)) {
        throw new Error(`Unknown command: ${command}. Run 'modenv help' for the list of commands.`);
      }

      const config = new ConfigLoader({ homeDir: options.home }).load();
      configureFileLogging(config.logsDir);
      modenv = this.createModEnv(config);

      if (options.env) {
        await modenv.activate(options.env);
      } else {
        await modenv.restoreAutoActivated();
      }

      await this.commandDispatcher.executeCommand(command, options._, {
        modenv,
        interaction: this.userInteraction
      });
    } catch (error: unknown) {
      this.errorHandler.handleError(error, this.cliOptions);
    } finally {
      if (modenv) {
        await this.shutdown(modenv);
      }
    }
  }

  private async runInShell(argv: string[], context: CommandContext): Promise<void> {
    const [command, ...rest] = argv;

    try {
      if (command === 'help') {
        this.helpSystem.displayHelp(rest[0]);
        return;
      }
      if (rest.includes('--help') || rest.includes('-h')) {
        this.helpSystem.displayHelp(command);
        return;
      }
      await this.commandDispatcher.executeCommand(command, rest, context);
    } catch (error: unknown) {
      this.errorHandler.handleError(error, { ...this.cliOptions, interactive: true });
    }
  }

  private async shutdown(modenv: ModEnv): Promise<void> {
    try {
      await modenv.dispose();
    } catch (error: unknown) {
      cliLogger.debug('Cleanup after command failed');
      this.errorHandler.handleError(error, this.cliOptions);
    }
  }

  private configureLogging(options: CLIOptions): void {
    if (options.debug) {
      process.env.MODENV_DEBUG = 'true';
      setLogLevel('debug');
    } else if (options.verbose) {
      setLogLevel('info');
    } else {
      setLogLevel('warn');
    }
  }
}
