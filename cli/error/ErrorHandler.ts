import chalk from 'chalk';
import {
  DependencyConflictError,
  IsolatedImportError,
  ModEnvError,
  getErrorMessage
} from '@core/errors';
import { cliLogger } from '@core/utils/logger';

export interface ErrorHandlingOptions {
  verbose?: boolean;
  debug?: boolean;
  /** Inside the interactive shell: report, never touch the exit code */
  interactive?: boolean;
}

export class ErrorHandler {

  handleError(error: unknown, options: ErrorHandlingOptions = {}): void {
    let fatal = true;

    if (error instanceof ModEnvError) {
      fatal = !error.canBeWarning();
      this.handleModEnvError(error, options);
    } else if (error instanceof Error) {
      this.handleGenericError(error, options);
    } else {
      cliLogger.debug('Non-error value thrown', { error });
      console.error(chalk.red(`Unknown Error: ${getErrorMessage(error)}`));
    }

    if (fatal && !options.interactive) {
      process.exitCode = 1;
    }
  }

  private handleModEnvError(error: ModEnvError, options: ErrorHandlingOptions): void {
    if (error.canBeWarning()) {
      console.error(chalk.yellow(`Warning: ${error.message}`));
      return;
    }

    if (error instanceof DependencyConflictError) {
      console.error(chalk.red(error.getFormattedMessage()));
      return;
    }

    console.error(chalk.red(`Error: ${error.message}`) + chalk.gray(` [${error.code}]`));

    if (error instanceof IsolatedImportError && error.stderr && error.stderr.trim()) {
      console.error(chalk.gray(error.stderr.trim()));
    }

    this.printCause(error);
    this.printStack(error, options);
  }

  private handleGenericError(error: Error, options: ErrorHandlingOptions): void {
    cliLogger.debug('Unexpected error', { error: error.message, stack: error.stack });
    console.error(chalk.red(`Error: ${error.message}`));
    this.printCause(error);
    this.printStack(error, options);
  }

  private printCause(error: Error): void {
    if (error.cause instanceof Error) {
      console.error(chalk.red(`  Cause: ${error.cause.message}`));
    }
  }

  private printStack(error: Error, options: ErrorHandlingOptions): void {
    if ((options.verbose || options.debug) && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  }
}
