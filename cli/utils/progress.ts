import chalk from 'chalk';

type Outcome = 'success' | 'failure' | 'warning';

const MARKS: Record<Outcome, string> = {
  success: '✅',
  failure: '❌',
  warning: '⚠️ '
};

const PAINT: Record<Outcome, (text: string) => string> = {
  success: chalk.green,
  failure: chalk.red,
  warning: chalk.yellow
};

/**
 * A pending line that is replaced by its outcome. Off a terminal only the
 * outcome is printed.
 */
export class ProgressIndicator {
  private pending = false;

  constructor(private readonly interactive: boolean = process.stdout.isTTY === true) {}

  start(message: string): void {
    if (!this.interactive) {
      return;
    }
    process.stdout.write(`⏳ ${message}...`);
    this.pending = true;
  }

  succeed(message: string): void {
    this.settle('success', message);
  }

  fail(message: string): void {
    this.settle('failure', message);
  }

  warn(message: string): void {
    this.settle('warning', message);
  }

  private settle(outcome: Outcome, message: string): void {
    if (this.pending) {
      process.stdout.write('\r\x1b[K');
      this.pending = false;
    }
    console.log(`${MARKS[outcome]} ${PAINT[outcome](message)}`);
  }
}
