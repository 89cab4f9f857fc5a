import type { CLIOptions } from '../index';

export class ArgumentParser {
  /**
   * Global flags are read anywhere before the command. After it, only the
   * ones that cannot clash with a command flag are lifted out; the rest is
   * handed to the command untouched.
   */
  parseArgs(args: string[]): CLIOptions {
    if (!Array.isArray(args)) {
      throw new TypeError('Internal CLI Error: Expected args to be an array.');
    }

    const options: CLIOptions = { _: [] };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (options.command !== undefined) {
        i = this.parseTrailing(args, i, options);
        continue;
      }

      switch (arg) {
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--verbose':
        case '-v':
          options.verbose = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--yes':
        case '-y':
          options.yes = true;
          break;
        case '--env':
        case '-e':
          options.env = this.requireValue(args, ++i, arg);
          break;
        case '--home':
          options.home = this.requireValue(args, ++i, arg);
          break;
        default:
          if (arg.startsWith('-')) {
            throw new Error(`Unknown option: ${arg}`);
          }
          options.command = arg;
      }
    }

    return options;
  }

  private parseTrailing(args: string[], i: number, options: CLIOptions): number {
    const arg = args[i];
    switch (arg) {
      case '--env':
      case '-e':
        options.env = this.requireValue(args, i + 1, arg);
        return i + 1;
      case '--home':
        options.home = this.requireValue(args, i + 1, arg);
        return i + 1;
      case '--yes':
      case '-y':
        options.yes = true;
        return i;
      case '--debug':
        options.debug = true;
        return i;
      case '--verbose':
        options.verbose = true;
        return i;
      case '--help':
      case '-h':
        options.help = true;
        return i;
      default:
        options._.push(arg);
        return i;
    }
  }

  private requireValue(args: string[], index: number, flag: string): string {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  }
}
