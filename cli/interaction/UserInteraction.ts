import { createInterface, type Interface } from 'readline';

export interface UserInteractionOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Answer yes to every confirmation (--yes) */
  assumeYes?: boolean;
}

export class UserInteraction {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private assumeYes: boolean;
  private shared: Interface | null = null;

  constructor(options: UserInteractionOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.assumeYes = options.assumeYes ?? false;
  }

  get streams(): { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } {
    return { input: this.input, output: this.output };
  }

  setAssumeYes(value: boolean): void {
    this.assumeYes = value;
  }

  /**
   * Route questions through an already open readline interface, e.g. the
   * interactive shell's. null goes back to a fresh interface per question.
   */
  useInterface(rl: Interface | null): void {
    this.shared = rl;
  }

  /**
   * Ask a yes/no question; anything but y/yes counts as no.
   */
  async confirm(message: string): Promise<boolean> {
    if (this.assumeYes) {
      return true;
    }

    const answer = await this.question(`${message} [y/N] `);
    const normalized = answer.trim().toLowerCase();
    return normalized === 'y' || normalized === 'yes';
  }

  private question(prompt: string): Promise<string> {
    if (this.shared) {
      const rl = this.shared;
      return new Promise(resolve => rl.question(prompt, resolve));
    }

    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    return new Promise(resolve => {
      let answered = false;
      rl.question(prompt, answer => {
        answered = true;
        rl.close();
        resolve(answer);
      });
      rl.on('close', () => {
        if (!answered) {
          resolve('');
        }
      });
    });
  }
}
