import { CLIOrchestrator } from './CLIOrchestrator';

export interface CLIOptions {
  /** First non-flag argument */
  command?: string;
  /** Arguments after the command, flags included */
  _: string[];
  version?: boolean;
  help?: boolean;
  verbose?: boolean;
  debug?: boolean;
  /** Activate this environment for the duration of the command */
  env?: string;
  /** Directory holding .modenv instead of the user's home */
  home?: string;
  /** Answer yes to confirmation prompts */
  yes?: boolean;
}

/**
 * Main CLI entry point.
 */
export async function main(customArgs?: string[]): Promise<void> {
  const orchestrator = new CLIOrchestrator();
  await orchestrator.main(customArgs);
}
