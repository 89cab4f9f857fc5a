export type ActivationScope = 'Session' | 'Global';

export interface ActiveSession {
  environmentName: string;
  environmentPath: string;
  /** Search path before activation; null when the variable was unset */
  originalSearchPath: string | null;
  protectedSearchPath: string;
  activatedAt: string;
  scope: ActivationScope;
}

export interface ActivateOptions {
  scope?: ActivationScope;
}

/**
 * UI hook showing the active environment, e.g. an interactive prompt.
 */
export interface PromptDecorator {
  decorate(environmentName: string): void;
  restore(): void;
}
