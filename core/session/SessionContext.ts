import type { ActiveSession } from './types';

/**
 * Holds the one active session of the process. Only the activation
 * controller writes it.
 */
export class SessionContext {
  private session: ActiveSession | null = null;

  get(): ActiveSession | null {
    return this.session ? { ...this.session } : null;
  }

  isActive(): boolean {
    return this.session !== null;
  }

  set(session: ActiveSession): void {
    this.session = { ...session };
  }

  clear(): void {
    this.session = null;
  }
}
