import type { HostRuntime, InstalledPackage, LoadedPackage } from '@core/host/types';
import { interceptorLogger as logger } from '@core/utils/logger';
import type { PathGuard } from './PathGuard';

export const DEFAULT_IMPORT_BYPASS_SECONDS = 15;
export const DEFAULT_INSTALL_BYPASS_SECONDS = 45;

type HostOperation = 'import' | 'install';
type AsyncOperation<A extends unknown[], R> = (...args: A) => Promise<R>;
type ImportArgs = Parameters<HostRuntime['importPackage']>;
type InstallArgs = Parameters<HostRuntime['installPackage']>;

export interface CallInterceptorOptions {
  importBypassSeconds?: number;
  installBypassSeconds?: number;
}

/**
 * Guarded entry points for the two host operations allowed to touch the
 * search path during an active session. Every internal import or install
 * goes through `importPackage` / `installPackage` here; while hooks are
 * enabled each call opens a guard bypass window before delegating.
 */
export class CallInterceptor {
  private enabled = false;
  private readonly importBypassSeconds: number;
  private readonly installBypassSeconds: number;

  readonly importPackage: HostRuntime['importPackage'];
  readonly installPackage: HostRuntime['installPackage'];

  constructor(
    private readonly host: Pick<HostRuntime, 'importPackage' | 'installPackage'>,
    private readonly guard: Pick<PathGuard, 'requestBypass' | 'getState'>,
    options: CallInterceptorOptions = {}
  ) {
    this.importBypassSeconds = options.importBypassSeconds ?? DEFAULT_IMPORT_BYPASS_SECONDS;
    this.installBypassSeconds = options.installBypassSeconds ?? DEFAULT_INSTALL_BYPASS_SECONDS;

    this.importPackage = this.intercept<ImportArgs, LoadedPackage>(
      'import',
      (...args) => this.host.importPackage(...args)
    );
    this.installPackage = this.intercept<InstallArgs, InstalledPackage>(
      'install',
      (...args) => this.host.installPackage(...args)
    );
  }

  enableHooks(): void {
    if (this.enabled) {
      logger.debug('Hooks already enabled');
      return;
    }
    this.enabled = true;
    logger.debug('Hooks enabled');
  }

  disableHooks(): void {
    if (!this.enabled) {
      return;
    }
    this.enabled = false;
    logger.debug('Hooks disabled');
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  private intercept<A extends unknown[], R>(
    operation: HostOperation,
    original: AsyncOperation<A, R>
  ): AsyncOperation<A, R> {
    return (...args: A): Promise<R> => {
      if (!this.enabled) {
        return original(...args);
      }

      const seconds = operation === 'import' ? this.importBypassSeconds : this.installBypassSeconds;
      this.guard.requestBypass(seconds);
      return this.settle(operation, original(...args));
    };
  }

  private async settle<R>(operation: HostOperation, pending: Promise<R>): Promise<R> {
    try {
      return await pending;
    } finally {
      if (this.enabled && this.guard.getState() === 'Inactive') {
        logger.warn(`Search path guard was disarmed while ${operation} was running`);
      }
    }
  }
}
