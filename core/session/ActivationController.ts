import * as fs from 'fs';
import {
  ActiveEnvironmentConflictError,
  EnvironmentCorruptedError,
  EnvironmentNotFoundError,
  getErrorMessage
} from '@core/errors';
import type { CallInterceptor } from '@core/isolation/CallInterceptor';
import type { PathGuard } from '@core/isolation/PathGuard';
import type { SearchPathManager } from '@core/isolation/SearchPathManager';
import type { EnvironmentRegistry } from '@core/registry/EnvironmentRegistry';
import type { Environment } from '@core/registry/types';
import { sessionLogger as logger } from '@core/utils/logger';
import { EnvironmentLog } from './EnvironmentLog';
import { SessionContext } from './SessionContext';
import type { ActivateOptions, ActiveSession, PromptDecorator } from './types';

export interface ActivationControllerDependencies {
  registry: EnvironmentRegistry;
  searchPath: SearchPathManager;
  guard: Pick<PathGuard, 'enable' | 'disable'>;
  interceptor: Pick<CallInterceptor, 'enableHooks' | 'disableHooks'>;
  context?: SessionContext;
  prompt?: PromptDecorator;
  log?: EnvironmentLog;
}

/**
 * Deactivated <-> Activated. The only writer of the session context.
 */
export class ActivationController {
  private readonly registry: EnvironmentRegistry;
  private readonly searchPath: SearchPathManager;
  private readonly guard: Pick<PathGuard, 'enable' | 'disable'>;
  private readonly interceptor: Pick<CallInterceptor, 'enableHooks' | 'disableHooks'>;
  private readonly context: SessionContext;
  private readonly log: EnvironmentLog;
  private prompt?: PromptDecorator;

  constructor(dependencies: ActivationControllerDependencies) {
    this.registry = dependencies.registry;
    this.searchPath = dependencies.searchPath;
    this.guard = dependencies.guard;
    this.interceptor = dependencies.interceptor;
    this.context = dependencies.context ?? new SessionContext();
    this.prompt = dependencies.prompt;
    this.log = dependencies.log ?? new EnvironmentLog();
  }

  setPromptDecorator(prompt: PromptDecorator | undefined): void {
    this.prompt = prompt;
  }

  getActiveSession(): ActiveSession | null {
    return this.context.get();
  }

  isActive(): boolean {
    return this.context.isActive();
  }

  async activate(name: string, options: ActivateOptions = {}): Promise<ActiveSession> {
    const scope = options.scope ?? 'Session';
    const current = this.context.get();
    if (current) {
      logger.warn(`Environment '${current.environmentName}' is active; deactivating it first`);
      await this.deactivate();
    }

    const environment = this.validate(name);
    const originalSearchPath = this.searchPath.snapshot();

    try {
      const entries = this.searchPath.computeSearchPath(
        environment.path,
        environment.settings.includeSystemPaths,
        originalSearchPath
      );
      const protectedSearchPath = this.searchPath.apply(entries);

      if (!this.guard.enable(protectedSearchPath)) {
        throw new ActiveEnvironmentConflictError(
          `${this.searchPath.variable} is already guarded by another session`,
          environment.name
        );
      }
      this.interceptor.enableHooks();

      const session: ActiveSession = {
        environmentName: environment.name,
        environmentPath: environment.path,
        originalSearchPath,
        protectedSearchPath,
        activatedAt: new Date().toISOString(),
        scope
      };
      this.context.set(session);

      if (scope === 'Global') {
        await this.registry.setAutoActivate(environment.name);
      }
      this.prompt?.decorate(environment.name);

      await this.log.activation(environment.path, `Activated (${scope})`);
      logger.info(`Activated environment '${environment.name}'`);
      return session;
    } catch (error) {
      this.rollback(originalSearchPath);
      throw error;
    }
  }

  /**
   * Returns false, with a warning, when nothing is active.
   */
  async deactivate(): Promise<boolean> {
    const session = this.context.get();
    if (!session) {
      logger.warn('No environment is active');
      return false;
    }

    try {
      this.interceptor.disableHooks();
      this.guard.disable();
      this.searchPath.restoreOriginal(session.originalSearchPath);
      this.prompt?.restore();
      await this.log.activation(session.environmentPath, 'Deactivated');
      this.context.clear();
    } catch (error) {
      logger.warn(`Deactivation of '${session.environmentName}' failed: ${getErrorMessage(error)}; cleaning up`);
      this.emergencyCleanup(session.originalSearchPath);
      throw error;
    }

    logger.info(`Deactivated environment '${session.environmentName}'`);
    return true;
  }

  /**
   * Activate the environment flagged for automatic activation, if any.
   * Failures are reported as warnings.
   */
  async restoreAutoActivated(): Promise<ActiveSession | undefined> {
    const flagged = this.registry.getAutoActivate();
    if (!flagged || this.context.isActive()) {
      return undefined;
    }

    try {
      return await this.activate(flagged.name, { scope: 'Global' });
    } catch (error) {
      logger.warn(`Could not auto-activate '${flagged.name}': ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  private validate(name: string): Environment {
    const environment = this.registry.get(name);
    if (!environment) {
      throw new EnvironmentNotFoundError(name);
    }

    let isDirectory = false;
    try {
      isDirectory = fs.statSync(environment.path).isDirectory();
    } catch (error) {
      throw new EnvironmentCorruptedError(environment.name, environment.path, error);
    }
    if (!isDirectory) {
      throw new EnvironmentCorruptedError(environment.name, environment.path);
    }

    return environment;
  }

  private rollback(originalSearchPath: string | null): void {
    const steps: Array<[string, () => void]> = [
      ['disable hooks', () => this.interceptor.disableHooks()],
      ['disable guard', () => this.guard.disable()],
      ['restore search path', () => { this.searchPath.restoreOriginal(originalSearchPath); }],
      ['clear session', () => this.context.clear()],
      ['restore prompt', () => this.prompt?.restore()]
    ];

    for (const [label, step] of steps) {
      try {
        step();
      } catch (error) {
        logger.warn(`Rollback step '${label}' failed: ${getErrorMessage(error)}`);
      }
    }
  }

  private emergencyCleanup(originalSearchPath: string | null): void {
    const steps = [
      () => this.interceptor.disableHooks(),
      () => this.guard.disable(),
      () => { this.searchPath.restoreOriginal(originalSearchPath); },
      () => this.prompt?.restore(),
      () => this.context.clear()
    ];

    for (const step of steps) {
      try {
        step();
      } catch (error) {
        logger.debug(`Emergency cleanup step failed: ${getErrorMessage(error)}`);
      }
    }
  }
}
