import type { HostRuntime } from '@core/host/types';
import { guardLogger as logger } from '@core/utils/logger';
import { getErrorMessage } from '@core/errors';

export type GuardState = 'Inactive' | 'Armed' | 'BypassWindow';

export interface PathGuardOptions {
  /** Reconciliation tick in milliseconds */
  intervalMs?: number;
}

export interface PathGuardStats {
  ticks: number;
  restorations: number;
  failures: number;
  bypasses: number;
}

export const DEFAULT_GUARD_INTERVAL_MS = 150;

/**
 * Watchdog that reverts unauthorized changes to the host search path.
 *
 * Inactive -> Armed on enable(); Armed -> BypassWindow on requestBypass();
 * BypassWindow -> Armed when the bypass timer fires; any -> Inactive on
 * disable(). A new bypass request replaces the pending deadline.
 */
export class PathGuard {
  private state: GuardState = 'Inactive';
  private protectedPath: string | null = null;
  private ticker: NodeJS.Timeout | null = null;
  private bypassTimer: NodeJS.Timeout | null = null;
  private bypassDeadline: number | null = null;
  private readonly intervalMs: number;
  private readonly stats: PathGuardStats = { ticks: 0, restorations: 0, failures: 0, bypasses: 0 };

  constructor(
    private readonly host: Pick<HostRuntime, 'readSearchPath' | 'writeSearchPath' | 'searchPathVariable'>,
    options: PathGuardOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_GUARD_INTERVAL_MS;
  }

  enable(protectedPath: string): boolean {
    if (this.state !== 'Inactive') {
      logger.warn(`${this.host.searchPathVariable} is already protected`);
      return false;
    }

    this.protectedPath = protectedPath;
    this.state = 'Armed';
    this.ticker = setInterval(() => this.check(), this.intervalMs);
    this.ticker.unref?.();
    logger.debug(`Guard armed on ${this.host.searchPathVariable}`, { intervalMs: this.intervalMs });
    return true;
  }

  disable(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
    this.clearBypassTimer();

    if (this.state !== 'Inactive') {
      logger.debug('Guard disarmed', { ...this.stats });
    }
    this.state = 'Inactive';
    this.protectedPath = null;
  }

  requestBypass(durationSeconds: number): void {
    if (this.state === 'Inactive') {
      logger.debug('Bypass requested while guard inactive; ignoring');
      return;
    }

    this.clearBypassTimer();
    const durationMs = Math.max(0, Math.round(durationSeconds * 1000));
    this.bypassDeadline = Date.now() + durationMs;
    this.state = 'BypassWindow';
    this.stats.bypasses++;

    this.bypassTimer = setTimeout(() => this.endBypass(), durationMs);
    this.bypassTimer.unref?.();
    logger.debug(`Bypass window open for ${durationSeconds}s`);
  }

  /**
   * One reconciliation tick. Restore failures are logged, never thrown.
   */
  check(): void {
    if (this.state !== 'Armed' || this.protectedPath === null) {
      return;
    }

    this.stats.ticks++;
    const live = this.host.readSearchPath();
    if (live === this.protectedPath) {
      return;
    }

    try {
      this.host.writeSearchPath(this.protectedPath);
      this.stats.restorations++;
      logger.info(`Reverted unauthorized change to ${this.host.searchPathVariable}`, { observed: live });
    } catch (error) {
      this.stats.failures++;
      logger.warn(`Failed to restore ${this.host.searchPathVariable}: ${getErrorMessage(error)}`);
    }
  }

  getState(): GuardState {
    return this.state;
  }

  getProtectedPath(): string | null {
    return this.protectedPath;
  }

  getBypassDeadline(): number | null {
    return this.bypassDeadline;
  }

  getStats(): PathGuardStats {
    return { ...this.stats };
  }

  private endBypass(): void {
    this.bypassTimer = null;
    this.bypassDeadline = null;
    if (this.state === 'BypassWindow') {
      this.state = 'Armed';
      logger.debug('Bypass window expired');
    }
  }

  private clearBypassTimer(): void {
    if (this.bypassTimer) {
      clearTimeout(this.bypassTimer);
      this.bypassTimer = null;
    }
    this.bypassDeadline = null;
  }
}
