import chalk from 'chalk';
import type { ModEnvStatus } from '@core/ModEnv';
import type { EnvironmentSummary } from '@core/services/EnvironmentService';
import type { PackageInfo, UpdateSummary } from '@core/services/PackageService';
import type { InstalledPackage } from '@core/host/types';

export class OutputFormatter {

  static formatEnvironmentList(environments: EnvironmentSummary[], options: { detailed?: boolean } = {}): string {
    if (environments.length === 0) {
      return chalk.gray('No environments found');
    }

    const headers = options.detailed
      ? ['', 'Name', 'Packages', 'System paths', 'Created', 'Path']
      : ['', 'Name', 'Packages', 'Path'];

    const rows = environments.map(environment => {
      const marker = environment.active ? '*' : environment.healthy ? '' : '!';
      const base = [marker, environment.name, String(environment.moduleCount)];
      return options.detailed
        ? [...base, environment.includeSystemPaths ? 'yes' : 'no', environment.created.slice(0, 10), environment.path]
        : [...base, environment.path];
    });

    const lines = [OutputFormatter.formatTable(headers, rows)];

    if (options.detailed) {
      for (const environment of environments) {
        if (environment.modules && environment.modules.length > 0) {
          lines.push('');
          lines.push(chalk.bold(environment.name));
          for (const module of environment.modules) {
            lines.push(`  ${module.name} ${module.version}${module.repository ? chalk.gray(` (${module.repository})`) : ''}`);
          }
        }
      }
    }

    if (environments.some(environment => !environment.healthy)) {
      lines.push(chalk.yellow('! directory missing'));
    }

    return lines.join('\n');
  }

  static formatPackageList(packages: PackageInfo[]): string {
    if (packages.length === 0) {
      return chalk.gray('No packages installed');
    }

    const rows = packages.map(pkg => [
      pkg.name,
      pkg.version,
      pkg.loaded ? 'loaded' : '',
      pkg.description ?? ''
    ]);
    return OutputFormatter.formatTable(['Name', 'Version', 'Status', 'Description'], rows);
  }

  static formatInstallResult(installed: InstalledPackage): string {
    const lines: string[] = [];
    const walk = (pkg: InstalledPackage, depth: number): void => {
      const status = pkg.status === 'installed' ? chalk.green('installed') : chalk.gray('already present');
      lines.push(`${'  '.repeat(depth)}${pkg.name} ${pkg.version}  ${status}`);
      for (const dependency of pkg.dependencies) {
        walk(dependency, depth + 1);
      }
    };
    walk(installed, 0);
    return lines.join('\n');
  }

  static formatUpdateSummary(summary: UpdateSummary): string {
    const lines: string[] = [];

    for (const detail of summary.details) {
      const target = detail.to && detail.to !== detail.from ? ` -> ${detail.to}` : '';
      const reason = detail.reason ? chalk.gray(` (${detail.reason})`) : '';
      const status = detail.status === 'updated' ? chalk.green(detail.status)
        : detail.status === 'failed' ? chalk.red(detail.status)
        : detail.status === 'skipped' ? chalk.yellow(detail.status)
        : chalk.gray(detail.status);
      lines.push(`  ${detail.name} ${detail.from}${target}  ${status}${reason}`);
    }

    const parts = [`${summary.updated} updated`, `${summary.current} current`];
    if (summary.skipped > 0) {
      parts.push(chalk.yellow(`${summary.skipped} skipped`));
    }
    if (summary.failed > 0) {
      parts.push(chalk.red(`${summary.failed} failed`));
    }

    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(parts.join(', '));
    return lines.join('\n');
  }

  static formatStatus(status: ModEnvStatus): string {
    const lines: string[] = [];

    if (status.session) {
      lines.push(`${chalk.bold('Active:')} ${chalk.green(status.session.environmentName)} (${status.session.scope})`);
      lines.push(`  Path: ${status.session.environmentPath}`);
      lines.push(`  Since: ${status.session.activatedAt}`);
    } else {
      lines.push(`${chalk.bold('Active:')} ${chalk.gray('none')}`);
    }

    lines.push(`${chalk.bold('Guard:')} ${status.guard.state}, ${status.guard.stats.restorations} restoration(s), hooks ${status.hooksEnabled ? 'on' : 'off'}`);
    lines.push(chalk.bold(`${status.searchPathVariable}:`));
    if (status.searchPath.length === 0) {
      lines.push(chalk.gray('  (unset)'));
    }
    for (const entry of status.searchPath) {
      lines.push(`  ${entry}`);
    }

    if (status.loadedPackages.length > 0) {
      lines.push(chalk.bold('Loaded:'));
      for (const pkg of status.loadedPackages) {
        lines.push(`  ${pkg.name} ${pkg.version} ${chalk.gray(`[${pkg.source}]`)}`);
      }
    }

    return lines.join('\n');
  }

  static formatError(error: Error, options: { verbose?: boolean } = {}): string {
    const lines: string[] = [];

    lines.push(chalk.red(`Error: ${error.message}`));

    if (options.verbose && error.stack) {
      lines.push('');
      lines.push(chalk.gray('Stack trace:'));
      lines.push(chalk.gray(error.stack));
    }

    return lines.join('\n');
  }

  static formatTable(headers: string[], rows: string[][]): string {
    if (rows.length === 0) {
      return chalk.gray('No data to display');
    }

    const widths = headers.map((header, i) => {
      const maxRowWidth = Math.max(...rows.map(row => (row[i] || '').length));
      return Math.max(header.length, maxRowWidth);
    });

    const lines: string[] = [];

    const headerLine = headers.map((header, i) => header.padEnd(widths[i])).join(' │ ');
    lines.push(`┌─${widths.map(w => '─'.repeat(w)).join('─┬─')}─┐`);
    lines.push(`│ ${headerLine} │`);
    lines.push(`├─${widths.map(w => '─'.repeat(w)).join('─┼─')}─┤`);

    for (const row of rows) {
      const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join(' │ ');
      lines.push(`│ ${rowLine} │`);
    }

    lines.push(`└─${widths.map(w => '─'.repeat(w)).join('─┴─')}─┘`);

    return lines.join('\n');
  }
}
