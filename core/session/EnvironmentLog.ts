import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage } from '@core/errors';
import { sessionLogger as logger } from '@core/utils/logger';

export const LOG_DIRECTORY = 'Logs';
export const ACTIVATION_LOG = 'activation.log';
export const MODULES_LOG = 'modules.log';

/**
 * Append-only text logs kept inside each environment. Write failures are
 * reported at debug level and otherwise ignored.
 */
export class EnvironmentLog {
  constructor(private readonly now: () => Date = () => new Date()) {}

  static activationLogPath(environmentPath: string): string {
    return path.join(environmentPath, LOG_DIRECTORY, ACTIVATION_LOG);
  }

  static modulesLogPath(environmentPath: string): string {
    return path.join(environmentPath, LOG_DIRECTORY, MODULES_LOG);
  }

  async activation(environmentPath: string, message: string): Promise<void> {
    await this.append(EnvironmentLog.activationLogPath(environmentPath), message);
  }

  async modules(environmentPath: string, message: string): Promise<void> {
    await this.append(EnvironmentLog.modulesLogPath(environmentPath), message);
  }

  private async append(file: string, message: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(file), { recursive: true });
      await fs.promises.appendFile(file, `[${this.now().toISOString()}] ${message}\n`, 'utf8');
    } catch (error) {
      logger.debug(`Could not append to ${file}: ${getErrorMessage(error)}`);
    }
  }
}
