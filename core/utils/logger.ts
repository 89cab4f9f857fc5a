import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { loggingConfig, type LoggerServiceName } from '@core/config/logging';

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output unless debugging
    if (process.env.MODENV_DEBUG !== 'true') {
      return `${level}: ${String(message)}`;
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

const getLogLevel = (fallback: string): string => {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.MODENV_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
};

const isSilentTest = (): boolean => process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL;

/**
 * Factory for service-scoped winston loggers
 */
export class LoggerFactory {
  private readonly loggers = new Map<LoggerServiceName, winston.Logger>();

  createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const serviceConfig = loggingConfig.services[serviceName];
    const logger = winston.createLogger({
      level: getLogLevel(serviceConfig.level),
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn'],
          silent: isSilentTest()
        })
      ]
    });

    this.loggers.set(serviceName, logger);
    return logger;
  }

  all(): winston.Logger[] {
    return [...this.loggers.values()];
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const sessionLogger = createServiceLogger('session');
export const guardLogger = createServiceLogger('guard');
export const interceptorLogger = createServiceLogger('interceptor');
export const resolverLogger = createServiceLogger('resolver');
export const loaderLogger = createServiceLogger('loader');
export const registryLogger = createServiceLogger('registry');
export const repositoryLogger = createServiceLogger('repository');
export const hostLogger = createServiceLogger('host');
export const cliLogger = createServiceLogger('cli');

/**
 * Set the level on every service logger and its transports.
 */
export function setLogLevel(level: string): void {
  for (const logger of loggerFactory.all()) {
    logger.level = level;
    logger.transports.forEach(transport => {
      transport.level = level;
    });
  }
}

let fileLoggingDirectory: string | undefined;

/**
 * Attach JSON file transports under the given directory. Called once by the
 * CLI; libraries embedding modenv keep console-only logging.
 */
export function configureFileLogging(directory: string): void {
  if (fileLoggingDirectory === directory || process.env.NODE_ENV === 'test') {
    return;
  }

  fs.mkdirSync(directory, { recursive: true });
  fileLoggingDirectory = directory;

  const mainLog = new winston.transports.File({
    filename: path.join(directory, loggingConfig.files.mainLog),
    format: fileFormat,
    maxsize: loggingConfig.files.maxSize,
    maxFiles: loggingConfig.files.maxFiles,
    tailable: loggingConfig.files.tailable
  });
  const errorLog = new winston.transports.File({
    filename: path.join(directory, loggingConfig.files.errorLog),
    level: 'error',
    format: fileFormat,
    maxsize: loggingConfig.files.maxSize,
    maxFiles: loggingConfig.files.maxFiles,
    tailable: loggingConfig.files.tailable
  });

  for (const logger of loggerFactory.all()) {
    logger.add(mainLog);
    logger.add(errorLog);
  }
}

export default sessionLogger;
