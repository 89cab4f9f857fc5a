import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration, relative to the modenv home directory
  files: {
    directory: 'logs',
    mainLog: 'modenv.log',
    errorLog: 'error.log',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  defaultLevel: 'warn',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    session: { level: 'warn' },
    guard: { level: 'warn' },
    interceptor: { level: 'warn' },
    resolver: { level: 'warn' },
    loader: { level: 'warn' },
    registry: { level: 'warn' },
    repository: { level: 'warn' },
    host: { level: 'warn' },
    cli: { level: 'warn' }
  }
} as const;

export type LoggerServiceName = keyof typeof loggingConfig.services;
