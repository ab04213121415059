import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration, used when NODE_ENV=production or RECSCOPE_LOG_DIR is set
  files: {
    directory: 'logs',
    mainLog: 'recscope.log',
    errorLog: 'error.log',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  // Default level based on environment
  defaultLevel: 'warn',

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    macro: {
      level: 'warn'
    },
    shell: {
      level: 'warn'
    },
    builder: {
      level: 'warn'
    },
    parser: {
      level: 'warn'
    },
    graph: {
      level: 'warn'
    },
    loader: {
      level: 'info'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type LoggedService = keyof typeof loggingConfig.services;
