import winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { loggingConfig, type LoggedService } from '@core/config/logging';

/**
 * Interface for the LoggerFactory
 */
export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggedService): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // In non-debug mode, use more concise output
    if (process.env.RECSCOPE_DEBUG !== 'true') {
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

/**
 * Determine the log level for a service based on environment variables
 */
function resolveLogLevel(fallback: string): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.RECSCOPE_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

function fileTransports(): winston.transport[] {
  const directory = process.env.RECSCOPE_LOG_DIR
    ?? (process.env.NODE_ENV === 'production' ? loggingConfig.files.directory : undefined);
  if (!directory) {
    return [];
  }

  if (!fs.existsSync(directory)) {
    fs.mkdirSync(directory, { recursive: true });
  }

  return [
    new winston.transports.File({
      filename: path.join(directory, loggingConfig.files.mainLog),
      format: fileFormat,
      maxsize: loggingConfig.files.maxSize,
      maxFiles: loggingConfig.files.maxFiles,
      tailable: loggingConfig.files.tailable
    }),
    // Separate file for errors
    new winston.transports.File({
      filename: path.join(directory, loggingConfig.files.errorLog),
      level: 'error',
      format: fileFormat,
      maxsize: loggingConfig.files.maxSize,
      maxFiles: loggingConfig.files.maxFiles,
      tailable: loggingConfig.files.tailable
    })
  ];
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly shared = fileTransports();

  /**
   * Create a service-specific logger
   */
  createServiceLogger(serviceName: LoggedService): winston.Logger {
    const level = resolveLogLevel(loggingConfig.services[serviceName].level);

    return winston.createLogger({
      level,
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      // Winston warns when a logger has no transports, so tests get a silent one
      transports: process.env.NODE_ENV === 'test'
        ? [new winston.transports.Console({ silent: !process.env.TEST_LOG_LEVEL, format: consoleFormat })]
        : [
          // Diagnostics go to stderr so command output stays clean on stdout
          new winston.transports.Console({
            format: consoleFormat,
            stderrLevels: Object.keys(loggingConfig.levels)
          }),
          ...this.shared
        ]
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggedService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

/**
 * Change the level of every service logger at once (used by --verbose/--debug).
 */
export function setLogLevel(level: string): void {
  for (const serviceLogger of allLoggers) {
    serviceLogger.level = level;
  }
}

// Create service loggers
export const macroLogger = createServiceLogger('macro');
export const shellLogger = createServiceLogger('shell');
export const builderLogger = createServiceLogger('builder');
export const parserLogger = createServiceLogger('parser');
export const graphLogger = createServiceLogger('graph');
export const loaderLogger = createServiceLogger('loader');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

const allLoggers = [
  macroLogger,
  shellLogger,
  builderLogger,
  parserLogger,
  graphLogger,
  loaderLogger,
  configLogger,
  cliLogger
];
