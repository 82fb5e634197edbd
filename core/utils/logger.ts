import winston from 'winston';
import path from 'path';
import { loggingConfig, type LoggingService } from '@core/config/logging';

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
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
 * Resolve the level for a service from the environment.
 * LOG_LEVEL wins, then TEST_LOG_LEVEL under test, then OS_STRINGS_DEBUG.
 */
export function resolveLogLevel(
  service: LoggingService,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }

  if (env.NODE_ENV === 'test') {
    return env.TEST_LOG_LEVEL || 'error';
  }

  if (env.OS_STRINGS_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[service].level;
}

function createTransports(level: string): winston.transport[] {
  const transports: winston.transport[] = [];

  // Only use console transport outside of tests
  if (process.env.NODE_ENV !== 'test') {
    transports.push(new winston.transports.Console({ format: consoleFormat, level }));
  }

  const logDir = process.env.OS_STRINGS_LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, loggingConfig.files.mainLog),
        format: fileFormat,
        maxsize: loggingConfig.files.maxSize,
        maxFiles: loggingConfig.files.maxFiles,
        tailable: loggingConfig.files.tailable
      })
    );
  }

  // winston warns about loggers without transports
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return transports;
}

/**
 * Create a winston logger tagged with the given service name.
 */
export function createServiceLogger(serviceName: LoggingService): winston.Logger {
  const level = resolveLogLevel(serviceName);

  return winston.createLogger({
    level,
    levels: loggingConfig.levels,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    defaultMeta: { service: serviceName },
    transports: createTransports(level)
  });
}

export const stringsLogger = createServiceLogger('strings');
export const pathLogger = createServiceLogger('path');
