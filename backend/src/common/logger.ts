// cutshift/backend/src/common/logger.ts
import { LoggerService, LogLevel } from '@nestjs/common';
import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { environment } from '../config/environment';

const APP_DIR = 'cutshift';
const MAX_LOG_SIZE = 10 * 1024 * 1024;

function resolveLogDirectory(): string {
  if (environment.logging.directory) {
    return environment.logging.directory;
  }
  if (!environment.production) {
    return path.join(process.cwd(), 'logs');
  }

  const homeDir = process.env.HOME || process.env.USERPROFILE || '.';
  switch (process.platform) {
    case 'darwin':
      return path.join(homeDir, 'Library', 'Logs', APP_DIR);
    case 'win32':
      return path.join(process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming'), APP_DIR, 'logs');
    default:
      return path.join(homeDir, '.config', APP_DIR, 'logs');
  }
}

const logDir = resolveLogDirectory();
fs.mkdirSync(logDir, { recursive: true });

// "<time> [LEVEL] [Context] message"
const lineFormat = winston.format.printf(({ level, message, timestamp, context, stack }) => {
  const scope = typeof context === 'string' ? ` [${context}]` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${timestamp} [${level.toUpperCase()}]${scope} ${message}${trace}`;
});

const logger = winston.createLogger({
  level: environment.logging.level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    lineFormat,
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        lineFormat,
        winston.format.colorize({ all: true }),
      ),
    }),
    new winston.transports.File({
      filename: path.join(logDir, `${APP_DIR}.log`),
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true,
    }),
    new winston.transports.File({
      filename: path.join(logDir, `${APP_DIR}-error.log`),
      level: 'error',
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true,
    }),
  ],
  exitOnError: false,
});

const join = (args: unknown[]): string =>
  args
    .map((arg) => {
      if (arg instanceof Error) return arg.stack ?? arg.message;
      return typeof arg === 'string' ? arg : JSON.stringify(arg);
    })
    .join(' ');

/** Plain logging for code that runs outside of Nest (bootstrap). */
export const log = {
  info: (...args: unknown[]) => logger.info(join(args)),
  error: (...args: unknown[]) => logger.error(join(args)),
  warn: (...args: unknown[]) => logger.warn(join(args)),
  debug: (...args: unknown[]) => logger.debug(join(args)),
};

const NEST_LEVELS: Record<LogLevel, string> = {
  log: 'info',
  error: 'error',
  warn: 'warn',
  debug: 'debug',
  verbose: 'verbose',
  fatal: 'error',
};

/**
 * Routes Nest's logger (and with it every `new Logger(Context)`) into the
 * winston transports above.
 */
export class WinstonLogger implements LoggerService {
  log(message: unknown, context?: string): void {
    this.write('log', message, context);
  }

  error(message: unknown, stackOrContext?: string, context?: string): void {
    // Nest passes (message, stack, context), or (message, context) without a stack
    if (context === undefined) {
      this.write('error', message, stackOrContext);
      return;
    }
    logger.log({ level: 'error', message: join([message]), context, stack: stackOrContext });
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.write('verbose', message, context);
  }

  fatal(message: unknown, context?: string): void {
    this.write('fatal', message, context);
  }

  private write(level: LogLevel, message: unknown, context?: string): void {
    logger.log({ level: NEST_LEVELS[level], message: join([message]), context });
  }
}
