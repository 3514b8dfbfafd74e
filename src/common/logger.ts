import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { LoggerService } from '@nestjs/common';

const APP_DIR_NAME = 'mpv-supervisor';

// Determine log directory based on platform
const getLogDirectory = (): string => {
  if (process.env.NODE_ENV === 'development') {
    // In development, log to project root
    return path.join(process.cwd(), 'logs');
  }

  const homeDir = process.env.HOME || process.env.USERPROFILE || '.';

  if (process.platform === 'darwin') {
    // macOS: ~/Library/Logs/mpv-supervisor
    return path.join(homeDir, 'Library', 'Logs', APP_DIR_NAME);
  } else if (process.platform === 'win32') {
    // Windows: %APPDATA%/mpv-supervisor/logs
    const appData = process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming');
    return path.join(appData, APP_DIR_NAME, 'logs');
  }
  // Linux: ~/.config/mpv-supervisor/logs
  return path.join(homeDir, '.config', APP_DIR_NAME, 'logs');
};

// Custom format for better readability
const customFormat = winston.format.printf(({ level, message, timestamp, context, ...metadata }) => {
  const scope = typeof context === 'string' ? ` [${context}]` : '';
  let msg = `${timestamp} [${level.toUpperCase()}]${scope} ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const fileTransports = (): winston.transports.FileTransportInstance[] => {
  // Test runs stay on the console
  if (process.env.NODE_ENV === 'test') {
    return [];
  }

  const logDir = getLogDirectory();
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return [
    // File transport for all logs
    new winston.transports.File({
      filename: path.join(logDir, 'backend.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
    // File transport for errors only
    new winston.transports.File({
      filename: path.join(logDir, 'backend-error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
  ];
};

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    customFormat,
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        customFormat,
      ),
    }),
    ...fileTransports(),
  ],
  exitOnError: false,
});

/**
 * Routes Nest's Logger into winston.
 * Nest passes the context as the last optional parameter, and a stack
 * before it for errors.
 */
export class WinstonLoggerService implements LoggerService {
  constructor(private readonly target: winston.Logger = logger) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }

  private write(level: string, message: unknown, optionalParams: unknown[]): void {
    const params = [...optionalParams];
    const last = params[params.length - 1];
    // A lone multi-line string is a stack trace, not a context
    const strings = params.filter((param) => typeof param === 'string').length;
    const context = typeof last === 'string' && (strings > 1 || !last.includes('\n')) ? last : undefined;
    if (context !== undefined) {
      params.pop();
    }

    const text = message instanceof Error ? message.message : typeof message === 'string' ? message : JSON.stringify(message);
    const meta: Record<string, unknown> = {};
    if (context !== undefined) {
      meta.context = context;
    }
    const stack = params.find((param): param is string => typeof param === 'string');
    if (stack) {
      meta.stack = stack;
    }

    this.target.log(level, text, meta);
  }
}
