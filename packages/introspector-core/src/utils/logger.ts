import winston from 'winston';
import path from 'path';
import { config } from '../config/index.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

// stdout carries the result envelope, so every console level goes to stderr
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

// Custom format for console logging
const consoleFormat = printf(({ level, message, timestamp, context, stack, ...metadata }) => {
  let log = `${String(timestamp)} [${typeof context === 'string' ? context : 'App'}] ${level}: ${String(message)}`;
  if (typeof stack === 'string') {
    log += `\n${stack}`;
  }
  // Avoid printing empty metadata objects
  if (Object.keys(metadata).length > 0) {
    log += ` ${JSON.stringify(metadata, null, 2)}`;
  }
  return log;
});

const fileFormat = combine(
  timestamp(),
  errors({ stack: true }),
  json()
);

function createFileTransports(logDir: string): winston.transports.FileTransportInstance[] {
  const resolvedDir = path.resolve(logDir);
  return [
    new winston.transports.File({
      filename: path.join(resolvedDir, 'combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }),
    new winston.transports.File({
      level: 'error',
      filename: path.join(resolvedDir, 'error.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 3,
      tailable: true,
    }),
  ];
}

const logger: winston.Logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
    errors({ stack: true })
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: combine(colorize(), consoleFormat),
    }),
    // File logging only when a directory is configured
    ...(config.logDir ? createFileTransports(config.logDir) : []),
  ],
  exitOnError: false,
});

/**
 * Creates a child logger with a specific context label.
 * @param context - The context label (e.g., 'SyntaxAnalyzer', 'IntrospectCmd').
 */
const createContextLogger = (context: string): winston.Logger => {
  return logger.child({ context });
};

export { logger, createContextLogger };
