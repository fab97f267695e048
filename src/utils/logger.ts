import winston from 'winston';
import path from 'path';

// Define log format
const fileFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, stack, service: _service, version: _version, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level}]: ${stack || message}${metaStr}`;
  })
);

// Create logger instance
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: {
    service: 'license-audit',
    version: process.env.npm_package_version || '1.0.0'
  },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      silent: process.env.NODE_ENV === 'test'
    })
  ]
});

// Persist a JSON copy of the run when a log file is requested
if (process.env.LOG_FILE) {
  logger.add(new winston.transports.File({
    filename: path.resolve(process.cwd(), process.env.LOG_FILE),
    format: fileFormat,
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
}

export const setLogLevel = (level: string): void => {
  logger.level = level;
};

export default logger;
