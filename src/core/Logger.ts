import winston from 'winston';
import path from 'path';
import fs from 'fs';

const LOG_FOLDER = process.env.LOG_FOLDER || './logs';
const LOG_TO_FILE = process.env.LOG_TO_FILE !== 'false';

// Sensitive data patterns to filter
const SENSITIVE_PATTERNS = [
  /api[_-]?key[=:]\s*["']?[\w-]+["']?/gi,
  /token[=:]\s*["']?[\w-]+["']?/gi,
  /password[=:]\s*["']?[^"'\s]+["']?/gi,
  /secret[=:]\s*["']?[\w-]+["']?/gi,
];

/**
 * Replace the value of every `key=value` / `key: value` secret in a message.
 */
export function redactSensitiveData(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSensitiveData(info.message);
  }
  return info;
});

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module }) => {
    const modulePrefix = module ? `[${module}]` : '';
    return `${timestamp} ${level} ${modulePrefix} ${message}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  if (!LOG_TO_FILE) {
    return transports;
  }

  if (!fs.existsSync(LOG_FOLDER)) {
    fs.mkdirSync(LOG_FOLDER, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(LOG_FOLDER, 'finbridge-error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(LOG_FOLDER, 'finbridge.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  return transports;
}

// Create the main logger
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: createTransports(),
});

// Create a child logger with module context
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export default logger;
