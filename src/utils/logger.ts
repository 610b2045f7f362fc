import winston from 'winston';
import path from 'path';

const LOGS_PATH = process.env.LOGS_PATH || './logs';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
  winston.format.printf(({ timestamp, level, message, stack, service, ...meta }) => {
    const context = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${level.toUpperCase()}] ${service}: ${message}${context}${stack ? '\n' + stack : ''}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: process.env.LOG_SILENT === 'true',
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
];

if (process.env.LOG_TO_FILE !== 'false') {
  transports.push(
    // File transport for all logs
    new winston.transports.File({
      filename: path.join(LOGS_PATH, 'app.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),

    // File transport for error logs only
    new winston.transports.File({
      filename: path.join(LOGS_PATH, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  );
}

// Create logger instance
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'warn' : 'info'),
  format: logFormat,
  defaultMeta: { service: 'task-bridge' },
  transports
});

if (process.env.LOG_TO_FILE !== 'false') {
  logger.exceptions.handle(
    new winston.transports.File({
      filename: path.join(LOGS_PATH, 'exceptions.log')
    })
  );
}

export default logger;
