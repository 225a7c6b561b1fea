import winston from 'winston';
import fs from 'fs';
import path from 'path';

const isTest = process.env.NODE_ENV === 'test';
const logsDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const transports: winston.transport[] = [
  // Console output
  new winston.transports.Console({
    format: consoleFormat,
    silent: isTest,
  }),
];

if (!isTest) {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  transports.push(
    // Error log file
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    // Combined log file
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'clipmix-backend' },
  transports,
});

/**
 * Child logger carrying the job id on every line, so the interleaved output
 * of concurrent exports can be told apart.
 */
export const jobLogger = (jobId: string): winston.Logger => logger.child({ jobId });

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
