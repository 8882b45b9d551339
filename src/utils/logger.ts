import path from 'path';
import winston from 'winston';
import { config } from '../config/config';

const { nodeEnv } = config.server;
const isTest = nodeEnv === 'test';
const logDir = process.env.LOG_DIR || './logs';

const humanReadable = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} ${level} ${message}${extra}`;
});

function fileTransports() {
  return [
    new winston.transports.File({ filename: path.join(logDir, 'broker-error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(logDir, 'broker.log') }),
  ];
}

export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: { service: 'relay-broker' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  silent: isTest,
  transports: isTest ? [new winston.transports.Console()] : fileTransports(),
});

// Operators tail the console locally; production ships the JSON files
if (nodeEnv !== 'production' && !isTest) {
  logger.add(
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
        humanReadable
      ),
    })
  );
}

export default logger;
