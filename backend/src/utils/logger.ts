import winston from 'winston';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const defaultLevel = isTest ? 'error' : 'info';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || defaultLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'recommendation-service' },
  transports: [
    new winston.transports.Console({
      // Keep stdout clean for the CLI, which prints its result there
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: isProduction
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          ),
    }),
  ],
});
