import { createLogger, format, transports } from 'winston';

const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  // stdout carries only command output (--json); every log level goes to stderr.
  transports: [
    new transports.Stream({
      stream: process.stderr,
      format: format.combine(
        format.colorize(),
        format.simple()
      )
    })
  ]
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
