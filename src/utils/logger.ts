import winston from 'winston';

const { combine, timestamp, printf, colorize, align } = winston.format;

// Define custom log levels and colors
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, ...meta }) => {
  const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `[${timestamp}] ${level}: ${message}${metaString}`;
});

const baseLevel = process.env.LOG_LEVEL || 'info';

const transports: winston.transport[] = [new winston.transports.Console()];

// File output is opt-in; the node normally runs attached to a terminal next to the patch
if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: winston.format.json(),
    })
  );
}

// Create logger instance
const logger = winston.createLogger({
  levels,
  level: baseLevel,
  format: combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    align(),
    consoleFormat
  ),
  transports,
});

/**
 * Toggle debug output. Verbose mode shows every handled message; otherwise the
 * level configured through LOG_LEVEL applies.
 */
export function setVerbose(enabled: boolean): void {
  logger.level = enabled ? 'debug' : baseLevel;
}

export { logger };
