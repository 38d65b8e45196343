import winston from 'winston';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

// LOG_LEVEL wins; otherwise debug in development and warn elsewhere
const level = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  const env = process.env.NODE_ENV || 'development';
  return env === 'development' ? 'debug' : 'warn';
};

const RESERVED_KEYS = ['timestamp', 'level', 'message', 'stack'];

const printLine = winston.format.printf((info) => {
  const metadata = Object.fromEntries(
    Object.entries(info).filter(([key]) => !RESERVED_KEYS.includes(key))
  );
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  const extra = Object.keys(metadata).length > 0 ? `\n${JSON.stringify(metadata, null, 2)}` : '';

  return `${String(info.timestamp)} ${info.level}: ${String(info.message)}${stack}${extra}`;
});

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  printLine
);

// Define transports
const transports: winston.transport[] = [
  new winston.transports.Console({
    level: level(),
    format,
  }),
];

// Add file transport if LOG_FILE is specified
if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
        printLine
      ),
    })
  );
}

export const logger = winston.createLogger({
  level: level(),
  levels,
  format,
  transports,
});
