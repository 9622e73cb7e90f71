import path from 'path';
import winston from 'winston';

const { createLogger: winstonCreateLogger, format, transports } = winston;
const { combine, timestamp, printf, colorize, errors } = format;

const logFormat = printf(({ level, message, timestamp, module, stack, ...metadata }) => {
  const moduleString = module ? ` [${String(module)}]` : '';
  let msg = `${String(timestamp)} [${level}]${moduleString} ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  if (stack) {
    msg += `\n${String(stack)}`;
  }
  return msg;
});

/** Every npm level goes to stderr so that stdout carries only the tools' own output. */
export const STDERR_LEVELS = Object.keys(winston.config.npm.levels);

const buildTransports = () => {
  const consoleTransport = new transports.Console({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(colorize(), logFormat),
    stderrLevels: STDERR_LEVELS,
  });
  const logDir = process.env.LOG_DIR;
  if (!logDir) {
    return [consoleTransport];
  }
  return [
    consoleTransport,
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error'
    }),
    new transports.File({
      filename: path.join(logDir, 'combined.log')
    })
  ];
};

export const createLogger = (module: string) => {
  return winstonCreateLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
      errors({ stack: true }),
      timestamp(),
      logFormat
    ),
    transports: buildTransports(),
    defaultMeta: { module }
  });
};
