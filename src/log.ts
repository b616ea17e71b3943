import * as winston from 'winston';
import env from './env.js';

/**
 * Creates a logger that logs messages in JSON format.
 *
 * @param transports - the transports to write to
 * @returns The JSON Winston logger
 */
export function createJsonLogger(transports: winston.transport[]): winston.Logger {
  return winston.createLogger({
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports,
  });
}

/**
 * Formats a string as a log tag only if it is provided
 */
function optionalTag(tag: unknown): string {
  return typeof tag === 'string' && tag ? ` [${tag}]` : '';
}

const textFormat = winston.format.printf((info) => {
  let message = `${info.timestamp} [${info.level}]${optionalTag(info.component)}${optionalTag(info.dataset)}: ${info.message}`;
  if (typeof info.stack === 'string') message += `\n${info.stack}`;
  return message;
});

/**
 * Creates a logger that logs messages as text lines. Useful when running locally and viewing
 * logs in a terminal.
 *
 * @param transports - the transports to write to
 * @returns The text Winston logger
 */
export function createTextLogger(transports: winston.transport[]): winston.Logger {
  return winston.createLogger({
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ colors: { error: 'red', warn: 'yellow', info: 'blue' } }),
      textFormat,
    ),
    transports,
  });
}

const transport = new winston.transports.Console({ level: env.logLevel });
const logger = env.textLogger ? createTextLogger([transport]) : createJsonLogger([transport]);

/**
 * Changes the level of the console transport, e.g. from a command line flag.
 *
 * @param level - a winston npm log level
 */
export function setLogLevel(level: string): void {
  transport.level = level;
}

export default logger;
