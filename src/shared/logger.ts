// Shared logger
// Every component logs through this instance with a `[Component]` prefix

import winston from 'winston';
import { inspect } from 'util';

const SPLAT = Symbol.for('splat');

const formatExtra = (value: unknown): string => {
  if (value instanceof Error) {
    return value.stack || value.message;
  }
  if (typeof value === 'string') {
    return value;
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
};

const appendExtras = winston.format((info) => {
  const extras: unknown = Reflect.get(info, SPLAT);
  if (Array.isArray(extras) && extras.length > 0) {
    info.message = `${String(info.message)} ${extras.map(formatExtra).join(' ')}`;
  }
  return info;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    appendExtras(),
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => `${timestamp} ${level.toUpperCase()} ${message}`)
  ),
  transports: [new winston.transports.Console()],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
