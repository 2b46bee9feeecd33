/**
 * Service Logger
 *
 * Winston logger shared by the ledger, the token and the HTTP routes.
 * Components take a child logger tagged with their module name.
 */

import winston from 'winston';

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
  debug: 'white',
};

winston.addColors(colors);

let logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

if (!(logLevel in levels)) {
  console.warn(`Invalid LOG_LEVEL "${logLevel}" specified. Using "info" instead.`);
  logLevel = 'info';
}

// bigint metadata (token amounts) has no JSON form
const stringifyMeta = (meta: Record<string, unknown>): string =>
  JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );

const printFormat = winston.format.printf((info) => {
  const { timestamp, level, message, module, stack, ...meta } = info;
  const tag = typeof module === 'string' ? `[${module}] ` : '';
  const metaStr = Object.keys(meta).length ? ` ${stringifyMeta(meta)}` : '';
  const stackStr = typeof stack === 'string' ? `\n${stack}` : '';
  return `[${String(timestamp)}] ${level}: ${tag}${String(message)}${metaStr}${stackStr}`;
});

export const logger = winston.createLogger({
  levels,
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), printFormat),
    }),
  ],
});

export function moduleLogger(module: string): winston.Logger {
  return logger.child({ module });
}
