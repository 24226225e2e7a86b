/**
 * Process-wide winston logger.
 *
 * Everything is written to stderr so that CLI output on stdout stays clean
 * for `--json` consumers.
 */

import winston from 'winston';

const { combine, timestamp, printf, json, errors } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';
export type LogFormat = 'json' | 'pretty';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

const prettyFormat = printf(({ level, message, timestamp: ts, ...metadata }) => {
  let line = `${String(ts)} [${level}]: ${String(message)}`;
  const keys = Object.keys(metadata);
  if (keys.length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  return line;
});

function buildFormat(format: LogFormat): winston.Logform.Format {
  if (format === 'json') {
    return combine(timestamp(), errors({ stack: true }), json());
  }
  return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), prettyFormat);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const lower = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === lower) ?? 'info';
}

const consoleTransport = new winston.transports.Console({
  stderrLevels: ['error', 'warn', 'info', 'debug'],
});

const rootLogger = winston.createLogger({ exitOnError: false });

configureLogging({
  level: parseLogLevel(process.env['LOG_LEVEL']),
  format: process.env['LOG_FORMAT'] === 'json' ? 'json' : 'pretty',
});

/** Reconfigure the root logger once the application config is loaded. */
export function configureLogging(options: { level: LogLevel; format: LogFormat }): void {
  rootLogger.configure({
    level: options.level === 'silent' ? 'error' : options.level,
    silent: options.level === 'silent',
    format: buildFormat(options.format),
    transports: [consoleTransport],
    exitOnError: false,
  });
}

export type Logger = winston.Logger;

export function createChildLogger(component: string): Logger {
  return rootLogger.child({ component });
}

/** Shorten SQL for log lines. */
export function sqlPreview(sql: string, max = 120): string {
  const flat = sql.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

export default rootLogger;
