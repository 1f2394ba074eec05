/**
 * Logger
 *
 * Leveled, context-tagged logger. Writes to stderr so that stdout stays
 * reserved for command output and for the MCP JSON-RPC stream.
 *
 * Level comes from GRAPHPORT_LOG_LEVEL (debug | info | warn | error | silent).
 */

import { formatLocalDate } from './timestamp.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(context: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Line sink (default: stderr) */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(value = process.env.GRAPHPORT_LOG_LEVEL): LogLevel {
  const normalized = value?.toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  try {
    return ' ' + JSON.stringify(meta);
  } catch {
    return ' [unserializable meta]';
  }
}

export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const threshold = LEVEL_ORDER[level];

  const log = (lineLevel: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[lineLevel] < threshold) {
      return;
    }
    write(
      `[${formatLocalDate()}] [${lineLevel.toUpperCase()}] [${context}] ${message}${formatMeta(meta)}`
    );
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (childContext) => createLogger(`${context}:${childContext}`, { level, write }),
  };
}
