import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Logger whose lines carry `scope` and the given fields on every entry. */
  child(scope: string, fields?: LogMeta): Logger;
}

// Error instances stringify to {}
function serializable(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function write(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = serializable(meta);
  const hasFields = Object.keys(fields).length > 0;
  const label = scope ? `${scope}: ${message}` : message;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, scope, message, ...fields })
    : hasFields ? `[${ts}] [${level.toUpperCase()}] ${label} ${JSON.stringify(fields)}`
                : `[${ts}] [${level.toUpperCase()}] ${label}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

function createLogger(scope?: string, bound: LogMeta = {}): Logger {
  const log = (level: LogLevel) => (msg: string, meta?: LogMeta) =>
    write(level, scope, msg, { ...bound, ...meta });
  return {
    debug: log('debug'),
    info:  log('info'),
    warn:  log('warn'),
    error: log('error'),
    child: (childScope, fields) =>
      createLogger(scope ? `${scope}/${childScope}` : childScope, { ...bound, ...fields }),
  };
}

export const logger = createLogger();
