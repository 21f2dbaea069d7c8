import pino from 'pino';

// Keys whose values never reach the log stream. Matched case-insensitively.
const REDACTED_KEYS = new Set([
  'password',
  'currentpassword',
  'newpassword',
  'passwordhash',
  'hash',
  'salt',
  'token',
  'sessiontoken',
  'session',
  'cookie',
  'cookies',
  'authorization',
  'email',
  'ip',
  'remoteaddress',
  'content',
  'body',
]);

function isRedactedKey(key: string): boolean {
  return REDACTED_KEYS.has(key.toLowerCase());
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return redact(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

function redact(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = isRedactedKey(key) ? '[REDACTED]' : redactValue(value);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(redact(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(redact(meta), msg);
    },
    error(meta, msg) {
      logger.error(redact(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(redact(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(redact(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(redact(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const instance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(instance);
}

export { redact as redactLogMeta };
